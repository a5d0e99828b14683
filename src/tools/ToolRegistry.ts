/**
 * @fileoverview Tool Registry
 *
 * Sole owner of the intent → tool mapping. Each intent maps to at most one
 * active tool; a later registration for the same intent wins and is reported
 * as a conflict. Handler failures are contained here and converted into
 * `execution_error` outcomes so one misbehaving tool cannot take down the
 * dispatch loop.
 *
 * Events:
 * - `conflict` (intent, previousTool, newTool)
 * - `registered` / `unregistered` / `enabled` / `disabled` (toolName)
 * - `changed` after any of the above and after reload
 *
 * Mutation is synchronous, so it cannot interleave with the await points of
 * a running `executeIntent`.
 */

import { EventEmitter } from 'events';
import { Entities } from '../intent/types';
import { fail, formatOutcome } from './outcome';
import { ToolHandler, ToolOutcome } from './types';
import { ToolExecutionError, extractErrorDetails } from '../errors/AssistantErrors';
import logger from '../utils/logger';
import { CorrelationIdManager } from '../utils/correlationId';

/**
 * Builds the fixed tool list; called at construction time by the owner and
 * again on reload
 */
export type ToolFactory = () => Array<[string, ToolHandler]>;

export interface ToolSummary {
  name: string;
  displayName: string;
  description: string;
  supportedIntents: string[];
}

export interface ToolStatus {
  name: string;
  description: string;
  enabled: boolean;
  supportedIntentsCount: number;
  supportedIntents: string[];
}

export interface ToolRecommendation {
  toolName: string;
  displayName: string;
  description: string;
  confidence: number;
}

export interface ToolConfigurationReport {
  validTools: string[];
  invalidTools: string[];
  warnings: string[];
}

export interface ToolUsageStats {
  totalCalls: number;
  successfulCalls: number;
  failedCalls: number;
  /** Milliseconds */
  avgExecutionTime: number;
}

export interface ToolRegistryOptions {
  /** Name used in logs, e.g. "main" or "builtin" */
  label?: string;
  factory?: ToolFactory;
}

const RECOMMENDATION_CONFIDENCE = 0.8;
const MAX_RECOMMENDATIONS = 5;

const KEYWORD_TOOL_MAP: ReadonlyArray<[string, readonly string[]]> = [
  ['文件', ['file']],
  ['系统', ['system']],
  ['网络', ['web']],
  ['计算', ['calculator']],
  ['天气', ['weather']],
  ['邮件', ['email']],
  ['日历', ['calendar']],
  ['时间', ['calendar']],
  ['提醒', ['calendar']],
  ['下载', ['web', 'file']],
  ['搜索', ['web', 'file']],
  ['发送', ['email']],
  ['查询', ['weather', 'web', 'system']],
  ['创建', ['file', 'calendar']],
  ['删除', ['file', 'calendar']],
  ['复制', ['file']],
  ['移动', ['file']],
  ['重命名', ['file']],
  ['换算', ['unit_conversion', 'calculator']],
  ['转换', ['unit_conversion', 'calculator']],
  ['音量', ['system']],
  ['进程', ['system']],
  ['内存', ['system']],
  ['cpu', ['system']],
  ['磁盘', ['system']],
];

export class ToolRegistry extends EventEmitter {
  private readonly tools = new Map<string, ToolHandler>();
  private readonly intentToTool = new Map<string, string>();
  private readonly usage = new Map<string, { calls: number; successes: number; failures: number; totalMs: number }>();
  private readonly label: string;
  private readonly factory?: ToolFactory;

  constructor(options: ToolRegistryOptions = {}) {
    super();
    this.label = options.label ?? 'main';
    this.factory = options.factory;
    if (this.factory) {
      this.registerAll(this.factory());
    }
  }

  /**
   * Register a handler under a name. Disabled handlers are skipped.
   */
  register(toolName: string, handler: ToolHandler): void {
    if (!handler.isEnabled()) {
      logger.info('Tool is disabled, skipping registration', { registry: this.label, toolName });
      return;
    }

    this.tools.set(toolName, handler);
    const intents = handler.getSupportedIntents();
    this.mapIntents(toolName, intents);

    logger.info('Tool registered', {
      registry: this.label,
      toolName,
      displayName: handler.name,
      intentCount: intents.length
    });
    this.emit('registered', toolName);
    this.emit('changed');
  }

  unregister(toolName: string): boolean {
    if (!this.tools.has(toolName)) {
      logger.warn('Cannot unregister unknown tool', { registry: this.label, toolName });
      return false;
    }

    this.unmapIntents(toolName);
    this.tools.delete(toolName);
    logger.info('Tool unregistered', { registry: this.label, toolName });
    this.emit('unregistered', toolName);
    this.emit('changed');
    return true;
  }

  /**
   * Name of the tool owning an intent, if any
   */
  resolve(intent: string): string | undefined {
    return this.intentToTool.get(intent);
  }

  getTool(toolName: string): ToolHandler | undefined {
    return this.tools.get(toolName);
  }

  /**
   * Route an intent to its owner. Never throws: unknown intents, stale
   * mappings and handler exceptions all come back as error outcomes.
   */
  async executeIntent(intent: string, entities: Entities, originalText: string): Promise<ToolOutcome> {
    const correlationId = CorrelationIdManager.getCurrentCorrelationId();
    const toolName = this.intentToTool.get(intent);

    if (!toolName) {
      logger.debug('No tool handles intent', { registry: this.label, correlationId, intent });
      return fail('unsupported_intent', intent);
    }

    const handler = this.tools.get(toolName);
    if (!handler) {
      logger.error('Intent mapped to a missing tool', { registry: this.label, correlationId, intent, toolName });
      return fail('tool_not_found', toolName);
    }

    if (!handler.isEnabled() || !handler.getSupportedIntents().includes(intent)) {
      logger.warn('Tool can no longer handle intent', { registry: this.label, correlationId, intent, toolName });
      return fail('tool_cannot_handle', intent);
    }

    logger.info('Executing intent with tool', { registry: this.label, correlationId, intent, toolName });
    const startTime = Date.now();

    try {
      const outcome = await logger.withSpan(
        'registry.execute_intent',
        () => handler.execute(intent, entities, originalText),
        { 'tool.name': toolName, 'tool.intent': intent }
      );

      this.recordUsage(toolName, outcome.kind !== 'error', Date.now() - startTime);
      if (outcome.kind === 'error') {
        logger.error('Tool reported failure', {
          registry: this.label,
          correlationId,
          toolName,
          intent,
          result: formatOutcome(outcome)
        });
      } else {
        logger.info('Tool completed intent', {
          registry: this.label,
          correlationId,
          toolName,
          intent,
          result: formatOutcome(outcome)
        });
      }
      return outcome;
    } catch (error) {
      this.recordUsage(toolName, false, Date.now() - startTime);
      const wrapped = ToolExecutionError.create(
        `Tool ${toolName} failed on intent ${intent}`,
        toolName,
        intent,
        correlationId,
        error instanceof Error ? error : undefined
      );
      const details = extractErrorDetails(error);
      logger.error('Tool raised during execution', {
        registry: this.label,
        error: wrapped.toJSON(),
        cause: details.message,
        stack: details.stack
      });
      return fail('execution_error', details.message);
    }
  }

  enable(toolName: string): boolean {
    const handler = this.tools.get(toolName);
    if (!handler) {
      logger.warn('Cannot enable unknown tool', { registry: this.label, toolName });
      return false;
    }

    handler.setEnabled(true);
    this.mapIntents(toolName, handler.getSupportedIntents());
    logger.info('Tool enabled', { registry: this.label, toolName });
    this.emit('enabled', toolName);
    this.emit('changed');
    return true;
  }

  disable(toolName: string): boolean {
    const handler = this.tools.get(toolName);
    if (!handler) {
      logger.warn('Cannot disable unknown tool', { registry: this.label, toolName });
      return false;
    }

    handler.setEnabled(false);
    this.unmapIntents(toolName);
    logger.info('Tool disabled', { registry: this.label, toolName });
    this.emit('disabled', toolName);
    this.emit('changed');
    return true;
  }

  hasTool(toolName: string): boolean {
    return this.tools.has(toolName);
  }

  /**
   * Enabled tools, including their own display names
   */
  getAvailableTools(): ToolSummary[] {
    return this.enabledEntries().map(([name, handler]) => ({
      name,
      displayName: handler.name,
      description: handler.description,
      supportedIntents: [...handler.getSupportedIntents()]
    }));
  }

  /**
   * Enabled (tool name, handler) pairs in registration order
   */
  getEnabledHandlers(): Array<[string, ToolHandler]> {
    return this.enabledEntries();
  }

  /**
   * Currently routable intents
   */
  getSupportedIntents(): string[] {
    return Array.from(this.intentToTool.keys());
  }

  getToolStatus(): Record<string, ToolStatus> {
    const status: Record<string, ToolStatus> = {};
    for (const [toolName, handler] of this.tools) {
      const intents = [...handler.getSupportedIntents()];
      status[toolName] = {
        name: handler.name,
        description: handler.description,
        enabled: handler.isEnabled(),
        supportedIntentsCount: intents.length,
        supportedIntents: intents
      };
    }
    return status;
  }

  /**
   * Enabled tools whose name, description, intents or keywords contain the term
   */
  searchToolsByCapability(capability: string): string[] {
    const term = capability.toLowerCase();
    return this.enabledEntries()
      .filter(([toolName, handler]) => {
        const haystack = [
          toolName,
          handler.name,
          handler.description,
          ...handler.getSupportedIntents(),
          ...(handler.getKeywords?.() ?? [])
        ];
        return haystack.some((entry) => entry.toLowerCase().includes(term));
      })
      .map(([toolName]) => toolName);
  }

  /**
   * Keyword-based suggestions for free text, at most five
   */
  getToolRecommendations(userInput: string): ToolRecommendation[] {
    const input = userInput.toLowerCase();
    const matched = new Set<string>();
    for (const [keyword, toolNames] of KEYWORD_TOOL_MAP) {
      if (input.includes(keyword)) {
        toolNames.forEach((toolName) => matched.add(toolName));
      }
    }

    const recommendations: ToolRecommendation[] = [];
    for (const toolName of matched) {
      const handler = this.tools.get(toolName);
      if (handler && handler.isEnabled()) {
        recommendations.push({
          toolName,
          displayName: handler.name,
          description: handler.description,
          confidence: RECOMMENDATION_CONFIDENCE
        });
      }
    }
    return recommendations.slice(0, MAX_RECOMMENDATIONS);
  }

  validateConfiguration(): ToolConfigurationReport {
    const report: ToolConfigurationReport = { validTools: [], invalidTools: [], warnings: [] };

    for (const [toolName, handler] of this.tools) {
      if (!handler.validateConfiguration) {
        report.validTools.push(toolName);
        report.warnings.push(`Tool ${toolName} has no configuration check`);
        continue;
      }
      try {
        if (handler.validateConfiguration()) {
          report.validTools.push(toolName);
        } else {
          report.invalidTools.push(toolName);
        }
      } catch (error) {
        report.invalidTools.push(toolName);
        report.warnings.push(`Tool ${toolName} configuration check failed: ${extractErrorDetails(error).message}`);
      }
    }
    return report;
  }

  getUsageStats(): Record<string, ToolUsageStats> {
    const stats: Record<string, ToolUsageStats> = {};
    for (const toolName of this.tools.keys()) {
      const usage = this.usage.get(toolName);
      stats[toolName] = {
        totalCalls: usage?.calls ?? 0,
        successfulCalls: usage?.successes ?? 0,
        failedCalls: usage?.failures ?? 0,
        avgExecutionTime: usage && usage.calls > 0 ? usage.totalMs / usage.calls : 0
      };
    }
    return stats;
  }

  /**
   * Drop every tool and rebuild from the factory. Without a factory the
   * current handlers are re-registered in their original order.
   */
  async reload(): Promise<void> {
    logger.info('Reloading tools', { registry: this.label });
    const previous = Array.from(this.tools.entries());
    await this.disposeAll();
    this.tools.clear();
    this.intentToTool.clear();

    const entries = this.factory ? this.factory() : previous;
    this.registerAll(entries);
    logger.info('Tools reloaded', { registry: this.label, toolCount: this.tools.size });
    this.emit('changed');
  }

  async shutdown(): Promise<void> {
    logger.info('Shutting down tool registry', { registry: this.label });
    await this.disposeAll();
    this.tools.clear();
    this.intentToTool.clear();
    this.emit('changed');
  }

  private registerAll(entries: Array<[string, ToolHandler]>): void {
    for (const [toolName, handler] of entries) {
      this.register(toolName, handler);
    }
  }

  private enabledEntries(): Array<[string, ToolHandler]> {
    return Array.from(this.tools.entries()).filter(([, handler]) => handler.isEnabled());
  }

  private mapIntents(toolName: string, intents: readonly string[]): void {
    for (const intent of intents) {
      const previous = this.intentToTool.get(intent);
      if (previous !== undefined && previous !== toolName) {
        logger.warn('Intent already registered, overriding', {
          registry: this.label,
          intent,
          previousTool: previous,
          newTool: toolName
        });
        this.emit('conflict', intent, previous, toolName);
      }
      this.intentToTool.set(intent, toolName);
    }
  }

  private unmapIntents(toolName: string): void {
    for (const [intent, owner] of Array.from(this.intentToTool.entries())) {
      if (owner === toolName) {
        this.intentToTool.delete(intent);
      }
    }
  }

  private recordUsage(toolName: string, succeeded: boolean, durationMs: number): void {
    const usage = this.usage.get(toolName) ?? { calls: 0, successes: 0, failures: 0, totalMs: 0 };
    usage.calls += 1;
    usage.totalMs += durationMs;
    if (succeeded) {
      usage.successes += 1;
    } else {
      usage.failures += 1;
    }
    this.usage.set(toolName, usage);
  }

  private async disposeAll(): Promise<void> {
    for (const [toolName, handler] of this.tools) {
      if (!handler.dispose) {
        continue;
      }
      try {
        await handler.dispose();
      } catch (error) {
        logger.error('Error disposing tool', { registry: this.label, toolName, error: extractErrorDetails(error).message });
      }
    }
  }
}
