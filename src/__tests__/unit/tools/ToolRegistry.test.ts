/**
 * Unit tests for ToolRegistry
 */

import { ToolRegistry } from '../../../tools/ToolRegistry';
import { fail, formatOutcome, ok, clarify, isUnsupported } from '../../../tools/outcome';
import { StubTool } from '../../utils/fakes';

describe('ToolRegistry', () => {
  let registry: ToolRegistry;

  beforeEach(() => {
    registry = new ToolRegistry({ label: 'test' });
  });

  describe('register', () => {
    it('should map every supported intent to the tool', async () => {
      const tool = new StubTool('weather', ['get_weather', 'get_air_quality']);
      registry.register('weather', tool);

      expect(registry.resolve('get_weather')).toBe('weather');
      expect(registry.getSupportedIntents()).toEqual(['get_weather', 'get_air_quality']);
      await expect(registry.executeIntent('get_weather', { city: 'Paris' }, '巴黎天气')).resolves.toEqual(ok('get_weather_done'));
      expect(tool.calls).toEqual([{ intent: 'get_weather', entities: { city: 'Paris' } }]);
    });

    it('should let the later registration win a conflicting intent', () => {
      const conflicts: unknown[][] = [];
      registry.on('conflict', (...args: unknown[]) => conflicts.push(args));

      registry.register('first', new StubTool('first', ['shared', 'only_first']));
      registry.register('second', new StubTool('second', ['shared']));

      expect(registry.resolve('shared')).toBe('second');
      expect(registry.resolve('only_first')).toBe('first');
      expect(conflicts).toEqual([['shared', 'first', 'second']]);
    });

    it('should skip a disabled handler', () => {
      const tool = new StubTool('off', ['x']);
      tool.setEnabled(false);

      registry.register('off', tool);

      expect(registry.hasTool('off')).toBe(false);
      expect(registry.resolve('x')).toBeUndefined();
    });
  });

  describe('executeIntent', () => {
    it('should report an unmapped intent as unsupported', async () => {
      const outcome = await registry.executeIntent('fly_to_moon', {}, '');

      expect(outcome).toEqual({ kind: 'error', code: 'unsupported_intent', message: 'fly_to_moon' });
      expect(isUnsupported(outcome)).toBe(true);
      expect(formatOutcome(outcome)).toBe('unsupported_intent: fly_to_moon');
    });

    it('should contain a thrown handler error', async () => {
      registry.register('broken', new StubTool('broken', ['explode'], () => {
        throw new Error('boom');
      }));

      const outcome = await registry.executeIntent('explode', {}, '');

      expect(outcome).toEqual({ kind: 'error', code: 'execution_error', message: 'boom' });
      expect(formatOutcome(outcome)).toBe('execution_error: boom');
      expect(registry.getUsageStats().broken).toMatchObject({ totalCalls: 1, successfulCalls: 0, failedCalls: 1 });
    });

    it('should pass handler errors through unchanged', async () => {
      registry.register('picky', new StubTool('picky', ['pick'], () => fail('bad_pick', 'no good', '不行')));

      await expect(registry.executeIntent('pick', {}, '')).resolves.toEqual({
        kind: 'error',
        code: 'bad_pick',
        message: 'no good',
        speech: '不行'
      });
    });
  });

  describe('enable and disable', () => {
    it('should unroute a disabled tool and restore it on enable', async () => {
      const changes: string[] = [];
      registry.on('changed', () => changes.push('changed'));
      registry.register('calc', new StubTool('calc', ['calculate']));

      expect(registry.disable('calc')).toBe(true);
      expect(registry.resolve('calculate')).toBeUndefined();
      expect(registry.getAvailableTools()).toEqual([]);
      expect((await registry.executeIntent('calculate', {}, '')).kind).toBe('error');

      expect(registry.enable('calc')).toBe(true);
      expect(registry.resolve('calculate')).toBe('calc');
      expect(changes).toHaveLength(3);
    });

    it('should return false for unknown tools', () => {
      expect(registry.enable('ghost')).toBe(false);
      expect(registry.disable('ghost')).toBe(false);
    });
  });

  describe('introspection', () => {
    beforeEach(() => {
      registry.register('calculator', new StubTool('calc_display', ['calculate'], undefined, { description: '数学计算' }));
      registry.register('weather', new StubTool('weather', ['get_weather']));
    });

    it('should describe every tool in the status map', () => {
      registry.disable('weather');

      expect(registry.getToolStatus()).toEqual({
        calculator: {
          name: 'calc_display',
          description: '数学计算',
          enabled: true,
          supportedIntentsCount: 1,
          supportedIntents: ['calculate']
        },
        weather: {
          name: 'weather',
          description: 'weather stub',
          enabled: false,
          supportedIntentsCount: 1,
          supportedIntents: ['get_weather']
        }
      });
    });

    it('should search names, descriptions and intents', () => {
      expect(registry.searchToolsByCapability('计算')).toEqual(['calculator']);
      expect(registry.searchToolsByCapability('GET_WEATHER')).toEqual(['weather']);
    });

    it('should recommend tools by keyword', () => {
      expect(registry.getToolRecommendations('帮我计算一下')).toEqual([
        { toolName: 'calculator', displayName: 'calc_display', description: '数学计算', confidence: 0.8 }
      ]);
    });

    it('should warn about tools without a configuration check', () => {
      expect(registry.validateConfiguration()).toEqual({
        validTools: ['calculator', 'weather'],
        invalidTools: [],
        warnings: ['Tool calculator has no configuration check', 'Tool weather has no configuration check']
      });
    });
  });

  describe('reload and shutdown', () => {
    it('should rebuild the tools from the factory', async () => {
      let builds = 0;
      const factoryRegistry = new ToolRegistry({
        factory: () => {
          builds++;
          return [['calc', new StubTool('calc', ['calculate'])]];
        }
      });
      factoryRegistry.disable('calc');

      await factoryRegistry.reload();

      expect(builds).toBe(2);
      expect(factoryRegistry.resolve('calculate')).toBe('calc');
    });

    it('should dispose tools on shutdown', async () => {
      const tool = new StubTool('calc', ['calculate']);
      const dispose = jest.fn().mockResolvedValue(undefined);
      Object.assign(tool, { dispose });
      registry.register('calc', tool);

      await registry.shutdown();

      expect(dispose).toHaveBeenCalledTimes(1);
      expect(registry.hasTool('calc')).toBe(false);
    });
  });
});

describe('formatOutcome', () => {
  it('should render each outcome kind', () => {
    expect(formatOutcome(ok('greeted'))).toBe('greeted');
    expect(formatOutcome(clarify('missing_city', '哪个城市？'))).toBe('clarification_needed: missing_city');
    expect(formatOutcome(fail('weather_lookup_failed', 'HTTP 500'))).toBe('error: HTTP 500');
  });
});
