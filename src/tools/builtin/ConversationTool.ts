/**
 * Greeting, exit and the spoken clock
 */

import { BaseTool } from '../BaseTool';
import { exitOutcome, fail, ok } from '../outcome';
import { IntentSchema, ToolOutcome } from '../types';

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

export class ConversationTool extends BaseTool {
  readonly name = 'conversation';
  readonly description = '问候、退出助手和报时';

  constructor(private readonly clock: () => Date = () => new Date()) {
    super();
  }

  getSupportedIntents(): readonly string[] {
    return ['greeting', 'exit_assistant', 'get_time'];
  }

  getIntentSchemas(): readonly IntentSchema[] {
    return [
      { intent: 'greeting', description: 'Greet the user', parameters: {} },
      { intent: 'exit_assistant', description: 'Stop the assistant', parameters: {} },
      { intent: 'get_time', description: 'Tell the current time', parameters: {} }
    ];
  }

  getKeywords(): readonly string[] {
    return ['你好', '再见', '时间', '几点'];
  }

  protected async handle(intent: string): Promise<ToolOutcome> {
    switch (intent) {
      case 'greeting':
        return ok('greeted', '你好！有什么可以帮您的吗？');
      case 'exit_assistant':
        return exitOutcome('再见！');
      case 'get_time': {
        const now = this.clock();
        const spoken = `${pad(now.getHours())}点${pad(now.getMinutes())}分`;
        return ok(`Current time is ${spoken}`, `现在是${spoken}`);
      }
      default:
        return fail('unsupported_operation', `unsupported_operation: ${intent}`);
    }
  }
}
