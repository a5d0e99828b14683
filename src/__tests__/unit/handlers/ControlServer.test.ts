/**
 * Unit tests for the control server routes
 */

import request from 'supertest';
import { Express } from 'express';
import { createApp } from '../../../server';
import { AssistantLoop } from '../../../assistant/AssistantLoop';
import { Dispatcher } from '../../../dispatch/Dispatcher';
import { IntentRecognizer } from '../../../intent/IntentRecognizer';
import { ToolRegistries } from '../../../tools';
import { ToolRegistry } from '../../../tools/ToolRegistry';
import { exitOutcome, ok } from '../../../tools/outcome';
import { RecordingSpeechSink, StubTool } from '../../utils/fakes';

describe('control server', () => {
  let registries: ToolRegistries;
  let loop: AssistantLoop;
  let app: Express;

  beforeEach(() => {
    registries = {
      main: new ToolRegistry({ label: 'main' }),
      builtin: new ToolRegistry({ label: 'builtin' })
    };
    registries.main.register('calculator', new StubTool('calculator', ['calculate'], (_intent, entities) =>
      ok(`calculation_result: ${String(entities.expression)}`)));
    registries.builtin.register('conversation', new StubTool('conversation', ['greeting'], () => ok('greeted', '你好')));

    const recognizer = new IntentRecognizer({ engine: 'rule_based' });
    const speech = new RecordingSpeechSink();
    const dispatcher = new Dispatcher({ registry: registries.main, builtins: registries.builtin, speech });
    loop = new AssistantLoop({ recognizer, dispatcher, speech });
    app = createApp({ registries, recognizer, loop });
  });

  describe('health', () => {
    it('should report liveness', async () => {
      const response = await request(app).get('/health/live');

      expect(response.status).toBe(200);
      expect(response.body.status).toBe('alive');
    });

    it('should be ready while tools are routable', async () => {
      const response = await request(app).get('/health/ready');

      expect(response.status).toBe(200);
      expect(response.body).toMatchObject({
        status: 'ready',
        engine: 'rule_based',
        tools: 2,
        misconfiguredTools: []
      });
    });

    it('should not be ready without enabled tools', async () => {
      registries.main.disable('calculator');
      registries.builtin.disable('conversation');

      const response = await request(app).get('/health');

      expect(response.status).toBe(503);
      expect(response.body).toMatchObject({ status: 'not ready', tools: 0 });
    });
  });

  describe('tools', () => {
    it('should list tools of both registries', async () => {
      const response = await request(app).get('/tools');

      expect(response.status).toBe(200);
      expect(response.body.tools).toEqual([
        {
          tool: 'calculator',
          registry: 'main',
          displayName: 'calculator',
          description: 'calculator stub',
          enabled: true,
          supportedIntents: ['calculate'],
          usage: { totalCalls: 0, successfulCalls: 0, failedCalls: 0, avgExecutionTime: 0 }
        },
        {
          tool: 'conversation',
          registry: 'builtin',
          displayName: 'conversation',
          description: 'conversation stub',
          enabled: true,
          supportedIntents: ['greeting'],
          usage: { totalCalls: 0, successfulCalls: 0, failedCalls: 0, avgExecutionTime: 0 }
        }
      ]);
    });

    it('should disable and re-enable a tool', async () => {
      const disabled = await request(app).post('/tools/calculator/disable');

      expect(disabled.status).toBe(200);
      expect(disabled.body).toEqual({ tool: 'calculator', enabled: false });
      expect(registries.main.getAvailableTools()).toEqual([]);

      const enabled = await request(app).post('/tools/calculator/enable');

      expect(enabled.body).toEqual({ tool: 'calculator', enabled: true });
      expect(registries.main.resolve('calculate')).toBe('calculator');
    });

    it('should answer 404 for an unknown tool', async () => {
      const response = await request(app).post('/tools/teleport/enable');

      expect(response.status).toBe(404);
      expect(response.body).toEqual({ error: 'tool_not_found', tool: 'teleport' });
    });
  });

  describe('commands', () => {
    it('should require text', async () => {
      const response = await request(app).post('/commands').send({ text: '  ' });

      expect(response.status).toBe(400);
      expect(response.body).toEqual({ error: 'text_required' });
    });

    it('should dispatch the text and echo the correlation id', async () => {
      const response = await request(app)
        .post('/commands')
        .set('x-correlation-id', 'test-correlation')
        .send({ text: '计算 2 + 3 * 4' });

      expect(response.status).toBe(200);
      expect(response.headers['x-correlation-id']).toBe('test-correlation');
      expect(response.body).toEqual({
        outcome: { kind: 'ok', detail: 'calculation_result: 2 + 3 * 4' },
        status: 'calculation_result: 2 + 3 * 4',
        route: 'registry',
        exit: false
      });
    });

    it('should end the session on an exit command', async () => {
      registries.builtin.register('farewell', new StubTool('farewell', ['exit_assistant'], () => exitOutcome('再见！')));

      const exit = await request(app).post('/commands').send({ text: '再见' });
      const after = await request(app).post('/commands').send({ text: '你好' });

      expect(exit.status).toBe(200);
      expect(exit.body).toMatchObject({ status: 'exit', exit: true });
      expect(after.status).toBe(503);
      expect(after.body.error).toBe('ASSISTANT_STOPPED');
    });

    it('should answer 503 once the loop has stopped', async () => {
      loop.stop();

      const response = await request(app).post('/commands').send({ text: '你好' });

      expect(response.status).toBe(503);
      expect(response.body).toEqual({ error: 'ASSISTANT_STOPPED', message: 'Assistant loop has stopped' });
    });
  });
});
