/**
 * Tests for running agent turns against a fake Cortex client
 */

import {
  AgentTurnService,
  NothingToRegenerateError,
  type AgentTurnSettings,
} from '../src/application/services/AgentTurnService.js';
import type {
  AgentDescriptor,
  AgentDetails,
  AgentReference,
  AgentRunRequest,
  AgentRunStream,
  ServerSentEvent,
} from '../src/core/entities/Agent.js';
import type { ThreadMetadata } from '../src/core/entities/Thread.js';
import { CortexApiError, type ICortexClient, type RemoteThread } from '../src/core/interfaces/ICortexClient.js';
import { TurnInProgressError } from '../src/core/stream/ConversationSession.js';
import { DatabaseConnection } from '../src/infrastructure/database/DatabaseConnection.js';
import { ThreadRepository } from '../src/infrastructure/database/repositories/ThreadRepository.js';
import { MemoryRenderSink } from '../src/infrastructure/render/MemoryRenderSink.js';

function sse(event: string, payload: unknown = {}): ServerSentEvent {
  return { event, data: JSON.stringify(payload) };
}

async function* streamOf(events: ServerSentEvent[], breakWith?: Error): AsyncGenerator<ServerSentEvent> {
  for (const event of events) {
    yield event;
  }
  if (breakWith) {
    throw breakWith;
  }
}

function answer(text: string, userId: number, assistantId: number): ServerSentEvent[] {
  return [
    sse('metadata', { metadata: { role: 'user', message_id: userId } }),
    sse('response.text.delta', { content_index: 0, text }),
    sse('metadata', { metadata: { role: 'assistant', message_id: assistantId } }),
    sse('response.done'),
  ];
}

class FakeCortexClient implements ICortexClient {
  requests: AgentRunRequest[] = [];
  nextRun: () => Promise<AgentRunStream> = async () => ({ requestId: 'req-1', events: streamOf([]) });
  agents: AgentDescriptor[] = [];
  agentQueries: Array<[string, string]> = [];

  async runAgent(request: AgentRunRequest): Promise<AgentRunStream> {
    this.requests.push(request);
    return this.nextRun();
  }

  async createThread(): Promise<string> {
    return '1';
  }

  async listThreads(): Promise<ThreadMetadata[]> {
    return [];
  }

  async getThread(threadId: string): Promise<RemoteThread> {
    return {
      metadata: { threadId, threadName: '', originApplication: '', createdOn: 0, updatedOn: 0 },
      messages: [],
    };
  }

  async renameThread(): Promise<void> {}

  async deleteThread(): Promise<void> {}

  async listAgents(database: string, schema: string): Promise<AgentDescriptor[]> {
    this.agentQueries.push([database, schema]);
    return this.agents;
  }

  async describeAgent(agent: AgentReference): Promise<AgentDetails> {
    return {
      ...agent,
      comment: null,
      owner: null,
      createdOn: null,
      sampleQuestions: ['What was revenue last quarter?'],
      tools: [],
      orchestrationModel: null,
    };
  }
}

const SETTINGS: AgentTurnSettings = {
  agent: { database: 'DB', schema: 'SC', name: 'SALES' },
  orchestrationModel: 'claude-4-sonnet',
  maxTableRows: 1000,
  enableCitations: true,
};

describe('AgentTurnService', () => {
  let connection: DatabaseConnection;
  let store: ThreadRepository;
  let client: FakeCortexClient;
  let service: AgentTurnService;
  let warnSpy: jest.SpyInstance;
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => {});
    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => {});
    connection = new DatabaseConnection(':memory:');
    store = new ThreadRepository(connection.getDatabase());
    client = new FakeCortexClient();
    service = new AgentTurnService(client, store, SETTINGS);
  });

  afterEach(() => {
    connection.close();
    warnSpy.mockRestore();
    errorSpy.mockRestore();
  });

  it('should stream a turn into the sink and store it', async () => {
    client.nextRun = async () => ({ requestId: 'req-1', events: streamOf(answer('Revenue grew.', 10, 11)) });
    const sink = new MemoryRenderSink();
    const started: string[] = [];

    const message = await service.sendMessage('1', 'How did revenue do?', sink, {
      onRequestStarted: (requestId) => started.push(requestId),
    });

    expect(started).toEqual(['req-1']);
    expect(client.requests).toEqual([
      {
        agent: SETTINGS.agent,
        threadId: '1',
        parentMessageId: 0,
        text: 'How did revenue do?',
        orchestrationModel: 'claude-4-sonnet',
        toolChoice: undefined,
      },
    ]);
    expect(message.status).toBe('done');
    expect(message.items).toEqual([{ type: 'text', contentIndex: 0, text: 'Revenue grew.' }]);
    expect(message.userMessageId).toBe(10);
    expect(message.assistantMessageId).toBe(11);
    expect(sink.status).toEqual({ label: 'Response complete', state: 'complete' });
    expect(store.getTurn('req-1')).toMatchObject({ state: 'done', error: null });
    expect(store.listMessages('1').map((stored) => stored.role)).toEqual(['user', 'assistant']);
    expect(service.isBusy('1')).toBe(false);
  });

  it('should continue from the last stored assistant message', async () => {
    client.nextRun = async () => ({ requestId: 'req-1', events: streamOf(answer('First.', 10, 11)) });
    await service.sendMessage('1', 'first', new MemoryRenderSink());

    client.nextRun = async () => ({ requestId: 'req-2', events: streamOf(answer('Second.', 12, 13)) });
    await service.sendMessage('1', 'second', new MemoryRenderSink(), {
      agent: { database: 'OTHER', schema: 'SC', name: 'SUPPORT' },
    });

    expect(client.requests[1]).toMatchObject({
      parentMessageId: 11,
      agent: { database: 'OTHER', schema: 'SC', name: 'SUPPORT' },
    });
  });

  it('should reject a second turn while one is active', async () => {
    let release: (stream: AgentRunStream) => void = () => {};
    client.nextRun = () =>
      new Promise<AgentRunStream>((resolve) => {
        release = resolve;
      });

    const first = service.sendMessage('1', 'first', new MemoryRenderSink());

    await expect(service.sendMessage('1', 'second', new MemoryRenderSink())).rejects.toBeInstanceOf(TurnInProgressError);
    expect(service.isBusy('1')).toBe(true);
    expect(service.isBusy('2')).toBe(false);

    release({ requestId: 'req-1', events: streamOf(answer('Done.', 10, 11)) });
    await expect(first).resolves.toMatchObject({ status: 'done' });
    expect(service.isBusy('1')).toBe(false);
  });

  it('should fail with the HTTP status when the run is refused', async () => {
    client.nextRun = async () => {
      throw new CortexApiError(401, 'unauthorized', 'Agent run');
    };
    const sink = new MemoryRenderSink();

    const message = await service.sendMessage('1', 'q', sink);

    expect(message.requestId).toMatch(/^local-/);
    expect(message.status).toBe('error');
    expect(message.error).toEqual({ code: 'http_401', message: 'Agent run failed: HTTP 401 - unauthorized' });
    expect(sink.status).toEqual({
      label: 'Error: Agent run failed: HTTP 401 - unauthorized (http_401)',
      state: 'error',
    });
    expect(store.getTurn(message.requestId)).toMatchObject({
      state: 'errored',
      error: 'Agent run failed: HTTP 401 - unauthorized',
    });
    expect(store.listMessages('1')).toEqual([]);
    expect(service.isBusy('1')).toBe(false);
  });

  it('should report a connection error when the run never reaches the server', async () => {
    client.nextRun = async () => {
      throw new Error('connect ECONNREFUSED');
    };

    const message = await service.sendMessage('1', 'q', new MemoryRenderSink());

    expect(message.error).toEqual({ code: 'connection_error', message: 'connect ECONNREFUSED' });
  });

  it('should keep partial content when the stream breaks', async () => {
    client.nextRun = async () => ({
      requestId: 'req-1',
      events: streamOf([sse('response.text.delta', { content_index: 0, text: 'Partial' })], new Error('socket hang up')),
    });

    const message = await service.sendMessage('1', 'q', new MemoryRenderSink());

    expect(message.status).toBe('error');
    expect(message.error).toEqual({ code: 'transport_error', message: 'socket hang up' });
    expect(message.items).toEqual([{ type: 'text', contentIndex: 0, text: 'Partial' }]);
    expect(store.getTurn('req-1')).toMatchObject({ state: 'errored', error: 'socket hang up' });
    expect(store.listMessages('1')).toEqual([]);
  });

  it('should finalize as done when the stream ends without a done event', async () => {
    client.nextRun = async () => ({
      requestId: 'req-1',
      events: streamOf([sse('response.text.delta', { content_index: 0, text: 'Cut short' })]),
    });

    const message = await service.sendMessage('1', 'q', new MemoryRenderSink());

    expect(message.status).toBe('done');
    expect(message.items).toEqual([{ type: 'text', contentIndex: 0, text: 'Cut short' }]);
    expect(warnSpy).toHaveBeenCalledTimes(1);
    expect(store.listMessages('1')).toHaveLength(2);
  });

  it('should list agents in the configured schema by default', async () => {
    client.agents = [{ database: 'DB', schema: 'SC', name: 'SALES', comment: null, owner: null, createdOn: null }];

    await expect(service.listAgents()).resolves.toEqual(client.agents);
    await service.listAgents('OTHER', 'PUBLIC');

    expect(client.agentQueries).toEqual([
      ['DB', 'SC'],
      ['OTHER', 'PUBLIC'],
    ]);
    expect(service.defaultAgent).toEqual(SETTINGS.agent);
  });

  it('should leave a stored answer untouched when a later turn re-evaluates', async () => {
    client.nextRun = async () => ({
      requestId: 'req-A',
      events: streamOf([
        sse('metadata', { metadata: { role: 'user', message_id: 10 } }),
        sse('response.text.delta', { content_index: 0, text: 'Revenue by region:' }),
        sse('response.table', {
          content_index: 1,
          result_set: { data: [['east', 5]], resultSetMetaData: { rowType: [{ name: 'REGION' }, { name: 'TOTAL' }] } },
        }),
        sse('metadata', { metadata: { role: 'assistant', message_id: 11 } }),
        sse('response.done'),
      ]),
    });
    const first = await service.sendMessage('1', 'Revenue by region?', new MemoryRenderSink());
    const firstJson = JSON.stringify(first);
    const storedBefore = JSON.stringify(store.listMessages('1'));

    client.nextRun = async () => ({
      requestId: 'req-B',
      events: streamOf([
        sse('response.text.delta', { content_index: 0, text: 'Draft' }),
        sse('response.table', {
          content_index: 1,
          result_set: { data: [['west', 7]], resultSetMetaData: { rowType: [{ name: 'REGION' }, { name: 'TOTAL' }] } },
        }),
        sse('response.status', { status: 'reevaluating_plan' }),
        sse('response.text.delta', { content_index: 2, text: 'Final' }),
        sse('response.done'),
      ]),
    });
    const second = await service.sendMessage('1', 'And the west?', new MemoryRenderSink());

    expect(second.items).toEqual([{ type: 'text', contentIndex: 2, text: 'Final' }]);
    expect(JSON.stringify(first)).toBe(firstJson);
    expect(JSON.stringify(store.listMessages('1').slice(0, 2))).toBe(storedBefore);
    expect(store.listMessages('1')).toHaveLength(4);
    expect(service.getSession('1').slots.size()).toBe(0);
  });

  it('should ask the last stored question again', async () => {
    client.nextRun = async () => ({ requestId: 'req-1', events: streamOf(answer('First.', 10, 11)) });
    await service.sendMessage('1', 'How did revenue do?', new MemoryRenderSink());

    client.nextRun = async () => ({ requestId: 'req-2', events: streamOf(answer('Again.', 12, 13)) });
    const message = await service.regenerate('1', new MemoryRenderSink());

    expect(client.requests[1]).toMatchObject({ text: 'How did revenue do?', parentMessageId: 11 });
    expect(message.items).toEqual([{ type: 'text', contentIndex: 0, text: 'Again.' }]);
    expect(store.listMessages('1').map((stored) => (stored.role === 'user' ? stored.payload.text : stored.role))).toEqual([
      'How did revenue do?',
      'assistant',
      'How did revenue do?',
      'assistant',
    ]);
  });

  it('should refuse to regenerate on a thread without a stored question', async () => {
    await expect(service.regenerate('1', new MemoryRenderSink())).rejects.toBeInstanceOf(NothingToRegenerateError);
    expect(service.lastQuestion('1')).toBeNull();
    expect(client.requests).toEqual([]);
  });

  it('should describe the default agent unless another is named', async () => {
    await expect(service.describeAgent()).resolves.toMatchObject({
      ...SETTINGS.agent,
      sampleQuestions: ['What was revenue last quarter?'],
    });
    await expect(service.describeAgent('SUPPORT')).resolves.toMatchObject({ database: 'DB', schema: 'SC', name: 'SUPPORT' });
  });

  it('should forget idle sessions only', () => {
    const session = service.getSession('1');
    session.beginTurn('token');

    service.forgetSession('1');
    expect(service.getSession('1')).toBe(session);

    session.endTurn('token');
    service.forgetSession('1');
    expect(service.getSession('1')).not.toBe(session);
  });
});
