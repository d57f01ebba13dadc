/**
 * Tests for the MCP tool handlers
 */

import { AgentTurnService } from '../src/application/services/AgentTurnService.js';
import { ThreadService } from '../src/application/services/ThreadService.js';
import type {
  AgentDescriptor,
  AgentDetails,
  AgentReference,
  AgentRunRequest,
  AgentRunStream,
  ServerSentEvent,
} from '../src/core/entities/Agent.js';
import type { ThreadMetadata } from '../src/core/entities/Thread.js';
import type { ICortexClient, RemoteThread, RemoteThreadMessage } from '../src/core/interfaces/ICortexClient.js';
import { DatabaseConnection } from '../src/infrastructure/database/DatabaseConnection.js';
import { ThreadRepository } from '../src/infrastructure/database/repositories/ThreadRepository.js';
import { askAgent, regenerateAnswer } from '../src/presentation/tools/AskAgentTool.js';
import { formatAgentDetails } from '../src/presentation/tools/DescribeAgentTool.js';
import { checkHealth, type HealthDependencies } from '../src/presentation/tools/HealthCheckTool.js';
import { manageThreads, remotePayloadText } from '../src/presentation/tools/ManageThreadsTool.js';
import { CircuitBreaker } from '../src/utils/retry.js';

const AGENT = { database: 'DB', schema: 'SC', name: 'SALES' };

async function* streamOf(events: ServerSentEvent[]): AsyncGenerator<ServerSentEvent> {
  for (const event of events) {
    yield event;
  }
}

class FakeCortexClient implements ICortexClient {
  requests: AgentRunRequest[] = [];
  renamed: Array<[string, string]> = [];
  remoteMessages: RemoteThreadMessage[] = [];
  reply: ServerSentEvent[] = [
    { event: 'response.text.delta', data: JSON.stringify({ content_index: 0, text: 'Revenue grew.' }) },
    { event: 'metadata', data: JSON.stringify({ metadata: { role: 'assistant', message_id: 11 } }) },
    { event: 'response.done', data: '' },
  ];

  async runAgent(request: AgentRunRequest): Promise<AgentRunStream> {
    this.requests.push(request);
    return { requestId: `req-${this.requests.length}`, events: streamOf(this.reply) };
  }

  async createThread(): Promise<string> {
    return '501';
  }

  async listThreads(): Promise<ThreadMetadata[]> {
    return [];
  }

  async getThread(threadId: string): Promise<RemoteThread> {
    return {
      metadata: { threadId, threadName: '', originApplication: '', createdOn: 0, updatedOn: 0 },
      messages: this.remoteMessages,
    };
  }

  async renameThread(threadId: string, threadName: string): Promise<void> {
    this.renamed.push([threadId, threadName]);
  }

  async deleteThread(): Promise<void> {}

  async listAgents(): Promise<AgentDescriptor[]> {
    return [];
  }

  async describeAgent(agent: AgentReference): Promise<AgentDetails> {
    return { ...agent, comment: null, owner: null, createdOn: null, sampleQuestions: [], tools: [], orchestrationModel: null };
  }
}

describe('MCP tools', () => {
  let connection: DatabaseConnection;
  let client: FakeCortexClient;
  let turnService: AgentTurnService;
  let threadService: ThreadService;

  beforeEach(() => {
    connection = new DatabaseConnection(':memory:');
    const store = new ThreadRepository(connection.getDatabase());
    client = new FakeCortexClient();
    turnService = new AgentTurnService(client, store, { agent: AGENT, maxTableRows: 1000, enableCitations: true });
    threadService = new ThreadService(client, store, 'cortex_chat');
  });

  afterEach(() => {
    connection.close();
  });

  describe('askAgent', () => {
    it('should start a thread named after the question', async () => {
      const result = await askAgent(turnService, threadService, { question: 'How did revenue do?' });

      expect(client.renamed).toEqual([['501', 'How did revenue do?']]);
      expect(result.threadId).toBe('501');
      expect(result.message.status).toBe('done');
      expect(result.markdown).toBe('Revenue grew.\n\n---\n_Thread: 501 | Request: req-1_');
    });

    it('should continue a thread with another agent', async () => {
      await askAgent(turnService, threadService, { question: 'First', thread_id: '77' });
      await askAgent(turnService, threadService, { question: 'Second', thread_id: '77', agent_name: 'SUPPORT' });

      expect(client.renamed).toEqual([]);
      expect(client.requests[0]).toMatchObject({ threadId: '77', parentMessageId: 0, agent: AGENT });
      expect(client.requests[1]).toMatchObject({
        threadId: '77',
        parentMessageId: 11,
        agent: { database: 'DB', schema: 'SC', name: 'SUPPORT' },
      });
    });

    it('should ask the last question of a thread again', async () => {
      await askAgent(turnService, threadService, { question: 'How did revenue do?', thread_id: '77' });
      client.reply = [
        { event: 'response.text.delta', data: JSON.stringify({ content_index: 0, text: 'Revenue grew 4%.' }) },
        { event: 'response.done', data: '' },
      ];

      const result = await regenerateAnswer(turnService, { thread_id: '77' });

      expect(client.requests[1]).toMatchObject({ threadId: '77', text: 'How did revenue do?', parentMessageId: 11 });
      expect(result.markdown).toBe('Revenue grew 4%.\n\n---\n_Thread: 77 | Request: req-2_');
    });

    it('should refuse to regenerate an empty thread', async () => {
      await expect(regenerateAnswer(turnService, { thread_id: '77' })).rejects.toThrow(
        'Thread 77 has no answered question to regenerate'
      );
    });

    it('should say when the agent sent nothing', async () => {
      client.reply = [{ event: 'response.done', data: '' }];

      const result = await askAgent(turnService, threadService, { question: 'Anything?', thread_id: '77' });

      expect(result.markdown).toBe('_The agent returned no content._\n\n---\n_Thread: 77 | Request: req-1_');
    });
  });

  describe('manageThreads', () => {
    it('should report an empty thread list', async () => {
      await expect(manageThreads(threadService, { action: 'list' })).resolves.toBe('No threads found.');
    });

    it('should list and view stored threads', async () => {
      await askAgent(turnService, threadService, { question: 'How did revenue do?' });

      await expect(manageThreads(threadService, { action: 'list' })).resolves.toBe(
        '# Threads\n\n- **501** How did revenue do?: 2 messages'
      );
      await expect(manageThreads(threadService, { action: 'view', thread_id: '501' })).resolves.toBe(
        '# Thread 501\n\n1. **👤 User**\nHow did revenue do?\n\n---\n\n2. **🤖 Agent**\nRevenue grew.\n'
      );
      await expect(manageThreads(threadService, { action: 'view', thread_id: '9' })).resolves.toBe(
        'No messages stored for thread 9'
      );
    });

    it('should rename and delete threads', async () => {
      await threadService.createThread();

      await expect(manageThreads(threadService, { action: 'rename', thread_id: '501', thread_name: 'Sales' })).resolves.toBe(
        '✓ Thread 501 renamed to "Sales"'
      );
      expect(threadService.getThread('501')?.threadName).toBe('Sales');

      await expect(manageThreads(threadService, { action: 'delete', thread_id: '501' })).resolves.toBe(
        '✓ Thread 501 deleted'
      );
      expect(threadService.getThread('501')).toBeNull();
    });

    it('should show the server history of a thread', async () => {
      client.remoteMessages = [
        { messageId: 12, parentId: 11, createdOn: 0, role: 'assistant', messagePayload: 'Revenue grew.', requestId: 'r-1' },
        {
          messageId: 11,
          parentId: 0,
          createdOn: 0,
          role: 'user',
          messagePayload: JSON.stringify({ text: 'How did revenue do?' }),
          requestId: 'r-1',
        },
      ];

      await expect(manageThreads(threadService, { action: 'history', thread_id: '5' })).resolves.toBe(
        '# Thread 5 (server history, newest first)\n\n- **#12 🤖 Agent**: Revenue grew.\n- **#11 👤 User**: How did revenue do?'
      );
    });

    it('should say when the server holds no history', async () => {
      await expect(manageThreads(threadService, { action: 'history', thread_id: '5' })).resolves.toBe(
        'Thread 5 has no messages on the server'
      );
    });

    it('should read payload text from JSON or keep it as is', () => {
      expect(remotePayloadText('{"text":"hi"}')).toBe('hi');
      expect(remotePayloadText('{"other":1}')).toBe('{"other":1}');
      expect(remotePayloadText('plain')).toBe('plain');
    });

    it('should require the arguments an action needs', async () => {
      await expect(manageThreads(threadService, { action: 'view' })).rejects.toThrow("thread_id is required for 'view'");
      await expect(manageThreads(threadService, { action: 'rename', thread_id: '1' })).rejects.toThrow(
        "thread_name is required for 'rename'"
      );
    });
  });

  describe('checkHealth', () => {
    const breaker = new CircuitBreaker(5, 60000);

    function deps(hasCredentials: boolean, agents: AgentDescriptor[] | Error): HealthDependencies {
      return {
        client: {
          getCircuitBreakerState: () => breaker.getState(),
          getCircuitBreakerStats: () => breaker.getStats(),
        },
        tokens: { hasCredentials: () => hasCredentials },
        turnService: {
          defaultAgent: AGENT,
          listAgents: async () => {
            if (agents instanceof Error) {
              throw agents;
            }
            return agents;
          },
        },
        dbConnection: connection,
      };
    }

    it('should be healthy when the agent is listed', async () => {
      const health = await checkHealth(
        deps(true, [{ database: 'DB', schema: 'SC', name: 'sales', comment: null, owner: null, createdOn: null }])
      );

      expect(health.status).toBe('healthy');
      expect(health.components.database.status).toBe('healthy');
      expect(health.components.credentials).toEqual({ status: 'healthy', message: 'Credentials available' });
      expect(health.components.agent).toEqual({
        status: 'healthy',
        message: 'Agent DB.SC.SALES is available',
        agents_count: 1,
      });
      expect(health.components.circuitBreaker.state).toBe('closed');
    });

    it('should skip the agent check without credentials', async () => {
      const health = await checkHealth(deps(false, []));

      expect(health.status).toBe('degraded');
      expect(health.components.credentials.status).toBe('error');
      expect(health.components.agent).toEqual({ status: 'unknown', message: 'Skipped: no credentials' });
    });

    it('should be degraded when the agent is missing or unreachable', async () => {
      const missing = await checkHealth(deps(true, []));
      expect(missing.status).toBe('degraded');
      expect(missing.components.agent.message).toBe('Agent SALES not found among 0 agent(s) in DB.SC');

      const unreachable = await checkHealth(deps(true, new Error('HTTP 403')));
      expect(unreachable.components.agent).toEqual({ status: 'error', message: 'HTTP 403' });
    });
  });

  describe('formatAgentDetails', () => {
    it('should list the model, tools and numbered sample questions', () => {
      expect(
        formatAgentDetails({
          ...AGENT,
          comment: 'Answers sales questions',
          owner: null,
          createdOn: null,
          sampleQuestions: ['Top regions?', 'Revenue trend?'],
          tools: ['analyst', 'search'],
          orchestrationModel: 'claude-4-sonnet',
        })
      ).toBe(
        [
          '# DB.SC.SALES',
          '',
          'Answers sales questions',
          '',
          '**Model:** claude-4-sonnet',
          '**Tools:** analyst, search',
          '',
          '## Sample questions',
          '',
          '1. Top regions?',
          '2. Revenue trend?',
        ].join('\n')
      );
    });

    it('should fall back when the agent has no model or tools', () => {
      expect(
        formatAgentDetails({
          ...AGENT,
          comment: null,
          owner: null,
          createdOn: null,
          sampleQuestions: [],
          tools: [],
          orchestrationModel: null,
        })
      ).toBe('# DB.SC.SALES\n\n**Model:** auto\n**Tools:** none');
    });
  });
});
