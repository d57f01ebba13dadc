import fetch, { type RequestInit, type Response } from 'node-fetch';
import { randomUUID } from 'crypto';
import { z } from 'zod';
import type {
  AgentDescriptor,
  AgentDetails,
  AgentReference,
  AgentRunRequest,
  AgentRunStream,
} from '../../core/entities/Agent.js';
import type { ThreadMetadata } from '../../core/entities/Thread.js';
import { CortexApiError, type ICortexClient, type RemoteThread } from '../../core/interfaces/ICortexClient.js';
import { CircuitBreaker, DEFAULT_RETRY_CONFIG, isRetryableError, withRetry, type RetryConfig } from '../../utils/retry.js';
import type { TokenProvider } from './TokenProvider.js';
import { readServerSentEvents } from './sse.js';

export const REQUEST_ID_HEADER = 'x-snowflake-request-id';

const MAX_THREAD_PAGE_SIZE = 100;

function shouldRetry(error: unknown): boolean {
  if (error instanceof CortexApiError) {
    return error.retryable;
  }
  return isRetryableError(error);
}

function retryAfterMs(error: unknown): number | undefined {
  return error instanceof CortexApiError ? error.retryAfterMs : undefined;
}

/**
 * `Retry-After` in seconds; the HTTP-date form is ignored
 */
export function parseRetryAfter(header: string | null): number | undefined {
  if (!header || !/^\d+$/.test(header.trim())) {
    return undefined;
  }
  return Number(header.trim()) * 1000;
}

const epoch = z.union([z.number(), z.string()]).transform((value) => Number(value) || 0);

const ThreadMetadataSchema = z.object({
  thread_id: z.union([z.number(), z.string()]).transform(String),
  thread_name: z.string().nullish(),
  origin_application: z.string().nullish(),
  created_on: epoch.nullish(),
  updated_on: epoch.nullish(),
});

const CreateThreadSchema = z.union([
  z.object({ thread_id: z.union([z.number(), z.string()]) }).transform((body) => String(body.thread_id)),
  z.union([z.number(), z.string()]).transform(String),
]);

const RemoteMessageSchema = z.object({
  message_id: z.number().int(),
  parent_id: z.number().int().nullish(),
  created_on: epoch.nullish(),
  role: z.string().default(''),
  message_payload: z.string().default(''),
  request_id: z.string().default(''),
});

const ThreadResponseSchema = z.object({
  metadata: ThreadMetadataSchema.partial().default({}),
  messages: z.array(RemoteMessageSchema).default([]),
});

const AgentSchema = z.object({
  name: z.string(),
  database_name: z.string().nullish(),
  schema_name: z.string().nullish(),
  comment: z.string().nullish(),
  owner: z.string().nullish(),
  created_on: z.union([z.string(), z.number()]).nullish(),
});

const AgentListSchema = z.array(AgentSchema);

const AgentDetailSchema = AgentSchema.extend({ agent_spec: z.unknown() });

const SampleQuestionSchema = z.union([
  z.string(),
  z.object({ question: z.string() }).transform((value) => value.question),
]);

const ToolEntrySchema = z.object({ tool_spec: z.object({ name: z.string() }) }).transform((value) => value.tool_spec.name);

const AgentSpecSchema = z.object({
  models: z.object({ orchestration: z.string().nullish() }).nullish(),
  instructions: z.object({ sample_questions: z.array(z.unknown()).nullish() }).nullish(),
  tools: z.array(z.unknown()).nullish(),
});

export interface AgentSpecSummary {
  sampleQuestions: string[];
  tools: string[];
  orchestrationModel: string | null;
}

function collect<T>(items: unknown[], schema: z.ZodType<T, z.ZodTypeDef, unknown>): T[] {
  const values: T[] = [];
  for (const item of items) {
    const result = schema.safeParse(item);
    if (result.success) values.push(result.data);
  }
  return values;
}

/**
 * Read the user-facing parts of an agent specification, given as an object
 * or a JSON string. Anything unreadable is left out.
 */
export function parseAgentSpec(spec: unknown): AgentSpecSummary {
  let value = spec;
  if (typeof value === 'string') {
    try {
      value = JSON.parse(value);
    } catch {
      return { sampleQuestions: [], tools: [], orchestrationModel: null };
    }
  }

  const result = AgentSpecSchema.safeParse(value);
  if (!result.success) {
    return { sampleQuestions: [], tools: [], orchestrationModel: null };
  }
  const { models, instructions, tools } = result.data;
  return {
    sampleQuestions: collect(instructions?.sample_questions ?? [], SampleQuestionSchema).filter(
      (question) => question.trim().length > 0
    ),
    tools: collect(tools ?? [], ToolEntrySchema),
    orchestrationModel: models?.orchestration || null,
  };
}

export interface CortexApiClientOptions {
  account: string;
  /** Overrides `{account}.snowflakecomputing.com` */
  host?: string;
  requestTimeoutMs: number;
  userAgent?: string;
  debugLog?: (message: string) => void;
}

type FetchFn = (url: string, init?: RequestInit) => Promise<Response>;

function segment(value: string): string {
  return encodeURIComponent(value);
}

function toDescriptor(agent: z.infer<typeof AgentSchema>, database: string, schema: string): AgentDescriptor {
  return {
    database: agent.database_name ?? database,
    schema: agent.schema_name ?? schema,
    name: agent.name,
    comment: agent.comment ?? null,
    owner: agent.owner ?? null,
    createdOn: agent.created_on === undefined || agent.created_on === null ? null : String(agent.created_on),
  };
}

/**
 * Snowflake Cortex REST client: agent runs, threads and agent listing
 */
export class CortexApiClient implements ICortexClient {
  private baseUrl: string;
  private circuitBreaker: CircuitBreaker;
  private retryConfig: RetryConfig;
  private debugLog: (message: string) => void;

  constructor(
    private options: CortexApiClientOptions,
    private tokens: TokenProvider,
    circuitBreaker?: CircuitBreaker,
    retryConfig?: RetryConfig,
    private fetchImpl: FetchFn = fetch
  ) {
    const host = options.host || `${options.account}.snowflakecomputing.com`;
    this.baseUrl = (/^https?:\/\//.test(host) ? host : `https://${host}`).replace(/\/+$/, '');
    this.circuitBreaker = circuitBreaker || new CircuitBreaker(5, 60000);
    this.retryConfig = retryConfig || { ...DEFAULT_RETRY_CONFIG, timeoutMs: options.requestTimeoutMs };
    this.debugLog = options.debugLog ?? (() => {});
  }

  private headers(accept: string): Record<string, string> {
    const { token, tokenType } = this.tokens.getToken();
    return {
      Authorization: `Bearer ${token}`,
      'X-Snowflake-Authorization-Token-Type': tokenType,
      'Content-Type': 'application/json',
      Accept: accept,
      'User-Agent': this.options.userAgent ?? 'CortexAgentChat/1.0',
    };
  }

  /**
   * Non-streaming JSON call behind the circuit breaker and retry policy
   */
  private async requestJson<T>(
    method: 'GET' | 'POST' | 'DELETE',
    path: string,
    operation: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    body?: Record<string, unknown>
  ): Promise<T> {
    const text = await this.circuitBreaker.execute(() =>
      withRetry(
        async () => {
          const res = await this.fetchImpl(`${this.baseUrl}${path}`, {
            method,
            headers: this.headers('application/json'),
            body: body === undefined ? undefined : JSON.stringify(body),
            timeout: this.options.requestTimeoutMs,
          });
          const content = await res.text();
          if (!res.ok) {
            throw new CortexApiError(res.status, content, operation, parseRetryAfter(res.headers.get('retry-after')));
          }
          return content;
        },
        this.retryConfig,
        {
          onLog: (log) => {
            if (!log.success) {
              this.debugLog(`[CortexApiClient] ${operation} attempt ${log.attempt} failed: ${log.error}`);
            }
          },
          shouldRetry,
          retryAfterMs,
        }
      )
    );

    let parsed: unknown = null;
    if (text.trim()) {
      try {
        parsed = JSON.parse(text);
      } catch {
        // Some endpoints answer with a bare status string
        parsed = text;
      }
    }
    return schema.parse(parsed);
  }

  async runAgent(request: AgentRunRequest, signal?: AbortSignal): Promise<AgentRunStream> {
    const { agent } = request;
    const path = `/api/v2/databases/${segment(agent.database)}/schemas/${segment(agent.schema)}/agents/${segment(agent.name)}:run`;
    const numericThreadId = Number(request.threadId);

    const body: Record<string, unknown> = {
      thread_id: Number.isSafeInteger(numericThreadId) ? numericThreadId : request.threadId,
      parent_message_id: request.parentMessageId,
      messages: [{ role: 'user', content: [{ type: 'text', text: request.text }] }],
    };
    if (request.orchestrationModel) {
      body.models = { orchestration: request.orchestrationModel };
    }
    if (request.toolChoice) {
      body.tool_choice = request.toolChoice;
    }

    this.debugLog(
      `[CortexApiClient] Running agent ${agent.name} on thread ${request.threadId} (parent ${request.parentMessageId})`
    );

    // Streaming calls are never retried
    const res = await this.fetchImpl(`${this.baseUrl}${path}`, {
      method: 'POST',
      headers: this.headers('text/event-stream'),
      body: JSON.stringify(body),
      timeout: this.options.requestTimeoutMs,
      signal,
    });

    if (!res.ok) {
      throw new CortexApiError(res.status, await res.text(), 'Agent run');
    }

    const requestId = res.headers.get(REQUEST_ID_HEADER) || `local-${randomUUID()}`;
    return { requestId, events: readServerSentEvents(res.body) };
  }

  async createThread(originApplication: string): Promise<string> {
    return this.requestJson('POST', '/api/v2/cortex/threads', 'Create thread', CreateThreadSchema, {
      origin_application: originApplication,
    });
  }

  async listThreads(originApplication?: string): Promise<ThreadMetadata[]> {
    const query = originApplication ? `?origin_application=${encodeURIComponent(originApplication)}` : '';
    const threads = await this.requestJson(
      'GET',
      `/api/v2/cortex/threads${query}`,
      'List threads',
      z.array(ThreadMetadataSchema).nullable()
    );
    return (threads ?? []).map((thread) => ({
      threadId: thread.thread_id,
      threadName: thread.thread_name ?? '',
      originApplication: thread.origin_application ?? originApplication ?? '',
      createdOn: thread.created_on ?? 0,
      updatedOn: thread.updated_on ?? 0,
    }));
  }

  async getThread(threadId: string, pageSize = 20, lastMessageId?: number): Promise<RemoteThread> {
    const params = new URLSearchParams({ page_size: String(Math.min(Math.max(pageSize, 1), MAX_THREAD_PAGE_SIZE)) });
    if (lastMessageId !== undefined) {
      params.set('last_message_id', String(lastMessageId));
    }

    const thread = await this.requestJson(
      'GET',
      `/api/v2/cortex/threads/${segment(threadId)}?${params.toString()}`,
      'Get thread',
      ThreadResponseSchema
    );

    return {
      metadata: {
        threadId: thread.metadata.thread_id ?? threadId,
        threadName: thread.metadata.thread_name ?? '',
        originApplication: thread.metadata.origin_application ?? '',
        createdOn: thread.metadata.created_on ?? 0,
        updatedOn: thread.metadata.updated_on ?? 0,
      },
      messages: thread.messages.map((message) => ({
        messageId: message.message_id,
        parentId: message.parent_id ?? null,
        createdOn: message.created_on ?? 0,
        role: message.role,
        messagePayload: message.message_payload,
        requestId: message.request_id,
      })),
    };
  }

  async renameThread(threadId: string, threadName: string): Promise<void> {
    await this.requestJson('POST', `/api/v2/cortex/threads/${segment(threadId)}`, 'Rename thread', z.unknown(), {
      thread_name: threadName,
    });
  }

  async deleteThread(threadId: string): Promise<void> {
    await this.requestJson('DELETE', `/api/v2/cortex/threads/${segment(threadId)}`, 'Delete thread', z.unknown());
  }

  async listAgents(database: string, schema: string): Promise<AgentDescriptor[]> {
    const agents = await this.requestJson(
      'GET',
      `/api/v2/databases/${segment(database)}/schemas/${segment(schema)}/agents`,
      'List agents',
      AgentListSchema.nullable()
    );
    return (agents ?? []).map((agent) => toDescriptor(agent, database, schema));
  }

  async describeAgent(agent: AgentReference): Promise<AgentDetails> {
    const detail = await this.requestJson(
      'GET',
      `/api/v2/databases/${segment(agent.database)}/schemas/${segment(agent.schema)}/agents/${segment(agent.name)}`,
      'Describe agent',
      AgentDetailSchema
    );
    const spec = parseAgentSpec(detail.agent_spec);
    this.debugLog(
      `[CortexApiClient] Agent ${agent.name} has ${spec.sampleQuestions.length} sample question(s) and ${spec.tools.length} tool(s)`
    );
    return { ...toDescriptor(detail, agent.database, agent.schema), ...spec };
  }

  getCircuitBreakerState() {
    return this.circuitBreaker.getState();
  }

  getCircuitBreakerStats() {
    return this.circuitBreaker.getStats();
  }
}
