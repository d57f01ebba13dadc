import type {
  AgentDescriptor,
  AgentDetails,
  AgentReference,
  AgentRunRequest,
  AgentRunStream,
} from '../entities/Agent.js';
import type { ThreadMetadata } from '../entities/Thread.js';

export class CortexApiError extends Error {
  constructor(
    public readonly status: number,
    public readonly body: string,
    operation: string,
    /** From a `Retry-After` header */
    public readonly retryAfterMs?: number
  ) {
    super(`${operation} failed: HTTP ${status}${body ? ` - ${body.slice(0, 500)}` : ''}`);
    this.name = 'CortexApiError';
  }

  /** Throttling and server-side failures are worth another attempt */
  get retryable(): boolean {
    return this.status === 429 || this.status >= 500;
  }
}

export interface RemoteThreadMessage {
  messageId: number;
  parentId: number | null;
  createdOn: number;
  role: string;
  messagePayload: string;
  requestId: string;
}

export interface RemoteThread {
  metadata: ThreadMetadata;
  messages: RemoteThreadMessage[];
}

/**
 * Interface for the Snowflake Cortex REST API
 */
export interface ICortexClient {
  /**
   * Start an agent run and expose its server-sent events
   */
  runAgent(request: AgentRunRequest, signal?: AbortSignal): Promise<AgentRunStream>;

  createThread(originApplication: string): Promise<string>;

  listThreads(originApplication?: string): Promise<ThreadMetadata[]>;

  getThread(threadId: string, pageSize?: number, lastMessageId?: number): Promise<RemoteThread>;

  renameThread(threadId: string, threadName: string): Promise<void>;

  deleteThread(threadId: string): Promise<void>;

  listAgents(database: string, schema: string): Promise<AgentDescriptor[]>;

  /**
   * One agent with its sample questions, tools and orchestration model
   */
  describeAgent(agent: AgentReference): Promise<AgentDetails>;
}
