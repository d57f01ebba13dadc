import { randomUUID } from 'crypto';
import { setImmediate } from 'timers/promises';
import type {
  AgentDescriptor,
  AgentDetails,
  AgentReference,
  AgentRunStream,
  ToolChoice,
} from '../../core/entities/Agent.js';
import type { FinalizedMessage, TurnError } from '../../core/entities/Message.js';
import { CortexApiError, type ICortexClient } from '../../core/interfaces/ICortexClient.js';
import type { IRenderSink } from '../../core/interfaces/IRenderSink.js';
import type { IThreadStore } from '../../core/interfaces/IThreadStore.js';
import { ConversationSession, StreamReassembler } from '../../core/stream/index.js';

export interface AgentTurnSettings {
  agent: AgentReference;
  orchestrationModel?: string;
  maxTableRows: number;
  enableCitations: boolean;
}

export interface SendMessageOptions {
  /** Overrides the configured agent for this turn */
  agent?: AgentReference;
  toolChoice?: ToolChoice;
  signal?: AbortSignal;
  /** Called once the turn's request id is known, before any event is rendered */
  onRequestStarted?: (requestId: string) => void;
}

export class NothingToRegenerateError extends Error {
  constructor(public readonly threadId: string) {
    super(`Thread ${threadId} has no answered question to regenerate`);
    this.name = 'NothingToRegenerateError';
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Runs agent turns end to end: one active turn per thread, events fed to a
 * StreamReassembler in arrival order
 */
export class AgentTurnService {
  private sessions: Map<string, ConversationSession> = new Map();

  constructor(
    private client: ICortexClient,
    private store: IThreadStore,
    private settings: AgentTurnSettings,
    private debugLog: (message: string) => void = () => {}
  ) {}

  getSession(threadId: string): ConversationSession {
    let session = this.sessions.get(threadId);
    if (!session) {
      session = new ConversationSession(threadId);
      this.sessions.set(threadId, session);
    }
    return session;
  }

  isBusy(threadId: string): boolean {
    return this.sessions.get(threadId)?.isBusy ?? false;
  }

  forgetSession(threadId: string): void {
    if (!this.isBusy(threadId)) {
      this.sessions.delete(threadId);
    }
  }

  /**
   * Send a user message and stream the agent's reply into `sink`
   * @throws TurnInProgressError when the thread already has an active turn
   */
  async sendMessage(
    threadId: string,
    text: string,
    sink: IRenderSink,
    options: SendMessageOptions = {}
  ): Promise<FinalizedMessage> {
    const session = this.getSession(threadId);
    const token = randomUUID();
    session.beginTurn(token);

    try {
      const parentMessageId = this.store.getLastAssistantMessageId(threadId) ?? 0;

      let stream: AgentRunStream;
      try {
        stream = await this.client.runAgent(
          {
            agent: options.agent ?? this.settings.agent,
            threadId,
            parentMessageId,
            text,
            orchestrationModel: this.settings.orchestrationModel,
            toolChoice: options.toolChoice,
          },
          options.signal
        );
      } catch (error) {
        console.error(`[AgentTurnService] Agent run on thread ${threadId} failed before streaming:`, errorMessage(error));
        return this.failBeforeStream(session, sink, text, error, options);
      }

      options.onRequestStarted?.(stream.requestId);
      this.startTurn(threadId, stream.requestId, text);
      const reassembler = this.createReassembler(stream.requestId, session, sink, text);

      try {
        for await (const event of stream.events) {
          reassembler.applyRaw(event.event, event.data);
          if (reassembler.isTerminal) {
            break;
          }
          await setImmediate();
        }
      } catch (error) {
        console.error(`[AgentTurnService] Stream for request ${stream.requestId} broke:`, errorMessage(error));
        reassembler.fail({ code: 'transport_error', message: errorMessage(error) });
      }

      const message = reassembler.result ?? reassembler.finishStream();
      this.finishTurn(message);
      return message;
    } finally {
      session.endTurn(token);
    }
  }

  /**
   * Ask the last stored question of a thread again as a new turn
   * @throws NothingToRegenerateError when the thread has no stored question
   * @throws TurnInProgressError when the thread already has an active turn
   */
  async regenerate(threadId: string, sink: IRenderSink, options: SendMessageOptions = {}): Promise<FinalizedMessage> {
    const question = this.lastQuestion(threadId);
    if (question === null) {
      throw new NothingToRegenerateError(threadId);
    }
    this.debugLog(`[AgentTurnService] Regenerating the answer to "${question.slice(0, 50)}" on thread ${threadId}`);
    return this.sendMessage(threadId, question, sink, options);
  }

  lastQuestion(threadId: string): string | null {
    const messages = this.store.listMessages(threadId);
    for (let i = messages.length - 1; i >= 0; i--) {
      const message = messages[i];
      if (message.role === 'user') {
        return message.payload.text;
      }
    }
    return null;
  }

  async listAgents(database?: string, schema?: string): Promise<AgentDescriptor[]> {
    const db = database || this.settings.agent.database;
    const sc = schema || this.settings.agent.schema;
    const agents = await this.client.listAgents(db, sc);
    this.debugLog(`[AgentTurnService] Found ${agents.length} agent(s) in ${db}.${sc}`);
    return agents;
  }

  /**
   * Details of an agent in the configured database and schema; the default agent when no name is given
   */
  async describeAgent(name?: string): Promise<AgentDetails> {
    return this.client.describeAgent(name ? { ...this.settings.agent, name } : this.settings.agent);
  }

  get defaultAgent(): AgentReference {
    return this.settings.agent;
  }

  private createReassembler(
    requestId: string,
    session: ConversationSession,
    sink: IRenderSink,
    userText: string
  ): StreamReassembler {
    return new StreamReassembler(requestId, session, sink, {
      userText,
      store: this.store,
      maxTableRows: this.settings.maxTableRows,
      enableCitations: this.settings.enableCitations,
      debugLog: this.debugLog,
    });
  }

  private failBeforeStream(
    session: ConversationSession,
    sink: IRenderSink,
    text: string,
    error: unknown,
    options: SendMessageOptions
  ): FinalizedMessage {
    const requestId = `local-${randomUUID()}`;
    const failure: TurnError =
      error instanceof CortexApiError
        ? { code: `http_${error.status}`, message: error.message }
        : { code: 'connection_error', message: errorMessage(error) };

    options.onRequestStarted?.(requestId);
    this.startTurn(session.threadId, requestId, text);
    const message = this.createReassembler(requestId, session, sink, text).fail(failure);
    this.finishTurn(message);
    return message;
  }

  private startTurn(threadId: string, requestId: string, text: string): void {
    try {
      this.store.createTurn(threadId, requestId, text);
    } catch (error) {
      console.error(`[AgentTurnService] Failed to record turn ${requestId}:`, error);
    }
  }

  private finishTurn(message: FinalizedMessage): void {
    try {
      this.store.completeTurn(
        message.requestId,
        message.status === 'done' ? 'done' : 'errored',
        message.error?.message
      );
    } catch (error) {
      console.error(`[AgentTurnService] Failed to record outcome of turn ${message.requestId}:`, error);
    }
    this.debugLog(`[AgentTurnService] Turn ${message.requestId} finished as ${message.status}`);
  }
}
