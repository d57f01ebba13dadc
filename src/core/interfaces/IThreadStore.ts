import type {
  CompletedTurn,
  StoredTurnState,
  ThreadMessage,
  ThreadMetadata,
  ThreadSummary,
  TurnRecord,
} from '../entities/Thread.js';

/**
 * Interface for thread, turn and message persistence
 */
export interface IThreadStore {
  saveThread(thread: ThreadMetadata): void;

  getThread(threadId: string): ThreadMetadata | null;

  listThreads(): ThreadSummary[];

  renameThread(threadId: string, threadName: string): void;

  deleteThread(threadId: string): void;

  createTurn(threadId: string, requestId: string, userText: string): TurnRecord;

  completeTurn(requestId: string, state: Exclude<StoredTurnState, 'receiving'>, error?: string): void;

  getTurn(requestId: string): TurnRecord | null;

  /**
   * Append the user and assistant messages of a finished turn atomically.
   * Appending the same request twice is a no-op.
   */
  appendFinalizedMessage(threadId: string, turn: CompletedTurn): void;

  listMessages(threadId: string): ThreadMessage[];

  getLastAssistantMessageId(threadId: string): number | null;
}
