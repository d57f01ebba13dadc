import type { FinalizedMessage } from './Message.js';

/**
 * Conversation thread domain entities
 */
export interface ThreadMetadata {
  threadId: string;
  threadName: string;
  originApplication: string;
  createdOn: number;
  updatedOn: number;
}

export interface ThreadSummary extends ThreadMetadata {
  messageCount: number;
  lastActivity: string | null;
}

export type TurnState = 'receiving' | 'reevaluating' | 'done' | 'errored';

export type StoredTurnState = 'receiving' | 'done' | 'errored';

export interface TurnRecord {
  requestId: string;
  threadId: string;
  userText: string;
  state: StoredTurnState;
  error: string | null;
  startedAt: string;
  finishedAt: string | null;
}

interface ThreadMessageBase {
  threadId: string;
  messageIndex: number;
  requestId: string;
  remoteMessageId: number | null;
  createdAt: string;
}

export interface UserThreadMessage extends ThreadMessageBase {
  role: 'user';
  payload: { text: string };
}

export interface AssistantThreadMessage extends ThreadMessageBase {
  role: 'assistant';
  payload: FinalizedMessage;
}

export type ThreadMessage = UserThreadMessage | AssistantThreadMessage;

/**
 * A finished turn handed to the thread store in one append
 */
export interface CompletedTurn {
  requestId: string;
  userText: string;
  message: FinalizedMessage;
}
