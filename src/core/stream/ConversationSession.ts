import { ContentSlotStore } from './ContentSlotStore.js';

export class TurnInProgressError extends Error {
  constructor(public readonly threadId: string) {
    super(`A turn is already in progress for thread ${threadId}`);
    this.name = 'TurnInProgressError';
  }
}

/**
 * Conversation state owned by one thread: the live content slots and the
 * single-active-turn guard. Passed explicitly to everything that renders a turn.
 */
export class ConversationSession {
  readonly slots: ContentSlotStore = new ContentSlotStore();
  private activeTurn: string | null = null;

  constructor(public readonly threadId: string) {}

  get isBusy(): boolean {
    return this.activeTurn !== null;
  }

  /**
   * Claim the thread for a new turn
   * @throws TurnInProgressError when another turn is still active
   */
  beginTurn(token: string): void {
    if (this.activeTurn !== null) {
      throw new TurnInProgressError(this.threadId);
    }
    this.activeTurn = token;
  }

  endTurn(token: string): void {
    if (this.activeTurn === token) {
      this.activeTurn = null;
    }
  }
}
