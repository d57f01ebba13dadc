import type { RenderOp } from '../../core/interfaces/IRenderSink.js';
import { RenderOpSink } from '../render/RenderOpSink.js';

export interface RenderBroadcast {
  type: 'render';
  threadId: string;
  requestId: string | null;
  op: RenderOp;
}

export interface RenderBroadcaster {
  broadcast(message: RenderBroadcast): void;
}

/**
 * Forwards render operations of one thread to every connected browser
 */
export class WebSocketRenderSink extends RenderOpSink {
  private requestId: string | null = null;

  constructor(
    private broadcaster: RenderBroadcaster,
    readonly threadId: string
  ) {
    super();
  }

  /**
   * Tag subsequent operations with the turn's request id
   */
  bindRequest(requestId: string): void {
    this.requestId = requestId;
  }

  protected emit(op: RenderOp): void {
    this.broadcaster.broadcast({
      type: 'render',
      threadId: this.threadId,
      requestId: this.requestId,
      op,
    });
  }
}
