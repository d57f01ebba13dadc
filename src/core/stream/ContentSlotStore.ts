import type { TableRender } from '../interfaces/IRenderSink.js';
import type { PlacedAnnotation } from './citations.js';

interface SlotBase {
  requestId: string;
  contentIndex: number;
  /** Re-evaluation cycle the slot was written in */
  cycle: number;
}

export interface TextSlot extends SlotBase {
  kind: 'text';
  buffer: string;
  complete: boolean;
  annotations: Map<number, PlacedAnnotation>;
}

export interface ThinkingSlot extends SlotBase {
  kind: 'thinking';
  buffer: string;
  complete: boolean;
}

export interface TableSlot extends SlotBase {
  kind: 'table';
  table: TableRender;
  fingerprint: string;
  source: 'table_event' | 'tool_result';
}

export interface ChartSlot extends SlotBase {
  kind: 'chart';
  spec: Record<string, unknown>;
}

export interface ErrorSlot extends SlotBase {
  kind: 'error';
  message: string;
}

export type ContentSlot = TextSlot | ThinkingSlot | TableSlot | ChartSlot | ErrorSlot;

export type SlotKind = ContentSlot['kind'];

/**
 * Content slots keyed by (request id, content index).
 *
 * Slots of one request live in their own map; no operation that takes a
 * request id reaches another request's slots.
 */
export class ContentSlotStore {
  private slots: Map<string, Map<number, ContentSlot>> = new Map();

  get(requestId: string, contentIndex: number): ContentSlot | undefined {
    return this.slots.get(requestId)?.get(contentIndex);
  }

  set(slot: ContentSlot): void {
    let request = this.slots.get(slot.requestId);
    if (!request) {
      request = new Map();
      this.slots.set(slot.requestId, request);
    }
    request.set(slot.contentIndex, slot);
  }

  delete(requestId: string, contentIndex: number): boolean {
    return this.slots.get(requestId)?.delete(contentIndex) ?? false;
  }

  /**
   * Slots of one request ordered by content index
   */
  list(requestId: string): ContentSlot[] {
    const request = this.slots.get(requestId);
    if (!request) {
      return [];
    }
    return [...request.values()].sort((a, b) => a.contentIndex - b.contentIndex);
  }

  indicesBelow(requestId: string, contentIndex: number): number[] {
    return this.list(requestId)
      .map((slot) => slot.contentIndex)
      .filter((index) => index < contentIndex);
  }

  /**
   * Drop every slot of a finished request
   */
  release(requestId: string): void {
    this.slots.delete(requestId);
  }

  size(requestId?: string): number {
    if (requestId !== undefined) {
      return this.slots.get(requestId)?.size ?? 0;
    }
    let total = 0;
    for (const request of this.slots.values()) {
      total += request.size;
    }
    return total;
  }
}
