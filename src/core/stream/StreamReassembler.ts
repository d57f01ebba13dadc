import type {
  AgentStreamEvent,
  MetadataEvent,
  RawResultSet,
  TextAnnotationEvent,
  ToolResultEvent,
  ToolUseEvent,
} from '../entities/StreamEvent.js';
import {
  deepFreeze,
  type DegradedNotice,
  type FinalizedMessage,
  type MessageItem,
  type ToolCall,
  type TurnError,
} from '../entities/Message.js';
import type { TurnState } from '../entities/Thread.js';
import type { IRenderSink, RegionId } from '../interfaces/IRenderSink.js';
import type { IThreadStore } from '../interfaces/IThreadStore.js';
import { parseResultSet, parseStreamEvent } from './EventParser.js';
import {
  CitationRegistry,
  citationIdsInText,
  renderCitations,
  visibleStreamingText,
} from './citations.js';
import type {
  ChartSlot,
  ContentSlot,
  ErrorSlot,
  TableSlot,
  TextSlot,
  ThinkingSlot,
} from './ContentSlotStore.js';
import type { ConversationSession } from './ConversationSession.js';
import {
  buildTablePayload,
  describeToolInput,
  findTableReferences,
  parseChartSpec,
  tableFingerprint,
} from './payloads.js';

export const DEFAULT_MAX_TABLE_ROWS = 1000;

export interface StreamReassemblerOptions {
  /** Prompt that started the turn; stored next to the finalized message */
  userText: string;
  store?: Pick<IThreadStore, 'appendFinalizedMessage'>;
  maxTableRows?: number;
  enableCitations?: boolean;
  debugLog?: (message: string) => void;
}

export function slotRegion(requestId: string, contentIndex: number): RegionId {
  return `${requestId}:${contentIndex}`;
}

export function toolRegion(requestId: string, toolUseId: string): RegionId {
  return `${requestId}:tool:${toolUseId}`;
}

function assertNever(event: never): never {
  throw new Error(`Unhandled stream event: ${JSON.stringify(event)}`);
}

function humanizeStatus(status: string): string {
  const words = status.replace(/_/g, ' ').trim();
  return words ? words.charAt(0).toUpperCase() + words.slice(1) : 'Working';
}

function formatToolCall(call: ToolCall): string {
  const sections: string[] = [];
  if (Object.keys(call.input).length > 0) {
    sections.push(`**Input**\n\n\`\`\`json\n${JSON.stringify(call.input, null, 2)}\n\`\`\``);
  }
  if (call.sql) {
    sections.push(`**SQL**\n\n\`\`\`sql\n${call.sql}\n\`\`\``);
  }
  if (call.resultText) {
    sections.push(`**Result**\n\n${call.resultText}`);
  }
  if (call.status === 'error') {
    sections.push('**Status:** failed');
  }
  return sections.join('\n\n');
}

/**
 * Reassembles the event stream of one turn into a finalized message.
 *
 * Slots are addressed by (request id, content index) in the session's slot
 * store; this instance only ever touches slots of its own request id.
 * `RECEIVING → (REEVALUATING → RECEIVING)* → DONE | ERRORED`
 */
export class StreamReassembler {
  private turnState: TurnState = 'receiving';
  private cycle = 0;
  private citations = new CitationRegistry();
  private toolCalls: Map<string, ToolCall> = new Map();
  private tableIndexByFingerprint: Map<string, number> = new Map();
  private answering = false;
  private userMessageId: number | null = null;
  private assistantMessageId: number | null = null;
  private finalized: FinalizedMessage | null = null;
  private skipped = 0;
  private readonly maxTableRows: number;
  private readonly enableCitations: boolean;
  private readonly debugLog: (message: string) => void;

  constructor(
    readonly requestId: string,
    private session: ConversationSession,
    private sink: IRenderSink,
    private options: StreamReassemblerOptions
  ) {
    this.maxTableRows = options.maxTableRows ?? DEFAULT_MAX_TABLE_ROWS;
    this.enableCitations = options.enableCitations ?? true;
    this.debugLog = options.debugLog ?? (() => {});
  }

  get state(): TurnState {
    return this.turnState;
  }

  get isTerminal(): boolean {
    return this.turnState === 'done' || this.turnState === 'errored';
  }

  get result(): FinalizedMessage | null {
    return this.finalized;
  }

  /** Number of events dropped as malformed */
  get skippedEvents(): number {
    return this.skipped;
  }

  /**
   * Decode and apply one server-sent event; malformed payloads are skipped
   */
  applyRaw(eventName: string, data: string): void {
    if (this.isTerminal) {
      this.debugLog(`[StreamReassembler] Ignoring ${eventName} after request ${this.requestId} finished`);
      return;
    }

    const parsed = parseStreamEvent(eventName, data);
    if (!parsed.ok) {
      this.skipped++;
      console.warn(
        `[StreamReassembler] Skipping malformed ${eventName} event for request ${this.requestId}: ${parsed.error}`
      );
      return;
    }
    this.apply(parsed.event);
  }

  apply(event: AgentStreamEvent): void {
    if (this.isTerminal) {
      this.debugLog(`[StreamReassembler] Ignoring ${event.kind} after request ${this.requestId} finished`);
      return;
    }

    switch (event.kind) {
      case 'status':
        this.showStatus(event.message || humanizeStatus(event.status));
        break;
      case 'reevaluation':
        this.beginReevaluation(event.message);
        break;
      case 'thinking.delta':
        this.appendThinking(event.contentIndex, event.text, false);
        break;
      case 'thinking':
        this.appendThinking(event.contentIndex, event.text, true);
        break;
      case 'tool_use':
        this.recordToolUse(event);
        break;
      case 'tool_result':
        this.recordToolResult(event);
        break;
      case 'tool_status':
        this.showStatus(event.message || humanizeStatus(event.status));
        break;
      case 'table': {
        const parsed = parseResultSet(event.resultSet);
        if (parsed.ok) {
          this.placeTable(event.contentIndex, parsed.resultSet, 'table_event');
        } else {
          this.placeError(event.contentIndex, `Unable to render table: ${parsed.error}`);
        }
        break;
      }
      case 'chart':
        this.placeChart(event.contentIndex, event.chartSpec);
        break;
      case 'text.delta':
        this.appendText(event.contentIndex, event.text);
        break;
      case 'text':
        this.completeText(event.contentIndex, event.text);
        break;
      case 'text.annotation':
        this.attachAnnotation(event);
        break;
      case 'metadata':
        this.recordMetadata(event);
        break;
      case 'error':
        this.finalize('error', { code: event.code, message: event.message });
        break;
      case 'done':
        this.finalize('done', null);
        break;
      case 'unknown':
        this.debugLog(`[StreamReassembler] Ignoring ${event.name} event`);
        break;
      default:
        assertNever(event);
    }
  }

  /**
   * The stream closed without a terminal event; finalize what arrived
   */
  finishStream(): FinalizedMessage {
    if (this.finalized) {
      return this.finalized;
    }
    console.warn(
      `[StreamReassembler] Stream for request ${this.requestId} ended without a done event; finalizing partial content`
    );
    return this.finalize('done', null);
  }

  /**
   * End the turn after a transport failure, keeping partial content
   */
  fail(error: TurnError): FinalizedMessage {
    if (this.finalized) {
      return this.finalized;
    }
    return this.finalize('error', error);
  }

  private showStatus(label: string): void {
    this.render(() => this.sink.setStatus(label, 'running'));
  }

  private beginReevaluation(message: string): void {
    this.turnState = 'reevaluating';
    this.debugLog(`[StreamReassembler] Request ${this.requestId} is re-evaluating its plan`);
    this.showStatus(message || 'Re-evaluating the plan');
  }

  /**
   * Every slot write passes through here. The first write after a
   * re-evaluation signal opens a new cycle at that index and clears this
   * request's slots below it.
   */
  private enterSlot(contentIndex: number): void {
    if (this.turnState !== 'reevaluating') {
      return;
    }

    this.cycle++;
    this.turnState = 'receiving';
    const cleared = this.session.slots.indicesBelow(this.requestId, contentIndex);
    for (const index of cleared) {
      this.dropSlot(index);
    }
    this.debugLog(
      `[StreamReassembler] Cycle ${this.cycle} of ${this.requestId} starts at index ${contentIndex}, cleared ${cleared.length} slot(s)`
    );
  }

  private dropSlot(contentIndex: number): void {
    const slot = this.session.slots.get(this.requestId, contentIndex);
    if (!slot) {
      return;
    }
    this.forgetTable(slot);
    this.session.slots.delete(this.requestId, contentIndex);
    this.render(() => this.sink.clear(slotRegion(this.requestId, contentIndex)));
  }

  private forgetTable(slot: ContentSlot): void {
    if (slot.kind === 'table' && this.tableIndexByFingerprint.get(slot.fingerprint) === slot.contentIndex) {
      this.tableIndexByFingerprint.delete(slot.fingerprint);
    }
  }

  /**
   * Slot at an index in the current cycle; a slot left by a superseded cycle
   * is discarded so the new attempt starts empty
   */
  private currentSlot(contentIndex: number): ContentSlot | undefined {
    const existing = this.session.slots.get(this.requestId, contentIndex);
    if (existing && existing.cycle < this.cycle) {
      this.forgetTable(existing);
      this.session.slots.delete(this.requestId, contentIndex);
      return undefined;
    }
    return existing;
  }

  private replaceSlot(existing: ContentSlot | undefined, slot: ContentSlot): void {
    if (existing) {
      if (existing.kind !== slot.kind) {
        console.warn(
          `[StreamReassembler] Index ${slot.contentIndex} of ${this.requestId} changed from ${existing.kind} to ${slot.kind}`
        );
      }
      this.forgetTable(existing);
    }
    this.session.slots.set(slot);
  }

  private textSlot(contentIndex: number): TextSlot {
    const existing = this.currentSlot(contentIndex);
    if (existing?.kind === 'text') {
      return existing;
    }
    const slot: TextSlot = {
      kind: 'text',
      requestId: this.requestId,
      contentIndex,
      cycle: this.cycle,
      buffer: '',
      complete: false,
      annotations: new Map(),
    };
    this.replaceSlot(existing, slot);
    return slot;
  }

  private thinkingSlot(contentIndex: number): ThinkingSlot {
    const existing = this.currentSlot(contentIndex);
    if (existing?.kind === 'thinking') {
      return existing;
    }
    const slot: ThinkingSlot = {
      kind: 'thinking',
      requestId: this.requestId,
      contentIndex,
      cycle: this.cycle,
      buffer: '',
      complete: false,
    };
    this.replaceSlot(existing, slot);
    this.render(() => this.sink.createCollapsible(slotRegion(this.requestId, contentIndex), 'Reasoning'));
    this.showStatus('Thinking');
    return slot;
  }

  private appendThinking(contentIndex: number, text: string, complete: boolean): void {
    this.enterSlot(contentIndex);
    const slot = this.thinkingSlot(contentIndex);
    if (complete) {
      if (text) slot.buffer = text;
      slot.complete = true;
    } else {
      slot.buffer += text;
    }
    this.render(() => this.sink.upsertText(slotRegion(this.requestId, contentIndex), slot.buffer));
  }

  private appendText(contentIndex: number, text: string): void {
    this.enterSlot(contentIndex);
    const slot = this.textSlot(contentIndex);
    slot.buffer += text;
    for (const citationId of citationIdsInText(slot.buffer)) {
      this.citations.observe(citationId);
    }

    if (!this.answering) {
      this.answering = true;
      this.showStatus('Writing the answer');
    }
    this.render(() =>
      this.sink.upsertText(slotRegion(this.requestId, contentIndex), visibleStreamingText(slot.buffer))
    );
  }

  private completeText(contentIndex: number, text: string): void {
    this.enterSlot(contentIndex);
    const slot = this.textSlot(contentIndex);
    if (!slot.buffer && text) {
      slot.buffer = text;
      for (const citationId of citationIdsInText(slot.buffer)) {
        this.citations.observe(citationId);
      }
    }
    slot.complete = true;

    const numbering = this.numberCitations(this.liveTextSlots());
    this.render(() =>
      this.sink.upsertText(slotRegion(this.requestId, contentIndex), this.resolveText(slot, numbering))
    );
  }

  private attachAnnotation(event: TextAnnotationEvent): void {
    const { contentIndex, annotation } = event;
    if (!annotation.citationId) {
      this.skipped++;
      console.warn(
        `[StreamReassembler] Skipping annotation ${event.annotationIndex} at index ${contentIndex} of ${this.requestId}: no citation id`
      );
      return;
    }

    this.enterSlot(contentIndex);
    const existing = this.currentSlot(contentIndex);
    if (existing && existing.kind !== 'text') {
      console.warn(
        `[StreamReassembler] Annotation at index ${contentIndex} of ${this.requestId} targets a ${existing.kind} slot`
      );
      return;
    }

    const slot = this.textSlot(contentIndex);
    this.citations.observe(annotation.citationId, {
      docId: annotation.docId,
      docTitle: annotation.docTitle,
      text: annotation.text,
      type: annotation.type,
    });
    slot.annotations.set(event.annotationIndex, {
      citationId: annotation.citationId,
      endIndex: annotation.endIndex,
    });
  }

  private recordToolUse(event: ToolUseEvent): void {
    const toolUseId = event.toolUseId || `${event.name || 'tool'}-${event.contentIndex}`;
    const call: ToolCall = {
      toolUseId,
      name: event.name,
      type: event.toolType,
      input: event.input,
      status: 'running',
      sql: '',
      resultText: '',
    };
    this.toolCalls.set(toolUseId, call);

    const label = `Using ${event.name || event.toolType || 'a tool'}`;
    const detail = describeToolInput(event.input);
    const region = toolRegion(this.requestId, toolUseId);
    this.showStatus(detail ? `${label}: ${detail}` : label);
    this.render(() => this.sink.createCollapsible(region, `Tool: ${event.name || event.toolType}`));
    this.render(() => this.sink.upsertText(region, formatToolCall(call)));
  }

  private recordToolResult(event: ToolResultEvent): void {
    const toolUseId = event.toolUseId || `${event.name || 'tool'}-${event.contentIndex}`;
    const region = toolRegion(this.requestId, toolUseId);

    let call = this.toolCalls.get(toolUseId);
    if (!call) {
      this.debugLog(`[StreamReassembler] Result for ${toolUseId} arrived without a recorded invocation`);
      call = { toolUseId, name: event.name, type: event.toolType, input: {}, status: '', sql: '', resultText: '' };
      this.toolCalls.set(toolUseId, call);
      this.render(() => this.sink.createCollapsible(region, `Tool: ${event.name || event.toolType}`));
    }

    call.status = event.status || 'success';
    call.sql = event.result.sql;
    call.resultText = event.result.text;
    for (const reference of event.result.searchResults) {
      this.citations.describe(reference.id, {
        docId: reference.docId,
        docTitle: reference.docTitle,
        text: reference.text,
      });
    }

    const finished = call;
    const name = event.name || finished.name || 'Tool';
    this.render(() => this.sink.upsertText(region, formatToolCall(finished)));
    this.showStatus(finished.status === 'error' ? `${name} failed` : `${name} finished`);

    if (event.result.table) {
      this.placeTable(event.contentIndex, event.result.table, 'tool_result');
    }
  }

  /**
   * Store a table unless the same data is already shown at another index
   */
  private placeTable(contentIndex: number, resultSet: RawResultSet, source: TableSlot['source']): void {
    this.enterSlot(contentIndex);

    const fingerprint = tableFingerprint(resultSet);
    const shownAt = this.tableIndexByFingerprint.get(fingerprint);
    if (shownAt !== undefined && shownAt !== contentIndex) {
      const shown = this.session.slots.get(this.requestId, shownAt);
      if (shown?.kind === 'table' && shown.fingerprint === fingerprint) {
        this.debugLog(
          `[StreamReassembler] Table at index ${contentIndex} of ${this.requestId} duplicates index ${shownAt}; not rendered again`
        );
        return;
      }
    }

    const existing = this.currentSlot(contentIndex);
    const slot: TableSlot = {
      kind: 'table',
      requestId: this.requestId,
      contentIndex,
      cycle: this.cycle,
      table: buildTablePayload(resultSet, this.maxTableRows),
      fingerprint,
      source,
    };
    this.replaceSlot(existing, slot);
    this.tableIndexByFingerprint.set(fingerprint, contentIndex);
    this.render(() => this.sink.upsertTable(slotRegion(this.requestId, contentIndex), slot.table));
  }

  private placeChart(contentIndex: number, chartSpec: string | Record<string, unknown>): void {
    const parsed = parseChartSpec(chartSpec);
    if (!parsed.ok) {
      this.placeError(contentIndex, `Unable to render chart: ${parsed.error}`);
      return;
    }

    this.enterSlot(contentIndex);
    const existing = this.currentSlot(contentIndex);
    const slot: ChartSlot = {
      kind: 'chart',
      requestId: this.requestId,
      contentIndex,
      cycle: this.cycle,
      spec: parsed.spec,
    };
    this.replaceSlot(existing, slot);
    this.render(() => this.sink.upsertChart(slotRegion(this.requestId, contentIndex), { spec: slot.spec }));
  }

  /**
   * Content that could not be decoded; the error stays in its own slot
   */
  private placeError(contentIndex: number, message: string): void {
    this.enterSlot(contentIndex);
    const existing = this.currentSlot(contentIndex);
    const slot: ErrorSlot = {
      kind: 'error',
      requestId: this.requestId,
      contentIndex,
      cycle: this.cycle,
      message,
    };
    this.replaceSlot(existing, slot);
    console.warn(`[StreamReassembler] ${message} (request ${this.requestId}, index ${contentIndex})`);
    this.render(() => this.sink.upsertText(slotRegion(this.requestId, contentIndex), `⚠️ ${message}`));
  }

  private recordMetadata(event: MetadataEvent): void {
    if (event.messageId === null) {
      return;
    }
    if (event.role === 'user') {
      this.userMessageId = event.messageId;
    } else {
      this.assistantMessageId = event.messageId;
    }
  }

  private liveTextSlots(): TextSlot[] {
    return this.session.slots.list(this.requestId).filter((slot): slot is TextSlot => slot.kind === 'text');
  }

  private numberCitations(textSlots: TextSlot[]): Map<string, number> {
    if (!this.enableCitations) {
      return new Map();
    }
    const referenced: string[] = [];
    for (const slot of textSlots) {
      referenced.push(...citationIdsInText(slot.buffer));
      for (const annotation of slot.annotations.values()) {
        referenced.push(annotation.citationId);
      }
    }
    return this.citations.resolve(referenced);
  }

  private resolveText(slot: TextSlot, numbering: ReadonlyMap<string, number>): string {
    const annotations = this.enableCitations ? [...slot.annotations.values()] : [];
    return renderCitations(slot.buffer, annotations, numbering);
  }

  private detectMissingTables(textSlots: TextSlot[], items: MessageItem[]): DegradedNotice[] {
    if (items.some((item) => item.type === 'table')) {
      return [];
    }

    const references = textSlots.map((slot) => findTableReferences(slot.buffer));
    const referencedToolIds = [...new Set(references.flatMap((reference) => reference.toolResultIds))];
    if (!references.some((reference) => reference.mentionsTable) && referencedToolIds.length === 0) {
      return [];
    }

    console.warn(`[StreamReassembler] Answer for ${this.requestId} refers to a table but no table event arrived`);
    return [
      {
        kind: 'missing-table',
        message: 'The answer refers to a table, but the agent did not send any table data.',
        referencedToolIds,
      },
    ];
  }

  /**
   * Snapshot the live slots into an immutable message. Runs once per turn.
   */
  private finalize(status: FinalizedMessage['status'], error: TurnError | null): FinalizedMessage {
    if (this.finalized) {
      return this.finalized;
    }
    this.turnState = status === 'done' ? 'done' : 'errored';

    // Slots below a restart index are already gone; older slots nobody rewrote stay
    const live = this.session.slots.list(this.requestId);
    const textSlots = live.filter((slot): slot is TextSlot => slot.kind === 'text');
    const numbering = this.numberCitations(textSlots);
    const items: MessageItem[] = [];
    const thinking: FinalizedMessage['thinking'] = [];

    for (const slot of live) {
      switch (slot.kind) {
        case 'text': {
          const overflow = [...slot.annotations.values()].filter(
            (annotation) => annotation.endIndex !== null && annotation.endIndex > Buffer.byteLength(slot.buffer)
          );
          if (overflow.length > 0) {
            console.warn(
              `[StreamReassembler] ${overflow.length} annotation(s) at index ${slot.contentIndex} of ${this.requestId} point past the text; placed at its end`
            );
          }
          const text = this.resolveText(slot, numbering);
          if (text.length === 0) {
            break;
          }
          items.push({ type: 'text', contentIndex: slot.contentIndex, text });
          if (status === 'done') {
            this.render(() => this.sink.upsertText(slotRegion(this.requestId, slot.contentIndex), text));
          }
          break;
        }
        case 'thinking':
          thinking.push({ contentIndex: slot.contentIndex, text: slot.buffer });
          break;
        case 'table':
          items.push({
            type: 'table',
            contentIndex: slot.contentIndex,
            columns: [...slot.table.columns],
            rows: slot.table.rows.map((row) => [...row]),
            totalRows: slot.table.totalRows,
            truncated: slot.table.truncated,
            source: slot.source,
          });
          break;
        case 'chart':
          items.push({ type: 'chart', contentIndex: slot.contentIndex, spec: slot.spec });
          break;
        case 'error':
          items.push({ type: 'error', contentIndex: slot.contentIndex, message: slot.message });
          break;
      }
    }

    const degraded = this.detectMissingTables(textSlots, items);
    const message: FinalizedMessage = deepFreeze({
      requestId: this.requestId,
      threadId: this.session.threadId,
      status,
      items,
      thinking,
      toolCalls: [...this.toolCalls.values()].map((call) => ({ ...call, input: { ...call.input } })),
      citations: this.citations.citations(numbering),
      degraded,
      error,
      userMessageId: this.userMessageId,
      assistantMessageId: this.assistantMessageId,
      finalizedAt: new Date().toISOString(),
    });

    this.finalized = message;
    this.session.slots.release(this.requestId);

    if (error) {
      const detail = error.code ? `${error.message} (${error.code})` : error.message;
      this.render(() => this.sink.setStatus(`Error: ${detail}`, 'error'));
      this.render(() => this.sink.notice('error', detail));
    } else {
      this.render(() => this.sink.setStatus('Response complete', 'complete'));
    }
    for (const notice of degraded) {
      this.render(() => this.sink.notice('warning', notice.message));
    }

    this.debugLog(
      `[StreamReassembler] Finalized ${this.requestId} as ${status} with ${items.length} item(s), ${this.skipped} skipped event(s)`
    );

    if (status === 'done' && this.options.store) {
      try {
        this.options.store.appendFinalizedMessage(this.session.threadId, {
          requestId: this.requestId,
          userText: this.options.userText,
          message,
        });
      } catch (persistError) {
        console.error(`[StreamReassembler] Failed to store message for request ${this.requestId}:`, persistError);
      }
    }

    return message;
  }

  private render(action: () => void): void {
    try {
      action();
    } catch (error) {
      console.error(`[StreamReassembler] Render sink failed for request ${this.requestId}:`, error);
    }
  }
}
