/**
 * Stream reassembly: turns agent server-sent events into finalized messages
 */
export { parseStreamEvent, summarizeToolResult, REEVALUATION_STATUS } from './EventParser.js';
export type { ParseResult } from './EventParser.js';
export { ContentSlotStore } from './ContentSlotStore.js';
export type { ContentSlot, SlotKind } from './ContentSlotStore.js';
export { ConversationSession, TurnInProgressError } from './ConversationSession.js';
export { CitationRegistry, renderCitations, visibleStreamingText } from './citations.js';
export {
  StreamReassembler,
  DEFAULT_MAX_TABLE_ROWS,
  slotRegion,
  toolRegion,
} from './StreamReassembler.js';
export type { StreamReassemblerOptions } from './StreamReassembler.js';
