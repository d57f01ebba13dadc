/**
 * Typed events decoded from the agent run stream.
 *
 * Every vendor event name maps to exactly one `kind`; consumers switch over
 * `kind` exhaustively.
 */

export interface RawResultSet {
  rows: unknown[][];
  /** Column names from the result set metadata, or null when absent */
  columnNames: string[] | null;
}

export interface SearchResultReference {
  id: string;
  docId: string;
  docTitle: string;
  text: string;
}

export interface ToolResultPayload {
  text: string;
  sql: string;
  table: RawResultSet | null;
  searchResults: SearchResultReference[];
}

export interface CitationAnnotation {
  citationId: string;
  type: string;
  docId: string;
  docTitle: string;
  text: string;
  /** UTF-8 byte offsets into the text buffer of the annotated index */
  startIndex: number | null;
  endIndex: number | null;
}

export interface StatusEvent {
  kind: 'status';
  status: string;
  message: string;
}

export interface ReevaluationEvent {
  kind: 'reevaluation';
  message: string;
}

export interface ThinkingDeltaEvent {
  kind: 'thinking.delta';
  contentIndex: number;
  text: string;
}

export interface ThinkingEvent {
  kind: 'thinking';
  contentIndex: number;
  text: string;
}

export interface ToolUseEvent {
  kind: 'tool_use';
  contentIndex: number;
  toolUseId: string;
  name: string;
  toolType: string;
  input: Record<string, unknown>;
}

export interface ToolResultEvent {
  kind: 'tool_result';
  contentIndex: number;
  toolUseId: string;
  name: string;
  toolType: string;
  status: string;
  result: ToolResultPayload;
}

export interface ToolStatusEvent {
  kind: 'tool_status';
  toolType: string;
  status: string;
  message: string;
}

export interface TableEvent {
  kind: 'table';
  contentIndex: number;
  /** Undecoded `result_set`; checked when the table is placed */
  resultSet: unknown;
}

export interface ChartEvent {
  kind: 'chart';
  contentIndex: number;
  chartSpec: string | Record<string, unknown>;
}

export interface TextDeltaEvent {
  kind: 'text.delta';
  contentIndex: number;
  text: string;
}

export interface TextEvent {
  kind: 'text';
  contentIndex: number;
  text: string;
}

export interface TextAnnotationEvent {
  kind: 'text.annotation';
  contentIndex: number;
  annotationIndex: number;
  annotation: CitationAnnotation;
}

export interface MetadataEvent {
  kind: 'metadata';
  role: string;
  messageId: number | null;
  parentId: number | null;
  threadId: string | null;
}

export interface ErrorEvent {
  kind: 'error';
  code: string;
  message: string;
}

export interface DoneEvent {
  kind: 'done';
}

export interface UnknownEvent {
  kind: 'unknown';
  name: string;
}

export type AgentStreamEvent =
  | StatusEvent
  | ReevaluationEvent
  | ThinkingDeltaEvent
  | ThinkingEvent
  | ToolUseEvent
  | ToolResultEvent
  | ToolStatusEvent
  | TableEvent
  | ChartEvent
  | TextDeltaEvent
  | TextEvent
  | TextAnnotationEvent
  | MetadataEvent
  | ErrorEvent
  | DoneEvent
  | UnknownEvent;

export type AgentStreamEventKind = AgentStreamEvent['kind'];
