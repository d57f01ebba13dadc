import { z } from 'zod';

/**
 * Finalized assistant message domain entity.
 *
 * Schemas double as the decoder for messages read back from storage.
 */

export const TextItemSchema = z.object({
  type: z.literal('text'),
  contentIndex: z.number().int(),
  text: z.string(),
});

export const TableItemSchema = z.object({
  type: z.literal('table'),
  contentIndex: z.number().int(),
  columns: z.array(z.string()),
  rows: z.array(z.array(z.unknown())),
  totalRows: z.number().int(),
  truncated: z.boolean(),
  source: z.enum(['table_event', 'tool_result']),
});

export const ChartItemSchema = z.object({
  type: z.literal('chart'),
  contentIndex: z.number().int(),
  spec: z.record(z.unknown()),
});

export const ErrorItemSchema = z.object({
  type: z.literal('error'),
  contentIndex: z.number().int(),
  message: z.string(),
});

export const MessageItemSchema = z.discriminatedUnion('type', [
  TextItemSchema,
  TableItemSchema,
  ChartItemSchema,
  ErrorItemSchema,
]);

export const CitationSchema = z.object({
  number: z.number().int().positive(),
  id: z.string(),
  docId: z.string(),
  docTitle: z.string(),
  text: z.string(),
  type: z.string(),
});

export const ToolCallSchema = z.object({
  toolUseId: z.string(),
  name: z.string(),
  type: z.string(),
  input: z.record(z.unknown()),
  status: z.string(),
  sql: z.string(),
  resultText: z.string(),
});

export const ThinkingSchema = z.object({
  contentIndex: z.number().int(),
  text: z.string(),
});

export const DegradedNoticeSchema = z.object({
  kind: z.literal('missing-table'),
  message: z.string(),
  referencedToolIds: z.array(z.string()),
});

export const FinalizedMessageSchema = z.object({
  requestId: z.string(),
  threadId: z.string(),
  status: z.enum(['done', 'error']),
  items: z.array(MessageItemSchema),
  thinking: z.array(ThinkingSchema),
  toolCalls: z.array(ToolCallSchema),
  citations: z.array(CitationSchema),
  degraded: z.array(DegradedNoticeSchema),
  error: z.object({ code: z.string(), message: z.string() }).nullable(),
  userMessageId: z.number().int().nullable(),
  assistantMessageId: z.number().int().nullable(),
  finalizedAt: z.string(),
});

export type TextItem = z.infer<typeof TextItemSchema>;
export type TableItem = z.infer<typeof TableItemSchema>;
export type ChartItem = z.infer<typeof ChartItemSchema>;
export type ErrorItem = z.infer<typeof ErrorItemSchema>;
export type MessageItem = z.infer<typeof MessageItemSchema>;
export type Citation = z.infer<typeof CitationSchema>;
export type ToolCall = z.infer<typeof ToolCallSchema>;
export type DegradedNotice = z.infer<typeof DegradedNoticeSchema>;
export type FinalizedMessage = z.infer<typeof FinalizedMessageSchema>;
export type TurnError = NonNullable<FinalizedMessage['error']>;

/**
 * Recursively freeze a value so the snapshot can no longer be mutated
 */
export function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    const children: unknown[] = Object.values(value);
    for (const child of children) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * Plain text of a message, text items joined in content order
 */
export function messageText(message: FinalizedMessage): string {
  return message.items
    .filter((item): item is TextItem => item.type === 'text')
    .map((item) => item.text)
    .join('\n\n');
}
