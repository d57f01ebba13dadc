import { z } from 'zod';
import type {
  AgentStreamEvent,
  RawResultSet,
  SearchResultReference,
  ToolResultPayload,
} from '../entities/StreamEvent.js';
import { columnNamesFromMetadata } from './payloads.js';

/** `response.status` value announcing that the agent is re-planning its answer */
export const REEVALUATION_STATUS = 'reevaluating_plan';

export type ParseResult = { ok: true; event: AgentStreamEvent } | { ok: false; error: string };

// Missing or null fields default to empty/zero; wrong types fail the event
const text = z
  .string()
  .nullish()
  .transform((value) => value ?? '');
const index = z
  .number()
  .int()
  .nonnegative()
  .nullish()
  .transform((value) => value ?? 0);
const offset = z
  .number()
  .int()
  .nonnegative()
  .nullish()
  .transform((value) => value ?? null);
const identifier = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((value) => (value === null || value === undefined ? '' : String(value)));
const messageId = z
  .number()
  .int()
  .nullish()
  .transform((value) => value ?? null);
const rows = z
  .array(z.array(z.unknown()))
  .nullish()
  .transform((value) => value ?? []);

const StatusSchema = z.object({ status: text, message: text });

const ContentTextSchema = z.object({ content_index: index, text });

const AnnotationSchema = z.object({
  content_index: index,
  annotation_index: index,
  annotation: z
    .object({
      type: text,
      search_result_id: text,
      doc_id: text,
      doc_title: text,
      text,
      start_index: offset,
      end_index: offset,
    })
    .nullish()
    .transform((value) => value ?? null),
});

const ToolUseSchema = z.object({
  content_index: index,
  tool_use_id: identifier,
  name: text,
  type: text,
  input: z
    .record(z.unknown())
    .nullish()
    .transform((value) => value ?? {}),
});

const ToolResultSchema = z.object({
  content_index: index,
  tool_use_id: identifier,
  name: text,
  type: text,
  status: text,
  content: z
    .array(z.unknown())
    .nullish()
    .transform((value) => value ?? []),
});

const ToolStatusSchema = z.object({ tool_type: text, status: text, message: text });

// The result set is checked when the table is placed, so a bad one only spoils its own slot
const TableSchema = z.object({ content_index: index, result_set: z.unknown() });

const ResultSetSchema = z
  .object({ data: rows, resultSetMetaData: z.unknown() })
  .nullish()
  .transform((value) => value ?? { data: [], resultSetMetaData: undefined });

const ChartSchema = z.object({
  content_index: index,
  chart_spec: z
    .union([z.string(), z.record(z.unknown())])
    .nullish()
    .transform((value) => value ?? ''),
});

const MetadataSchema = z.object({
  metadata: z
    .object({
      role: text,
      message_id: messageId,
      parent_id: messageId,
      thread_id: identifier,
    })
    .nullish()
    .transform((value) => value ?? { role: '', message_id: null, parent_id: null, thread_id: '' }),
});

const ErrorSchema = z.object({ code: identifier, message: text });

// Tool result content items
const SearchResultSchema = z.object({
  id: text,
  search_result_id: text,
  source_id: identifier,
  doc_id: text,
  doc_title: text,
  text,
});

const JsonContentSchema = z.object({
  type: z.literal('json'),
  json: z.object({
    text,
    sql: text,
    data: z.array(z.array(z.unknown())).optional(),
    resultSetMetaData: z.unknown(),
    search_results: z.array(z.unknown()).optional(),
    searchResults: z.array(z.unknown()).optional(),
  }),
});

const TextContentSchema = z.object({ type: z.literal('text'), text });

function describeIssues(error: z.ZodError): string {
  return error.errors
    .map((issue) => `${issue.path.join('.') || 'root'}: ${issue.message}`)
    .join('; ');
}

function decode<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: string,
  build: (value: T) => AgentStreamEvent
): ParseResult {
  let payload: unknown;
  try {
    payload = JSON.parse(data);
  } catch (error) {
    return {
      ok: false,
      error: `invalid JSON: ${error instanceof Error ? error.message : String(error)}`,
    };
  }

  const result = schema.safeParse(payload);
  if (!result.success) {
    return { ok: false, error: describeIssues(result.error) };
  }
  return { ok: true, event: build(result.data) };
}

export type ResultSetParse = { ok: true; resultSet: RawResultSet } | { ok: false; error: string };

/**
 * Decode the `result_set` of a table event; an absent one is an empty table
 */
export function parseResultSet(value: unknown): ResultSetParse {
  const result = ResultSetSchema.safeParse(value);
  if (!result.success) {
    return { ok: false, error: describeIssues(result.error) };
  }
  return {
    ok: true,
    resultSet: { rows: result.data.data, columnNames: columnNamesFromMetadata(result.data.resultSetMetaData) },
  };
}

function toSearchResult(item: unknown): SearchResultReference | null {
  const result = SearchResultSchema.safeParse(item);
  if (!result.success) {
    return null;
  }
  const value = result.data;
  const id = value.search_result_id || value.id || (value.source_id.startsWith('cs_') ? value.source_id : '');
  if (!id) {
    return null;
  }
  return { id, docId: value.doc_id, docTitle: value.doc_title, text: value.text };
}

/**
 * Reduce the heterogeneous content array of a tool result to what is displayed
 */
export function summarizeToolResult(content: unknown[]): ToolResultPayload {
  const texts: string[] = [];
  let sql = '';
  let table: RawResultSet | null = null;
  const searchResults: SearchResultReference[] = [];

  for (const item of content) {
    const json = JsonContentSchema.safeParse(item);
    if (json.success) {
      const body = json.data.json;
      if (body.text) texts.push(body.text);
      if (body.sql && !sql) sql = body.sql;
      if (!table && body.data && body.data.length > 0) {
        table = { rows: body.data, columnNames: columnNamesFromMetadata(body.resultSetMetaData) };
      }
      for (const entry of [...(body.search_results ?? []), ...(body.searchResults ?? [])]) {
        const reference = toSearchResult(entry);
        if (reference) searchResults.push(reference);
      }
      continue;
    }

    const plain = TextContentSchema.safeParse(item);
    if (plain.success) {
      if (plain.data.text) texts.push(plain.data.text);
      continue;
    }

    // Citation items sit directly in the content array
    const reference = toSearchResult(item);
    if (reference && reference.id.startsWith('cs_')) {
      searchResults.push(reference);
    }
  }

  return { text: texts.join('\n\n'), sql, table, searchResults };
}

/**
 * Decode one server-sent event into a typed stream event.
 * Unknown event names decode to `unknown`; malformed payloads fail.
 */
export function parseStreamEvent(name: string, data: string): ParseResult {
  switch (name) {
    case 'response.done':
      return { ok: true, event: { kind: 'done' } };

    case 'response.status':
      return decode(StatusSchema, data, (value) =>
        value.status === REEVALUATION_STATUS
          ? { kind: 'reevaluation', message: value.message }
          : { kind: 'status', status: value.status, message: value.message }
      );

    case 'response.thinking.delta':
      return decode(ContentTextSchema, data, (value) => ({
        kind: 'thinking.delta',
        contentIndex: value.content_index,
        text: value.text,
      }));

    case 'response.thinking':
      return decode(ContentTextSchema, data, (value) => ({
        kind: 'thinking',
        contentIndex: value.content_index,
        text: value.text,
      }));

    case 'response.tool_use':
      return decode(ToolUseSchema, data, (value) => ({
        kind: 'tool_use',
        contentIndex: value.content_index,
        toolUseId: value.tool_use_id,
        name: value.name,
        toolType: value.type,
        input: value.input,
      }));

    case 'response.tool_result':
      return decode(ToolResultSchema, data, (value) => ({
        kind: 'tool_result',
        contentIndex: value.content_index,
        toolUseId: value.tool_use_id,
        name: value.name,
        toolType: value.type,
        status: value.status,
        result: summarizeToolResult(value.content),
      }));

    case 'response.tool_result.status':
      return decode(ToolStatusSchema, data, (value) => ({
        kind: 'tool_status',
        toolType: value.tool_type,
        status: value.status,
        message: value.message,
      }));

    case 'response.table':
      return decode(TableSchema, data, (value) => ({
        kind: 'table',
        contentIndex: value.content_index,
        resultSet: value.result_set,
      }));

    case 'response.chart':
      return decode(ChartSchema, data, (value) => ({
        kind: 'chart',
        contentIndex: value.content_index,
        chartSpec: value.chart_spec,
      }));

    case 'response.text.delta':
      return decode(ContentTextSchema, data, (value) => ({
        kind: 'text.delta',
        contentIndex: value.content_index,
        text: value.text,
      }));

    case 'response.text':
      return decode(ContentTextSchema, data, (value) => ({
        kind: 'text',
        contentIndex: value.content_index,
        text: value.text,
      }));

    case 'response.text.annotation':
      return decode(AnnotationSchema, data, (value) => {
        const annotation = value.annotation;
        return {
          kind: 'text.annotation',
          contentIndex: value.content_index,
          annotationIndex: value.annotation_index,
          annotation: {
            citationId: annotation ? annotation.search_result_id || annotation.doc_id : '',
            type: annotation?.type ?? '',
            docId: annotation?.doc_id ?? '',
            docTitle: annotation?.doc_title ?? '',
            text: annotation?.text ?? '',
            startIndex: annotation?.start_index ?? null,
            endIndex: annotation?.end_index ?? null,
          },
        };
      });

    case 'metadata':
      return decode(MetadataSchema, data, (value) => ({
        kind: 'metadata',
        role: value.metadata.role,
        messageId: value.metadata.message_id,
        parentId: value.metadata.parent_id,
        threadId: value.metadata.thread_id || null,
      }));

    case 'response.error':
    case 'error':
      return decode(ErrorSchema, data, (value) => ({
        kind: 'error',
        code: value.code,
        message: value.message || 'The agent reported an error',
      }));

    default:
      return { ok: true, event: { kind: 'unknown', name } };
  }
}
