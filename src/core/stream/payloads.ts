import type { RawResultSet } from '../entities/StreamEvent.js';
import type { TableRender } from '../interfaces/IRenderSink.js';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function truncate(text: string, maxLength: number): string {
  return text.length > maxLength ? `${text.slice(0, maxLength)}...` : text;
}

function columnName(column: unknown, index: number): string {
  if (typeof column === 'string' && column.length > 0) {
    return column;
  }
  if (isRecord(column)) {
    for (const key of ['name', 'NAME', 'column_name']) {
      const value = column[key];
      if (typeof value === 'string' && value.length > 0) {
        return value;
      }
    }
  }
  return `col_${index}`;
}

/**
 * Column names from Snowflake result set metadata (`rowType`, `row_type` or `columns`)
 */
export function columnNamesFromMetadata(metadata: unknown): string[] | null {
  if (!isRecord(metadata)) {
    return null;
  }

  let columns: unknown[] | null = null;
  if (Array.isArray(metadata.rowType)) {
    columns = metadata.rowType;
  } else if (Array.isArray(metadata.row_type)) {
    columns = metadata.row_type;
  } else if (Array.isArray(metadata.columns)) {
    columns = metadata.columns;
  }

  return columns ? columns.map((column, index) => columnName(column, index)) : null;
}

/**
 * Shape a raw result set for display. Column names that do not match the row
 * width fall back to positional names; rows past `maxRows` are cut.
 */
export function buildTablePayload(resultSet: RawResultSet, maxRows: number): TableRender {
  const width = resultSet.rows.reduce((max, row) => Math.max(max, row.length), 0);
  const names = resultSet.columnNames;

  let columns: string[];
  if (width === 0) {
    columns = names ?? [];
  } else if (names && names.length === width) {
    columns = names;
  } else {
    columns = Array.from({ length: width }, (_, index) => `col_${index}`);
  }

  const rows = resultSet.rows.slice(0, maxRows);
  return {
    columns,
    rows,
    totalRows: resultSet.rows.length,
    truncated: rows.length < resultSet.rows.length,
  };
}

/**
 * Identity of a table's data, used to recognise the same result rendered twice
 */
export function tableFingerprint(resultSet: RawResultSet): string {
  return JSON.stringify([resultSet.columnNames ?? [], resultSet.rows]);
}

export type ChartSpecResult =
  | { ok: true; spec: Record<string, unknown> }
  | { ok: false; error: string };

function parseJson(text: string): { ok: true; value: unknown } | { ok: false; error: string } {
  try {
    const value: unknown = JSON.parse(text);
    return { ok: true, value };
  } catch (error) {
    return { ok: false, error: error instanceof Error ? error.message : String(error) };
  }
}

/**
 * Decode a chart specification. A `{ charts: [...] }` wrapper resolves to its
 * first chart, which may itself be a JSON string.
 */
export function parseChartSpec(chartSpec: string | Record<string, unknown>): ChartSpecResult {
  let value: unknown = chartSpec;

  if (typeof value === 'string') {
    const parsed = parseJson(value);
    if (!parsed.ok) {
      return { ok: false, error: `Chart specification is not valid JSON: ${parsed.error}` };
    }
    value = parsed.value;
  }

  if (isRecord(value) && Array.isArray(value.charts)) {
    const charts: unknown[] = value.charts;
    if (charts.length === 0) {
      return { ok: false, error: 'Chart specification contains no charts' };
    }
    value = charts[0];
    if (typeof value === 'string') {
      const parsed = parseJson(value);
      if (!parsed.ok) {
        return { ok: false, error: `Chart specification is not valid JSON: ${parsed.error}` };
      }
      value = parsed.value;
    }
  }

  if (!isRecord(value)) {
    return { ok: false, error: 'Chart specification must be a JSON object' };
  }
  return { ok: true, spec: value };
}

const TOOL_INPUT_KEYS = ['query', 'search_term', 'sql', 'reference_vqrs'];

/**
 * Short description of what a tool was asked to do, for the activity display
 */
export function describeToolInput(input: Record<string, unknown>, maxLength = 100): string {
  for (const key of TOOL_INPUT_KEYS) {
    const value = input[key];
    if (typeof value === 'string' && value.trim().length > 0) {
      return truncate(value.trim().replace(/\s+/g, ' '), maxLength);
    }
  }
  return '';
}

const TABLE_REFERENCE_PHRASES = [
  'please find the requested table below',
  'here is the table',
  'the table below shows',
  'find the table below',
  'requested table below',
  'show the table',
  'display the table',
  'table that shows',
  'see the table',
  'table data',
  'show you the data in a table',
];

const TOOL_RESULT_REFERENCE = /tool result ID:\s*([a-zA-Z0-9_]+)/g;

export interface TableReferences {
  mentionsTable: boolean;
  toolResultIds: string[];
}

/**
 * Find places where answer text claims to show a table
 */
export function findTableReferences(text: string): TableReferences {
  const lower = text.toLowerCase();
  const toolResultIds = Array.from(text.matchAll(TOOL_RESULT_REFERENCE), (match) => match[1]);
  return {
    mentionsTable: TABLE_REFERENCE_PHRASES.some((phrase) => lower.includes(phrase)),
    toolResultIds: [...new Set(toolResultIds)],
  };
}
