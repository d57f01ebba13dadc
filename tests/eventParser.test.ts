/**
 * Tests for stream event decoding
 */

import { parseResultSet, parseStreamEvent, summarizeToolResult } from '../src/core/stream/EventParser.js';

function parse(name: string, payload: unknown) {
  const result = parseStreamEvent(name, JSON.stringify(payload));
  if (!result.ok) {
    throw new Error(`expected ${name} to parse: ${result.error}`);
  }
  return result.event;
}

describe('parseStreamEvent', () => {
  it('should decode text deltas', () => {
    expect(parse('response.text.delta', { content_index: 2, text: 'Hi' })).toEqual({
      kind: 'text.delta',
      contentIndex: 2,
      text: 'Hi',
    });
  });

  it('should default a missing content index and text', () => {
    expect(parse('response.text.delta', {})).toEqual({ kind: 'text.delta', contentIndex: 0, text: '' });
  });

  it('should map the re-evaluation status to its own event', () => {
    expect(parse('response.status', { status: 'reevaluating_plan', message: 'Trying again' })).toEqual({
      kind: 'reevaluation',
      message: 'Trying again',
    });
    expect(parse('response.status', { status: 'planning', message: 'Planning' })).toEqual({
      kind: 'status',
      status: 'planning',
      message: 'Planning',
    });
  });

  it('should decode done without a payload', () => {
    expect(parseStreamEvent('response.done', '')).toEqual({ ok: true, event: { kind: 'done' } });
  });

  it('should decode unknown event names as unknown', () => {
    expect(parseStreamEvent('response.future', 'whatever')).toEqual({
      ok: true,
      event: { kind: 'unknown', name: 'response.future' },
    });
  });

  it('should fail on invalid JSON', () => {
    const result = parseStreamEvent('response.text', '{oops');
    expect(result.ok).toBe(false);
  });

  it('should fail on wrongly typed fields', () => {
    const result = parseStreamEvent('response.table', JSON.stringify({ content_index: -1 }));
    expect(result.ok).toBe(false);
    expect(result.ok ? '' : result.error).toMatch(/^content_index: /);
  });

  it('should decode tool use events', () => {
    expect(
      parse('response.tool_use', {
        content_index: 1,
        tool_use_id: 'tu_1',
        name: 'search',
        type: 'cortex_search',
        input: { query: 'pricing' },
      })
    ).toEqual({
      kind: 'tool_use',
      contentIndex: 1,
      toolUseId: 'tu_1',
      name: 'search',
      toolType: 'cortex_search',
      input: { query: 'pricing' },
    });
  });

  it('should pass the table result set through undecoded', () => {
    const resultSet = { data: 'not rows' };
    expect(parse('response.table', { content_index: 3, result_set: resultSet })).toEqual({
      kind: 'table',
      contentIndex: 3,
      resultSet,
    });
  });

  it('should decode annotations with the search result id as citation id', () => {
    expect(
      parse('response.text.annotation', {
        content_index: 0,
        annotation_index: 4,
        annotation: { type: 'cortex_search_citation', search_result_id: 'cs_2', doc_title: 'Guide', end_index: 7 },
      })
    ).toEqual({
      kind: 'text.annotation',
      contentIndex: 0,
      annotationIndex: 4,
      annotation: {
        citationId: 'cs_2',
        type: 'cortex_search_citation',
        docId: '',
        docTitle: 'Guide',
        text: '',
        startIndex: null,
        endIndex: 7,
      },
    });
  });

  it('should decode metadata', () => {
    expect(parse('metadata', { metadata: { role: 'assistant', message_id: 42, thread_id: 9 } })).toEqual({
      kind: 'metadata',
      role: 'assistant',
      messageId: 42,
      parentId: null,
      threadId: '9',
    });
  });

  it('should decode both error event names', () => {
    expect(parse('response.error', { code: 399504, message: 'boom' })).toEqual({
      kind: 'error',
      code: '399504',
      message: 'boom',
    });
    expect(parse('error', {})).toEqual({ kind: 'error', code: '', message: 'The agent reported an error' });
  });
});

describe('summarizeToolResult', () => {
  it('should collect text, the first SQL and the first table', () => {
    const summary = summarizeToolResult([
      { type: 'json', json: { text: 'First', sql: 'SELECT 1', data: [['x']], resultSetMetaData: { rowType: [{ name: 'C' }] } } },
      { type: 'json', json: { text: 'Second', sql: 'SELECT 2', data: [['y']] } },
      { type: 'text', text: 'Third' },
    ]);

    expect(summary).toEqual({
      text: 'First\n\nSecond\n\nThird',
      sql: 'SELECT 1',
      table: { rows: [['x']], columnNames: ['C'] },
      searchResults: [],
    });
  });

  it('should pick up citation items in the content array', () => {
    const summary = summarizeToolResult([
      { source_id: 'cs_5', doc_id: 'd5', doc_title: 'Policy', text: 'excerpt' },
      { source_id: 'other', doc_title: 'Ignored' },
    ]);

    expect(summary.searchResults).toEqual([{ id: 'cs_5', docId: 'd5', docTitle: 'Policy', text: 'excerpt' }]);
  });
});

describe('parseResultSet', () => {
  it('should take column names from metadata', () => {
    expect(parseResultSet({ data: [[1, 2]], resultSetMetaData: { row_type: ['A', { column_name: 'B' }] } })).toEqual({
      ok: true,
      resultSet: { rows: [[1, 2]], columnNames: ['A', 'B'] },
    });
  });

  it('should treat a missing result set as an empty table', () => {
    expect(parseResultSet(null)).toEqual({ ok: true, resultSet: { rows: [], columnNames: null } });
  });

  it('should reject rows that are not arrays', () => {
    expect(parseResultSet({ data: [1, 2] })).toEqual({ ok: false, error: 'data.0: Expected array, received number' });
  });
});
