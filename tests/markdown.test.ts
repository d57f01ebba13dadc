/**
 * Tests for markdown formatting of finalized messages
 */

import type { FinalizedMessage } from '../src/core/entities/Message.js';
import { formatMessageAsMarkdown, formatTableAsMarkdown } from '../src/utils/markdown.js';

function message(overrides: Partial<FinalizedMessage>): FinalizedMessage {
  return {
    requestId: 'req-1',
    threadId: '1',
    status: 'done',
    items: [],
    thinking: [],
    toolCalls: [],
    citations: [],
    degraded: [],
    error: null,
    userMessageId: null,
    assistantMessageId: null,
    finalizedAt: '2025-01-01T00:00:00.000Z',
    ...overrides,
  };
}

describe('formatTableAsMarkdown', () => {
  it('should escape pipes and flatten newlines', () => {
    expect(
      formatTableAsMarkdown({
        columns: ['name', 'note'],
        rows: [
          ['a|b', 'line1\nline2'],
          [null, { n: 1 }],
        ],
        totalRows: 2,
        truncated: false,
      })
    ).toBe(['| name | note |', '| --- | --- |', '| a\\|b | line1 line2 |', '|  | {"n":1} |'].join('\n'));
  });

  it('should note truncated tables', () => {
    expect(formatTableAsMarkdown({ columns: ['x'], rows: [[1]], totalRows: 5, truncated: true })).toBe(
      '| x |\n| --- |\n| 1 |\n\n_Showing 1 of 5 rows_'
    );
  });

  it('should mark empty tables', () => {
    expect(formatTableAsMarkdown({ columns: [], rows: [], totalRows: 0, truncated: false })).toBe('_(empty table)_');
  });
});

describe('formatMessageAsMarkdown', () => {
  it('should render items in order followed by notices, tools and sources', () => {
    const markdown = formatMessageAsMarkdown(
      message({
        items: [
          { type: 'text', contentIndex: 0, text: 'Revenue [1]' },
          { type: 'error', contentIndex: 1, message: 'Unable to render chart' },
        ],
        degraded: [{ kind: 'missing-table', message: 'Table missing', referencedToolIds: [] }],
        toolCalls: [
          {
            toolUseId: 'tu_1',
            name: 'analyst',
            type: 'cortex_analyst_text_to_sql',
            input: {},
            status: 'success',
            sql: '',
            resultText: '',
          },
        ],
        citations: [{ number: 1, id: 'cs_1', docId: 'd1', docTitle: 'Annual report', text: '', type: 'cortex_search_citation' }],
      })
    );

    expect(markdown).toBe(
      [
        'Revenue [1]',
        '⚠️ Unable to render chart',
        '> ⚠️ Table missing',
        '**Tools used:** analyst',
        '**Sources**\n[1] Annual report',
      ].join('\n\n')
    );
  });

  it('should lead with the error of a failed turn', () => {
    const markdown = formatMessageAsMarkdown(
      message({
        status: 'error',
        error: { code: 'transport_error', message: 'socket hang up' },
        items: [{ type: 'text', contentIndex: 0, text: 'Partial' }],
      })
    );

    expect(markdown).toBe('**Error:** socket hang up (transport_error)\n\nPartial');
  });

  it('should render charts as a JSON block', () => {
    const markdown = formatMessageAsMarkdown(message({ items: [{ type: 'chart', contentIndex: 0, spec: { mark: 'bar' } }] }));

    expect(markdown).toBe('**Chart** (Vega-Lite)\n\n```json\n{\n  "mark": "bar"\n}\n```');
  });
});
