import type { FinalizedMessage, TableItem } from '../core/entities/Message.js';

function formatCell(value: unknown): string {
  if (value === null || value === undefined) return '';
  const text = typeof value === 'object' ? JSON.stringify(value) : String(value);
  return text.replace(/\|/g, '\\|').replace(/\r?\n/g, ' ');
}

/**
 * Render a table item as a GitHub-flavoured markdown table
 */
export function formatTableAsMarkdown(table: Pick<TableItem, 'columns' | 'rows' | 'totalRows' | 'truncated'>): string {
  if (table.columns.length === 0) {
    return '_(empty table)_';
  }

  const lines = [
    `| ${table.columns.map(formatCell).join(' | ')} |`,
    `| ${table.columns.map(() => '---').join(' | ')} |`,
    ...table.rows.map((row) => `| ${table.columns.map((_, i) => formatCell(row[i])).join(' | ')} |`),
  ];

  if (table.truncated) {
    lines.push('', `_Showing ${table.rows.length} of ${table.totalRows} rows_`);
  }
  return lines.join('\n');
}

/**
 * Format a finalized agent message for an MCP text response
 */
export function formatMessageAsMarkdown(message: FinalizedMessage): string {
  const sections: string[] = [];

  if (message.error) {
    const code = message.error.code ? ` (${message.error.code})` : '';
    sections.push(`**Error:** ${message.error.message}${code}`);
  }

  for (const item of message.items) {
    switch (item.type) {
      case 'text':
        sections.push(item.text);
        break;
      case 'table':
        sections.push(formatTableAsMarkdown(item));
        break;
      case 'chart':
        sections.push(`**Chart** (Vega-Lite)\n\n\`\`\`json\n${JSON.stringify(item.spec, null, 2)}\n\`\`\``);
        break;
      case 'error':
        sections.push(`⚠️ ${item.message}`);
        break;
    }
  }

  for (const notice of message.degraded) {
    sections.push(`> ⚠️ ${notice.message}`);
  }

  if (message.toolCalls.length > 0) {
    sections.push(`**Tools used:** ${message.toolCalls.map((call) => call.name || call.type).join(', ')}`);
  }

  if (message.citations.length > 0) {
    const sources = message.citations.map((citation) => `[${citation.number}] ${citation.docTitle}`);
    sections.push(['**Sources**', ...sources].join('\n'));
  }

  return sections.join('\n\n');
}
