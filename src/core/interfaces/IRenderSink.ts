/**
 * Displayable-region abstraction the stream reassembler renders into.
 * Implementations decide what a region looks like; the reassembler only
 * addresses regions by id.
 */

export type RegionId = string;

export type ActivityState = 'running' | 'complete' | 'error';

export type NoticeLevel = 'info' | 'warning' | 'error';

export interface TableRender {
  columns: string[];
  rows: unknown[][];
  totalRows: number;
  truncated: boolean;
}

export interface ChartRender {
  spec: Record<string, unknown>;
}

export type RenderOp =
  | { op: 'status'; label: string; state: ActivityState }
  | { op: 'text'; region: RegionId; markdown: string }
  | { op: 'table'; region: RegionId; table: TableRender }
  | { op: 'chart'; region: RegionId; chart: ChartRender }
  | { op: 'collapsible'; region: RegionId; title: string }
  | { op: 'clear'; region: RegionId }
  | { op: 'notice'; level: NoticeLevel; message: string };

export interface IRenderSink {
  /** Update the single "current activity" display */
  setStatus(label: string, state: ActivityState): void;
  upsertText(region: RegionId, markdown: string): void;
  upsertTable(region: RegionId, table: TableRender): void;
  upsertChart(region: RegionId, chart: ChartRender): void;
  createCollapsible(region: RegionId, title: string): void;
  clear(region: RegionId): void;
  notice(level: NoticeLevel, message: string): void;
}
