import type {
  ActivityState,
  ChartRender,
  IRenderSink,
  NoticeLevel,
  RegionId,
  RenderOp,
  TableRender,
} from '../../core/interfaces/IRenderSink.js';

/**
 * Base sink that turns every call into a RenderOp
 */
export abstract class RenderOpSink implements IRenderSink {
  protected abstract emit(op: RenderOp): void;

  setStatus(label: string, state: ActivityState): void {
    this.emit({ op: 'status', label, state });
  }

  upsertText(region: RegionId, markdown: string): void {
    this.emit({ op: 'text', region, markdown });
  }

  upsertTable(region: RegionId, table: TableRender): void {
    this.emit({ op: 'table', region, table });
  }

  upsertChart(region: RegionId, chart: ChartRender): void {
    this.emit({ op: 'chart', region, chart });
  }

  createCollapsible(region: RegionId, title: string): void {
    this.emit({ op: 'collapsible', region, title });
  }

  clear(region: RegionId): void {
    this.emit({ op: 'clear', region });
  }

  notice(level: NoticeLevel, message: string): void {
    this.emit({ op: 'notice', level, message });
  }
}
