import type {
  ActivityState,
  ChartRender,
  NoticeLevel,
  RegionId,
  RenderOp,
  TableRender,
} from '../../core/interfaces/IRenderSink.js';
import { RenderOpSink } from './RenderOpSink.js';

export type RegionContent =
  | { kind: 'text'; markdown: string }
  | { kind: 'table'; table: TableRender }
  | { kind: 'chart'; chart: ChartRender };

export interface RegionState {
  id: RegionId;
  /** Title of the collapsible wrapping the region, if any */
  title: string | null;
  content: RegionContent | null;
}

/**
 * Keeps the rendered state in memory: regions in creation order, the current
 * status and every notice. Also records the raw operation log.
 */
export class MemoryRenderSink extends RenderOpSink {
  readonly ops: RenderOp[] = [];
  readonly notices: Array<{ level: NoticeLevel; message: string }> = [];
  private regionMap: Map<RegionId, RegionState> = new Map();
  private currentStatus: { label: string; state: ActivityState } | null = null;

  protected emit(op: RenderOp): void {
    this.ops.push(op);

    switch (op.op) {
      case 'status':
        this.currentStatus = { label: op.label, state: op.state };
        break;
      case 'text':
        this.region(op.region).content = { kind: 'text', markdown: op.markdown };
        break;
      case 'table':
        this.region(op.region).content = { kind: 'table', table: op.table };
        break;
      case 'chart':
        this.region(op.region).content = { kind: 'chart', chart: op.chart };
        break;
      case 'collapsible':
        this.region(op.region).title = op.title;
        break;
      case 'clear':
        this.regionMap.delete(op.region);
        break;
      case 'notice':
        this.notices.push({ level: op.level, message: op.message });
        break;
    }
  }

  private region(id: RegionId): RegionState {
    let region = this.regionMap.get(id);
    if (!region) {
      region = { id, title: null, content: null };
      this.regionMap.set(id, region);
    }
    return region;
  }

  get status(): { label: string; state: ActivityState } | null {
    return this.currentStatus;
  }

  get regions(): RegionState[] {
    return [...this.regionMap.values()];
  }

  getRegion(id: RegionId): RegionState | undefined {
    return this.regionMap.get(id);
  }

  /** Markdown shown in a text region, if the region holds text */
  textOf(id: RegionId): string | undefined {
    const content = this.regionMap.get(id)?.content;
    return content?.kind === 'text' ? content.markdown : undefined;
  }

  opsOfType<K extends RenderOp['op']>(type: K): Array<Extract<RenderOp, { op: K }>> {
    return this.ops.filter((op): op is Extract<RenderOp, { op: K }> => op.op === type);
  }
}
