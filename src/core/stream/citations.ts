import type { Citation } from '../entities/Message.js';

/** Inline citation markup emitted by the agent, e.g. `<cite>cs_1a2b</cite>` */
const CITE_TAG = /<cite>\s*([^<\s]+)\s*<\/cite>/g;

const CITE_OPEN = '<cite>';
const CITE_CLOSE = '</cite>';

export interface CitationSource {
  docId: string;
  docTitle: string;
  text: string;
  type: string;
}

export interface PlacedAnnotation {
  citationId: string;
  endIndex: number | null;
}

/**
 * Citation ids referenced by inline markup, in order of appearance
 */
export function citationIdsInText(text: string): string[] {
  return Array.from(text.matchAll(CITE_TAG), (match) => match[1]);
}

/**
 * Text safe to show while deltas are still arriving: complete citation tags
 * are hidden and a trailing tag with no closing `</cite>` yet is withheld.
 */
export function visibleStreamingText(buffer: string): string {
  const stripped = buffer.replace(CITE_TAG, '');

  const openTag = stripped.lastIndexOf('<cite');
  if (openTag !== -1 && !stripped.includes(CITE_CLOSE, openTag)) {
    return stripped.slice(0, openTag);
  }

  const lastAngle = stripped.lastIndexOf('<');
  if (lastAngle !== -1 && CITE_OPEN.startsWith(stripped.slice(lastAngle))) {
    return stripped.slice(0, lastAngle);
  }

  return stripped;
}

/**
 * Map a UTF-8 byte offset to a string index, never splitting a code point.
 * Offsets past the end clamp to the end.
 */
export function byteOffsetToIndex(text: string, byteOffset: number): number {
  let bytes = 0;
  let index = 0;
  for (const char of text) {
    const size = Buffer.byteLength(char, 'utf8');
    if (bytes + size > byteOffset) {
      return index;
    }
    bytes += size;
    index += char.length;
  }
  return text.length;
}

/**
 * Resolve citations in a finished text buffer into `[n]` markers.
 *
 * Ranged annotations get a marker at their end offset unless the buffer
 * already cites the same id inline. Inline tags without a number are dropped.
 */
export function renderCitations(
  buffer: string,
  annotations: PlacedAnnotation[],
  numbering: ReadonlyMap<string, number>
): string {
  const inline = new Set(citationIdsInText(buffer));
  const seen = new Set<string>();
  const placements: Array<{ at: number; number: number }> = [];

  for (const annotation of annotations) {
    const number = numbering.get(annotation.citationId);
    if (annotation.endIndex === null || number === undefined || inline.has(annotation.citationId)) {
      continue;
    }
    const key = `${annotation.citationId}@${annotation.endIndex}`;
    if (seen.has(key)) {
      continue;
    }
    seen.add(key);
    placements.push({ at: byteOffsetToIndex(buffer, annotation.endIndex), number });
  }

  // Insert back to front so earlier offsets stay valid
  placements.sort((a, b) => b.at - a.at || b.number - a.number);

  let text = buffer;
  for (const placement of placements) {
    text = `${text.slice(0, placement.at)}[${placement.number}]${text.slice(placement.at)}`;
  }

  return text.replace(CITE_TAG, (_tag, id: string) => {
    const number = numbering.get(id);
    return number === undefined ? '' : `[${number}]`;
  });
}

/**
 * Tracks citations seen during one turn.
 *
 * Numbers follow first-seen order and are only handed out for citations that
 * are still referenced, so content dropped by a re-evaluation leaves no gaps.
 */
export class CitationRegistry {
  private order: string[] = [];
  private sources = new Map<string, CitationSource>();

  /**
   * Record that a citation appeared in the stream
   */
  observe(citationId: string, source?: Partial<CitationSource>): void {
    if (!this.order.includes(citationId)) {
      this.order.push(citationId);
    }
    if (source) {
      this.describe(citationId, source);
    }
  }

  /**
   * Attach document metadata without counting as an appearance
   */
  describe(citationId: string, source: Partial<CitationSource>): void {
    const current = this.sources.get(citationId) ?? { docId: '', docTitle: '', text: '', type: '' };
    this.sources.set(citationId, {
      docId: source.docId || current.docId,
      docTitle: source.docTitle || current.docTitle,
      text: source.text || current.text,
      type: source.type || current.type,
    });
  }

  /**
   * Number the referenced citations in first-seen order
   */
  resolve(referenced: Iterable<string>): Map<string, number> {
    const wanted = new Set(referenced);
    const numbering = new Map<string, number>();
    for (const id of [...this.order, ...wanted]) {
      if (wanted.has(id) && !numbering.has(id)) {
        numbering.set(id, numbering.size + 1);
      }
    }
    return numbering;
  }

  citations(numbering: ReadonlyMap<string, number>): Citation[] {
    return [...numbering.entries()]
      .sort((a, b) => a[1] - b[1])
      .map(([id, number]) => {
        const source = this.sources.get(id);
        return {
          number,
          id,
          docId: source?.docId ?? '',
          docTitle: source?.docTitle || `Citation ${number}`,
          text: source?.text ?? '',
          type: source?.type ?? '',
        };
      });
  }
}
