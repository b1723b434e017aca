import type { HeadingCandidate, OutlineDocument, OutlineEntry, OutlineLevel } from '../types/outline.js';
import type { ArchetypePolicy } from './policies.js';

const collapse = (text: string): string => text.replace(/\s+/g, ' ').trim();

const isOutlineLevel = (level: HeadingCandidate['level']): level is OutlineLevel => level !== 'TITLE';

export const emptyOutline = (): OutlineDocument => ({ title: '', outline: [] });

export function compareReadingOrder(a: HeadingCandidate, b: HeadingCandidate): number {
  return a.line.page - b.line.page || a.line.bbox.y0 - b.line.bbox.y0 || a.line.bbox.x0 - b.line.bbox.x0;
}

export class OutlineAssembler {
  assemble(candidates: readonly HeadingCandidate[], policy: ArchetypePolicy): OutlineDocument {
    const outline: OutlineEntry[] = [];
    for (const candidate of [...candidates].sort(compareReadingOrder)) {
      if (!isOutlineLevel(candidate.level)) continue;
      outline.push({ text: collapse(candidate.line.text), level: candidate.level, page: candidate.line.page });
    }
    return { title: this.selectTitle(candidates, policy), outline };
  }

  /** Explicit TITLE first; otherwise the most confident H1 on page 1, which also stays in the outline. */
  selectTitle(candidates: readonly HeadingCandidate[], policy: ArchetypePolicy): string {
    const explicit = candidates.find((c) => c.level === 'TITLE');
    if (explicit) return collapse(explicit.line.text);
    if (!policy.allowTitle) return '';

    let best: HeadingCandidate | null = null;
    for (const candidate of candidates) {
      if (candidate.level !== 'H1' || candidate.line.page !== 1) continue;
      if (!best || candidate.confidence > best.confidence) best = candidate;
    }
    return best ? collapse(best.line.text) : '';
  }
}

/** Two-space indented JSON with a trailing newline; key order follows the object literals. */
export function serializeOutline(doc: OutlineDocument): string {
  const ordered: OutlineDocument = {
    title: doc.title,
    outline: doc.outline.map((e) => ({ text: e.text, level: e.level, page: e.page }))
  };
  return `${JSON.stringify(ordered, null, 2)}\n`;
}
