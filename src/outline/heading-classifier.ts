import type { ClassificationOptions } from '../types/config.js';
import type { DocumentProfile, HeadingCandidate, HeadingLevel, Line, OutlineLevel, PageLayout } from '../types/outline.js';
import { DEFAULT_OUTLINE_CONFIG } from '../types/config.js';
import { detectNumbering, type SectionNumbering } from './numbering.js';
import { getArchetypePolicy, levelForDepth, type ArchetypePolicy } from './policies.js';
import {
  hasLetters,
  isAllCaps,
  isBodySentence,
  isColonLabel,
  isCopyrightNotice,
  isFieldLabel,
  startsLowercase,
  wordCount
} from './text-heuristics.js';

export interface LineFeatures {
  sizeRatio: number;
  /** Gap to the line above, in body line heights; unbounded for the first line of a page. */
  whitespaceAbove: number;
  numbering: SectionNumbering | null;
  isBold: boolean;
  words: number;
}

interface TitleSelection {
  candidate: HeadingCandidate;
  consumed: Set<string>;
}

/** Only the opening lines of page 1 are searched for a keyword title. */
const TITLE_KEYWORD_LINES = 10;

const clamp01 = (v: number): number => Math.max(0, Math.min(1, v));

const sameSize = (a: Line, b: Line): boolean => Math.abs(a.dominantFontSize - b.dominantFontSize) < 0.05;

export function computeLineFeatures(line: Line, above: Line | null, profile: DocumentProfile): LineFeatures {
  const body = profile.bodyFontSize > 0 ? profile.bodyFontSize : 12;
  const gap = above ? Math.max(0, line.bbox.y0 - above.bbox.y1) : Number.POSITIVE_INFINITY;

  return {
    sizeRatio: line.dominantFontSize / body,
    whitespaceAbove: above ? gap / Math.max(0.01, profile.bodyLineHeight) : Number.POSITIVE_INFINITY,
    numbering: detectNumbering(line.text),
    isBold: line.bold,
    words: wordCount(line.text)
  };
}

/** Nearest earlier line on the page that sits fully above this one. */
export function lineAbove(lines: readonly Line[], index: number): Line | null {
  const line = lines[index];
  for (let i = index - 1; i >= 0; i--) {
    const candidate = lines[i];
    if (candidate.bbox.y1 <= line.bbox.y0 + 0.5) return candidate;
  }
  return null;
}

export class HeadingClassifier {
  private readonly options: ClassificationOptions;

  constructor(options?: Partial<ClassificationOptions>) {
    this.options = { ...DEFAULT_OUTLINE_CONFIG.classification, ...options };
  }

  classify(pages: readonly PageLayout[], profile: DocumentProfile): HeadingCandidate[] {
    const policy = getArchetypePolicy(profile.archetype);
    const firstPage = pages.find((p) => p.page === 1);
    const title = policy.allowTitle && firstPage ? this.selectTitle(firstPage, profile, policy) : null;
    const candidates: HeadingCandidate[] = [];

    for (const page of pages) {
      page.lines.forEach((line, i) => {
        if (title && line.id === title.candidate.line.id) {
          candidates.push(title.candidate);
          return;
        }
        if (title?.consumed.has(line.id)) return;

        const features = computeLineFeatures(line, lineAbove(page.lines, i), profile);
        const level = this.classifyLine(line, features, policy);
        if (level) {
          candidates.push({ line, level, confidence: this.confidence(features, policy) });
        }
      });
    }

    return candidates;
  }

  /** Text-level guards that rule a line out regardless of its typography. */
  isHeadingText(text: string, numbering: SectionNumbering | null, policy: ArchetypePolicy): boolean {
    const s = text.trim();
    if (!hasLetters(s)) return false;
    if (isCopyrightNotice(s)) return false;
    if (s.length < 2 || s.length > this.options.maxHeadingChars) return false;
    if (wordCount(s) > this.options.maxHeadingWords) return false;
    if (startsLowercase(s) && !numbering) return false;
    if (isBodySentence(s, numbering !== null)) return false;
    if (policy.labelsAreBody && isFieldLabel(s)) return false;
    return true;
  }

  classifyLine(line: Line, features: LineFeatures, policy: ArchetypePolicy): OutlineLevel | null {
    if (!this.isHeadingText(line.text, features.numbering, policy)) return null;

    const t = policy.thresholds;
    const r = features.sizeRatio;
    const bold = features.isBold;
    const numberingLevel = this.numberingLevel(line, features, policy);

    if (policy.numberingFirst && numberingLevel) return numberingLevel;

    if (r >= t.h1 || (r >= t.h1Bold && bold)) return 'H1';
    if (policy.allCapsAsH1 && r >= t.h1Bold && features.words <= 6 && isAllCaps(line.text)) return 'H1';

    if (r >= t.h2Bold && bold) return 'H2';
    if (numberingLevel === 'H1' || numberingLevel === 'H2') return numberingLevel;

    if (r >= t.h3Bold && bold && features.whitespaceAbove >= this.options.whitespaceAbove) return 'H3';
    if (numberingLevel === 'H3') return 'H3';
    if (policy.boldLabelsAsH3 && bold && r >= t.h3Bold && features.words <= 10 && isColonLabel(line.text)) return 'H3';

    return null;
  }

  confidence(features: LineFeatures, policy: ArchetypePolicy): number {
    const w = policy.weights;
    const total = w.size + w.bold + w.numbering + w.whitespace;
    if (total <= 0) return 0;

    const size = clamp01(features.sizeRatio - 1);
    const bold = features.isBold ? 1 : 0;
    const numbering = features.numbering && policy.numberingLevels ? 1 : 0;
    const whitespace = features.whitespaceAbove >= this.options.whitespaceAbove ? 1 : 0;

    const score = (w.size * size + w.bold * bold + w.numbering * numbering + w.whitespace * whitespace) / total;
    return Math.round(score * 10000) / 10000;
  }

  private numberingLevel(line: Line, features: LineFeatures, policy: ArchetypePolicy): OutlineLevel | null {
    if (!features.numbering || !policy.numberingLevels) return null;
    // A numbered line ending in sentence punctuation is a list item.
    if (/[.;,]$/.test(line.text.trim())) return null;
    return levelForDepth(policy, features.numbering.depth);
  }

  /**
   * Picks at most one title from the top of page 1: the largest qualifying
   * font wins, ties go to the topmost line. Lines directly below it in the
   * same size and weight are wrapped title text and are folded into it.
   * Without a large enough line, archetypes with title keywords take the
   * first early line that names the document.
   */
  selectTitle(page: PageLayout, profile: DocumentProfile, policy: ArchetypePolicy): TitleSelection | null {
    const body = profile.bodyFontSize > 0 ? profile.bodyFontSize : 12;
    const topLimit = page.height > 0 ? page.height * this.options.titleTopFraction : Number.POSITIVE_INFINITY;

    const qualifies = (line: Line): boolean =>
      line.bbox.y0 <= topLimit &&
      line.dominantFontSize / body >= policy.thresholds.title &&
      this.isHeadingText(line.text, detectNumbering(line.text), policy);

    let best: Line | null = null;
    for (const line of page.lines) {
      if (!qualifies(line)) continue;
      if (
        !best ||
        line.dominantFontSize > best.dominantFontSize ||
        (sameSize(line, best) && line.bbox.y0 < best.bbox.y0)
      ) {
        best = line;
      }
    }
    if (!best) {
      const named = this.findKeywordTitle(page, topLimit, policy);
      return named ? this.buildTitle([named], page, profile, policy) : null;
    }

    const parts: Line[] = [best];
    for (let i = best.index + 1; i < page.lines.length; i++) {
      const prev = parts[parts.length - 1];
      const next = page.lines[i];
      const gap = next.bbox.y0 - prev.bbox.y1;
      const wraps =
        sameSize(next, best) &&
        next.bold === best.bold &&
        gap >= -0.5 &&
        gap <= prev.bbox.y1 - prev.bbox.y0 &&
        hasLetters(next.text);
      if (!wraps) break;
      parts.push(next);
    }

    return this.buildTitle(parts, page, profile, policy);
  }

  private findKeywordTitle(page: PageLayout, topLimit: number, policy: ArchetypePolicy): Line | null {
    const keywords = policy.titleKeywords;
    if (!keywords) return null;
    for (const line of page.lines.slice(0, TITLE_KEYWORD_LINES)) {
      const text = line.text.trim();
      if (line.bbox.y0 > topLimit || text.length <= 15 || !keywords.test(text)) continue;
      if (this.isHeadingText(text, detectNumbering(text), policy)) return line;
    }
    return null;
  }

  private buildTitle(parts: Line[], page: PageLayout, profile: DocumentProfile, policy: ArchetypePolicy): TitleSelection {
    const [first] = parts;
    const line: Line = parts.length === 1
      ? first
      : {
          ...first,
          text: parts.map((p) => p.text).join(' '),
          bbox: {
            x0: Math.min(...parts.map((p) => p.bbox.x0)),
            y0: Math.min(...parts.map((p) => p.bbox.y0)),
            x1: Math.max(...parts.map((p) => p.bbox.x1)),
            y1: Math.max(...parts.map((p) => p.bbox.y1))
          },
          runs: parts.flatMap((p) => p.runs)
        };

    const features = computeLineFeatures(first, lineAbove(page.lines, first.index), profile);
    const level: HeadingLevel = 'TITLE';
    return {
      candidate: { line, level, confidence: this.confidence(features, policy) },
      consumed: new Set(parts.slice(1).map((p) => p.id))
    };
  }
}
