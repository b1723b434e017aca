import type { Archetype, DocumentProfile, Line, PageLayout } from '../types/outline.js';
import { DocumentStatisticsAnalyzer, type DocumentStatistics } from './stats.js';
import { detectNumbering } from './numbering.js';
import { isFieldLabel } from './text-heuristics.js';

export interface ArchetypeRules {
  formMinLines: number;
  formLabelRatio: number;
  formKeywordLabelRatio: number;
  rfpMinPages: number;
  rfpMinNumberedLines: number;
  flyerMaxPages: number;
  flyerLargeRatio: number;
  flyerMaxLargeLines: number;
  flyerMaxCoverage: number;
}

export const DEFAULT_ARCHETYPE_RULES: ArchetypeRules = {
  formMinLines: 5,
  formLabelRatio: 0.3,
  formKeywordLabelRatio: 0.15,
  rfpMinPages: 2,
  rfpMinNumberedLines: 3,
  flyerMaxPages: 2,
  flyerLargeRatio: 2.0,
  flyerMaxLargeLines: 4,
  flyerMaxCoverage: 0.3
};

const FORM_KEYWORDS: readonly RegExp[] = [
  /application\s+form/,
  /\bsignature\b/,
  /date of birth/,
  /undertake.*refund/,
  /\bapplicant\b/
];

const RFP_KEYWORDS: readonly RegExp[] = [
  /request for proposals?/,
  /\brfp\b/,
  /\bappendix [a-z]\b/,
  /\bdeliverables\b/,
  /evaluation criteria/,
  /scope of work/
];

const keywordScore = (text: string, patterns: readonly RegExp[]): number =>
  patterns.reduce((score, pattern) => score + (pattern.test(text) ? 1 : 0), 0);

export interface ArchetypeSignals {
  labelRatio: number;
  formKeywords: number;
  numberedLines: number;
  numberedPages: number;
  rfpKeywords: number;
  largeLines: number;
}

export function collectArchetypeSignals(lines: readonly Line[], stats: DocumentStatistics, rules: ArchetypeRules): ArchetypeSignals {
  const text = lines.map((l) => l.text.toLowerCase()).join(' ');
  const labels = lines.filter((l) => isFieldLabel(l.text)).length;
  const numbered = lines.filter((l) => detectNumbering(l.text) !== null);

  return {
    labelRatio: lines.length > 0 ? labels / lines.length : 0,
    formKeywords: keywordScore(text, FORM_KEYWORDS),
    numberedLines: numbered.length,
    numberedPages: new Set(numbered.map((l) => l.page)).size,
    rfpKeywords: keywordScore(text, RFP_KEYWORDS),
    largeLines: lines.filter((l) => l.dominantFontSize / stats.bodyFontSize >= rules.flyerLargeRatio).length
  };
}

export function selectArchetype(signals: ArchetypeSignals, stats: DocumentStatistics, rules: ArchetypeRules): Archetype {
  if (stats.lineCount === 0) return 'generic';

  const formByLabels = stats.lineCount >= rules.formMinLines && signals.labelRatio >= rules.formLabelRatio;
  const formByKeywords = signals.formKeywords >= 2 && signals.labelRatio >= rules.formKeywordLabelRatio;
  if (formByLabels || formByKeywords) return 'form';

  if (stats.pageCount >= rules.rfpMinPages) {
    const numberedSections = signals.numberedLines >= rules.rfpMinNumberedLines && signals.numberedPages >= 2;
    if (numberedSections || signals.rfpKeywords >= 2) return 'rfp';
  }

  if (
    stats.pageCount <= rules.flyerMaxPages &&
    signals.largeLines >= 1 &&
    signals.largeLines <= rules.flyerMaxLargeLines &&
    stats.textCoverage <= rules.flyerMaxCoverage
  ) {
    return 'flyer';
  }

  return 'generic';
}

/**
 * Builds the per-document profile. The result is frozen and shared read-only
 * by the later stages.
 */
export class DocumentTypeClassifier {
  private readonly analyzer = new DocumentStatisticsAnalyzer();

  constructor(private readonly rules: ArchetypeRules = DEFAULT_ARCHETYPE_RULES) {}

  classify(pages: readonly PageLayout[], forceArchetype?: Archetype): DocumentProfile {
    const stats = this.analyzer.analyze(pages);
    const lines = pages.flatMap((p) => p.lines);
    const archetype = forceArchetype ?? selectArchetype(collectArchetypeSignals(lines, stats, this.rules), stats, this.rules);

    return Object.freeze({
      archetype,
      bodyFontSize: stats.bodyFontSize,
      bodyLineHeight: stats.bodyLineHeight,
      pageCount: stats.pageCount
    });
  }
}
