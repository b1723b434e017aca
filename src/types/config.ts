import { OutlineConfigError } from '../core/errors.js';
import type { Archetype } from './outline.js';

export interface ReconstructionOptions {
  /** Minimum vertical overlap, as a share of the smaller box height, for two runs to share a row. */
  sameLineOverlap: number;
  /** Gaps below this many font-size units join runs without a space. */
  wordGapFactor: number;
  /** Gaps above this many font-size units split a row into separate lines. */
  columnGapFactor: number;
  /** A run taller than this many font sizes is treated as a multi-line artifact. */
  multiLineFactor: number;
}

export interface ClassificationOptions {
  titleTopFraction: number;
  maxHeadingChars: number;
  maxHeadingWords: number;
  /** Gap above a line, in body line heights, that marks it as set apart. */
  whitespaceAbove: number;
  forceArchetype?: Archetype;
}

export interface HeaderFooterOptions {
  bandFraction: number;
  dropPageNumbers: boolean;
}

export interface DedupeOptions {
  adjacencyFactor: number;
}

export interface OutlineConfig {
  reconstruction: ReconstructionOptions;
  classification: ClassificationOptions;
  headerFooter: HeaderFooterOptions;
  dedupe: DedupeOptions;
  maxPages?: number;
  debug: boolean;
}

export type OutlineConfigInput = {
  reconstruction?: Partial<ReconstructionOptions>;
  classification?: Partial<ClassificationOptions>;
  headerFooter?: Partial<HeaderFooterOptions>;
  dedupe?: Partial<DedupeOptions>;
  maxPages?: number;
  debug?: boolean;
};

export const DEFAULT_OUTLINE_CONFIG: OutlineConfig = {
  reconstruction: {
    sameLineOverlap: 0.5,
    wordGapFactor: 0.2,
    columnGapFactor: 3.0,
    multiLineFactor: 1.6
  },
  classification: {
    titleTopFraction: 0.4,
    maxHeadingChars: 200,
    maxHeadingWords: 20,
    whitespaceAbove: 0.75
  },
  headerFooter: {
    bandFraction: 0.1,
    dropPageNumbers: true
  },
  dedupe: {
    adjacencyFactor: 0.5
  },
  debug: false
};

const ARCHETYPES: readonly Archetype[] = ['generic', 'form', 'rfp', 'flyer'];

const requirePositive = (name: string, value: number): void => {
  if (!Number.isFinite(value) || value <= 0) {
    throw new OutlineConfigError(`${name} must be a positive number, got ${value}`);
  }
};

const requireFraction = (name: string, value: number): void => {
  if (!Number.isFinite(value) || value <= 0 || value >= 1) {
    throw new OutlineConfigError(`${name} must be between 0 and 1, got ${value}`);
  }
};

export function resolveOutlineConfig(input: OutlineConfigInput = {}): OutlineConfig {
  const config: OutlineConfig = {
    reconstruction: { ...DEFAULT_OUTLINE_CONFIG.reconstruction, ...input.reconstruction },
    classification: { ...DEFAULT_OUTLINE_CONFIG.classification, ...input.classification },
    headerFooter: { ...DEFAULT_OUTLINE_CONFIG.headerFooter, ...input.headerFooter },
    dedupe: { ...DEFAULT_OUTLINE_CONFIG.dedupe, ...input.dedupe },
    maxPages: input.maxPages ?? DEFAULT_OUTLINE_CONFIG.maxPages,
    debug: input.debug ?? DEFAULT_OUTLINE_CONFIG.debug
  };

  const { reconstruction, classification, headerFooter, dedupe } = config;
  requireFraction('reconstruction.sameLineOverlap', reconstruction.sameLineOverlap);
  requirePositive('reconstruction.wordGapFactor', reconstruction.wordGapFactor);
  requirePositive('reconstruction.columnGapFactor', reconstruction.columnGapFactor);
  requirePositive('reconstruction.multiLineFactor', reconstruction.multiLineFactor);
  requireFraction('classification.titleTopFraction', classification.titleTopFraction);
  requirePositive('classification.maxHeadingChars', classification.maxHeadingChars);
  requirePositive('classification.maxHeadingWords', classification.maxHeadingWords);
  requirePositive('classification.whitespaceAbove', classification.whitespaceAbove);
  requireFraction('headerFooter.bandFraction', headerFooter.bandFraction);
  requirePositive('dedupe.adjacencyFactor', dedupe.adjacencyFactor);

  if (reconstruction.wordGapFactor >= reconstruction.columnGapFactor) {
    throw new OutlineConfigError('reconstruction.wordGapFactor must be smaller than reconstruction.columnGapFactor');
  }
  if (classification.forceArchetype !== undefined && !ARCHETYPES.includes(classification.forceArchetype)) {
    throw new OutlineConfigError(`Unknown archetype: ${String(classification.forceArchetype)}`);
  }
  if (config.maxPages !== undefined && (!Number.isInteger(config.maxPages) || config.maxPages < 1)) {
    throw new OutlineConfigError(`maxPages must be a positive integer, got ${config.maxPages}`);
  }

  return config;
}
