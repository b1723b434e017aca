import type { Archetype, OutlineLevel } from '../types/outline.js';

/** Size-ratio thresholds, relative to the body font size. */
export interface HeadingThresholds {
  title: number;
  h1: number;
  h1Bold: number;
  h2Bold: number;
  h3Bold: number;
}

export interface SignalWeights {
  size: number;
  bold: number;
  numbering: number;
  whitespace: number;
}

export interface ArchetypePolicy {
  archetype: Archetype;
  thresholds: HeadingThresholds;
  weights: SignalWeights;
  /** Whether a TITLE may be assigned at all. */
  allowTitle: boolean;
  /** Level by numbering depth (index 0 is depth 1); null disables numbering as a signal. */
  numberingLevels: readonly OutlineLevel[] | null;
  /** Numbered lines take their level from the numbering before size is considered. */
  numberingFirst: boolean;
  /** Short all-caps lines count as H1. */
  allCapsAsH1: boolean;
  /** Bold colon-terminated labels at body size count as H3. */
  boldLabelsAsH3: boolean;
  /** Short colon-terminated lines are field labels, never headings. */
  labelsAreBody: boolean;
  /** Names a title line at any size when no line is large enough to be one. */
  titleKeywords: RegExp | null;
}

export const BASE_THRESHOLDS: HeadingThresholds = {
  title: 1.8,
  h1: 1.5,
  h1Bold: 1.2,
  h2Bold: 1.15,
  h3Bold: 1.0
};

export function scaleThresholds(base: HeadingThresholds, factor: number): HeadingThresholds {
  const scale = (v: number): number => Math.round(v * factor * 1000) / 1000;
  return {
    title: scale(base.title),
    h1: scale(base.h1),
    h1Bold: scale(base.h1Bold),
    h2Bold: scale(base.h2Bold),
    h3Bold: scale(base.h3Bold)
  };
}

const POLICIES: Record<Archetype, ArchetypePolicy> = {
  generic: {
    archetype: 'generic',
    thresholds: BASE_THRESHOLDS,
    weights: { size: 0.5, bold: 0.25, numbering: 0.15, whitespace: 0.1 },
    allowTitle: true,
    numberingLevels: ['H2', 'H3', 'H3'],
    numberingFirst: false,
    allCapsAsH1: true,
    boldLabelsAsH3: true,
    labelsAreBody: false,
    titleKeywords: null
  },
  form: {
    archetype: 'form',
    thresholds: scaleThresholds(BASE_THRESHOLDS, 1.2),
    weights: { size: 0.6, bold: 0.35, numbering: 0, whitespace: 0.05 },
    allowTitle: true,
    numberingLevels: null,
    numberingFirst: false,
    allCapsAsH1: false,
    boldLabelsAsH3: false,
    labelsAreBody: true,
    titleKeywords: /\b(form|application)\b/i
  },
  rfp: {
    archetype: 'rfp',
    thresholds: BASE_THRESHOLDS,
    weights: { size: 0.25, bold: 0.2, numbering: 0.45, whitespace: 0.1 },
    allowTitle: true,
    numberingLevels: ['H1', 'H2', 'H3'],
    numberingFirst: true,
    allCapsAsH1: false,
    boldLabelsAsH3: false,
    labelsAreBody: false,
    titleKeywords: null
  },
  flyer: {
    archetype: 'flyer',
    thresholds: BASE_THRESHOLDS,
    weights: { size: 0.6, bold: 0.35, numbering: 0, whitespace: 0.05 },
    allowTitle: false,
    numberingLevels: null,
    numberingFirst: false,
    allCapsAsH1: false,
    boldLabelsAsH3: false,
    labelsAreBody: false,
    titleKeywords: null
  }
};

export function getArchetypePolicy(archetype: Archetype): ArchetypePolicy {
  return POLICIES[archetype];
}

export function levelForDepth(policy: ArchetypePolicy, depth: number): OutlineLevel | null {
  const levels = policy.numberingLevels;
  if (!levels || levels.length === 0 || depth < 1) return null;
  return levels[Math.min(depth, levels.length) - 1];
}
