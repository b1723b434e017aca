import { describe, it, expect } from 'vitest';
import { HeadingClassifier, computeLineFeatures, lineAbove } from '../../src/outline/heading-classifier.js';
import { getArchetypePolicy } from '../../src/outline/policies.js';
import type { Archetype, DocumentProfile, Line } from '../../src/types/outline.js';
import { makeLayout, makeLine } from '../helpers/runs.js';

const profile = (archetype: Archetype): DocumentProfile => ({
  archetype,
  bodyFontSize: 10,
  bodyLineHeight: 10,
  pageCount: 1
});

/** Stacks lines top-down, each box as tall as its font size. */
const stack = (specs: Array<[text: string, y0: number, size?: number, bold?: boolean]>): Line[] =>
  specs.map(([text, y0, size = 10, bold = false], i) =>
    makeLine(1, i, text, { x0: 72, y0, x1: 72 + text.length * size * 0.5, y1: y0 + size }, { size, bold })
  );

const summarize = (lines: Line[], archetype: Archetype) =>
  new HeadingClassifier()
    .classify([makeLayout(1, lines)], profile(archetype))
    .map((c) => [c.line.text, c.level]);

describe('computeLineFeatures', () => {
  it('measures size ratio and whitespace above in body units', () => {
    const [above, line] = stack([['Intro', 100, 12], ['Details', 130, 15, true]]);
    const features = computeLineFeatures(line, above, profile('generic'));

    expect(features.sizeRatio).toBe(1.5);
    expect(features.whitespaceAbove).toBe(1.8);
    expect(features.isBold).toBe(true);
    expect(features.numbering).toBeNull();
    expect(features.words).toBe(1);
  });

  it('treats the first line of a page as set apart', () => {
    const [line] = stack([['Intro', 100]]);
    expect(computeLineFeatures(line, null, profile('generic')).whitespaceAbove).toBe(Number.POSITIVE_INFINITY);
  });
});

describe('lineAbove', () => {
  it('skips lines on the same row', () => {
    const lines = [
      makeLine(1, 0, 'Top', { x0: 72, y0: 80, x1: 100, y1: 90 }),
      makeLine(1, 1, 'Left', { x0: 72, y0: 100, x1: 100, y1: 110 }),
      makeLine(1, 2, 'Right', { x0: 300, y0: 100, x1: 330, y1: 110 })
    ];
    expect(lineAbove(lines, 2)?.text).toBe('Top');
    expect(lineAbove(lines, 0)).toBeNull();
  });
});

describe('HeadingClassifier', () => {
  it('applies the generic rules in order', () => {
    const lines = stack([
      ['SUMMARY', 100, 12],
      ['Eligibility:', 130, 10, true],
      ['1. Submit the form by Friday.', 150],
      ['2.1 Eligible costs', 170],
      ['3. Budget', 190],
      ['and continued text here', 210, 14, true],
      ['12345', 230, 14, true],
      ['Plain body text line', 250]
    ]);

    expect(summarize(lines, 'generic')).toEqual([
      ['SUMMARY', 'H1'],
      ['Eligibility:', 'H3'],
      ['2.1 Eligible costs', 'H3'],
      ['3. Budget', 'H2']
    ]);
  });

  it('levels proposal sections by numbering depth before size', () => {
    const lines = stack([
      ['4. Pricing', 100],
      ['4.1 Rates', 120],
      ['3.2.1 Pricing detail', 140],
      ['Delivery Terms', 160, 14, true]
    ]);

    expect(summarize(lines, 'rfp')).toEqual([
      ['4. Pricing', 'H1'],
      ['4.1 Rates', 'H2'],
      ['3.2.1 Pricing detail', 'H3'],
      ['Delivery Terms', 'H1']
    ]);
  });

  it('treats form field labels as body and raises size thresholds', () => {
    const lines = stack([
      ['Name:', 100, 14, true],
      ['Personal Details', 130, 14, true],
      ['1. Applicant', 160, 10, true]
    ]);

    expect(summarize(lines, 'form')).toEqual([['Personal Details', 'H2']]);
  });

  it('names a form by its first long line that mentions a form or application', () => {
    const lines = stack([
      ['Form 7', 60, 12, true],
      ['Application Form for Travel Grant', 80, 12, true],
      ['Name:', 110],
      ['Date of birth:', 130],
      ['Office address and phone', 150]
    ]);

    expect(summarize(lines, 'form')).toEqual([
      ['Form 7', 'H3'],
      ['Application Form for Travel Grant', 'TITLE']
    ]);
  });

  it('leaves a form untitled when no early line names it', () => {
    const lines = stack([
      ['Leave Request Sheet', 80, 12, true],
      ['Name:', 110]
    ]);

    expect(summarize(lines, 'form')).toEqual([['Leave Request Sheet', 'H3']]);
  });

  it('keeps copyright lines out of titles and headings', () => {
    const lines = stack([
      ['© 2024 Example Press', 80, 24, true],
      ['Copyright Notice', 130, 14, true],
      ['Contents', 160, 14, true]
    ]);

    expect(summarize(lines, 'generic')).toEqual([['Contents', 'H1']]);
  });

  it('merges wrapped title lines and skips them afterwards', () => {
    const lines = stack([
      ['Regional Transport', 80, 24, true],
      ['Strategy Review', 108, 24, true],
      ['Prepared for the council', 150, 12],
      ['Body text follows.', 180]
    ]);
    const candidates = new HeadingClassifier().classify([makeLayout(1, lines)], profile('generic'));

    expect(candidates).toHaveLength(1);
    expect(candidates[0].level).toBe('TITLE');
    expect(candidates[0].line.text).toBe('Regional Transport Strategy Review');
    expect(candidates[0].line.bbox).toEqual({ x0: 72, y0: 80, x1: 288, y1: 132 });
  });

  it('picks the largest qualifying line as title', () => {
    const lines = stack([
      ['Small Title', 80, 20, true],
      ['Big Title', 150, 28, true]
    ]);
    expect(summarize(lines, 'generic')).toEqual([
      ['Small Title', 'H1'],
      ['Big Title', 'TITLE']
    ]);
  });

  it('breaks title size ties towards the topmost line', () => {
    const lines = stack([
      ['Alpha Plan', 80, 24],
      ['Beta Plan', 200, 24]
    ]);
    expect(summarize(lines, 'generic')).toEqual([
      ['Alpha Plan', 'TITLE'],
      ['Beta Plan', 'H1']
    ]);
  });

  it('ignores large lines below the title zone', () => {
    const lines = stack([['Closing Remarks', 500, 24]]);
    expect(summarize(lines, 'generic')).toEqual([['Closing Remarks', 'H1']]);
  });

  it('never assigns a title to flyers', () => {
    const lines = stack([['Welcome', 100, 40]]);
    expect(summarize(lines, 'flyer')).toEqual([['Welcome', 'H1']]);
  });

  it('weights matched signals into a confidence', () => {
    const [line] = stack([['Details', 130, 15, true]]);
    const classifier = new HeadingClassifier();
    const features = computeLineFeatures(line, null, profile('generic'));

    expect(classifier.confidence(features, getArchetypePolicy('generic'))).toBe(0.6);
  });
});
