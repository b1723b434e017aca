import { describe, it, expect } from 'vitest';
import { detectNumbering } from '../../src/outline/numbering.js';

describe('detectNumbering', () => {
  it.each([
    ['1. Scope', { depth: 1, label: '1' }],
    ['3) Pricing', { depth: 1, label: '3' }],
    ['1.1 Background', { depth: 2, label: '1.1' }],
    ['2.3.1. Details', { depth: 3, label: '2.3.1' }],
    ['IV. Findings', { depth: 1, label: 'IV' }],
    ['B) Options', { depth: 1, label: 'B' }],
    ['Chapter 4 Results', { depth: 1, label: 'Chapter 4' }],
    ['Section 2.1 Scope', { depth: 2, label: 'Section 2.1' }],
    ['Appendix C: Forms', { depth: 1, label: 'Appendix C' }]
  ])('reads %s', (text, expected) => {
    expect(detectNumbering(text)).toEqual(expected);
  });

  it.each(['Overview', '2024 budget', '1.', 'Vendors must reply.'])('ignores %s', (text) => {
    expect(detectNumbering(text)).toBeNull();
  });
});
