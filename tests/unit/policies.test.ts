import { describe, it, expect } from 'vitest';
import { BASE_THRESHOLDS, getArchetypePolicy, levelForDepth, scaleThresholds } from '../../src/outline/policies.js';

describe('archetype policies', () => {
  it('scales thresholds for forms', () => {
    expect(scaleThresholds(BASE_THRESHOLDS, 1.2)).toEqual({ title: 2.16, h1: 1.8, h1Bold: 1.44, h2Bold: 1.38, h3Bold: 1.2 });
    expect(getArchetypePolicy('form').thresholds).toEqual(scaleThresholds(BASE_THRESHOLDS, 1.2));
  });

  it('maps numbering depth to levels per archetype', () => {
    const generic = getArchetypePolicy('generic');
    const rfp = getArchetypePolicy('rfp');

    expect([1, 2, 3, 5].map((d) => levelForDepth(generic, d))).toEqual(['H2', 'H3', 'H3', 'H3']);
    expect([1, 2, 3, 4].map((d) => levelForDepth(rfp, d))).toEqual(['H1', 'H2', 'H3', 'H3']);
    expect(levelForDepth(getArchetypePolicy('flyer'), 1)).toBeNull();
    expect(levelForDepth(generic, 0)).toBeNull();
  });

  it('only forbids titles on flyers', () => {
    const archetypes = ['generic', 'form', 'rfp', 'flyer'] as const;
    expect(archetypes.filter((a) => !getArchetypePolicy(a).allowTitle)).toEqual(['flyer']);
  });
});
