import { describe, it, expect } from 'vitest';
import {
  deriveFontStyleFromName,
  deriveFontTraits,
  deriveFontWeightFromName,
  stripSubsetPrefix
} from '../../src/fonts/font-style.js';

describe('font-style', () => {
  it('strips subset prefixes', () => {
    expect(stripSubsetPrefix('ABCDEF+Helvetica-Bold')).toBe('Helvetica-Bold');
    expect(stripSubsetPrefix('Helvetica')).toBe('Helvetica');
  });

  it.each([
    ['Helvetica', 400],
    ['Arial-BoldMT', 700],
    ['OpenSans-SemiBold', 600],
    ['Roboto-Light', 300],
    ['Inter 900', 900],
    ['Lato-Black', 900]
  ])('derives weight %s -> %i', (name, weight) => {
    expect(deriveFontWeightFromName(name)).toBe(weight);
  });

  it('derives italic from names and PostScript suffixes', () => {
    expect(deriveFontStyleFromName('Times-Italic')).toBe('italic');
    expect(deriveFontStyleFromName('Helvetica-Oblique')).toBe('oblique');
    expect(deriveFontStyleFromName('Arial-BoldIt')).toBe('italic');
    expect(deriveFontStyleFromName('Georgia')).toBe('normal');
  });

  it('combines font name and family', () => {
    expect(deriveFontTraits({ fontName: 'XYZABC+Calibri-Bold', fontFamily: 'sans-serif' })).toEqual({
      fontName: 'Calibri-Bold',
      weight: 700,
      style: 'normal',
      bold: true,
      italic: false
    });
    expect(deriveFontTraits({ fontName: '', fontFamily: 'serif' }).fontName).toBe('serif');
  });
});
