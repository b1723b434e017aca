export type FontStyle = 'normal' | 'italic' | 'oblique';

export interface FontTraits {
  fontName: string;
  weight: number;
  style: FontStyle;
  bold: boolean;
  italic: boolean;
}

function hasToken(s: string, token: string): boolean {
  if (!s) return false;
  return s.includes(token);
}

function hasWord(s: string, word: string): boolean {
  if (!s) return false;
  return new RegExp(`(^|[^a-z0-9])${word}([^a-z0-9]|$)`, 'i').test(s);
}

/** Drops the six-letter subset tag PDF producers put in front of embedded font names. */
export function stripSubsetPrefix(name: string): string {
  return (name || '').replace(/^[A-Z]{6}\+/, '');
}

export function deriveFontWeightFromName(name: string): number {
  const s = (name || '').toLowerCase();

  const num = s.match(/(^|[^0-9])(100|200|300|400|500|600|700|800|900)([^0-9]|$)/);
  if (num) return Number(num[2]);

  if (hasToken(s, 'thin')) return 100;
  if (hasToken(s, 'extralight') || hasToken(s, 'ultralight')) return 200;
  if (hasToken(s, 'light')) return 300;
  if (hasToken(s, 'semibold') || hasToken(s, 'demibold') || hasWord(s, 'demi') || hasWord(s, 'sb')) return 600;
  if (hasToken(s, 'extrabold') || hasToken(s, 'ultrabold')) return 800;
  if (hasToken(s, 'black') || hasToken(s, 'heavy')) return 900;
  if (hasToken(s, 'bold') || hasWord(s, 'bd')) return 700;
  if (hasToken(s, 'medium') || hasWord(s, 'md')) return 500;

  return 400;
}

export function deriveFontStyleFromName(name: string): FontStyle {
  const s = (name || '').toLowerCase();

  if (hasToken(s, 'italic') || hasWord(s, 'it') || hasWord(s, 'ital')) return 'italic';
  if (hasToken(s, 'oblique') || hasWord(s, 'obl')) return 'oblique';
  // PostScript names such as "Arial-BoldMT" or "Times-BoldItalic" join traits after a dash.
  const suffix = s.split('-').slice(1).join('-');
  if (/(^|bold)it$/.test(suffix)) return 'italic';
  return 'normal';
}

export function deriveFontTraits(args: { fontName?: string; fontFamily?: string }): FontTraits {
  const fontName = stripSubsetPrefix(args.fontName || '');
  const fontFamily = args.fontFamily || '';

  const weight = Math.max(deriveFontWeightFromName(fontName), deriveFontWeightFromName(fontFamily));
  const nameStyle = deriveFontStyleFromName(fontName);
  const style: FontStyle = nameStyle !== 'normal' ? nameStyle : deriveFontStyleFromName(fontFamily);

  return {
    fontName: fontName || fontFamily,
    weight,
    style,
    bold: weight >= 600,
    italic: style !== 'normal'
  };
}
