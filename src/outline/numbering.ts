export interface SectionNumbering {
  /** Number of components: "2" is 1, "2.3" is 2, "2.3.1" is 3. */
  depth: number;
  label: string;
}

const DOTTED = /^(\d{1,3}(?:\.\d{1,3})+)\.?\s+\S/;
const SINGLE = /^(\d{1,3})[.)]\s+\S/;
const LETTER = /^([A-Z])[.)]\s+\S/;
const ROMAN = /^((?:X{0,3})(?:IX|IV|V?I{0,3}))[.)]\s+\S/;
const KEYWORD = /^(chapter|part|section|appendix|annex)\s+(\d{1,3}(?:\.\d{1,3})*|[A-Z]|[IVXLC]+)\b/i;

const componentCount = (label: string): number => label.split('.').filter((p) => p.length > 0).length;

/** Recognises a leading section number and reports its nesting depth. */
export function detectNumbering(text: string): SectionNumbering | null {
  const s = text.trim();

  const keyword = s.match(KEYWORD);
  if (keyword) {
    const label = `${keyword[1]} ${keyword[2]}`;
    return { depth: /^\d/.test(keyword[2]) ? componentCount(keyword[2]) : 1, label };
  }

  const dotted = s.match(DOTTED);
  if (dotted) return { depth: componentCount(dotted[1]), label: dotted[1] };

  const single = s.match(SINGLE);
  if (single) return { depth: 1, label: single[1] };

  const roman = s.match(ROMAN);
  if (roman && roman[1].length > 0) return { depth: 1, label: roman[1] };

  const letter = s.match(LETTER);
  if (letter) return { depth: 1, label: letter[1] };

  return null;
}
