import type { TextRun } from '../types/pdf.js';
import { deriveFontTraits, type FontTraits } from '../fonts/font-style.js';

export type PDFJSTextItem = {
  str?: string;
  transform?: number[];
  width?: number;
  height?: number;
  fontName?: string;
  type?: string;
};

export type PDFJSFontStyle = {
  fontFamily?: string;
};

export type PDFJSTextContent = {
  items: PDFJSTextItem[];
  styles: Record<string, PDFJSFontStyle>;
};

export type PDFJSPage = {
  getTextContent(params?: { includeMarkedContent?: boolean; disableNormalization?: boolean }): Promise<PDFJSTextContent>;
  getViewport(options: { scale: number }): { width: number; height: number };
  getOperatorList?(): Promise<unknown>;
  commonObjs?: { get(objId: string): unknown };
};

const DESCENT_FACTOR = 0.2;

export class PDFJSTextExtractor {
  constructor(private readonly resolveFontNames: boolean = true) {}

  async extractRuns(page: PDFJSPage, pageNumber: number): Promise<TextRun[]> {
    const viewport = page.getViewport({ scale: 1.0 });
    const textContent = await page.getTextContent({ includeMarkedContent: false });

    if (this.resolveFontNames && textContent.items.length > 0 && typeof page.getOperatorList === 'function') {
      try {
        // Font objects only become available in commonObjs once the operator list is loaded.
        await page.getOperatorList();
      } catch (error) {
        console.warn(`PDFJSTextExtractor: operator list failed on page ${pageNumber}; bold detection falls back to font families.`, error);
      }
    }

    const fonts = new Map<string, FontTraits>();
    const runs: TextRun[] = [];

    for (const item of textContent.items) {
      const fontKey = item.fontName ?? '';
      let traits = fonts.get(fontKey);
      if (!traits) {
        traits = this.resolveTraits(page, fontKey, textContent.styles[fontKey]);
        fonts.set(fontKey, traits);
      }
      const run = this.toRun(item, traits, pageNumber, viewport.width, viewport.height);
      if (run) runs.push(run);
    }

    return runs;
  }

  private toRun(
    item: PDFJSTextItem,
    traits: FontTraits,
    pageNumber: number,
    pageWidth: number,
    pageHeight: number
  ): TextRun | null {
    const text = item.str ?? '';
    if (text.trim().length === 0) return null;

    // PDF.js transform: [a, b, c, d, e, f]; e/f locate the baseline origin in PDF space (bottom-left).
    const [a = 1, b = 0, c = 0, d = 1, e = 0, f = 0] = item.transform ?? [];
    const itemHeight = typeof item.height === 'number' && item.height > 0 ? item.height : 0;
    const scaleY = Math.hypot(c, d);
    const fontSize = scaleY > 0 ? scaleY : itemHeight || 12;

    const scaleX = Math.hypot(a, b) || fontSize;
    const width = typeof item.width === 'number' && item.width > 0 ? item.width : text.length * scaleX * 0.5;

    const baseline = pageHeight - f;
    const x0 = Math.max(0, e);
    const x1 = Math.min(pageWidth > 0 ? pageWidth : Number.POSITIVE_INFINITY, e + width);
    const y0 = Math.max(0, baseline - fontSize);
    const y1 = Math.min(pageHeight, baseline + fontSize * DESCENT_FACTOR);

    return {
      text,
      bbox: { x0, y0, x1: Math.max(x0, x1), y1: Math.max(y0, y1) },
      fontName: traits.fontName,
      fontSize,
      bold: traits.bold,
      italic: traits.italic,
      page: pageNumber
    };
  }

  private resolveTraits(page: PDFJSPage, fontKey: string, style: PDFJSFontStyle | undefined): FontTraits {
    const fontFamily = style?.fontFamily ?? '';
    const loaded = this.resolveFontNames ? this.lookupLoadedFont(page, fontKey) : null;
    const traits = deriveFontTraits({ fontName: loaded?.name ?? fontKey, fontFamily });

    return {
      ...traits,
      bold: traits.bold || loaded?.bold === true,
      italic: traits.italic || loaded?.italic === true
    };
  }

  private lookupLoadedFont(page: PDFJSPage, fontKey: string): { name?: string; bold?: boolean; italic?: boolean } | null {
    if (!fontKey || !page.commonObjs) return null;
    let font: unknown;
    try {
      font = page.commonObjs.get(fontKey);
    } catch {
      // Unresolved font objects throw; the style family is used instead.
      return null;
    }
    if (!font || typeof font !== 'object') return null;

    const name = 'name' in font && typeof font.name === 'string' ? font.name : undefined;
    const bold = 'bold' in font && typeof font.bold === 'boolean' ? font.bold : undefined;
    const italic = 'italic' in font && typeof font.italic === 'boolean' ? font.italic : undefined;
    return { name, bold, italic };
  }
}
