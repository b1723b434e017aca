// @vitest-environment node
import { describe, it, expect, vi, beforeEach } from 'vitest';
import { PDFOutline, PdfParseError, OutlineConfigError, serializeOutline } from '../../src/index.js';

const { mockGetDocumentProxy } = vi.hoisted(() => ({ mockGetDocumentProxy: vi.fn() }));

vi.mock('unpdf', () => ({
  getDocumentProxy: mockGetDocumentProxy
}));

const PAGE_HEIGHT = 800;

type Item = { str: string; transform: number[]; width: number; fontName: string };

/** A text item whose box top sits at `top` (top-left origin). */
const item = (str: string, x: number, top: number, size: number, width: number): Item => ({
  str,
  transform: [size, 0, 0, size, x, PAGE_HEIGHT - top - size],
  width,
  fontName: 'g_d0_f1'
});

const mockDocument = (pages: Item[][]) => ({
  numPages: pages.length,
  getPage: vi.fn((n: number) =>
    Promise.resolve({
      getViewport: () => ({ width: 600, height: PAGE_HEIGHT }),
      getTextContent: () => Promise.resolve({ items: pages[n - 1], styles: { g_d0_f1: { fontFamily: 'sans-serif' } } })
    })
  ),
  destroy: vi.fn().mockResolvedValue(undefined)
});

describe('PDFOutline end-to-end', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('extracts the outline of a one-page flyer', async () => {
    const doc = mockDocument([
      [
        item('Welcome', 100, 300, 40, 140),
        item('Join us for food and music', 100, 400, 10, 130),
        item('Saturday at noon', 100, 420, 10, 80),
        item('Free entry for everyone', 100, 440, 10, 115)
      ]
    ]);
    mockGetDocumentProxy.mockResolvedValue(doc);

    const extractor = new PDFOutline();
    try {
      const outline = await extractor.extract(new Uint8Array([37, 80, 68, 70]));
      expect(serializeOutline(outline)).toBe(
        '{\n  "title": "",\n  "outline": [\n    {\n      "text": "Welcome",\n      "level": "H1",\n      "page": 1\n    }\n  ]\n}\n'
      );
      expect(doc.destroy).toHaveBeenCalledTimes(1);
    } finally {
      await extractor.dispose();
    }
  });

  it('returns an empty outline and warns for documents without text', async () => {
    mockGetDocumentProxy.mockResolvedValue(mockDocument([[], []]));
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    const outline = await new PDFOutline().extract(new Uint8Array([1]));

    expect(outline).toEqual({ title: '', outline: [] });
    expect(warn).toHaveBeenCalledWith('PDFOutline: no extractable text on 2 page(s); returning an empty outline.');
    warn.mockRestore();
  });

  it('returns an empty outline for a document with no pages', async () => {
    mockGetDocumentProxy.mockResolvedValue(mockDocument([]));
    expect(await new PDFOutline().extract(new Uint8Array([1]))).toEqual({ title: '', outline: [] });
  });

  it('passes maxPages to the parser', async () => {
    const doc = mockDocument([[item('One', 72, 100, 10, 15)], [item('Two', 72, 100, 10, 15)]]);
    mockGetDocumentProxy.mockResolvedValue(doc);

    await new PDFOutline({ maxPages: 1 }).extract(new Uint8Array([1]));
    expect(doc.getPage).toHaveBeenCalledTimes(1);
  });

  it('rejects unreadable input with PdfParseError', async () => {
    mockGetDocumentProxy.mockRejectedValue(new Error('No PDF header found'));
    await expect(new PDFOutline().extract(new Uint8Array([1]))).rejects.toBeInstanceOf(PdfParseError);
  });

  it('rejects invalid configuration up front', () => {
    expect(() => new PDFOutline({ dedupe: { adjacencyFactor: -1 } })).toThrow(OutlineConfigError);
  });
});
