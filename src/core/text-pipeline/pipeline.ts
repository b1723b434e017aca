import type { PageRuns } from '../../types/pdf.js';
import type { ReconstructionOptions } from '../../types/config.js';
import type { PageLayout } from '../../types/outline.js';
import { DEFAULT_OUTLINE_CONFIG } from '../../types/config.js';
import { reconstructPageLines } from './reconstruct.js';

export class LineReconstructionPipeline {
  private readonly options: ReconstructionOptions;

  constructor(options?: Partial<ReconstructionOptions>) {
    this.options = { ...DEFAULT_OUTLINE_CONFIG.reconstruction, ...options };
  }

  reconstructPage(page: PageRuns): PageLayout {
    return reconstructPageLines(page, this.options);
  }

  reconstructDocument(pages: readonly PageRuns[]): PageLayout[] {
    return [...pages]
      .sort((a, b) => a.page - b.page)
      .map((page) => this.reconstructPage(page));
  }
}
