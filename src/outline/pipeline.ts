import type { PageRuns } from '../types/pdf.js';
import type { OutlineDocument } from '../types/outline.js';
import { resolveOutlineConfig, type OutlineConfig, type OutlineConfigInput } from '../types/config.js';
import { LineReconstructionPipeline } from '../core/text-pipeline/pipeline.js';
import { DocumentTypeClassifier } from './archetype.js';
import { HeadingClassifier } from './heading-classifier.js';
import { HeaderFooterFilter } from './header-footer.js';
import { Deduplicator } from './dedupe.js';
import { OutlineAssembler, emptyOutline } from './assembler.js';
import { getArchetypePolicy } from './policies.js';

/**
 * Runs every outline stage over pre-extracted text runs:
 * lines, document profile, heading candidates, running text removal,
 * fragment merging and final assembly.
 */
export class OutlinePipeline {
  private readonly config: OutlineConfig;
  private readonly reconstructor: LineReconstructionPipeline;
  private readonly typeClassifier = new DocumentTypeClassifier();
  private readonly headingClassifier: HeadingClassifier;
  private readonly headerFooter: HeaderFooterFilter;
  private readonly deduplicator: Deduplicator;
  private readonly assembler = new OutlineAssembler();

  constructor(config: OutlineConfigInput = {}) {
    this.config = resolveOutlineConfig(config);
    this.reconstructor = new LineReconstructionPipeline(this.config.reconstruction);
    this.headingClassifier = new HeadingClassifier(this.config.classification);
    this.headerFooter = new HeaderFooterFilter(this.config.headerFooter);
    this.deduplicator = new Deduplicator(this.config.dedupe);
  }

  run(pages: readonly PageRuns[]): OutlineDocument {
    if (pages.length === 0) return emptyOutline();

    const layouts = this.reconstructor.reconstructDocument(pages);
    const profile = this.typeClassifier.classify(layouts, this.config.classification.forceArchetype);
    const policy = getArchetypePolicy(profile.archetype);

    const candidates = this.headingClassifier.classify(layouts, profile);
    const runningText = this.headerFooter.buildIndex(layouts);
    const filtered = this.headerFooter.filter(candidates, runningText);
    const merged = this.deduplicator.dedupe(filtered, layouts);
    const doc = this.assembler.assemble(merged, policy);

    if (this.config.debug) {
      const lineCount = layouts.reduce((sum, p) => sum + p.lines.length, 0);
      console.debug(
        `OutlinePipeline: ${layouts.length} pages, ${lineCount} lines, archetype=${profile.archetype}, ` +
          `body=${profile.bodyFontSize}pt`
      );
      console.debug(
        `OutlinePipeline: ${candidates.length} candidates, ${candidates.length - filtered.length} running, ` +
          `${filtered.length - merged.length} merged, ${doc.outline.length} entries`
      );
    }

    return doc;
  }
}

export function extractOutlineFromPages(pages: readonly PageRuns[], config: OutlineConfigInput = {}): OutlineDocument {
  return new OutlinePipeline(config).run(pages);
}
