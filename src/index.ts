export { PDFOutline } from './pdf-outline.js';
export { extractOutlineFromPages, OutlinePipeline } from './outline/pipeline.js';
export { serializeOutline, emptyOutline } from './outline/assembler.js';
export { resolveOutlineConfig, DEFAULT_OUTLINE_CONFIG } from './types/config.js';
export { PdfParseError, OutlineConfigError } from './core/errors.js';
export { runBatch } from './batch/batch-runner.js';
export type { BatchOptions, BatchReport, BatchFileResult } from './batch/batch-runner.js';
export * from './types/index.js';
