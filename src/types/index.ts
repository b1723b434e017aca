export * from './pdf.js';
export * from './outline.js';
export * from './config.js';
