/**
 * section-chunker
 *
 * Structure-aware chunking of extracted document sections into
 * retrieval-ready records.
 *
 * Diagnostics are written with console.error only; stdout stays free for
 * hosts that speak a protocol on it.
 *
 * @module index
 */

export * from './models/index.js';

// Pipeline and configuration
export * from './services/chunking/pipeline.js';
export * from './services/chunking/config.js';

// Structure inference
export * from './services/chunking/bullet-patterns.js';
export * from './services/chunking/style-classifier.js';
export * from './services/chunking/level-assigner.js';
export * from './services/chunking/question-bullets.js';
export * from './services/chunking/section-cleanup.js';
export * from './services/chunking/sections.js';

// Merging
export * from './services/chunking/tree-merger.js';
export * from './services/chunking/hierarchical-merger.js';
export * from './services/chunking/naive-merger.js';

// Records
export * from './services/chunking/position-tags.js';
export * from './services/chunking/chunk-records.js';
export * from './services/chunking/media-context.js';

// Extraction, images, tokens
export * from './services/extraction/content-list.js';
export * from './services/images/raster.js';
export * from './services/images/concat.js';
export * from './services/images/crop.js';
export * from './services/images/codec.js';
export * from './services/tokenizer/token-counter.js';

export * from './utils/language.js';
export * from './utils/numerals.js';
export { ValidationError, ImageCodecError, validateInput } from './utils/validation.js';
