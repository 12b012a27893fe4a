/**
 * Data models
 *
 * Barrel export for all model interfaces.
 */

export * from './section.js';

export * from './position.js';

export * from './chunk.js';

export * from './image.js';
