/**
 * Chunking Configuration
 *
 * Validated configuration for chunkDocument. Hosts either pass a partial
 * object (validated and completed with defaults) or load it from the
 * environment with loadChunkingConfigFromEnv.
 *
 * @module services/chunking/config
 */

import { z } from 'zod';
import { parseIntEnv, validateInput } from '../../utils/validation.js';
import { DEFAULT_DELIMITER } from './naive-merger.js';

export const CHUNKING_STRATEGIES = ['naive', 'tree', 'hierarchical'] as const;
export type ChunkingStrategy = (typeof CHUNKING_STRATEGIES)[number];

export const ChunkingConfigSchema = z.object({
  // Token budget per chunk
  chunkTokenNum: z.number().int().positive().default(128),

  // Delimiter string; backtick-quoted literals switch to hard splitting
  delimiter: z.string().default(DEFAULT_DELIMITER),

  // Share of a chunk repeated at the start of the next one
  overlappedPercent: z.number().int().min(0).max(99).default(0),

  // Heading depth kept together by the tree and hierarchical strategies
  depth: z.number().int().min(1).default(1),

  // Structure pass before the budgeted merge; naive skips it
  strategy: z.enum(CHUNKING_STRATEGIES).default('naive'),

  // Neighbouring text attached to table / image records, in tokens per side
  tableContextSize: z.number().int().min(0).default(0),
  imageContextSize: z.number().int().min(0).default(0),

  // Fragments sampled for numbering style classification
  sampleSize: z.number().int().positive().default(200),

  // Drop table-of-contents blocks before merging
  removeContents: z.boolean().default(false),

  // Promote the trailing clause of long lines ending in a colon to a title
  colonAsTitle: z.boolean().default(false),

  // Delimiter string for child chunks (same syntax as delimiter)
  childDelimiters: z.string().min(1).optional(),
});

export type ChunkingConfig = z.infer<typeof ChunkingConfigSchema>;
export type ChunkingConfigInput = z.input<typeof ChunkingConfigSchema>;

export const DEFAULT_CHUNKING_CONFIG: ChunkingConfig = ChunkingConfigSchema.parse({});

/**
 * Validate a (partial) configuration and fill in defaults.
 *
 * @throws ValidationError listing every invalid field
 */
export function resolveChunkingConfig(input: ChunkingConfigInput = {}): ChunkingConfig {
  return validateInput(ChunkingConfigSchema, input);
}

/**
 * Load chunking configuration from environment variables.
 *
 * Environment variables:
 *   CHUNK_TOKEN_NUM         : token budget per chunk (default: 128)
 *   CHUNK_DELIMITER         : delimiter string (default: "\n。；！？")
 *   CHUNK_OVERLAPPED_PERCENT: overlap, 0-99 (default: 0)
 *   CHUNK_DEPTH             : heading depth (default: 1)
 *   CHUNK_STRATEGY          : naive | tree | hierarchical (default: naive)
 *   TABLE_CONTEXT_SIZE      : table context tokens (default: 0)
 *   IMAGE_CONTEXT_SIZE      : image context tokens (default: 0)
 *
 * @throws ValidationError on non-numeric or out-of-range values
 */
export function loadChunkingConfigFromEnv(overrides?: ChunkingConfigInput): ChunkingConfig {
  const defaults = DEFAULT_CHUNKING_CONFIG;
  const envConfig = {
    chunkTokenNum: parseIntEnv('CHUNK_TOKEN_NUM', defaults.chunkTokenNum),
    delimiter: process.env.CHUNK_DELIMITER || defaults.delimiter,
    overlappedPercent: parseIntEnv('CHUNK_OVERLAPPED_PERCENT', defaults.overlappedPercent),
    depth: parseIntEnv('CHUNK_DEPTH', defaults.depth),
    strategy: process.env.CHUNK_STRATEGY || defaults.strategy,
    tableContextSize: parseIntEnv('TABLE_CONTEXT_SIZE', defaults.tableContextSize),
    imageContextSize: parseIntEnv('IMAGE_CONTEXT_SIZE', defaults.imageContextSize),
  };

  return validateInput(ChunkingConfigSchema, { ...envConfig, ...overrides });
}
