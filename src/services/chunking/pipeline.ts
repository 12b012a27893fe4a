/**
 * Chunking Pipeline
 *
 * chunkDocument wires the passes together:
 *
 *   sections → [contents removal] → [style classification → tree or
 *   hierarchical merge] → budgeted merge → records (+ tables) → media context
 *
 * The structural passes return plain strings, so positions of positioned
 * sections are inlined as tags before them and recovered from the tags when
 * records are built.
 *
 * @module services/chunking/pipeline
 */

import type { ChunkRecord, TableInput } from '../../models/chunk.js';
import type { RasterImage } from '../../models/image.js';
import type { RawSection, Section } from '../../models/section.js';
import { isEnglish } from '../../utils/language.js';
import {
  defaultTokenCounter,
  defaultTokenizer,
  type TokenCounter,
  type Tokenizer,
} from '../tokenizer/token-counter.js';
import { PATTERN_REGISTRY, PatternRegistry } from './bullet-patterns.js';
import { tokenizeChunks, tokenizeTable } from './chunk-records.js';
import { type ChunkingConfig, type ChunkingConfigInput, resolveChunkingConfig } from './config.js';
import { hierarchicalMerge } from './hierarchical-merger.js';
import { attachMediaContext } from './media-context.js';
import { getDelimiters, naiveMerge } from './naive-merger.js';
import { encodePositionTag } from './position-tags.js';
import { makeColonAsTitle, removeContentsTable } from './section-cleanup.js';
import { normalizeSections, visibleText } from './sections.js';
import { bulletsCategory, sampleTexts } from './style-classifier.js';
import { treeMerge } from './tree-merger.js';

export interface ChunkDocumentInput {
  sections: readonly RawSection[];
  tables?: readonly TableInput[];
  /** Zero-based page rasters; enables chunk image cropping */
  pageImages?: readonly RasterImage[];
}

export interface ChunkingDeps {
  counter?: TokenCounter;
  tokenizer?: Tokenizer;
  registry?: PatternRegistry;
}

/** Positioned sections become plain sections with the tag appended */
export function inlinePositionTags(sections: readonly Section[]): Section[] {
  return sections.map((section): Section =>
    section.kind === 'positioned'
      ? { kind: 'plain', text: section.text + encodePositionTag(section.position) }
      : section
  );
}

/**
 * Fragments handed to the budgeted merge for the configured strategy.
 */
export function structureSections(
  sections: readonly Section[],
  config: Pick<ChunkingConfig, 'strategy' | 'depth' | 'sampleSize'>,
  counter: TokenCounter = defaultTokenCounter,
  registry: PatternRegistry = PATTERN_REGISTRY
): RawSection[] {
  if (config.strategy === 'naive') {
    return [...sections];
  }

  const inlined = inlinePositionTags(sections);
  const styleIndex = bulletsCategory(
    sampleTexts(
      inlined.map((s) => s.text),
      config.sampleSize
    ),
    registry
  );

  if (config.strategy === 'tree') {
    return treeMerge(styleIndex, inlined, config.depth, registry);
  }
  return hierarchicalMerge(styleIndex, inlined, config.depth, counter, registry).map((group) => group.join('\n'));
}

/**
 * Chunk one document into indexable records.
 *
 * @throws ValidationError when the configuration is invalid
 */
export function chunkDocument(
  input: ChunkDocumentInput,
  config: ChunkingConfigInput = {},
  deps: ChunkingDeps = {}
): ChunkRecord[] {
  const cfg = resolveChunkingConfig(config);
  const counter = deps.counter ?? defaultTokenCounter;
  const tokenizer = deps.tokenizer ?? defaultTokenizer;
  const registry = deps.registry ?? PATTERN_REGISTRY;

  let sections = normalizeSections(input.sections);
  if (cfg.removeContents) {
    const eng = isEnglish(sections.map((s) => visibleText(s.text)));
    sections = removeContentsTable(sections, eng);
  }
  if (cfg.colonAsTitle) {
    sections = makeColonAsTitle(sections);
  }

  const fragments = structureSections(sections, cfg, counter, registry);
  const chunks = naiveMerge(fragments, {
    chunkTokenNum: cfg.chunkTokenNum,
    delimiter: cfg.delimiter,
    overlappedPercent: cfg.overlappedPercent,
    counter,
  });

  const records = tokenizeChunks(
    chunks.map((c) => c.text),
    {
      tokenizer,
      pageImages: input.pageImages,
      childDelimitersPattern: cfg.childDelimiters ? getDelimiters(cfg.childDelimiters) : undefined,
    }
  );
  if (input.tables && input.tables.length > 0) {
    for (const record of tokenizeTable(input.tables, { tokenizer })) {
      records.push(record);
    }
  }

  return attachMediaContext(records, {
    tableContextSize: cfg.tableContextSize,
    imageContextSize: cfg.imageContextSize,
    counter,
    tokenizer,
  });
}
