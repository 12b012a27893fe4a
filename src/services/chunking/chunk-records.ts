/**
 * Chunk Records
 *
 * Turns merged chunk texts and extracted tables into indexable records:
 * display content without position tags, coarse and fine token strings,
 * integer page positions and, when page rasters are available, the cropped
 * source image.
 *
 * @module services/chunking/chunk-records
 */

import type { ChunkRecord, TableInput } from '../../models/chunk.js';
import type { RasterImage } from '../../models/image.js';
import type { PagePosition, PositionTuple } from '../../models/position.js';
import { isEnglish } from '../../utils/language.js';
import { type CropOptions, cropByPositionTags } from '../images/crop.js';
import { defaultTokenizer, type Tokenizer } from '../tokenizer/token-counter.js';
import { extractPositionTags, removePositionTags } from './position-tags.js';

const TABLE_MARKUP = /<\/?(table|td|caption|tr|th)( [^<>]{0,12})?>/g;

export interface TokenizeChunksOptions {
  tokenizer?: Tokenizer;
  /** Page rasters (zero-based) to crop chunk images from */
  pageImages?: readonly RasterImage[];
  cropOptions?: CropOptions;
  /** Pattern source; when set every chunk is split into child records */
  childDelimitersPattern?: string;
}

export interface TokenizeTableOptions {
  tokenizer?: Tokenizer;
  /** Joins rows with "; " when true, "； " otherwise (default: detected from the rows) */
  eng?: boolean;
  /** Rows per record (default: 10) */
  batchSize?: number;
}

/**
 * Store positions on a record: one-based pages, integer coordinates.
 * An empty list leaves the record untouched.
 */
export function addPositions(
  record: Pick<ChunkRecord, 'pageNumbers' | 'tops' | 'positions'>,
  positions: readonly PagePosition[]
): void {
  if (positions.length === 0) {
    return;
  }
  record.pageNumbers = [];
  record.tops = [];
  record.positions = [];
  for (const [page, left, right, top, bottom] of positions) {
    const pn = Math.trunc(page + 1);
    record.pageNumbers.push(pn);
    record.tops.push(Math.trunc(top));
    record.positions.push([pn, Math.trunc(left), Math.trunc(right), Math.trunc(top), Math.trunc(bottom)]);
  }
}

/**
 * Record for `text`: content plus token strings. Table markup is blanked
 * for tokenizing but kept in content.
 */
export function tokenizeRecord(
  text: string,
  tokenizer: Tokenizer = defaultTokenizer,
  base: Omit<ChunkRecord, 'content'> = {}
): ChunkRecord {
  const contentTokens = tokenizer.tokenize(text.replace(TABLE_MARKUP, ' '));
  return {
    ...base,
    content: text,
    contentTokens,
    contentFineTokens: tokenizer.fineGrainedTokenize(contentTokens),
  };
}

function cloneBase(base: Omit<ChunkRecord, 'content'>): Omit<ChunkRecord, 'content'> {
  return {
    ...base,
    pageNumbers: base.pageNumbers ? [...base.pageNumbers] : undefined,
    tops: base.tops ? [...base.tops] : undefined,
    positions: base.positions ? base.positions.map((p): PositionTuple => [p[0], p[1], p[2], p[3], p[4]]) : undefined,
  };
}

/** Child pieces of a chunk, delimiters kept as their own pieces, blanks dropped */
function childPieces(text: string, pattern: string): string[] {
  return text.split(new RegExp(`(${pattern})`, 's')).filter((piece) => piece.trim().length > 0);
}

/**
 * One position per page of every tag. An untagged chunk gets
 * `[i, i, i, i, i]` only when `placeholder` is set, i.e. when nothing in the
 * batch is positioned; otherwise it stays unpositioned.
 */
function positionsFromTags(text: string, index: number, placeholder: boolean): PagePosition[] {
  const tags = extractPositionTags(text);
  if (tags.length === 0) {
    return placeholder ? [[index, index, index, index, index]] : [];
  }
  const positions: PagePosition[] = [];
  for (const tag of tags) {
    for (const page of tag.pages) {
      positions.push([page, tag.left, tag.right, tag.top, tag.bottom]);
    }
  }
  return positions;
}

function anyTagged(chunks: readonly string[]): boolean {
  return chunks.some((chunk) => extractPositionTags(chunk).length > 0);
}

function emit(
  out: ChunkRecord[],
  content: string,
  base: Omit<ChunkRecord, 'content'>,
  tokenizer: Tokenizer,
  childDelimitersPattern: string | undefined
): void {
  if (!childDelimitersPattern) {
    out.push(tokenizeRecord(content, tokenizer, base));
    return;
  }
  for (const piece of childPieces(content, childDelimitersPattern)) {
    out.push(tokenizeRecord(piece, tokenizer, { ...cloneBase(base), parentContent: content }));
  }
}

/**
 * Records for merged chunk texts. Blank chunks are skipped.
 *
 * With page images the chunk image is cropped from them and positions come
 * from the crop; otherwise positions come from the chunk's tags. Untagged
 * chunk `i` is placed at `[i, i, i, i, i]` when no chunk of the batch is
 * tagged and no page images are given, and left unpositioned otherwise.
 */
export function tokenizeChunks(chunks: readonly string[], options: TokenizeChunksOptions = {}): ChunkRecord[] {
  const tokenizer = options.tokenizer ?? defaultTokenizer;
  const pageImages = options.pageImages ?? [];
  const out: ChunkRecord[] = [];
  const placeholder = pageImages.length === 0 && !anyTagged(chunks);

  chunks.forEach((chunk, ii) => {
    if (chunk.trim().length === 0) {
      return;
    }
    const base: Omit<ChunkRecord, 'content'> = {};
    const cropped = pageImages.length > 0 ? cropByPositionTags(chunk, pageImages, options.cropOptions) : null;
    if (cropped) {
      base.image = cropped.image;
      addPositions(base, cropped.positions);
    } else {
      addPositions(base, positionsFromTags(chunk, ii, placeholder));
    }
    emit(out, removePositionTags(chunk), base, tokenizer, options.childDelimitersPattern);
  });
  return out;
}

/**
 * Records for chunks that carry their own image (DOCX-style merging).
 */
export function tokenizeChunksWithImages(
  chunks: readonly string[],
  images: ReadonlyArray<RasterImage | null>,
  options: Omit<TokenizeChunksOptions, 'pageImages' | 'cropOptions'> = {}
): ChunkRecord[] {
  const tokenizer = options.tokenizer ?? defaultTokenizer;
  const out: ChunkRecord[] = [];
  const count = Math.min(chunks.length, images.length);
  if (chunks.length !== images.length) {
    console.error(`[chunk-records] ${chunks.length} chunks but ${images.length} images, extra entries ignored`);
  }
  const placeholder = !anyTagged(chunks);

  for (let ii = 0; ii < count; ii++) {
    const chunk = chunks[ii];
    if (chunk.trim().length === 0) continue;
    const base: Omit<ChunkRecord, 'content'> = { image: images[ii] };
    addPositions(base, positionsFromTags(chunk, ii, placeholder));
    emit(out, removePositionTags(chunk), base, tokenizer, options.childDelimitersPattern);
  }
  return out;
}

/**
 * Records for extracted tables.
 *
 * A table given as a string is one record; a table given as rows is one
 * record per batch of rows. Tables with an image are typed `image`, others
 * `table`.
 */
export function tokenizeTable(tables: readonly TableInput[], options: TokenizeTableOptions = {}): ChunkRecord[] {
  const tokenizer = options.tokenizer ?? defaultTokenizer;
  const batchSize = Math.max(1, options.batchSize ?? 10);
  const out: ChunkRecord[] = [];

  for (const { image, rows, positions } of tables) {
    if (rows.length === 0) continue;
    const base: Omit<ChunkRecord, 'content'> = image ? { image, docType: 'image' } : { docType: 'table' };

    if (typeof rows === 'string') {
      const record = tokenizeRecord(rows, tokenizer, base);
      addPositions(record, positions);
      out.push(record);
      continue;
    }

    const eng = options.eng ?? isEnglish(rows);
    const separator = eng ? '; ' : '； ';
    for (let i = 0; i < rows.length; i += batchSize) {
      const record = tokenizeRecord(rows.slice(i, i + batchSize).join(separator), tokenizer, base);
      addPositions(record, positions);
      out.push(record);
    }
  }
  return out;
}
