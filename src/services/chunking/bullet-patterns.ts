/**
 * Numbering Pattern Catalog
 *
 * Ordered pattern lists used to infer document structure. Each body style is
 * one numbering convention; a pattern's position in its list is its level
 * (0 = most significant). The question catalog is used for FAQ-like
 * documents and captures the question index in group 1.
 *
 * All patterns are anchored at the start of the (trimmed) fragment.
 *
 * @module services/chunking/bullet-patterns
 */

/** A numbering convention: ordered, anchored level patterns */
export interface NumberingStyle {
  readonly name: string;
  readonly patterns: readonly RegExp[];
}

const CN_NUM = '零一二三四五六七八九十百';

const BODY_STYLE_SOURCES: ReadonlyArray<{ name: string; sources: string[] }> = [
  {
    name: 'chinese-legal',
    sources: [
      `第[${CN_NUM}0-9]+(分?编|部分)`,
      `第[${CN_NUM}0-9]+章`,
      `第[${CN_NUM}0-9]+节`,
      `第[${CN_NUM}0-9]+条`,
      `[\\(（][${CN_NUM}]+[\\)）]`,
    ],
  },
  {
    name: 'numeric-outline',
    sources: [
      '第[0-9]+章',
      '第[0-9]+节',
      '[0-9]{0,2}[\\. 、]',
      '[0-9]{0,2}\\.[0-9]{0,2}[^a-zA-Z/%~-]',
      '[0-9]{0,2}\\.[0-9]{0,2}\\.[0-9]{0,2}',
      '[0-9]{0,2}\\.[0-9]{0,2}\\.[0-9]{0,2}\\.[0-9]{0,2}',
    ],
  },
  {
    name: 'chinese-mixed',
    sources: [
      `第[${CN_NUM}0-9]+章`,
      `第[${CN_NUM}0-9]+节`,
      `[${CN_NUM}]+[ 、]`,
      `[\\(（][${CN_NUM}]+[\\)）]`,
      '[\\(（][0-9]{0,2}[\\)）]',
    ],
  },
  {
    name: 'western-keywords',
    sources: [
      'PART (ONE|TWO|THREE|FOUR|FIVE|SIX|SEVEN|EIGHT|NINE|TEN)',
      'Chapter (I+V?|VI*|XI|IX|X)',
      'Section [0-9]+',
      'Article [0-9]+',
    ],
  },
  {
    name: 'markdown',
    sources: ['#[^#]', '##[^#]', '###.*', '####.*', '#####.*', '######.*'],
  },
];

const QUESTION_SOURCES: string[] = [
  `第([${CN_NUM}0-9]+)问`,
  `第([${CN_NUM}0-9]+)条`,
  `[\\(（]([${CN_NUM}]+)[\\)）]`,
  '第([0-9]+)问',
  '第([0-9]+)条',
  '([0-9]{1,2})[\\. 、]',
  `([${CN_NUM}]+)[ 、]`,
  '[\\(（]([0-9]{1,2})[\\)）]',
  'QUESTION (ONE|TWO|THREE|FOUR|FIVE|SIX|SEVEN|EIGHT|NINE|TEN)',
  'QUESTION (I+V?|VI*|XI|IX|X)',
  'QUESTION ([0-9]+)',
];

function anchored(source: string): RegExp {
  return new RegExp(`^(?:${source})`);
}

/**
 * Read-only registry of the numbering styles, built once per process.
 */
export class PatternRegistry {
  readonly bodyStyles: readonly NumberingStyle[];
  readonly questionPatterns: readonly RegExp[];

  constructor() {
    this.bodyStyles = Object.freeze(
      BODY_STYLE_SOURCES.map((style) =>
        Object.freeze({
          name: style.name,
          patterns: Object.freeze(style.sources.map(anchored)),
        })
      )
    );
    this.questionPatterns = Object.freeze(QUESTION_SOURCES.map(anchored));
  }

  /** Patterns of a body style; empty for -1 ("no structure") or out of range */
  patternsOf(styleIndex: number): readonly RegExp[] {
    return this.bodyStyles[styleIndex]?.patterns ?? [];
  }

  /** Style index by name, -1 if unknown */
  indexOf(name: string): number {
    return this.bodyStyles.findIndex((s) => s.name === name);
  }
}

export const PATTERN_REGISTRY = new PatternRegistry();
