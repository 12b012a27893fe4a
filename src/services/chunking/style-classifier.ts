/**
 * Numbering Style Classification
 *
 * Scores every numbering style against a sample of fragment texts and picks
 * the one that explains the most fragments.
 *
 * @module services/chunking/style-classifier
 */

import { PATTERN_REGISTRY, PatternRegistry } from './bullet-patterns.js';
import { notBullet } from './level-assigner.js';

function countHits(patterns: readonly RegExp[], texts: readonly string[]): number {
  let hits = 0;
  for (const raw of texts) {
    const text = raw.trim();
    if (patterns.some((p) => p.test(text)) && !notBullet(text)) {
      hits++;
    }
  }
  return hits;
}

/** Index of the strictly greatest count; first wins ties; -1 if all zero */
function argMax(hits: readonly number[]): number {
  let maximum = 0;
  let best = -1;
  for (let i = 0; i < hits.length; i++) {
    if (hits[i] > maximum) {
      best = i;
      maximum = hits[i];
    }
  }
  return best;
}

/**
 * Best-fitting body style for the sample, -1 when nothing matches
 * (no detectable structure).
 */
export function bulletsCategory(
  texts: readonly string[],
  registry: PatternRegistry = PATTERN_REGISTRY
): number {
  return argMax(registry.bodyStyles.map((style) => countHits(style.patterns, texts)));
}

/**
 * Best-fitting question pattern for FAQ-like documents.
 */
export function qbulletsCategory(
  texts: readonly string[],
  registry: PatternRegistry = PATTERN_REGISTRY
): { index: number; pattern: RegExp | null } {
  const index = argMax(registry.questionPatterns.map((p) => countHits([p], texts)));
  return { index, pattern: index >= 0 ? registry.questionPatterns[index] : null };
}

/**
 * Evenly spaced, deterministic subsample used to bound classification cost.
 */
export function sampleTexts(texts: readonly string[], size: number): string[] {
  if (size <= 0) {
    return [];
  }
  if (texts.length <= size) {
    return [...texts];
  }
  const step = texts.length / size;
  const sample: string[] = [];
  for (let i = 0; i < size; i++) {
    sample.push(texts[Math.floor(i * step)]);
  }
  return sample;
}
