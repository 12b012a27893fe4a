/**
 * Hierarchical Bucket Merge
 *
 * Groups fragments with their enclosing headings without building a tree.
 * Fragment indices are bucketed by level; each unread fragment of the first
 * `depth` buckets (body bucket first) seeds a group, and every later, more
 * significant bucket contributes its nearest preceding index, so a group
 * reads heading path + fragment once reversed into document order.
 *
 * Single-fragment groups are coalesced under a small token ceiling so plain
 * body lines do not end up as one-line chunks.
 *
 * @module services/chunking/hierarchical-merger
 */

import type { RawSection } from '../../models/section.js';
import { defaultTokenCounter, type TokenCounter } from '../tokenizer/token-counter.js';
import { PATTERN_REGISTRY, PatternRegistry } from './bullet-patterns.js';
import { levelOfSection } from './level-assigner.js';
import { removePositionTags } from './position-tags.js';
import { filterMeaningfulSections, normalizeSections } from './sections.js';

/** Token ceiling for coalescing single-fragment groups */
export const SINGLETON_TOKEN_CEILING = 218;

/**
 * Position of the greatest element strictly below `target` in an ascending
 * list, -1 when there is none.
 */
export function nearestBelow(sorted: readonly number[], target: number): number {
  let lo = 0;
  let hi = sorted.length - 1;
  let found = -1;
  while (lo <= hi) {
    const mid = (lo + hi) >> 1;
    if (sorted[mid] < target) {
      found = mid;
      lo = mid + 1;
    } else {
      hi = mid - 1;
    }
  }
  return found;
}

/**
 * Index groups, each listed seed first, ancestors after (descending).
 */
export function groupByBuckets(levelBuckets: readonly number[][], depth: number, total: number): number[][] {
  const buckets = [...levelBuckets].reverse();
  const read = new Array<boolean>(total).fill(false);
  const groups: number[][] = [];

  for (let i = 0; i < Math.min(depth, buckets.length); i++) {
    for (const seed of buckets[i]) {
      if (read[seed]) {
        continue;
      }
      read[seed] = true;
      const group = [seed];
      groups.push(group);
      if (i + 1 === buckets.length - 1) {
        continue;
      }

      for (let ii = i + 1; ii < buckets.length; ii++) {
        const found = nearestBelow(buckets[ii], seed);
        if (found < 0) {
          continue;
        }
        const index = buckets[ii][found];
        // a later, more significant heading supersedes the previous pick
        if (index > group[group.length - 1]) {
          group.pop();
        }
        group.push(index);
      }
      for (const member of group) {
        read[member] = true;
      }
    }
  }

  return groups;
}

/**
 * Coalesce single-fragment groups while they stay under the ceiling;
 * multi-fragment groups are always emitted alone.
 */
export function coalesceSingletons(groups: readonly string[][], counter: TokenCounter): string[][] {
  const result: string[][] = [[]];
  const counts: number[] = [0];

  for (const group of groups) {
    if (group.length === 1) {
      const n = counter.count(removePositionTags(group[0]));
      if (n + counts[counts.length - 1] < SINGLETON_TOKEN_CEILING) {
        result[result.length - 1].push(group[0]);
        counts[counts.length - 1] += n;
        continue;
      }
      result.push([...group]);
      counts.push(n);
      continue;
    }
    result.push([...group]);
    counts.push(SINGLETON_TOKEN_CEILING);
  }

  return result.filter((g) => g.length > 0);
}

/**
 * Merge sections into heading-path groups.
 *
 * @param styleIndex - body style from bulletsCategory; with -1 every
 *   fragment is a singleton group
 * @param depth - number of buckets (from the least significant) that seed groups
 */
export function hierarchicalMerge(
  styleIndex: number,
  rawSections: readonly RawSection[],
  depth: number,
  counter: TokenCounter = defaultTokenCounter,
  registry: PatternRegistry = PATTERN_REGISTRY
): string[][] {
  if (rawSections.length === 0) {
    return [];
  }
  const sections = filterMeaningfulSections(normalizeSections(rawSections));
  const texts = sections.map((s) => s.text);

  if (styleIndex < 0) {
    console.error(`[hierarchical-merger] No numbering style detected, coalescing ${texts.length} fragments`);
    return coalesceSingletons(
      texts.map((t) => [t]),
      counter
    );
  }

  const bulletsSize = registry.patternsOf(styleIndex).length;
  const buckets: number[][] = Array.from({ length: bulletsSize + 2 }, () => []);
  sections.forEach((section, i) => {
    buckets[levelOfSection(styleIndex, section, registry)].push(i);
  });

  const groups = groupByBuckets(buckets, depth, sections.length);
  if (groups.length === 0) {
    return [];
  }

  return coalesceSingletons(
    groups.map((g) => [...g].reverse().map((i) => texts[i])),
    counter
  );
}
