/**
 * Tree Merge
 *
 * Builds a depth-bounded heading tree from leveled fragments and flattens it
 * into chunks, each prefixed with its ancestor title path.
 *
 * Tree levels are the assigner's levels shifted by one so that the synthetic
 * root sits at level 0 ("whole document"). Fragments deeper than the target
 * level never become nodes; they are folded into the texts of the node on
 * top of the construction stack.
 *
 * @module services/chunking/tree-merger
 */

import type { LeveledFragment, RawSection } from '../../models/section.js';
import { PATTERN_REGISTRY, PatternRegistry } from './bullet-patterns.js';
import { levelOfSection, normalizeFragmentText } from './level-assigner.js';
import { filterMeaningfulSections, normalizeSections } from './sections.js';

interface TreeNode {
  level: number;
  texts: string[];
  /** Arena index of the parent, -1 for the root */
  parent: number;
  /** Arena indices of the children, document order */
  children: number[];
}

const ROOT = 0;

/**
 * Heading tree stored as an arena of nodes addressed by index.
 */
export class SectionTree {
  private readonly nodes: TreeNode[] = [{ level: 0, texts: [], parent: -1, children: [] }];

  /**
   * @param depth - deepest level that still creates nodes
   */
  constructor(readonly depth: number) {}

  get size(): number {
    return this.nodes.length;
  }

  /**
   * Single pass with an explicit stack seeded with the root.
   */
  build(lines: readonly LeveledFragment[]): this {
    const stack: number[] = [ROOT];

    for (const { level, text } of lines) {
      if (level > this.depth) {
        this.nodes[stack[stack.length - 1]].texts.push(text);
        continue;
      }

      while (stack.length > 1 && level <= this.nodes[stack[stack.length - 1]].level) {
        stack.pop();
      }

      const parent = stack[stack.length - 1];
      const id = this.nodes.length;
      this.nodes.push({ level, texts: [text], parent, children: [] });
      this.nodes[parent].children.push(id);
      stack.push(id);
    }

    return this;
  }

  /**
   * Pre-order traversal with a work stack carrying the title path.
   * Each node contributes at most one chunk, before its children.
   */
  flatten(): string[] {
    const chunks: string[] = [];
    const work: Array<{ id: number; titles: string[] }> = [{ id: ROOT, titles: [] }];

    while (work.length > 0) {
      const item = work.pop();
      if (!item) break;
      const node = this.nodes[item.id];
      const withinDepth = node.level >= 1 && node.level <= this.depth;

      if (node.level === 0 && node.texts.length > 0) {
        chunks.push([...item.titles, ...node.texts].join('\n'));
      }

      const path = withinDepth ? [...item.titles, ...node.texts] : item.titles;

      if (node.level > this.depth && node.texts.length > 0) {
        chunks.push([...path, ...node.texts].join('\n'));
      } else if (node.children.length === 0 && withinDepth) {
        // header-only section keeps its title path
        chunks.push(path.join('\n'));
      }

      for (let i = node.children.length - 1; i >= 0; i--) {
        work.push({ id: node.children[i], titles: path });
      }
    }

    return chunks;
  }
}

/**
 * Level to group by: the `depth`-th distinct level (clamped to the deepest);
 * the body level is only used when it is the only level present.
 */
export function resolveTargetLevel(levels: Iterable<number>, depth: number, bodyLevel: number): number {
  const sorted = Array.from(new Set(levels)).sort((a, b) => a - b);
  if (sorted.length === 0) {
    return bodyLevel;
  }
  const index = Math.min(Math.max(depth, 1), sorted.length) - 1;
  let target = sorted[index];
  if (target === bodyLevel && sorted.length > 1) {
    target = sorted[sorted.length - 2];
  }
  return target;
}

/**
 * Merge sections into title-path chunks under a numbering style.
 *
 * @param styleIndex - body style from bulletsCategory; -1 returns the
 *   meaningful fragments flat, one per chunk
 * @param depth - number of heading levels kept as grouping boundaries
 */
export function treeMerge(
  styleIndex: number,
  rawSections: readonly RawSection[],
  depth: number,
  registry: PatternRegistry = PATTERN_REGISTRY
): string[] {
  if (rawSections.length === 0) {
    return [];
  }
  const sections = filterMeaningfulSections(normalizeSections(rawSections));

  if (styleIndex < 0) {
    console.error(`[tree-merger] No numbering style detected, keeping ${sections.length} fragments flat`);
    return sections.map((s) => s.text);
  }

  const lines: LeveledFragment[] = [];
  for (const section of sections) {
    const text = normalizeFragmentText(section.text);
    if (text.replace(/^\n+|\n+$/g, '').length === 0) {
      continue;
    }
    lines.push({ level: levelOfSection(styleIndex, section, registry) + 1, text });
  }
  if (lines.length === 0) {
    return [];
  }

  const bodyLevel = registry.patternsOf(styleIndex).length + 2;
  const target = resolveTargetLevel(
    lines.map((l) => l.level),
    depth,
    bodyLevel
  );

  return new SectionTree(target)
    .build(lines)
    .flatten()
    .filter((chunk) => chunk.length > 0);
}
