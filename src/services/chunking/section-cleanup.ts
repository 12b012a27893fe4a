/**
 * Section cleanup before merging
 *
 * @module services/chunking/section-cleanup
 */

import type { Section } from '../../models/section.js';

const CONTENTS_HEADING = /^(contents|tableofcontents|目录|目次|致谢|acknowledge)$/i;
const HEADING_SPACES = /[ \u00a0\u3000]+/g;
const ENTRY_SEARCH_WINDOW = 128;

function lineOf(section: Section): string {
  return section.text.trim();
}

function isContentsHeading(line: string): boolean {
  return CONTENTS_HEADING.test(line.split('@@')[0].replace(HEADING_SPACES, ''));
}

/** First two words (English) or first three characters */
function entryPrefix(line: string, eng: boolean): string {
  return eng ? line.split(/\s+/).filter(Boolean).slice(0, 2).join(' ') : Array.from(line).slice(0, 3).join('');
}

/**
 * Remove table-of-contents blocks.
 *
 * At every "contents" heading the heading is removed, then blank lines and
 * the first entry. The remaining entries are removed up to the first line
 * (within the next 128) starting with the first entry's prefix, which is
 * taken to be that entry's heading in the body. When no such line is found
 * only the heading and first entry are removed.
 */
export function removeContentsTable(sections: readonly Section[], eng = false): Section[] {
  const out = [...sections];
  let i = 0;
  while (i < out.length) {
    if (!isContentsHeading(lineOf(out[i]))) {
      i++;
      continue;
    }
    out.splice(i, 1);
    if (i >= out.length) break;

    let prefix = entryPrefix(lineOf(out[i]), eng);
    while (!prefix && i < out.length) {
      out.splice(i, 1);
      if (i < out.length) {
        prefix = entryPrefix(lineOf(out[i]), eng);
      }
    }
    if (i >= out.length) break;
    out.splice(i, 1);
    if (i >= out.length) break;

    const end = Math.min(i + ENTRY_SEARCH_WINDOW, out.length);
    for (let j = i; j < end; j++) {
      if (lineOf(out[j]).startsWith(prefix)) {
        out.splice(i, j - i);
        break;
      }
    }
  }
  return out;
}

/** Clause boundaries scanned from the end of a line; " ." is ". " reversed */
const CLAUSE_END = /([。？！!?;；]| \.)/;
/** Text before the trailing clause must be at least this long */
const MIN_LEADING_CHARS = 32;

function reverseText(text: string): string {
  return Array.from(text).reverse().join('');
}

/**
 * Promote the trailing clause of long colon-terminated lines to a title.
 *
 * For each non-plain section whose visible text ends with ":" or "：", the
 * clause after the last sentence boundary is inserted as a `title` section
 * in front of it, provided at least 32 characters precede the clause. The
 * original section is kept. Plain sections carry no layout and are returned
 * unchanged.
 */
export function makeColonAsTitle(sections: readonly Section[]): Section[] {
  const out: Section[] = [];
  for (const section of sections) {
    if (section.kind !== 'plain') {
      const title = colonClause(section.text);
      if (title) {
        out.push({ kind: 'layout', text: title, layout: 'title' });
      }
    }
    out.push(section);
  }
  return out;
}

function colonClause(text: string): string | null {
  const line = text.split('@')[0].trim();
  if (!line || !':：'.includes(line[line.length - 1])) {
    return null;
  }
  const parts = reverseText(line).split(CLAUSE_END);
  if (parts.length < 3) {
    return null;
  }
  const leading = parts.slice(2).join('');
  if (leading.length < MIN_LEADING_CHARS) {
    return null;
  }
  return reverseText(parts[0]).trim();
}
