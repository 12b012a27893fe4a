/**
 * Media Context Attacher Tests
 */

import { describe, it, expect } from 'vitest';
import { attachMediaContext, splitSentences, trimToTokens } from '../../../src/services/chunking/media-context.js';
import { solidImage, textRecord, wordCounter } from './helpers.js';

describe('splitSentences', () => {
  it('keeps the terminating punctuation on each sentence', () => {
    expect(splitSentences('Alpha one. Beta two? Tail')).toEqual(['Alpha one.', ' Beta two?', ' Tail']);
  });

  it('splits on CJK punctuation', () => {
    expect(splitSentences('第一句。第二句！')).toEqual(['第一句。', '第二句！']);
  });
});

describe('trimToTokens', () => {
  const text = 'Alpha one. Beta two. Gamma three.';

  it('takes whole sentences from the head', () => {
    expect(trimToTokens(text, 1, false, wordCounter)).toBe('Alpha one.');
  });

  it('keeps the sentence that overflows the budget', () => {
    expect(trimToTokens(text, 3, false, wordCounter)).toBe('Alpha one. Beta two.');
  });

  it('takes sentences from the tail in original order', () => {
    expect(trimToTokens(text, 3, true, wordCounter)).toBe(' Beta two. Gamma three.');
  });

  it('returns nothing for a zero budget', () => {
    expect(trimToTokens(text, 0, false, wordCounter)).toBe('');
  });
});

describe('attachMediaContext', () => {
  it('leaves records alone when both budgets are zero', () => {
    const records = [textRecord('before'), textRecord('', { docType: 'image' }), textRecord('after')];
    attachMediaContext(records, { counter: wordCounter });
    expect(records.map((r) => r.content)).toEqual(['before', '', 'after']);
  });

  it('surrounds an image with trimmed neighbouring text', () => {
    const records = [
      textRecord('Alpha one. Beta two. Gamma three.'),
      textRecord('', { docType: 'image' }),
      textRecord('Next part here. More after.'),
    ];

    attachMediaContext(records, { imageContextSize: 1, counter: wordCounter });

    expect(records[1].content).toBe(' Gamma three.\nNext part here.');
    expect(records[0].content).toBe('Alpha one. Beta two. Gamma three.');
    expect(records[2].content).toBe('Next part here. More after.');
  });

  it('treats a record with an image and blank content as an image', () => {
    const records = [textRecord('Caption text.'), textRecord('  ', { image: solidImage(1, 1, [0, 0, 0]) })];
    attachMediaContext(records, { imageContextSize: 5, counter: wordCounter });
    expect(records[1].content).toBe('Caption text.\n  ');
  });

  it('stops collecting at another media record', () => {
    const records = [
      textRecord('Intro text.'),
      textRecord('', { docType: 'image' }),
      textRecord('', { docType: 'image' }),
      textRecord('Outro.'),
    ];

    attachMediaContext(records, { imageContextSize: 5, counter: wordCounter });

    expect(records.map((r) => r.content)).toEqual(['Intro text.', 'Intro text.', 'Outro.', 'Outro.']);
  });

  it('uses the table budget for tables and keeps the table text in the middle', () => {
    const records = [
      textRecord('one two three'),
      textRecord('<table><tr><td>x</td></tr></table>', { docType: 'table' }),
      textRecord('', { docType: 'image' }),
    ];

    attachMediaContext(records, { tableContextSize: 10, counter: wordCounter });

    expect(records[1].content).toBe('one two three\n<table><tr><td>x</td></tr></table>');
    expect(records[2].content).toBe('');
  });

  it('orders records by page and top and re-tokenizes updated ones', () => {
    const a = textRecord('tail text', { pageNumbers: [2], tops: [10], positions: [[2, 0, 10, 10, 20]] });
    const d = textRecord('loose');
    const c = textRecord('T', {
      docType: 'table',
      contentTokens: 't',
      pageNumbers: [1],
      tops: [100],
      positions: [[1, 0, 10, 100, 120]],
    });
    const b = textRecord('head text', { pageNumbers: [1], tops: [50], positions: [[1, 0, 10, 50, 60]] });
    const records = [a, d, c, b];

    const result = attachMediaContext(records, { tableContextSize: 5, counter: wordCounter });

    expect(result).toBe(records);
    expect(records).toEqual([b, c, a, d]);
    expect(c.content).toBe('head text\nT\ntail text\nloose');
    expect(c.contentTokens).toBe('head text t tail text loose');
    expect(c.contentFineTokens).toBeUndefined();
  });

  it('reorders very long record lists', () => {
    const count = 130_000;
    const records = Array.from({ length: count }, (_, i) =>
      textRecord('w', { pageNumbers: [1], tops: [i + 1], positions: [[1, 0, 10, i + 1, i + 2]] })
    );
    const image = textRecord('', { docType: 'image', pageNumbers: [1], tops: [0], positions: [[1, 0, 10, 0, 1]] });
    records.push(image);

    attachMediaContext(records, { imageContextSize: 1, counter: wordCounter });

    expect(records).toHaveLength(count + 1);
    expect(records[0]).toBe(image);
    expect(image.content).toBe('w');
  });
});
