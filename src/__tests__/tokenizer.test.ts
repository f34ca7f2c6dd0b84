import { describe, it, expect } from 'vitest';
import { countTerms, tokenize } from '../search/tokenizer.js';

describe('tokenize', () => {
  it('lowercases and strips punctuation', () => {
    expect(tokenize("The cat's hat!")).toEqual(['the', 'cats', 'hat']);
  });

  it('splits on any whitespace', () => {
    expect(tokenize('one\ttwo\n  three')).toEqual(['one', 'two', 'three']);
  });

  it('keeps letters and digits from any script', () => {
    expect(tokenize('Café Über 42')).toEqual(['café', 'über', '42']);
  });

  it('joins identifiers split only by punctuation', () => {
    expect(tokenize('read_file(path)')).toEqual(['readfilepath']);
  });

  it('returns nothing for empty or punctuation-only text', () => {
    expect(tokenize('')).toEqual([]);
    expect(tokenize('!!! ???')).toEqual([]);
  });
});

describe('countTerms', () => {
  it('counts occurrences per term', () => {
    expect(countTerms(['a', 'b', 'a'])).toEqual(new Map([['a', 2], ['b', 1]]));
  });
});
