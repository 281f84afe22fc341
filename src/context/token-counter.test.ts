import { describe, it, expect } from 'vitest';
import {
  CharRatioTokenCounter,
  LexicalTokenCounter,
  estimateTokens,
  truncateToTokenBudget,
} from './token-counter.js';

describe('CharRatioTokenCounter', () => {
  const counter = new CharRatioTokenCounter();

  it('empty text → 0', () => {
    expect(counter.count('')).toBe(0);
  });

  it('rounds up at 3.5 chars per token', () => {
    expect(counter.count('abcdefg')).toBe(2);
    expect(counter.count('abcdefgh')).toBe(3);
  });

  it('estimateTokens uses the char ratio counter', () => {
    expect(estimateTokens('x'.repeat(35))).toBe(10);
  });
});

describe('LexicalTokenCounter', () => {
  it('counts words only for plain text', () => {
    // 3 words × 1.2 = 3.6 → 4
    expect(new LexicalTokenCounter().count('alpha beta gamma')).toBe(4);
  });

  it('counts punctuation and symbols', () => {
    // words: "f(x)" "=" "1;" → 3
    // punctuation: ( ) ; → 3
    // symbols: ( ) = → 3
    // (3 + 3 + 3) × 1.2 = 10.8 → 11
    expect(new LexicalTokenCounter().count('f(x) = 1;')).toBe(11);
  });

  it('applies the language multiplier', () => {
    // base 4 (see above) × 1.4 = 5.6 → 6
    expect(new LexicalTokenCounter('java').count('alpha beta gamma')).toBe(6);
  });

  it('unknown language keeps multiplier 1', () => {
    expect(new LexicalTokenCounter('cobol').count('alpha beta gamma')).toBe(4);
  });

  it('forLanguage returns a new counter', () => {
    const base = new LexicalTokenCounter();
    expect(base.forLanguage('markdown').count('alpha beta gamma')).toBe(4);
  });

  it('is deterministic', () => {
    const counter = new LexicalTokenCounter('go');
    const text = 'func main() { fmt.Println("hi") }';
    expect(counter.count(text)).toBe(counter.count(text));
  });
});

describe('truncateToTokenBudget', () => {
  it('returns text unchanged when within budget', () => {
    expect(truncateToTokenBudget('short', 10)).toBe('short');
  });

  it('returns only the suffix when the budget cannot hold anything', () => {
    expect(truncateToTokenBudget('x'.repeat(100), 1, '...')).toBe('...');
  });

  it('cuts at a line boundary', () => {
    const text = ['aaaaaaaaaa', 'bbbbbbbbbb', 'cccccccccc', 'dddddddddd'].join('\n');
    // 43 chars → 13 tokens; budget 8 → 28 chars minus 3 suffix = 25
    // first 25 chars end inside line 3; last newline at 21 > 12.5
    expect(truncateToTokenBudget(text, 8, '...')).toBe('aaaaaaaaaa\nbbbbbbbbbb...');
  });
});
