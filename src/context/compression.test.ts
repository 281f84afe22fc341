import { describe, it, expect } from 'vitest';
import { compressContent, estimateCompressionRatio, isCompressionStrategy } from './compression.js';
import type { TokenCounter } from './token-counter.js';

/** One token per line keeps expected counts easy to read */
const lineCounter: TokenCounter = {
  name: 'lines',
  count: (text) => (text ? text.split('\n').length : 0),
};

const goSource = [
  'package auth',
  '',
  'import (',
  '\t"fmt"',
  '\t"strings"',
  ')',
  '',
  '// Token is a session token.',
  'type Token struct {',
  '\tValue string // raw value',
  '}',
  '',
  '/* helper',
  '   block */',
  'func Check(t Token) error {',
  '\tif  strings.TrimSpace(t.Value) == "" {',
  '\t\treturn fmt.Errorf("empty")',
  '\t}',
  '\treturn nil',
  '}',
].join('\n');

const goFile = { path: 'auth.go', language: 'go' };

describe('compressContent', () => {
  it('none returns the content unchanged', () => {
    const result = compressContent(goSource, goFile, 'none', lineCounter);
    expect(result.content).toBe(goSource);
    expect(result.ratio).toBe(1);
    expect(result.compressedTokens).toBe(20);
  });

  it('minify strips comments, blank lines and repeated spaces', () => {
    const result = compressContent(goSource, goFile, 'minify', lineCounter);
    expect(result.content.split('\n')).toEqual([
      'package auth',
      'import (',
      '\t"fmt"',
      '\t"strings"',
      ')',
      'type Token struct {',
      '\tValue string',
      '}',
      'func Check(t Token) error {',
      '\tif strings.TrimSpace(t.Value) == "" {',
      '\t\treturn fmt.Errorf("empty")',
      '\t}',
      '\treturn nil',
      '}',
    ]);
    expect(result.originalTokens).toBe(20);
    expect(result.compressedTokens).toBe(14);
    expect(result.ratio).toBe(0.7);
  });

  it('minify keeps comment markers inside URLs', () => {
    const result = compressContent('const url = "https://example.test"; // docs', { path: 'a.ts', language: 'typescript' }, 'minify', lineCounter);
    expect(result.content).toBe('const url = "https://example.test";');
  });

  it('snippet keeps imports and function heads with their closing line', () => {
    const result = compressContent(goSource, goFile, 'snippet', lineCounter);
    expect(result.content.split('\n')).toEqual([
      '// snippets from auth.go',
      'import (',
      '\t"fmt"',
      '\t"strings"',
      ')',
      '',
      'func Check(t Token) error {',
      '    // ...',
      '}',
    ]);
  });

  it('snippet marks python bodies without a closing line', () => {
    const source = ['import os', 'from typing import List', '', 'def load(path):', '    # read it', '    return os.path.exists(path)'].join('\n');
    const result = compressContent(source, { path: 'util.py', language: 'python' }, 'snippet', lineCounter);
    expect(result.content.split('\n')).toEqual([
      '# snippets from util.py',
      'import os',
      'from typing import List',
      '',
      'def load(path):',
      '    ...',
    ]);
  });

  it('summary lists declarations under a header', () => {
    const result = compressContent(goSource, goFile, 'summary', lineCounter);
    expect(result.content.split('\n')).toEqual([
      '// summary of auth.go (go, 20 tokens)',
      'package auth',
      'import (',
      '\t"fmt"',
      '\t"strings"',
      ')',
      'type Token struct {',
      'func Check(t Token) error { ... }',
    ]);
  });

  it('summary of an unknown language keeps both ends', () => {
    const source = Array.from({ length: 10 }, (_, i) => `line ${i + 1}`).join('\n');
    const result = compressContent(source, { path: 'notes.txt', language: 'text' }, 'summary', lineCounter);
    expect(result.content.split('\n')).toEqual([
      '# summary of notes.txt (text, 10 tokens)',
      'line 1',
      'line 2',
      'line 3',
      '# ... 4 lines omitted ...',
      'line 8',
      'line 9',
      'line 10',
    ]);
  });

  it('reports a ratio of 1 for empty input', () => {
    expect(compressContent('', goFile, 'summary', lineCounter).ratio).toBe(1);
  });
});

describe('estimateCompressionRatio', () => {
  it('returns the typical ratio per strategy', () => {
    expect(estimateCompressionRatio('none')).toBe(1);
    expect(estimateCompressionRatio('minify')).toBe(0.8);
    expect(estimateCompressionRatio('snippet')).toBe(0.4);
    expect(estimateCompressionRatio('summary')).toBe(0.3);
  });

  it('recognizes strategy names', () => {
    expect(isCompressionStrategy('snippet')).toBe(true);
    expect(isCompressionStrategy('semantic')).toBe(false);
  });
});
