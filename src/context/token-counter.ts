/**
 * Token Counting
 *
 * Estimates how many model tokens a text blob will consume. Counters are
 * pure: the same text always yields the same count, so callers may cache
 * results by content hash.
 */

export interface TokenCounter {
  readonly name: string;
  /** Non-negative integer estimate for the text */
  count(text: string): number;
}

const CHARS_PER_TOKEN = 3.5;

/**
 * Character ratio estimate: ~3.5 characters per token for code.
 */
export class CharRatioTokenCounter implements TokenCounter {
  readonly name = 'char-ratio';

  count(text: string): number {
    if (!text) return 0;
    return Math.ceil(text.length / CHARS_PER_TOKEN);
  }
}

/**
 * Per-language multipliers applied on top of the lexical estimate.
 */
export const LANGUAGE_TOKEN_MULTIPLIERS: Readonly<Record<string, number>> = {
  go: 1.3,
  javascript: 1.2,
  typescript: 1.2,
  python: 1.1,
  java: 1.4,
  'c++': 1.3,
  rust: 1.2,
  markdown: 0.8,
  yaml: 0.9,
  json: 1.0,
};

const LEXICAL_FACTOR = 1.2;
const SYMBOL_CHARS = new Set('{}[]()+-*/=<>!&|^~%#@$');

/**
 * Lexical estimate: words, punctuation and operator symbols, scaled by 1.2.
 * Symbols that are also Unicode punctuation count twice, mirroring how
 * tokenizers tend to split dense operator runs.
 */
export class LexicalTokenCounter implements TokenCounter {
  readonly name = 'lexical';
  private readonly multiplier: number;

  constructor(language?: string) {
    this.multiplier = language ? LANGUAGE_TOKEN_MULTIPLIERS[language] ?? 1.0 : 1.0;
  }

  count(text: string): number {
    if (!text) return 0;

    const words = text.split(/\s+/).filter((w) => w.length > 0).length;
    let punctuation = 0;
    let symbols = 0;
    for (const ch of text) {
      if (/\p{P}/u.test(ch)) punctuation++;
      if (SYMBOL_CHARS.has(ch)) symbols++;
    }

    const base = Math.ceil((words + punctuation + symbols) * LEXICAL_FACTOR);
    return Math.ceil(base * this.multiplier);
  }

  /**
   * Counter for a specific language, sharing this counter's rules.
   */
  forLanguage(language: string): LexicalTokenCounter {
    return new LexicalTokenCounter(language);
  }
}

export const defaultTokenCounter: TokenCounter = new CharRatioTokenCounter();

/**
 * Estimate token count for text with the default counter.
 */
export function estimateTokens(text: string): number {
  return defaultTokenCounter.count(text);
}

/**
 * Truncate text to fit within a token budget.
 *
 * Cuts at a line boundary when one exists in the second half of the kept
 * text, then appends the suffix.
 */
export function truncateToTokenBudget(
  text: string,
  maxTokens: number,
  suffix: string = '\n... (truncated)',
  counter: TokenCounter = defaultTokenCounter
): string {
  if (counter.count(text) <= maxTokens) {
    return text;
  }

  const targetChars = Math.floor(maxTokens * CHARS_PER_TOKEN) - suffix.length;
  if (targetChars <= 0) {
    return suffix;
  }

  let truncated = text.substring(0, targetChars);
  const lastNewline = truncated.lastIndexOf('\n');
  if (lastNewline > targetChars * 0.5) {
    truncated = truncated.substring(0, lastNewline);
  }

  return truncated + suffix;
}
