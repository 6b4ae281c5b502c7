/**
 * Token counting for segment sizing.
 *
 * @module services/chunking/token-counter
 */

import { encode, decode } from 'gpt-tokenizer';

export interface TokenCounter {
  readonly name: string;
  count(text: string): number;
  /** Longest prefix of text that is at most maxTokens tokens */
  truncate(text: string, maxTokens: number): string;
}

/**
 * BPE token counts (gpt-tokenizer). Used in production.
 */
export class GptTokenCounter implements TokenCounter {
  readonly name = 'gpt-tokenizer';

  count(text: string): number {
    if (text.length === 0) return 0;
    return encode(text).length;
  }

  truncate(text: string, maxTokens: number): string {
    const tokens = encode(text);
    if (tokens.length <= maxTokens) return text;
    return decode(tokens.slice(0, Math.max(0, maxTokens)));
  }
}

const WORD = /\S+/g;

/**
 * Counts whitespace-separated words. Additive over any split made at
 * whitespace, which makes segment sizes exact and predictable.
 */
export class WhitespaceTokenCounter implements TokenCounter {
  readonly name = 'whitespace';

  count(text: string): number {
    return text.match(WORD)?.length ?? 0;
  }

  truncate(text: string, maxTokens: number): string {
    if (maxTokens <= 0) return '';
    let seen = 0;
    for (const match of text.matchAll(WORD)) {
      seen++;
      if (seen === maxTokens) {
        return text.slice(0, (match.index ?? 0) + match[0].length);
      }
    }
    return text;
  }
}

export type TokenCounterKind = 'gpt' | 'whitespace';

export function createTokenCounter(kind: TokenCounterKind): TokenCounter {
  return kind === 'gpt' ? new GptTokenCounter() : new WhitespaceTokenCounter();
}
