import type { TokenCounter } from '../tokens.js';

/**
 * One token per whitespace-separated word, so expected counts can be read
 * straight off the test text.
 */
export const wordCounter: TokenCounter = {
  name: 'words',
  count(text: string): number {
    return text.split(/\s+/).filter(word => word.length > 0).length;
  },
};

/** n space-separated words */
export function words(n: number, word = 'w'): string {
  return Array(n).fill(word).join(' ');
}
