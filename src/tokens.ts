/**
 * Token counting
 *
 * Every cached token count in a session comes from one TokenCounter, so
 * counts stay comparable across the message log, the pinned files and the
 * payload builder.
 *
 * - tiktoken encodings (cl100k_base, o200k_base) via js-tiktoken
 * - a character-ratio heuristic for callers that want zero encoder cost
 * - any injected object implementing TokenCounter
 */

import { getEncoding, type Tiktoken } from 'js-tiktoken';

// ============================================================================
// TYPES
// ============================================================================

export interface TokenCounter {
  /** Name shown in stats and logs */
  readonly name: string;
  /** Token count for text; 0 for the empty string */
  count(text: string): number;
}

export type TiktokenEncodingName = 'cl100k_base' | 'o200k_base';

export type TokenizerKind = TiktokenEncodingName | 'heuristic';

export const TOKENIZER_KINDS = ['cl100k_base', 'o200k_base', 'heuristic'] as const satisfies readonly TokenizerKind[];

// ============================================================================
// HEURISTIC ESTIMATION
// ============================================================================

/**
 * Estimate token count for text
 * Uses 1 token ≈ 4 chars for English as baseline,
 * with adjustments for code and special characters
 */
export function estimateTokens(text: string): number {
  const length = text.length;
  if (length === 0) return 0;

  // Base estimate: 4 chars per token
  let estimate = Math.ceil(length / 4);

  // Short strings keep the base estimate
  if (length > 10) {
    const symbolDensity = countSymbols(text) / length;
    if (symbolDensity > 0.15) {
      // High symbol density (likely code): 3 chars per token
      estimate = Math.ceil(length / 3);
    }

    const unicodeRatio = countUnicode(text) / length;
    if (unicodeRatio > 0.1) {
      estimate = Math.ceil(estimate * (1 + unicodeRatio));
    }
  }

  // Minimum 1 token for non-empty strings
  return Math.max(1, estimate);
}

function countSymbols(text: string): number {
  const symbols = text.match(/[{}()\[\]<>;:,.!?@#$%^&*+=|\\\/~`'"]/g);
  return symbols ? symbols.length : 0;
}

function countUnicode(text: string): number {
  let count = 0;
  for (let i = 0; i < text.length; i++) {
    if (text.charCodeAt(i) > 127) count++;
  }
  return count;
}

export const heuristicCounter: TokenCounter = {
  name: 'heuristic',
  count: estimateTokens,
};

// ============================================================================
// TIKTOKEN
// ============================================================================

const encoders = new Map<TiktokenEncodingName, Tiktoken>();

function getEncoder(encoding: TiktokenEncodingName): Tiktoken {
  let encoder = encoders.get(encoding);
  if (!encoder) {
    encoder = getEncoding(encoding);
    encoders.set(encoding, encoder);
  }
  return encoder;
}

/**
 * Counter backed by a tiktoken encoding. Special-token strings that appear
 * in user text (e.g. "<|endoftext|>") are encoded as ordinary text.
 */
export function createTiktokenCounter(encoding: TiktokenEncodingName = 'cl100k_base'): TokenCounter {
  return {
    name: encoding,
    count(text: string): number {
      if (text.length === 0) return 0;
      return getEncoder(encoding).encode(text, [], []).length;
    },
  };
}

// ============================================================================
// FACTORY
// ============================================================================

export function createTokenCounter(kind: TokenizerKind): TokenCounter {
  switch (kind) {
    case 'heuristic':
      return heuristicCounter;
    case 'cl100k_base':
    case 'o200k_base':
      return createTiktokenCounter(kind);
  }
}

/**
 * Count tokens for structured data (JSON-serialized)
 */
export function countStructured(counter: TokenCounter, data: unknown): number {
  try {
    const json = JSON.stringify(data);
    return json === undefined ? 0 : counter.count(json);
  } catch {
    // Circular or BigInt values have no JSON form to send
    return 0;
  }
}
