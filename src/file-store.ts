/**
 * File Context Store
 *
 * Pinned file contents, keyed by path. Bounded by maxEntries with FIFO
 * eviction from the least-recent end; re-pinning a path replaces it and
 * moves it to the most-recent end.
 */

import type { TokenCounter } from './tokens.js';

// ============================================================================
// TYPES
// ============================================================================

export interface FileContext {
  readonly path: string;
  readonly content: string;
  /** Tokens of the rendered entry (label + content) */
  readonly tokenCount: number;
}

export interface FileContextStore {
  /** Oldest first */
  entries: FileContext[];
  maxEntries: number;
  perFileTokenCap: number;
}

export type AddFileResult =
  | { added: true; tokenCount: number; replaced: boolean; evicted: string[] }
  | { added: false; tokenCount: number; reason: 'too_large' };

// ============================================================================
// RENDERING
// ============================================================================

export function fileEntryLabel(path: string): string {
  return `User added file '${path}'`;
}

/**
 * Text a pinned file contributes to a payload
 */
export function renderFileEntry(path: string, content: string): string {
  return `${fileEntryLabel(path)}. Content:\n\n${content}`;
}

// ============================================================================
// OPERATIONS
// ============================================================================

export function createFileContextStore(maxEntries: number, perFileTokenCap: number): FileContextStore {
  return { entries: [], maxEntries, perFileTokenCap };
}

/**
 * Pin a file. Oversized files are rejected without touching the store.
 */
export function addFileContext(
  store: FileContextStore,
  counter: TokenCounter,
  path: string,
  content: string
): AddFileResult {
  const tokenCount = counter.count(renderFileEntry(path, content));
  if (tokenCount > store.perFileTokenCap) {
    return { added: false, tokenCount, reason: 'too_large' };
  }

  const existing = store.entries.findIndex(entry => entry.path === path);
  const replaced = existing !== -1;
  if (replaced) {
    store.entries.splice(existing, 1);
  }

  store.entries.push(Object.freeze({ path, content, tokenCount }));

  const evicted: string[] = [];
  while (store.entries.length > store.maxEntries) {
    const oldest = store.entries.shift();
    if (!oldest) break;
    evicted.push(oldest.path);
  }

  return { added: true, tokenCount, replaced, evicted };
}

/**
 * Unpin a file
 */
export function removeFileContext(store: FileContextStore, path: string): boolean {
  const index = store.entries.findIndex(entry => entry.path === path);
  if (index === -1) return false;
  store.entries.splice(index, 1);
  return true;
}

export function entriesOldestFirst(store: FileContextStore): readonly FileContext[] {
  return [...store.entries];
}

export function fileStoreTotalTokens(store: FileContextStore): number {
  return store.entries.reduce((sum, entry) => sum + entry.tokenCount, 0);
}

export function hasFileContext(store: FileContextStore, path: string): boolean {
  return store.entries.some(entry => entry.path === path);
}

export function getFileContext(store: FileContextStore, path: string): FileContext | null {
  return store.entries.find(entry => entry.path === path) ?? null;
}
