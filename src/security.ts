import { resolve, normalize, relative, isAbsolute } from 'path';

/**
 * Remove dangerous characters from paths:
 * - Null bytes (can truncate paths in C-based systems)
 * - Unicode control characters (can manipulate display)
 * - URL-encoded sequences
 */
function stripDangerousChars(input: string): string {
  return input
    .replace(/[\u0000-\u001F\u007F-\u009F\u200B-\u200F\u2028-\u202F\uFEFF]/g, '')
    .replace(/%00/gi, '')
    .replace(/%2e%2e/gi, '..')
    .replace(/%2f/gi, '/');
}

export interface ResolvedFilePath {
  /** Absolute path to read */
  absolute: string;
  /** Path relative to the base, used as the pinned-file key */
  relative: string;
}

/**
 * Resolve a file path inside basePath. Returns null when the path is empty,
 * too long, or escapes the base directory.
 */
export function resolveFileWithin(inputPath: string, basePath: string = process.cwd()): ResolvedFilePath | null {
  const cleaned = stripDangerousChars(inputPath).trim();
  if (!cleaned || cleaned.length > LIMITS.PATH_MAX_LENGTH) {
    return null;
  }

  const absolute = resolve(basePath, normalize(cleaned));
  const rel = relative(basePath, absolute);
  if (!rel || rel.startsWith('..') || isAbsolute(rel)) {
    return null;
  }

  return { absolute, relative: rel.split('\\').join('/') };
}

/**
 * Binary files have a NUL byte near the start
 */
export function looksBinary(data: Uint8Array): boolean {
  const peek = Math.min(data.length, LIMITS.BINARY_PEEK_BYTES);
  for (let i = 0; i < peek; i++) {
    if (data[i] === 0) return true;
  }
  return false;
}

/**
 * Limit string length for logging
 */
export function limitLength(input: string, maxLength: number): string {
  if (input.length <= maxLength) {
    return input;
  }
  return input.slice(0, maxLength) + '... [truncated]';
}

export const LIMITS = {
  FILE_MAX_BYTES: 5_000_000,
  BINARY_PEEK_BYTES: 1024,
  DIRECTORY_MAX_FILES: 1000,
  PATH_MAX_LENGTH: 1000,
  LOG_PREVIEW_LENGTH: 80,
} as const;
