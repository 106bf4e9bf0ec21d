/**
 * Pinning from disk
 *
 * Reads files and whole directories inside the working directory for
 * pinning. Every key is the normalized path relative to the base, so a file
 * reached as `./a.ts`, `a.ts` or through its directory pins once.
 */

import { existsSync, lstatSync, readdirSync, readFileSync, statSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { logger } from './logger.js';
import { LIMITS, limitLength, looksBinary, resolveFileWithin, type ResolvedFilePath } from './security.js';
import { addFile, listFiles, type ContextSession } from './session.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Same depth from src/ and dist/
const EXCLUSIONS_PATH = join(__dirname, '..', 'data', 'pin-exclusions.json');

// ============================================================================
// TYPES
// ============================================================================

export type SkipReason = 'excluded' | 'size_limit' | 'binary' | 'too_large' | 'unreadable';

export interface SkippedFile {
  path: string;
  reason: SkipReason;
}

export interface DirectoryPinResult {
  /** Keys pinned during the walk, in walk order */
  added: string[];
  skipped: SkippedFile[];
  /** Pinned during the walk, then pushed out by later files */
  evicted: string[];
  /** The walk stopped at maxFiles with files left */
  limitReached: boolean;
}

type TextRead =
  | { ok: true; content: string }
  | { ok: false; reason: 'size_limit' | 'binary' };

// ============================================================================
// EXCLUSIONS
// ============================================================================

const exclusionsSchema = z.object({
  names: z.array(z.string()),
  extensions: z.array(z.string()),
});

interface Exclusions {
  names: Set<string>;
  extensions: string[];
}

let exclusions: Exclusions | null = null;

function getExclusions(): Exclusions {
  if (!exclusions) {
    const parsed = exclusionsSchema.parse(JSON.parse(readFileSync(EXCLUSIONS_PATH, 'utf-8')));
    exclusions = {
      names: new Set(parsed.names),
      extensions: parsed.extensions.map(ext => ext.toLowerCase()),
    };
  }
  return exclusions;
}

/** Hidden and tool-generated directories are not walked */
export function isExcludedDirectory(name: string): boolean {
  return name.startsWith('.') || getExclusions().names.has(name);
}

/** Hidden files, lock and env files, media, archives and build output */
export function isExcludedFile(name: string): boolean {
  const { names, extensions } = getExclusions();
  if (name.startsWith('.') || names.has(name)) return true;
  const lower = name.toLowerCase();
  return extensions.some(ext => lower.endsWith(ext));
}

// ============================================================================
// FILES
// ============================================================================

export function outsideWorkingDirectory(path: string): Error {
  return new Error(`Path is outside the working directory: ${limitLength(path, LIMITS.LOG_PREVIEW_LENGTH)}`);
}

export function isDirectory(absolute: string): boolean {
  return existsSync(absolute) && statSync(absolute).isDirectory();
}

function readTextFile(absolute: string): TextRead {
  if (statSync(absolute).size > LIMITS.FILE_MAX_BYTES) {
    return { ok: false, reason: 'size_limit' };
  }
  const data = readFileSync(absolute);
  if (looksBinary(data)) {
    return { ok: false, reason: 'binary' };
  }
  return { ok: true, content: data.toString('utf-8') };
}

/**
 * Read a text file inside basePath for pinning
 */
export function readPinnableFile(path: string, basePath: string = process.cwd()): { key: string; content: string } {
  const resolved = resolveFileWithin(path, basePath);
  if (!resolved) {
    throw outsideWorkingDirectory(path);
  }
  if (!existsSync(resolved.absolute) || !statSync(resolved.absolute).isFile()) {
    throw new Error(`File not found: ${resolved.relative}`);
  }

  const read = readTextFile(resolved.absolute);
  if (!read.ok) {
    throw new Error(read.reason === 'binary'
      ? `Binary files cannot be pinned: ${resolved.relative}`
      : `File exceeds ${LIMITS.FILE_MAX_BYTES} bytes: ${resolved.relative}`);
  }

  return { key: resolved.relative, content: read.content };
}

// ============================================================================
// DIRECTORIES
// ============================================================================

/**
 * Pin every text file under a directory: a directory's files in name order,
 * then its subdirectories. Stops once maxFiles files are pinned. Symbolic
 * links are not followed.
 */
export function pinDirectory(
  session: ContextSession,
  directory: ResolvedFilePath,
  options: { maxFiles?: number } = {}
): DirectoryPinResult {
  const maxFiles = options.maxFiles ?? LIMITS.DIRECTORY_MAX_FILES;
  const added: string[] = [];
  const skipped: SkippedFile[] = [];
  let limitReached = false;

  function walk(absoluteDir: string, relativeDir: string): void {
    const subdirectories: string[] = [];

    for (const name of readdirSync(absoluteDir).sort()) {
      const absolute = join(absoluteDir, name);
      const key = `${relativeDir}/${name}`;
      const stat = lstatSync(absolute);

      if (stat.isDirectory()) {
        if (!isExcludedDirectory(name)) subdirectories.push(name);
        continue;
      }
      if (!stat.isFile()) continue;

      if (added.length >= maxFiles) {
        limitReached = true;
        return;
      }
      if (isExcludedFile(name)) {
        skipped.push({ path: key, reason: 'excluded' });
        continue;
      }

      let read: TextRead;
      try {
        read = readTextFile(absolute);
      } catch (error) {
        logger.debug('Skipping unreadable file', { path: key, error: String(error) });
        skipped.push({ path: key, reason: 'unreadable' });
        continue;
      }

      if (!read.ok) {
        skipped.push({ path: key, reason: read.reason });
      } else if (!addFile(session, key, read.content)) {
        skipped.push({ path: key, reason: 'too_large' });
      } else {
        added.push(key);
      }
    }

    for (const name of subdirectories) {
      if (limitReached) return;
      walk(join(absoluteDir, name), `${relativeDir}/${name}`);
    }
  }

  walk(directory.absolute, directory.relative);

  const stillPinned = new Set(listFiles(session).map(file => file.path));
  const evicted = added.filter(path => !stillPinned.has(path));

  if (limitReached) {
    logger.warn('Directory pin stopped at the file limit', { path: directory.relative, maxFiles });
  }
  logger.info('Pinned directory', {
    path: directory.relative,
    added: added.length,
    skipped: skipped.length,
    evicted: evicted.length,
  });

  return { added, skipped, evicted, limitReached };
}
