/**
 * Context Session
 *
 * One conversation's context state: the message log, the pinned files, the
 * resolved settings and the counter every cached count came from. Created
 * once per session and passed to every operation.
 *
 * Every operation here is synchronous, so on the event loop each mutation,
 * build and usage read completes before another can start. Keep them that
 * way: an await inside one would let a file watcher mutate state halfway
 * through a build.
 */

import { resolveContextConfig, type ContextConfigInput, type ResolvedContextConfig } from './config.js';
import { ContextConfigError } from './errors.js';
import {
  addFileContext,
  createFileContextStore,
  entriesOldestFirst,
  fileStoreTotalTokens,
  hasFileContext,
  removeFileContext,
  renderFileEntry,
  type FileContextStore,
} from './file-store.js';
import { logger } from './logger.js';
import {
  appendMessage as appendToLog,
  countMessageTokens,
  createMessageLog,
  isValidToolCall,
  messageCount,
  messageLogTotalTokens,
  type Message,
  type MessageLink,
  type MessageLog,
  type MessageRole,
} from './message-log.js';
import { buildPayload, computeFileBudget, type PayloadMessage, type PayloadReport } from './payload.js';
import { createTokenCounter, type TokenCounter } from './tokens.js';
import { getUsage, type UsageReport } from './usage.js';

// ============================================================================
// TYPES
// ============================================================================

export interface ContextSession {
  readonly config: ResolvedContextConfig;
  readonly counter: TokenCounter;
  /** Cost of config.systemPrompt under counter */
  readonly systemPromptTokens: number;
  readonly log: MessageLog;
  readonly files: FileContextStore;
  readonly createdAt: number;
}

export interface PinnedFileSummary {
  path: string;
  tokenCount: number;
}

export interface SessionStats {
  tokenizer: string;
  messageCount: number;
  messageTokens: number;
  fileCount: number;
  fileTokens: number;
  systemPromptTokens: number;
  maxTokens: number;
  fileBudget: number;
  /** maxTokens minus everything held, floored at 0 */
  remainingTokens: number;
  sessionAge: number;
}

export interface SessionValidation {
  valid: boolean;
  problems: string[];
}

// ============================================================================
// LIFECYCLE
// ============================================================================

/**
 * Create a session. Throws ContextConfigError for unusable settings,
 * including a system prompt that alone exceeds maxTokens.
 */
export function createContextSession(
  input: ContextConfigInput = {},
  options: { counter?: TokenCounter } = {}
): ContextSession {
  const config = resolveContextConfig(input);
  const counter = options.counter ?? createTokenCounter(config.tokenizer);

  const systemPromptTokens = counter.count(config.systemPrompt);
  if (systemPromptTokens > config.maxTokens) {
    throw new ContextConfigError([
      `systemPrompt: costs ${systemPromptTokens} tokens, above maxTokens ${config.maxTokens}`,
    ]);
  }

  logger.debug('Context session created', {
    tokenizer: counter.name,
    maxTokens: config.maxTokens,
    maxFileContexts: config.maxFileContexts,
    perFileTokenCap: config.perFileTokenCap,
  });

  return {
    config,
    counter,
    systemPromptTokens,
    log: createMessageLog(),
    files: createFileContextStore(config.maxFileContexts, config.perFileTokenCap),
    createdAt: Date.now(),
  };
}

// ============================================================================
// MUTATIONS
// ============================================================================

/**
 * Record a turn. Tool calls missing an id or name, or whose arguments are
 * not JSON, are dropped with a warning.
 */
export function appendMessage(
  session: ContextSession,
  role: MessageRole,
  content: string,
  link: MessageLink = {}
): Message {
  if (!link.toolCalls) {
    return appendToLog(session.log, session.counter, role, content, link);
  }

  const toolCalls = link.toolCalls.filter(call => {
    const valid = isValidToolCall(call);
    if (!valid) {
      logger.warn('Dropping malformed tool call', { id: call.id, name: call.name });
    }
    return valid;
  });
  return appendToLog(session.log, session.counter, role, content, { ...link, toolCalls });
}

/**
 * Pin a file. Returns false when the file is over the per-file cap.
 */
export function addFile(session: ContextSession, path: string, content: string): boolean {
  const result = addFileContext(session.files, session.counter, path, content);

  if (!result.added) {
    logger.warn('File too large to pin', {
      path,
      tokens: result.tokenCount,
      cap: session.files.perFileTokenCap,
    });
    return false;
  }

  if (result.evicted.length > 0) {
    logger.debug('Evicted pinned files', { evicted: result.evicted, pinned: path });
  }
  return true;
}

export function removeFile(session: ContextSession, path: string): boolean {
  return removeFileContext(session.files, path);
}

// ============================================================================
// READS
// ============================================================================

export function buildSessionPayloadReport(session: ContextSession, extraUser?: string): PayloadReport {
  const { config } = session;
  const report = buildPayload({
    systemPrompt: config.systemPrompt,
    files: session.files,
    log: session.log,
    maxTokens: config.maxTokens,
    counter: session.counter,
    extraUser,
    fileBudgetRatio: config.fileBudgetRatio,
    maxHistoryMessages: config.maxHistoryMessages,
    preserveToolSequences: config.preserveToolSequences,
  });

  if (report.omittedFiles.length > 0 || report.omittedMessages > 0 || (extraUser !== undefined && !report.extraUserIncluded)) {
    logger.debug('Payload trimmed to budget', {
      totalTokens: report.totalTokens,
      omittedFiles: report.omittedFiles.length,
      omittedMessages: report.omittedMessages,
      extraUserIncluded: report.extraUserIncluded,
    });
  }

  return report;
}

/**
 * Ordered messages for the next model request
 */
export function buildSessionPayload(session: ContextSession, extraUser?: string): PayloadMessage[] {
  return buildSessionPayloadReport(session, extraUser).messages;
}

export function getSessionUsage(session: ContextSession): UsageReport {
  return getUsage({
    files: session.files,
    log: session.log,
    maxTokens: session.config.maxTokens,
    warnThreshold: session.config.warnThreshold,
    criticalThreshold: session.config.criticalThreshold,
  });
}

export function listFiles(session: ContextSession): PinnedFileSummary[] {
  return entriesOldestFirst(session.files).map(entry => ({ path: entry.path, tokenCount: entry.tokenCount }));
}

export function hasFile(session: ContextSession, path: string): boolean {
  return hasFileContext(session.files, path);
}

export function getSessionStats(session: ContextSession): SessionStats {
  const messageTokens = messageLogTotalTokens(session.log);
  const fileTokens = fileStoreTotalTokens(session.files);
  const held = session.systemPromptTokens + messageTokens + fileTokens;

  return {
    tokenizer: session.counter.name,
    messageCount: messageCount(session.log),
    messageTokens,
    fileCount: session.files.entries.length,
    fileTokens,
    systemPromptTokens: session.systemPromptTokens,
    maxTokens: session.config.maxTokens,
    fileBudget: computeFileBudget(session.config.maxTokens, session.config.fileBudgetRatio),
    remainingTokens: Math.max(0, session.config.maxTokens - held),
    sessionAge: Date.now() - session.createdAt,
  };
}

/**
 * Recount every cached token count and check the store invariants
 */
export function validateSession(session: ContextSession): SessionValidation {
  const problems: string[] = [];
  const { counter, files, log } = session;

  const seen = new Set<string>();
  for (const entry of files.entries) {
    if (seen.has(entry.path)) problems.push(`duplicate pinned path: ${entry.path}`);
    seen.add(entry.path);

    const expected = counter.count(renderFileEntry(entry.path, entry.content));
    if (expected !== entry.tokenCount) {
      problems.push(`stale token count for ${entry.path}: cached ${entry.tokenCount}, expected ${expected}`);
    }
  }

  if (files.entries.length > files.maxEntries) {
    problems.push(`pinned files over capacity: ${files.entries.length}/${files.maxEntries}`);
  }

  let total = 0;
  log.messages.forEach((message, index) => {
    const expected = countMessageTokens(counter, message.content, message);
    if (expected !== message.tokenCount) {
      problems.push(`stale token count for message ${index}: cached ${message.tokenCount}, expected ${expected}`);
    }
    total += message.tokenCount;
  });

  if (total !== log.totalTokens) {
    problems.push(`message total drifted: running ${log.totalTokens}, summed ${total}`);
  }

  return { valid: problems.length === 0, problems };
}
