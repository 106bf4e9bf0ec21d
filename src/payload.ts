/**
 * Payload Builder
 *
 * Merges the system prompt, pinned files and conversation log into the
 * ordered message list for one model request, never exceeding maxTokens.
 *
 * Order of the result:
 *   1. system prompt (always)
 *   2. pinned files, oldest first, within the file sub-budget
 *   3. most recent conversation turns that fit, in insertion order
 *   4. the pending user message, if it still fits
 *
 * Selection is greedy and stops at the first entry that does not fit;
 * entries are never truncated or skipped over.
 */

import { renderFileEntry, type FileContextStore } from './file-store.js';
import {
  iterateFromMostRecent,
  messageCount,
  type Message,
  type MessageLog,
  type MessageRole,
  type ToolCallRef,
} from './message-log.js';
import type { TokenCounter } from './tokens.js';

// ============================================================================
// TYPES
// ============================================================================

export interface PayloadMessage {
  role: MessageRole;
  content: string;
  /** Set on injected file entries */
  path?: string;
  toolCalls?: readonly ToolCallRef[];
  toolCallId?: string;
}

export interface BuildPayloadInput {
  systemPrompt: string;
  files: FileContextStore;
  log: MessageLog;
  maxTokens: number;
  counter: TokenCounter;
  /** Pending user message not yet recorded in the log */
  extraUser?: string;
  /** Share of maxTokens reserved for pinned files (default 0.1) */
  fileBudgetRatio?: number;
  /** Cap on conversation turns regardless of tokens */
  maxHistoryMessages?: number;
  /** Keep tool-calling assistant turns and their results together */
  preserveToolSequences?: boolean;
}

export interface PayloadReport {
  messages: PayloadMessage[];
  totalTokens: number;
  fileBudget: number;
  includedFiles: string[];
  omittedFiles: string[];
  includedMessages: number;
  omittedMessages: number;
  extraUserIncluded: boolean;
}

/** Messages selected or rejected together */
interface MessageUnit {
  messages: Message[];
  tokens: number;
  /** Tool results whose requesting turn is not in the log */
  orphan: boolean;
}

export const DEFAULT_FILE_BUDGET_RATIO = 0.1;

// ============================================================================
// UNIT GROUPING
// ============================================================================

function toUnit(messages: Message[], orphan = false): MessageUnit {
  return {
    messages,
    tokens: messages.reduce((sum, m) => sum + m.tokenCount, 0),
    orphan,
  };
}

function isToolCallingTurn(message: Message): boolean {
  return message.role === 'assistant' && (message.toolCalls?.length ?? 0) > 0;
}

/**
 * Units newest-first, each unit in insertion order. With
 * preserveToolSequences a run of tool results is held back until the turn
 * before it arrives: a tool-calling assistant turn joins the run, anything
 * else leaves it orphaned.
 */
function* unitsFromMostRecent(log: MessageLog, preserveToolSequences: boolean): Generator<MessageUnit, void, undefined> {
  let pendingResults: Message[] = [];

  for (const message of iterateFromMostRecent(log)) {
    if (!preserveToolSequences) {
      yield toUnit([message]);
      continue;
    }

    if (message.role === 'tool') {
      pendingResults.unshift(message);
      continue;
    }

    if (pendingResults.length > 0) {
      const results = pendingResults;
      pendingResults = [];
      if (isToolCallingTurn(message)) {
        yield toUnit([message, ...results]);
        continue;
      }
      yield toUnit(results, true);
    }

    yield toUnit([message]);
  }

  if (pendingResults.length > 0) {
    yield toUnit(pendingResults, true);
  }
}

function toPayloadMessage(message: Message): PayloadMessage {
  const entry: PayloadMessage = { role: message.role, content: message.content };
  if (message.toolCalls) entry.toolCalls = message.toolCalls;
  if (message.toolCallId !== undefined) entry.toolCallId = message.toolCallId;
  return entry;
}

// ============================================================================
// BUILD
// ============================================================================

export function computeFileBudget(maxTokens: number, fileBudgetRatio: number = DEFAULT_FILE_BUDGET_RATIO): number {
  return Math.floor(maxTokens * fileBudgetRatio);
}

export function buildPayload(input: BuildPayloadInput): PayloadReport {
  const {
    systemPrompt,
    files,
    log,
    maxTokens,
    counter,
    extraUser,
    fileBudgetRatio = DEFAULT_FILE_BUDGET_RATIO,
    maxHistoryMessages,
    preserveToolSequences = false,
  } = input;

  const messages: PayloadMessage[] = [{ role: 'system', content: systemPrompt }];
  let used = counter.count(systemPrompt);

  // Pinned files, oldest first, within the file sub-budget
  const fileBudget = computeFileBudget(maxTokens, fileBudgetRatio);
  const includedFiles: string[] = [];
  const omittedFiles: string[] = [];
  let fileTokens = 0;
  let filesStopped = false;

  for (const file of files.entries) {
    filesStopped = filesStopped
      || fileTokens + file.tokenCount > fileBudget
      || used + file.tokenCount > maxTokens;
    if (filesStopped) {
      omittedFiles.push(file.path);
      continue;
    }
    messages.push({ role: 'system', content: renderFileEntry(file.path, file.content), path: file.path });
    includedFiles.push(file.path);
    fileTokens += file.tokenCount;
    used += file.tokenCount;
  }

  // Conversation, newest first until something does not fit
  const selected: MessageUnit[] = [];
  let includedMessages = 0;

  for (const unit of unitsFromMostRecent(log, preserveToolSequences)) {
    if (unit.orphan) continue;
    if (maxHistoryMessages !== undefined && includedMessages + unit.messages.length > maxHistoryMessages) break;
    if (used + unit.tokens > maxTokens) break;
    selected.push(unit);
    includedMessages += unit.messages.length;
    used += unit.tokens;
  }

  for (const unit of selected.reverse()) {
    for (const message of unit.messages) {
      messages.push(toPayloadMessage(message));
    }
  }

  // Pending user message goes last, or not at all
  let extraUserIncluded = false;
  if (extraUser !== undefined) {
    const extraTokens = counter.count(extraUser);
    if (used + extraTokens <= maxTokens) {
      messages.push({ role: 'user', content: extraUser });
      used += extraTokens;
      extraUserIncluded = true;
    }
  }

  return {
    messages,
    totalTokens: used,
    fileBudget,
    includedFiles,
    omittedFiles,
    includedMessages,
    omittedMessages: messageCount(log) - includedMessages,
    extraUserIncluded,
  };
}
