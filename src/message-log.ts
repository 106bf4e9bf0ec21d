/**
 * Message Log
 *
 * Append-only record of conversation turns. The log is the record of what
 * happened; what the model is told on a given request is decided later by
 * the payload builder, which filters but never removes.
 */

import { countStructured, type TokenCounter } from './tokens.js';

// ============================================================================
// TYPES
// ============================================================================

export type MessageRole = 'system' | 'user' | 'assistant' | 'tool';

export const MESSAGE_ROLES = ['system', 'user', 'assistant', 'tool'] as const satisfies readonly MessageRole[];

/** A tool invocation requested by an assistant turn */
export interface ToolCallRef {
  id: string;
  name: string;
  /** Raw JSON arguments as sent by the model */
  arguments: string;
}

/** Tool-call linkage carried by assistant and tool turns */
export interface MessageLink {
  toolCalls?: readonly ToolCallRef[];
  toolCallId?: string;
}

export interface Message {
  readonly role: MessageRole;
  readonly content: string;
  readonly tokenCount: number;
  readonly toolCalls?: readonly ToolCallRef[];
  readonly toolCallId?: string;
}

export interface MessageLog {
  messages: Message[];
  /** Running sum of every tokenCount in messages */
  totalTokens: number;
}

// ============================================================================
// OPERATIONS
// ============================================================================

export function createMessageLog(): MessageLog {
  return { messages: [], totalTokens: 0 };
}

/**
 * A call needs an id, a name and arguments that are empty or parse as JSON
 */
export function isValidToolCall(call: ToolCallRef): boolean {
  if (!call.id || !call.name) return false;
  if (!call.arguments) return true;
  try {
    JSON.parse(call.arguments);
    return true;
  } catch {
    return false;
  }
}

/**
 * Token cost of a turn: its content plus any tool calls it carries
 */
export function countMessageTokens(counter: TokenCounter, content: string, link: MessageLink = {}): number {
  let tokens = counter.count(content);
  if (link.toolCalls && link.toolCalls.length > 0) {
    tokens += countStructured(counter, link.toolCalls);
  }
  return tokens;
}

/**
 * Record a conversation turn. Never fails; the log has no capacity bound.
 */
export function appendMessage(
  log: MessageLog,
  counter: TokenCounter,
  role: MessageRole,
  content: string,
  link: MessageLink = {}
): Message {
  const message: Message = Object.freeze({
    role,
    content,
    tokenCount: countMessageTokens(counter, content, link),
    ...(link.toolCalls && link.toolCalls.length > 0
      ? { toolCalls: Object.freeze(link.toolCalls.map(call => Object.freeze({ ...call }))) }
      : {}),
    ...(link.toolCallId !== undefined ? { toolCallId: link.toolCallId } : {}),
  });

  log.messages.push(message);
  log.totalTokens += message.tokenCount;
  return message;
}

export function messageLogTotalTokens(log: MessageLog): number {
  return log.totalTokens;
}

export function messageCount(log: MessageLog): number {
  return log.messages.length;
}

/**
 * Messages newest-first. Each call starts a fresh iteration.
 */
export function* iterateFromMostRecent(log: MessageLog): Generator<Message, void, undefined> {
  for (let i = log.messages.length - 1; i >= 0; i--) {
    yield log.messages[i];
  }
}

