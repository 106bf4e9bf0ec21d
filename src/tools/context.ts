/**
 * MCP tools over a context session
 */
import { z } from 'zod';
import {
  isDirectory,
  outsideWorkingDirectory,
  pinDirectory,
  readPinnableFile,
  type DirectoryPinResult,
} from '../disk.js';
import { MESSAGE_ROLES, messageCount } from '../message-log.js';
import type { PayloadReport } from '../payload.js';
import { LIMITS, resolveFileWithin } from '../security.js';
import {
  addFile,
  appendMessage,
  buildSessionPayloadReport,
  getSessionStats,
  getSessionUsage,
  listFiles,
  removeFile,
  type ContextSession,
  type PinnedFileSummary,
  type SessionStats,
} from '../session.js';
import type { UsageReport } from '../usage.js';
import { logger } from '../logger.js';

// ============================================================================
// APPEND MESSAGE
// ============================================================================

export const appendMessageSchema = z.object({
  role: z.enum(MESSAGE_ROLES).describe('Who produced the turn: user, assistant, tool or system'),
  content: z.string().describe('Text of the turn'),
  toolCalls: z.array(z.object({
    id: z.string(),
    name: z.string(),
    arguments: z.string().describe('JSON arguments as sent by the model'),
  })).optional().describe('Tool calls requested by an assistant turn'),
  toolCallId: z.string().optional().describe('For tool turns: the id of the call being answered'),
});

export type AppendMessageInput = z.infer<typeof appendMessageSchema>;

export interface AppendMessageResult {
  tokenCount: number;
  messageCount: number;
  usage: UsageReport;
}

export function appendMessageTool(session: ContextSession, input: AppendMessageInput): AppendMessageResult {
  const message = appendMessage(session, input.role, input.content, {
    toolCalls: input.toolCalls,
    toolCallId: input.toolCallId,
  });

  return {
    tokenCount: message.tokenCount,
    messageCount: messageCount(session.log),
    usage: getSessionUsage(session),
  };
}

// ============================================================================
// ADD FILE
// ============================================================================

export const addFileSchema = z.object({
  path: z.string().describe('File or directory path, relative to the server working directory'),
  content: z.string().optional().describe('File text; read from disk when omitted'),
  maxFiles: z.number().int().positive().optional()
    .describe(`Directories: stop after pinning this many files (default ${LIMITS.DIRECTORY_MAX_FILES})`),
});

export type AddFileInput = z.infer<typeof addFileSchema>;

export interface AddFileToolResult {
  added: boolean;
  /** Normalized key the file or directory was pinned under */
  path: string;
  reason?: 'too_large';
  directory?: DirectoryPinResult;
  pinned: PinnedFileSummary[];
  usage: UsageReport;
}

/**
 * Pin supplied content, a file read from disk, or every text file under a
 * directory. Paths outside basePath are refused.
 */
export function addFileTool(
  session: ContextSession,
  input: AddFileInput,
  basePath: string = process.cwd()
): AddFileToolResult {
  const resolved = resolveFileWithin(input.path, basePath);
  if (!resolved) {
    throw outsideWorkingDirectory(input.path);
  }

  if (input.content === undefined && isDirectory(resolved.absolute)) {
    const directory = pinDirectory(session, resolved, { maxFiles: input.maxFiles });
    return {
      added: directory.added.length > 0,
      path: resolved.relative,
      directory,
      pinned: listFiles(session),
      usage: getSessionUsage(session),
    };
  }

  const content = input.content ?? readPinnableFile(input.path, basePath).content;
  const added = addFile(session, resolved.relative, content);

  return {
    added,
    path: resolved.relative,
    ...(added ? {} : { reason: 'too_large' as const }),
    pinned: listFiles(session),
    usage: getSessionUsage(session),
  };
}

// ============================================================================
// REMOVE / LIST FILES
// ============================================================================

export const removeFileSchema = z.object({
  path: z.string().describe('Pinned path to remove, exactly as listed'),
});

export type RemoveFileInput = z.infer<typeof removeFileSchema>;

export function removeFileTool(
  session: ContextSession,
  input: RemoveFileInput
): { removed: boolean; pinned: PinnedFileSummary[] } {
  const removed = removeFile(session, input.path);
  if (!removed) {
    logger.debug('Remove requested for unpinned path', { path: input.path });
  }
  return { removed, pinned: listFiles(session) };
}

export const listFilesSchema = z.object({});

export function listFilesTool(session: ContextSession): { pinned: PinnedFileSummary[] } {
  return { pinned: listFiles(session) };
}

// ============================================================================
// BUILD PAYLOAD / USAGE / STATS
// ============================================================================

export const buildPayloadSchema = z.object({
  extraUser: z.string().optional().describe('Pending user message to append last if it fits'),
});

export type BuildPayloadToolInput = z.infer<typeof buildPayloadSchema>;

export function buildPayloadTool(session: ContextSession, input: BuildPayloadToolInput): PayloadReport {
  return buildSessionPayloadReport(session, input.extraUser);
}

export const usageSchema = z.object({});

export function usageTool(session: ContextSession): UsageReport {
  return getSessionUsage(session);
}

export const statsSchema = z.object({});

export function statsTool(session: ContextSession): SessionStats {
  return getSessionStats(session);
}
