/**
 * Usage Monitor
 *
 * Early-warning signal over everything held in context. totalTokens is the
 * unbounded sum of the log and the pinned files, so it can exceed what any
 * single payload would carry.
 */

import { fileStoreTotalTokens, type FileContextStore } from './file-store.js';
import { messageLogTotalTokens, type MessageLog } from './message-log.js';

export type UsageTier = 'ok' | 'warn' | 'critical';

export interface UsageReport {
  totalTokens: number;
  /** totalTokens / maxTokens, may exceed 1 */
  ratio: number;
  tier: UsageTier;
}

export interface UsageInput {
  files: FileContextStore;
  log: MessageLog;
  maxTokens: number;
  warnThreshold: number;
  criticalThreshold: number;
}

export function classifyUsage(ratio: number, warnThreshold: number, criticalThreshold: number): UsageTier {
  if (ratio > criticalThreshold) return 'critical';
  if (ratio > warnThreshold) return 'warn';
  return 'ok';
}

export function getUsage(input: UsageInput): UsageReport {
  const totalTokens = messageLogTotalTokens(input.log) + fileStoreTotalTokens(input.files);
  const ratio = totalTokens / input.maxTokens;
  return {
    totalTokens,
    ratio,
    tier: classifyUsage(ratio, input.warnThreshold, input.criticalThreshold),
  };
}
