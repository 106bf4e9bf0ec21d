import { loadConfig, resolveContextConfig, type ContextConfigInput } from './config.js';
import { ContextConfigError } from './errors.js';
import { renderFileEntry } from './file-store.js';
import { addFile, createContextSession, getSessionUsage, listFiles } from './session.js';
import { readPinnableFile } from './disk.js';
import { TOKENIZER_KINDS, type TokenCounter } from './tokens.js';
import type { UsageReport, UsageTier } from './usage.js';

// ANSI colors
const reset = '\x1b[0m';
const bold = '\x1b[1m';
const dim = '\x1b[2m';
const red = '\x1b[31m';
const green = '\x1b[32m';
const yellow = '\x1b[33m';
const cyan = '\x1b[36m';

const TIER_COLORS: Record<UsageTier, string> = {
  ok: green,
  warn: yellow,
  critical: red,
};

export function progressBar(ratio: number, width = 20): string {
  const filled = Math.min(width, Math.max(0, Math.round(ratio * width)));
  return `${'█'.repeat(filled)}${dim}${'░'.repeat(width - filled)}${reset}`;
}

export function formatUsage(usage: UsageReport, maxTokens: number): string {
  const color = TIER_COLORS[usage.tier];
  const percent = (usage.ratio * 100).toFixed(1);
  return `${color}${progressBar(usage.ratio)}${reset} ${color}${usage.tier.toUpperCase()}${reset} ${usage.totalTokens}/${maxTokens} tokens (${percent}%)`;
}

export function showHelp(): void {
  console.log(`
${bold}${cyan}context-budget${reset} - token-budgeted context for LLM requests

${bold}Usage:${reset}
  context-budget server                     Start MCP server (stdio)
  context-budget estimate <file...>         Token cost of pinning files
      --tokenizer=<cl100k_base|o200k_base|heuristic>
  context-budget config                     Show resolved settings
  context-budget help                       Show this help

${bold}Settings:${reset}
  ~/.context-budget/config.json, overridden by
  CONTEXT_BUDGET_MAX_TOKENS, CONTEXT_BUDGET_MAX_FILES,
  CONTEXT_BUDGET_TOKENIZER, CONTEXT_BUDGET_SYSTEM_PROMPT
`);
}

// ============================================================================
// ESTIMATE
// ============================================================================

export interface EstimateLine {
  path: string;
  tokens: number | null;
  status: 'pinned' | 'too_large' | 'unreadable';
  detail?: string;
}

export interface EstimateResult {
  lines: EstimateLine[];
  /** Paths dropped by capacity eviction while pinning in order */
  evicted: string[];
  usage: UsageReport;
  maxTokens: number;
  perFileTokenCap: number;
}

/**
 * Pin the given files into a scratch session and report what fits
 */
export function runEstimate(
  paths: string[],
  config: ContextConfigInput,
  options: { basePath?: string; counter?: TokenCounter } = {}
): EstimateResult {
  const session = createContextSession(config, { counter: options.counter });
  const lines: EstimateLine[] = [];

  for (const path of paths) {
    let file: { key: string; content: string };
    try {
      file = readPinnableFile(path, options.basePath);
    } catch (error) {
      lines.push({ path, tokens: null, status: 'unreadable', detail: error instanceof Error ? error.message : String(error) });
      continue;
    }

    const added = addFile(session, file.key, file.content);
    const pinned = listFiles(session).find(entry => entry.path === file.key);
    lines.push({
      path: file.key,
      tokens: pinned ? pinned.tokenCount : session.counter.count(renderFileEntry(file.key, file.content)),
      status: added ? 'pinned' : 'too_large',
    });
  }

  const stillPinned = new Set(listFiles(session).map(entry => entry.path));
  const evicted = lines
    .filter(line => line.status === 'pinned' && !stillPinned.has(line.path))
    .map(line => line.path);

  return {
    lines,
    evicted,
    usage: getSessionUsage(session),
    maxTokens: session.config.maxTokens,
    perFileTokenCap: session.config.perFileTokenCap,
  };
}

function printEstimate(result: EstimateResult): void {
  console.log('');
  for (const line of result.lines) {
    const tokens = line.tokens === null ? '-' : String(line.tokens);
    switch (line.status) {
      case 'pinned':
        console.log(`  ${green}[x]${reset} ${line.path} ${dim}${tokens} tokens${reset}`);
        break;
      case 'too_large':
        console.log(`  ${red}[!]${reset} ${line.path} ${dim}${tokens} tokens > cap ${result.perFileTokenCap}${reset}`);
        break;
      case 'unreadable':
        console.log(`  ${yellow}[?]${reset} ${line.path} ${dim}${line.detail ?? ''}${reset}`);
        break;
    }
  }
  if (result.evicted.length > 0) {
    console.log(`\n  ${dim}Evicted past capacity: ${result.evicted.join(', ')}${reset}`);
  }
  console.log(`\n  ${formatUsage(result.usage, result.maxTokens)}\n`);
}

function parseTokenizerFlag(args: string[]): ContextConfigInput {
  const flag = args.find(arg => arg.startsWith('--tokenizer='));
  if (!flag) return {};
  const value = flag.slice('--tokenizer='.length);
  const kind = TOKENIZER_KINDS.find(k => k === value);
  if (!kind) {
    throw new ContextConfigError([`tokenizer: unknown tokenizer '${value}'`]);
  }
  return { tokenizer: kind };
}

// ============================================================================
// ENTRY
// ============================================================================

export type CLIResult = 'server' | 'handled';

export function runCLI(args: string[]): CLIResult {
  const command = args[0];

  switch (command) {
    case 'help':
    case '--help':
    case '-h':
      showHelp();
      return 'handled';

    case 'estimate': {
      const paths = args.slice(1).filter(arg => !arg.startsWith('--'));
      if (paths.length === 0) {
        console.log(`\n  ${yellow}Usage:${reset} context-budget estimate <file...>\n`);
        return 'handled';
      }
      const config = { ...loadConfig(), ...parseTokenizerFlag(args) };
      printEstimate(runEstimate(paths, config));
      return 'handled';
    }

    case 'config':
      console.log(JSON.stringify(resolveContextConfig(loadConfig()), null, 2));
      return 'handled';

    case 'server':
      return 'server';

    case undefined:
      // Piped stdin means an MCP client launched us
      if (!process.stdin.isTTY) return 'server';
      showHelp();
      return 'handled';

    default:
      console.log(`Unknown command: ${command}`);
      console.log('Run: context-budget help');
      return 'handled';
  }
}
