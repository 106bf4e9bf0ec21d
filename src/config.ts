import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';
import { z } from 'zod';
import { ContextConfigError } from './errors.js';
import { logger } from './logger.js';
import { TOKENIZER_KINDS } from './tokens.js';

const CONFIG_DIR = join(homedir(), '.context-budget');
const CONFIG_FILE = join(CONFIG_DIR, 'config.json');

export const DEFAULT_SYSTEM_PROMPT =
  'You are a careful software engineering assistant. Files the user has pinned are included as system messages.';

export const DEFAULT_MAX_TOKENS = 128_000;

const configObject = z.object({
  systemPrompt: z.string().default(DEFAULT_SYSTEM_PROMPT),
  maxTokens: z.number().int().positive().default(DEFAULT_MAX_TOKENS),
  maxFileContexts: z.number().int().positive().default(5),
  // Defaults to maxTokens / 10 once maxTokens is known
  perFileTokenCap: z.number().int().positive().optional(),
  fileBudgetRatio: z.number().gt(0).lte(1).default(0.1),
  warnThreshold: z.number().gt(0).lt(1).default(0.8),
  criticalThreshold: z.number().gt(0).lt(1).default(0.9),
  tokenizer: z.enum(TOKENIZER_KINDS).default('cl100k_base'),
  preserveToolSequences: z.boolean().default(false),
  maxHistoryMessages: z.number().int().positive().optional(),
});

export const contextConfigSchema = configObject.refine(
  config => config.warnThreshold < config.criticalThreshold,
  { message: 'warnThreshold must be below criticalThreshold', path: ['warnThreshold'] }
);

/** Shape accepted from config.json; every field optional, no defaults applied */
const configFileSchema = configObject.partial();

export type ContextConfigInput = z.input<typeof contextConfigSchema>;

export type ResolvedContextConfig = Omit<z.output<typeof contextConfigSchema>, 'perFileTokenCap'> & {
  perFileTokenCap: number;
};

/**
 * Validate settings and fill in defaults. Throws ContextConfigError.
 */
export function resolveContextConfig(input: ContextConfigInput = {}): ResolvedContextConfig {
  const parsed = contextConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ContextConfigError(
      parsed.error.issues.map(issue => `${issue.path.join('.') || 'config'}: ${issue.message}`)
    );
  }

  const config = parsed.data;
  return {
    ...config,
    perFileTokenCap: config.perFileTokenCap ?? Math.floor(config.maxTokens / 10),
  };
}

// ============================================================================
// LOADING
// ============================================================================

function readConfigFile(path: string): ContextConfigInput {
  if (!existsSync(path)) return {};

  try {
    const raw: unknown = JSON.parse(readFileSync(path, 'utf-8'));
    const parsed = configFileSchema.safeParse(raw);
    if (!parsed.success) {
      logger.warn('Ignoring invalid config file', { path, issues: parsed.error.issues.length });
      return {};
    }
    return parsed.data;
  } catch (error) {
    logger.warn('Ignoring unreadable config file', { path, error: String(error) });
    return {};
  }
}

function numberFromEnv(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  return Number(value);
}

function readEnvOverrides(env: NodeJS.ProcessEnv): ContextConfigInput {
  const overrides: ContextConfigInput = {};

  const maxTokens = numberFromEnv(env.CONTEXT_BUDGET_MAX_TOKENS);
  if (maxTokens !== undefined) overrides.maxTokens = maxTokens;

  const maxFiles = numberFromEnv(env.CONTEXT_BUDGET_MAX_FILES);
  if (maxFiles !== undefined) overrides.maxFileContexts = maxFiles;

  const tokenizer = env.CONTEXT_BUDGET_TOKENIZER;
  const kind = TOKENIZER_KINDS.find(k => k === tokenizer);
  if (kind) {
    overrides.tokenizer = kind;
  } else if (tokenizer) {
    logger.warn('Unknown tokenizer in CONTEXT_BUDGET_TOKENIZER, using config value', { tokenizer });
  }

  if (env.CONTEXT_BUDGET_SYSTEM_PROMPT) {
    overrides.systemPrompt = env.CONTEXT_BUDGET_SYSTEM_PROMPT;
  }

  return overrides;
}

/**
 * Settings from ~/.context-budget/config.json with environment overrides.
 * Values are validated when a session is created.
 */
export function loadConfig(options: { configPath?: string; env?: NodeJS.ProcessEnv } = {}): ContextConfigInput {
  const { configPath = CONFIG_FILE, env = process.env } = options;
  return {
    ...readConfigFile(configPath),
    ...readEnvOverrides(env),
  };
}
