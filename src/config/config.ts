/**
 * Offer Desk — Configuration Management
 *
 * Reads configuration from environment variables and validates it.
 * Missing credentials are reported together so the operator can fix
 * them in one pass; nothing falls back to a silent default.
 *
 * @module config
 */

import {
  type AppConfig,
  AppConfigSchema,
  type Result,
  type StorageConfig,
  StorageConfigSchema,
  err,
  ok,
} from '../types/index.js';
import { ConfigError } from '../kernel/errors.js';

type Env = Record<string, string | undefined>;

// ═══════════════════════════════════════════════════════════════════════════
// ENVIRONMENT HELPERS
// ═══════════════════════════════════════════════════════════════════════════

/**
 * First non-blank value among the given variable names.
 */
function readEnv(env: Env, ...names: string[]): string | undefined {
  for (const name of names) {
    const value = env[name]?.trim();
    if (value) return value;
  }
  return undefined;
}

const REQUIRED_VARIABLES: ReadonlyArray<{ name: string; aliases: string[] }> = [
  { name: 'BOT_TOKEN', aliases: ['TELEGRAM_BOT_TOKEN'] },
  { name: 'OPENAI_API_KEY', aliases: [] },
];

function describeIssues(error: { issues: Array<{ path: Array<string | number>; message: string }> }): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`)
    .join('; ');
}

function storageFields(env: Env): Record<string, unknown> {
  return {
    dbPath: readEnv(env, 'DB_PATH'),
    logLevel: readEnv(env, 'LOG_LEVEL')?.toLowerCase(),
  };
}

// ═══════════════════════════════════════════════════════════════════════════
// CONFIGURATION LOADING
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Storage and logging settings only. Enough for the read-only CLI commands,
 * which never talk to Telegram or the interpreter.
 */
export function loadStorageConfig(env: Env = process.env): Result<StorageConfig, ConfigError> {
  const result = StorageConfigSchema.safeParse(storageFields(env));
  if (!result.success) {
    return err(new ConfigError(`Invalid configuration: ${describeIssues(result.error)}`));
  }
  return ok(result.data);
}

/**
 * Full bot configuration. BOT_TOKEN and OPENAI_API_KEY are required.
 */
export function loadConfig(env: Env = process.env): Result<AppConfig, ConfigError> {
  const missing = REQUIRED_VARIABLES
    .filter(({ name, aliases }) => readEnv(env, name, ...aliases) === undefined)
    .map(({ name }) => name);

  if (missing.length > 0) {
    return err(new ConfigError(
      `Missing required environment variables: ${missing.join(', ')}`,
      missing,
    ));
  }

  const result = AppConfigSchema.safeParse({
    ...storageFields(env),
    botToken: readEnv(env, 'BOT_TOKEN', 'TELEGRAM_BOT_TOKEN'),
    openaiApiKey: readEnv(env, 'OPENAI_API_KEY'),
    openaiModel: readEnv(env, 'OPENAI_MODEL'),
    interpreterTimeoutMs: readEnv(env, 'INTERPRETER_TIMEOUT_MS'),
    rateLimit: {
      perChat: readEnv(env, 'RATE_LIMIT_PER_CHAT'),
      global: readEnv(env, 'RATE_LIMIT_GLOBAL'),
    },
  });

  if (!result.success) {
    return err(new ConfigError(`Invalid configuration: ${describeIssues(result.error)}`));
  }
  return ok(result.data);
}
