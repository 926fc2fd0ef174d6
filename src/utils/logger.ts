/**
 * Offer Desk — Logging Utilities
 *
 * Structured logging using Pino with redaction helpers for
 * configuration dumps and consistent error formatting.
 *
 * @module utils/logger
 */

import pino from 'pino';
import { LogLevelSchema, type LogLevel } from '../types/index.js';

// ═══════════════════════════════════════════════════════════════════════════
// LOGGER FACTORY
// ═══════════════════════════════════════════════════════════════════════════

function initialLevel(): LogLevel {
  const parsed = LogLevelSchema.safeParse(process.env.LOG_LEVEL?.trim().toLowerCase());
  return parsed.success ? parsed.data : 'info';
}

let currentLevel: LogLevel = initialLevel();
const loggers = new Set<pino.Logger>();

export function createLogger(name: string, options?: { level?: LogLevel }): pino.Logger {
  const instance = pino({
    name,
    level: options?.level ?? currentLevel,
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label: string) => ({ level: label }),
    },
  });

  if (!options?.level) {
    loggers.add(instance);
  }
  return instance;
}

/**
 * Applies the configured verbosity to every logger that did not pin its own level.
 */
export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
  for (const instance of loggers) {
    instance.level = level;
  }
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

// ═══════════════════════════════════════════════════════════════════════════
// UTILITIES
// ═══════════════════════════════════════════════════════════════════════════

const SENSITIVE_FIELDS = ['token', 'key', 'secret', 'password', 'credential'];

export function redact(obj: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(obj)) {
    const lowerKey = key.toLowerCase();
    if (SENSITIVE_FIELDS.some((field) => lowerKey.includes(field))) {
      result[key] = '[REDACTED]';
    } else if (typeof value === 'object' && value !== null && !Array.isArray(value)) {
      result[key] = redact(Object.fromEntries(Object.entries(value)));
    } else {
      result[key] = value;
    }
  }

  return result;
}

export function formatError(error: unknown): {
  message: string;
  stack?: string;
  code?: string;
  name?: string;
} {
  if (error instanceof Error) {
    const result: { message: string; stack?: string; code?: string; name?: string } = {
      message: error.message,
      name: error.name,
    };
    if (error.stack !== undefined) {
      result.stack = error.stack;
    }
    if ('code' in error && typeof error.code === 'string') {
      result.code = error.code;
    }
    return result;
  }

  return { message: String(error) };
}
