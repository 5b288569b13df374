/**
 * Logger Module - Category Logging with Pino
 *
 * Features:
 * - Structured logging powered by Pino
 * - Pretty-printing outside production with pino-pretty
 * - JSON output in production for log aggregation
 * - Hierarchical category loggers with independent levels
 * - Auto-initialization from environment variables on module load
 *
 * Categories: Dot-separated hierarchies (e.g., "api.orders", "core.orders")
 * Usage: createCategoryLogger(category, bindings?)
 *
 * Environment Variable Support:
 *   - LOG_LEVEL sets the global default (default: error)
 *   - LOG_{CATEGORY} sets a per-category level (e.g., LOG_API_ORDERS=debug)
 *   - Most-specific match wins: LOG_API_ORDERS > LOG_API > LOG_LEVEL
 */

import dotenv from 'dotenv';
import { pino } from 'pino';
import type { LoggerOptions } from 'pino';
dotenv.config({ quiet: true });

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: Record<LogLevel, number> = {
  trace: 10, debug: 20, info: 30, warn: 40, error: 50
};

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

function shouldLog(messageLevel: LogLevel, currentLevel: LogLevel): boolean {
  return LOG_LEVELS[messageLevel] >= LOG_LEVELS[currentLevel];
}

// Dots are kept for hierarchy, any other run of non-alphanumerics becomes one dot
export function normalizeCategoryKey(raw: string): string {
  if (!raw) return '';

  return raw
    .toLowerCase()
    .replace(/[^a-z0-9.]+/g, '.')
    .replace(/\.+/g, '.')
    .replace(/^\.|\.$/g, '');
}

const pinoOptions: LoggerOptions = {
  level: 'trace', // filtering happens in the category wrapper
  formatters: {
    level: (label) => ({ level: label.toUpperCase() }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  ...(process.env.NODE_ENV !== 'production' && process.env.NODE_ENV !== 'test' ? {
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        ignore: 'pid,hostname',
        translateTime: 'SYS:standard',
      },
    },
  } : {}),
};

const pinoLogger = pino(pinoOptions);

let globalLevel: LogLevel = 'error';
const categoryLevels: Record<string, LogLevel> = {};
const categoryLoggers: Record<string, Logger> = {};

// e.g. for "api.orders.cancel": api.orders.cancel > api.orders > api > LOG_LEVEL
function getEffectiveLevelForCategory(category: string): LogLevel {
  const normalizedCategory = normalizeCategoryKey(category);
  if (!normalizedCategory) return globalLevel;

  const exact = categoryLevels[normalizedCategory];
  if (exact) return exact;

  const parts = normalizedCategory.split('.');
  for (let i = parts.length - 1; i > 0; i--) {
    const parent = categoryLevels[parts.slice(0, i).join('.')];
    if (parent) return parent;
  }

  return globalLevel;
}

type LogMethod = (msg: string, ...args: unknown[]) => void;

export interface Logger {
  trace: LogMethod;
  debug: LogMethod;
  info: LogMethod;
  warn: LogMethod;
  error: LogMethod;
  child: (bindings: Record<string, unknown>) => Logger;
  level: LogLevel;
}

function createSimpleLogger(category?: string, level: LogLevel = 'error', bindings?: Record<string, unknown>): Logger {
  const childBindings = { ...(category ? { category: category.toUpperCase() } : {}), ...bindings };
  const childLogger = Object.keys(childBindings).length > 0 ? pinoLogger.child(childBindings) : pinoLogger;

  const method = (messageLevel: LogLevel): LogMethod => (msg, ...args) => {
    if (!shouldLog(messageLevel, level)) return;
    if (args.length > 0) {
      childLogger[messageLevel]({ args }, msg);
    } else {
      childLogger[messageLevel](msg);
    }
  };

  return {
    trace: method('trace'),
    debug: method('debug'),
    info: method('info'),
    warn: method('warn'),
    error: method('error'),
    child: (extra) => createSimpleLogger(category, level, { ...bindings, ...extra }),
    level
  };
}

// LOG_API_ORDERS=debug -> categoryLevels['api.orders'] = 'debug'
function scanEnvironment(env: NodeJS.ProcessEnv): void {
  Object.keys(env).forEach(key => {
    if (key.startsWith('LOG_') && key !== 'LOG_LEVEL') {
      const category = normalizeCategoryKey(key.slice(4).toLowerCase().replace(/_/g, '.'));
      const value = env[key]?.toLowerCase();
      if (category && value && isLogLevel(value)) {
        categoryLevels[category] = value;
      }
    }
  });
}

function autoInitializeLogger(): void {
  const envGlobalLevel = process.env.LOG_LEVEL?.toLowerCase();
  globalLevel = envGlobalLevel && isLogLevel(envGlobalLevel) ? envGlobalLevel : 'error';
  scanEnvironment(process.env);
}

autoInitializeLogger();

export interface LoggerConfig {
  globalLevel?: LogLevel;
  categoryLevels?: Record<string, LogLevel>;
}

/**
 * Override levels at runtime. Environment variables are re-applied last so
 * LOG_{CATEGORY} keeps precedence over config.
 */
export function initializeLogger(config: LoggerConfig = {}): void {
  if (config.globalLevel) {
    globalLevel = config.globalLevel;
  }

  if (config.categoryLevels) {
    for (const [category, level] of Object.entries(config.categoryLevels)) {
      categoryLevels[normalizeCategoryKey(category)] = level;
    }
  }

  scanEnvironment(process.env);

  Object.keys(categoryLoggers).forEach(category => {
    categoryLoggers[category] = createSimpleLogger(category, getEffectiveLevelForCategory(category));
  });
}

export function createCategoryLogger(category: string, bindings?: Record<string, unknown>): Logger {
  const normalizedCategory = normalizeCategoryKey(category);

  const cached = categoryLoggers[normalizedCategory];
  if (!bindings && cached) {
    return cached;
  }

  const logger = createSimpleLogger(normalizedCategory, getEffectiveLevelForCategory(normalizedCategory), bindings);

  // Only loggers without extra bindings are shared
  if (!bindings) {
    categoryLoggers[normalizedCategory] = logger;
  }

  return logger;
}

export function getCategoryLogLevel(category: string): LogLevel {
  return getEffectiveLevelForCategory(category);
}

export function shouldLogForCategory(messageLevel: LogLevel, category: string): boolean {
  return shouldLog(messageLevel, getCategoryLogLevel(category));
}

export const logger = createSimpleLogger();

export default logger;
