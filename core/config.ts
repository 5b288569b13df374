/**
 * Server configuration from environment variables
 *
 * Environment Variables:
 * - PORT: listen port (default: 80)
 * - HOST: listen host (default: 0.0.0.0)
 * - ORDER_EXECUTION_MIN_DELAY_MS: lower bound of the execution delay (default: 100)
 * - ORDER_EXECUTION_MAX_DELAY_MS: upper bound of the execution delay (default: 1000)
 * - WS_HEARTBEAT_INTERVAL: ms between WebSocket pings (default: 30000)
 * - LOG_LEVEL: global log level, one of trace/debug/info/warn/error (default: error)
 * - LOG_{CATEGORY}: see logger.ts
 *
 * Blank values count as unset. Numbers must be plain decimal digits.
 */

import { z } from 'zod';
import type { LogLevel } from './logger.js';

const LOG_LEVEL_NAMES = ['trace', 'debug', 'info', 'warn', 'error'] as const satisfies readonly LogLevel[];

const intFromEnv = (fallback: number) =>
  z.preprocess((value) => {
    if (typeof value !== 'string') return value ?? fallback;
    const trimmed = value.trim();
    if (trimmed === '') return fallback;
    // Left as a string so z.number() rejects it
    return /^\d+$/.test(trimmed) ? Number(trimmed) : value;
  }, z.number().int().nonnegative());

const EnvSchema = z.object({
  PORT: intFromEnv(80),
  HOST: z.string().min(1).default('0.0.0.0'),
  ORDER_EXECUTION_MIN_DELAY_MS: intFromEnv(100),
  ORDER_EXECUTION_MAX_DELAY_MS: intFromEnv(1000),
  WS_HEARTBEAT_INTERVAL: intFromEnv(30000),
  LOG_LEVEL: z.preprocess(
    (value) => (typeof value === 'string' ? value.trim().toLowerCase() || undefined : value),
    z.enum(LOG_LEVEL_NAMES).default('error')
  )
}).refine(
  (env) => env.ORDER_EXECUTION_MIN_DELAY_MS <= env.ORDER_EXECUTION_MAX_DELAY_MS,
  { message: 'ORDER_EXECUTION_MIN_DELAY_MS must not exceed ORDER_EXECUTION_MAX_DELAY_MS', path: ['ORDER_EXECUTION_MIN_DELAY_MS'] }
);

export interface ServerConfig {
  port: number;
  host: string;
  minDelayMs: number;
  maxDelayMs: number;
  heartbeatInterval: number;
  logLevel: LogLevel;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    const problems = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration: ${problems.join('; ')}`);
  }

  const parsed = result.data;
  return {
    port: parsed.PORT,
    host: parsed.HOST,
    minDelayMs: parsed.ORDER_EXECUTION_MIN_DELAY_MS,
    maxDelayMs: parsed.ORDER_EXECUTION_MAX_DELAY_MS,
    heartbeatInterval: parsed.WS_HEARTBEAT_INTERVAL,
    logLevel: parsed.LOG_LEVEL
  };
}
