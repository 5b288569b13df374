/**
 * Tests for configuration loading, query flag schema and latency summary
 */

import { describe, it, expect } from 'vitest';
import { loadConfig, ConfigError } from '../../core/config.js';
import { CreateOrderQuerySchema, OrderSchema } from '../../core/types.js';
import { summarizeLatencies, formatLatencySummary } from '../../core/latency.js';

describe('loadConfig', () => {
  it('should apply defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({
      port: 80,
      host: '0.0.0.0',
      minDelayMs: 100,
      maxDelayMs: 1000,
      heartbeatInterval: 30000,
      logLevel: 'error'
    });
  });

  it('should read overrides from the environment', () => {
    const config = loadConfig({
      PORT: '5734',
      HOST: '127.0.0.1',
      ORDER_EXECUTION_MIN_DELAY_MS: '5',
      ORDER_EXECUTION_MAX_DELAY_MS: '10',
      WS_HEARTBEAT_INTERVAL: '0',
      LOG_LEVEL: 'Debug'
    });

    expect(config).toEqual({
      port: 5734,
      host: '127.0.0.1',
      minDelayMs: 5,
      maxDelayMs: 10,
      heartbeatInterval: 0,
      logLevel: 'debug'
    });
  });

  it('should treat empty values as unset', () => {
    expect(loadConfig({ PORT: '' }).port).toBe(80);
    expect(loadConfig({ PORT: '   ' }).port).toBe(80);
    expect(loadConfig({ LOG_LEVEL: '' }).logLevel).toBe('error');
  });

  it('should trim surrounding whitespace from numbers', () => {
    expect(loadConfig({ PORT: ' 8080 ' }).port).toBe(8080);
  });

  it('should reject numbers that are not plain decimal digits', () => {
    expect(() => loadConfig({ PORT: '0x50' })).toThrow(/^Invalid configuration: PORT: /);
    expect(() => loadConfig({ PORT: '1e3' })).toThrow(/^Invalid configuration: PORT: /);
    expect(() => loadConfig({ WS_HEARTBEAT_INTERVAL: '2.5' })).toThrow(/^Invalid configuration: WS_HEARTBEAT_INTERVAL: /);
  });

  it('should reject an unknown log level', () => {
    expect(() => loadConfig({ LOG_LEVEL: 'verbose' })).toThrow(/^Invalid configuration: LOG_LEVEL: /);
  });

  it('should reject a non-numeric port', () => {
    expect(() => loadConfig({ PORT: 'eighty' })).toThrow(ConfigError);
    expect(() => loadConfig({ PORT: 'eighty' })).toThrow(/^Invalid configuration: PORT: /);
  });

  it('should reject a negative delay', () => {
    expect(() => loadConfig({ ORDER_EXECUTION_MIN_DELAY_MS: '-5' })).toThrow(/ORDER_EXECUTION_MIN_DELAY_MS/);
  });

  it('should reject a minimum delay above the maximum', () => {
    expect(() => loadConfig({
      ORDER_EXECUTION_MIN_DELAY_MS: '500',
      ORDER_EXECUTION_MAX_DELAY_MS: '100'
    })).toThrow('ORDER_EXECUTION_MIN_DELAY_MS must not exceed ORDER_EXECUTION_MAX_DELAY_MS');
  });
});

describe('CreateOrderQuerySchema', () => {
  it('should default execute_order to true', () => {
    const result = CreateOrderQuerySchema.safeParse({});
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.execute_order).toBe(true);
    }
  });

  it.each([
    ['true', true],
    ['1', true],
    ['YES', true],
    ['on', true],
    ['t', true],
    ['Y', true],
    ['false', false],
    ['0', false],
    ['No', false],
    ['off', false],
    ['F', false],
    ['n', false]
  ])('should parse execute_order=%s as %s', (raw, expected) => {
    const result = CreateOrderQuerySchema.safeParse({ execute_order: raw });
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.execute_order).toBe(expected);
    }
  });

  it('should reject an unknown flag value', () => {
    expect(CreateOrderQuerySchema.safeParse({ execute_order: 'maybe' }).success).toBe(false);
  });

  it('should reject a repeated flag', () => {
    expect(CreateOrderQuerySchema.safeParse({ execute_order: ['true', 'false'] }).success).toBe(false);
  });
});

describe('OrderSchema', () => {
  it('should accept a valid order', () => {
    expect(OrderSchema.safeParse({ id: '6f1c2d3e-4b5a-4c6d-8e7f-a0b1c2d3e4f5', status: 'PENDING' }).success).toBe(true);
  });

  it('should reject an unknown status', () => {
    expect(OrderSchema.safeParse({ id: '6f1c2d3e-4b5a-4c6d-8e7f-a0b1c2d3e4f5', status: 'FILLED' }).success).toBe(false);
  });
});

describe('summarizeLatencies', () => {
  it('should return zeros for no samples', () => {
    expect(summarizeLatencies([])).toEqual({ count: 0, mean: 0, stdDev: 0, min: 0, max: 0 });
  });

  it('should compute mean and population standard deviation', () => {
    const summary = summarizeLatencies([1, 2, 3, 4]);

    expect(summary.count).toBe(4);
    expect(summary.mean).toBe(2.5);
    expect(summary.stdDev).toBeCloseTo(Math.sqrt(1.25), 10);
    expect(summary.min).toBe(1);
    expect(summary.max).toBe(4);
  });

  it('should format the summary lines', () => {
    const text = formatLatencySummary({ count: 2, mean: 0.5, stdDev: 0.25, min: 0.25, max: 0.75 });

    expect(text).toBe('Average Order Execution Delay: 0.5000 s\nStandard Deviation: 0.2500 s');
  });
});
