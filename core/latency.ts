/**
 * Latency summary for timing samples (seconds or milliseconds, caller's choice).
 * stdDev is the population standard deviation.
 */

export interface LatencySummary {
  count: number;
  mean: number;
  stdDev: number;
  min: number;
  max: number;
}

export function summarizeLatencies(samples: readonly number[]): LatencySummary {
  if (samples.length === 0) {
    return { count: 0, mean: 0, stdDev: 0, min: 0, max: 0 };
  }

  const count = samples.length;
  const mean = samples.reduce((sum, value) => sum + value, 0) / count;
  const variance = samples.reduce((sum, value) => sum + (value - mean) ** 2, 0) / count;

  return {
    count,
    mean,
    stdDev: Math.sqrt(variance),
    min: Math.min(...samples),
    max: Math.max(...samples)
  };
}

export function formatLatencySummary(summary: LatencySummary, unit = 's', digits = 4): string {
  return [
    `Average Order Execution Delay: ${summary.mean.toFixed(digits)} ${unit}`,
    `Standard Deviation: ${summary.stdDev.toFixed(digits)} ${unit}`
  ].join('\n');
}
