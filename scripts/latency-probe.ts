#!/usr/bin/env node
/**
 * Latency probe against a running order desk.
 *
 * Creates N orders, timing each POST and the wait for the next feed update,
 * then prints mean and standard deviation of (request time - feed wait).
 *
 *   tsx scripts/latency-probe.ts --url http://localhost:5734 --count 100
 */

import { program } from 'commander';
import dotenv from 'dotenv';
import { summarizeLatencies, formatLatencySummary } from '../core/latency.js';
import { OrderFeedClient } from '../ws/feed-client.js';

dotenv.config({ quiet: true });

function toFeedUrl(baseUrl: string): string {
  const url = new URL('/ws', baseUrl);
  url.protocol = url.protocol === 'https:' ? 'wss:' : 'ws:';
  return url.toString();
}

async function run(baseUrl: string, count: number): Promise<void> {
  const feed = await OrderFeedClient.connect(toFeedUrl(baseUrl));
  const differences: number[] = [];

  try {
    for (let i = 0; i < count; i++) {
      const requestStart = performance.now();
      const response = await fetch(new URL('/orders', baseUrl), { method: 'POST' });
      const requestSeconds = (performance.now() - requestStart) / 1000;
      if (!response.ok) {
        throw new Error(`POST /orders failed with ${response.status}`);
      }

      const feedStart = performance.now();
      await feed.next();
      const feedSeconds = (performance.now() - feedStart) / 1000;

      differences.push(requestSeconds - feedSeconds);
    }
  } finally {
    await feed.close();
  }

  console.log(formatLatencySummary(summarizeLatencies(differences)));
}

program
  .name('latency-probe')
  .description('Measure order execution delay against a running order desk')
  .option('-u, --url <url>', 'Order desk base URL', process.env.ORDER_DESK_URL ?? 'http://localhost:5734')
  .option('-n, --count <n>', 'Number of orders to create', '100')
  .parse();

const options = program.opts<{ url: string; count: string }>();
const count = Number.parseInt(options.count, 10);

if (!Number.isInteger(count) || count <= 0) {
  console.error(`Invalid --count: ${options.count}`);
  process.exit(1);
}

run(options.url, count).catch((error) => {
  console.error('Latency probe failed:', error instanceof Error ? error.message : error);
  process.exit(1);
});
