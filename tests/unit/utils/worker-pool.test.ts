/**
 * Unit tests for the bounded worker pool
 *
 * @module tests/unit/utils/worker-pool
 */

import { describe, it, expect } from 'vitest';
import { mapWithConcurrency } from '../../../src/utils/worker-pool.js';

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe('mapWithConcurrency', () => {
  it('returns results in input order regardless of completion order', async () => {
    const results = await mapWithConcurrency([30, 0, 15, 5], 4, async (delay, index) => {
      await sleep(delay);
      return `job-${index}`;
    });

    expect(results).toEqual(['job-0', 'job-1', 'job-2', 'job-3']);
  });

  it('never runs more than the limit at once', async () => {
    let inFlight = 0;
    let peak = 0;

    await mapWithConcurrency(Array.from({ length: 10 }, (_, i) => i), 3, async () => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await sleep(5);
      inFlight--;
    });

    expect(peak).toBe(3);
  });

  it('processes every item once', async () => {
    const seen: number[] = [];
    await mapWithConcurrency([1, 2, 3, 4, 5], 2, async (item) => {
      seen.push(item);
    });

    expect([...seen].sort()).toEqual([1, 2, 3, 4, 5]);
  });

  it('returns an empty array for no items', async () => {
    expect(await mapWithConcurrency([], 3, async () => 'x')).toEqual([]);
  });

  it('propagates a worker rejection', async () => {
    await expect(
      mapWithConcurrency([1, 2], 2, async (item) => {
        if (item === 2) throw new Error('job 2 failed');
        return item;
      })
    ).rejects.toThrow('job 2 failed');
  });

  it.each([0, -1, 1.5])('rejects limit %s', async (limit) => {
    await expect(mapWithConcurrency([1], limit, async (item) => item)).rejects.toThrow(
      `Worker pool limit must be a positive integer, got ${limit}`
    );
  });
});
