import { describe, it, expect, vi } from 'vitest';
import type { BatchResult, ScanRequest } from '@scan-harvest/shared';
import { createMockLogger, createScanOptions } from '@scan-harvest/shared/testing';
import { runScans, type ScanRunner } from '../src/scheduler.js';
import { RunStatistics } from '../src/stats.js';

function ids(count: number): string[] {
  return Array.from({ length: count }, (_, i) => `ws-${i}`);
}

function createRunner(failingBatches: number[] = []) {
  const run = vi.fn(async (request: ScanRequest): Promise<BatchResult> => {
    if (failingBatches.includes(request.batchId)) {
      throw new Error(`submit rejected for batch ${request.batchId}`);
    }
    return { request, scanId: `scan-${request.batchId}`, rawResult: '{}' };
  });
  const runner: ScanRunner = { run };
  return { runner, run };
}

describe('runScans', () => {
  it('should run every batch in order and count successes', async () => {
    const { runner, run } = createRunner();
    const statistics = new RunStatistics('run-1');

    const results = await runScans(ids(250), createScanOptions(), { runner, statistics });

    expect(run).toHaveBeenCalledTimes(3);
    expect(results.map((r) => r.scanId)).toEqual(['scan-1', 'scan-2', 'scan-3']);
    expect(results.map((r) => r.request.workspaceIds.length)).toEqual([100, 100, 50]);
    expect(statistics.get('batchesSucceeded')).toBe(3);
    expect(statistics.get('batchesFailed')).toBe(0);
    expect(statistics.getErrors()).toEqual([]);
  });

  it('should record a failed batch and keep going', async () => {
    const { runner, run } = createRunner([2]);
    const statistics = new RunStatistics('run-2');
    const logger = createMockLogger();
    const seen: number[] = [];

    const results = await runScans(ids(250), createScanOptions(), {
      runner,
      statistics,
      logger,
      onBatchResult: (r) => seen.push(r.request.batchId),
    });

    expect(run).toHaveBeenCalledTimes(3);
    expect(results.map((r) => r.request.batchId)).toEqual([1, 3]);
    expect(seen).toEqual([1, 3]);
    expect(statistics.get('batchesSucceeded')).toBe(2);
    expect(statistics.get('batchesFailed')).toBe(1);
    expect(statistics.getErrors()).toEqual([
      'Batch 2 of 3 failed (100 workspaces): submit rejected for batch 2',
    ]);
    expect(logger.hasLog('error', 'Batch failed, continuing with next batch')).toBe(true);
  });

  it('should count a batch once when its result hook throws', async () => {
    const { runner } = createRunner();
    const statistics = new RunStatistics('run-3');

    const results = await runScans(ids(150), createScanOptions(), {
      runner,
      statistics,
      onBatchResult: (r) => {
        if (r.request.batchId === 1) throw new Error('result rejected');
      },
    });

    expect(results.map((r) => r.request.batchId)).toEqual([2]);
    expect(statistics.get('batchesSucceeded')).toBe(1);
    expect(statistics.get('batchesFailed')).toBe(1);
    expect(statistics.getErrors()).toEqual(['Batch 1 of 2 failed (100 workspaces): result rejected']);
  });

  it('should plan nothing for an empty id list', async () => {
    const { runner, run } = createRunner();

    const results = await runScans([], createScanOptions(), { runner, statistics: new RunStatistics() });

    expect(results).toEqual([]);
    expect(run).not.toHaveBeenCalled();
  });
});
