import { describe, it, expect } from 'vitest';
import { partitionIds } from '../src/batches.js';
import { buildScanRequests } from '../src/scheduler.js';
import { createScanOptions } from '@scan-harvest/shared/testing';

function ids(count: number): string[] {
  return Array.from({ length: count }, (_, i) => `ws-${i}`);
}

describe('partitionIds', () => {
  it.each([0, 1, 99, 100, 101, 250, 1000])('should cover %i ids exactly once in ceil(N/100) batches', (n) => {
    const input = ids(n);
    const batches = partitionIds(input);

    expect(batches).toHaveLength(Math.ceil(n / 100));
    expect(batches.flat()).toEqual(input);
    for (const batch of batches) {
      expect(batch.length).toBeGreaterThan(0);
      expect(batch.length).toBeLessThanOrEqual(100);
    }
  });

  it('should split 250 ids into [100, 100, 50]', () => {
    expect(partitionIds(ids(250)).map((b) => b.length)).toEqual([100, 100, 50]);
  });

  it('should honour a smaller cap', () => {
    expect(partitionIds(['a', 'b', 'c'], 2)).toEqual([['a', 'b'], ['c']]);
  });

  it('should reject a non-positive cap', () => {
    expect(() => partitionIds(['a'], 0)).toThrow('Batch cap must be a positive integer, got 0');
  });
});

describe('buildScanRequests', () => {
  it('should number batches from 1 and copy the options into each request', () => {
    const options = createScanOptions({ lineage: false });
    const requests = buildScanRequests(ids(150), options);

    expect(requests.map((r) => r.batchId)).toEqual([1, 2]);
    expect(requests[1]?.workspaceIds[0]).toBe('ws-100');
    expect(requests[0]?.options).toEqual(options);
    expect(requests[0]?.options).not.toBe(options);
  });
});
