import { SCAN_BATCH_MAX_WORKSPACES } from '@scan-harvest/shared';

/**
 * Splits ids into consecutive chunks of at most `cap`, preserving order.
 * Concatenating the chunks yields the input exactly.
 */
export function partitionIds(ids: readonly string[], cap: number = SCAN_BATCH_MAX_WORKSPACES): string[][] {
  if (!Number.isInteger(cap) || cap < 1) {
    throw new RangeError(`Batch cap must be a positive integer, got ${cap}`);
  }

  const batches: string[][] = [];
  for (let i = 0; i < ids.length; i += cap) {
    batches.push(ids.slice(i, i + cap));
  }
  return batches;
}
