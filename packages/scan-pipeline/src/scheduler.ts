import {
  SCAN_BATCH_MAX_WORKSPACES,
  errorMessage,
  nullLogger,
  type BatchResult,
  type Logger,
  type ScanOptions,
  type ScanRequest,
} from '@scan-harvest/shared';
import { partitionIds } from './batches.js';
import type { RunStatistics } from './stats.js';

export interface ScanRunner {
  run(request: ScanRequest): Promise<BatchResult>;
}

export interface RunScansDeps {
  runner: ScanRunner;
  statistics: RunStatistics;
  logger?: Logger;
  batchSize?: number;
  /** Called for each completed batch, in batch order; a throw fails the batch */
  onBatchResult?: (result: BatchResult) => void;
}

export function buildScanRequests(
  ids: readonly string[],
  options: ScanOptions,
  batchSize: number = SCAN_BATCH_MAX_WORKSPACES
): ScanRequest[] {
  return partitionIds(ids, batchSize).map((workspaceIds, index) => ({
    batchId: index + 1,
    workspaceIds,
    options: { ...options },
  }));
}

/**
 * Runs every batch to completion, one after another.
 *
 * A failed batch (submit error, non-succeeded terminal status, fetch error)
 * is counted and recorded in the statistics error list; the next batch still
 * runs. Returns the succeeded batches in batch order.
 */
export async function runScans(
  ids: readonly string[],
  options: ScanOptions,
  deps: RunScansDeps
): Promise<BatchResult[]> {
  const log = deps.logger ?? nullLogger;
  const requests = buildScanRequests(ids, options, deps.batchSize);
  const results: BatchResult[] = [];

  log.info('Scan batches planned', { workspaces: ids.length, batches: requests.length });

  for (const request of requests) {
    const batchLog = log.child({ batchId: String(request.batchId) });
    try {
      const result = await deps.runner.run(request);
      deps.onBatchResult?.(result);
      deps.statistics.increment('batchesSucceeded');
      results.push(result);
      batchLog.info('Batch succeeded', { scanId: result.scanId });
    } catch (error) {
      deps.statistics.increment('batchesFailed');
      deps.statistics.recordError(
        `Batch ${request.batchId} of ${requests.length} failed (${request.workspaceIds.length} workspaces): ${errorMessage(error)}`
      );
      batchLog.error('Batch failed, continuing with next batch', error, {
        workspaces: request.workspaceIds.length,
        firstWorkspaceId: request.workspaceIds[0],
      });
    }
  }

  log.info('Scan batches finished', {
    succeeded: deps.statistics.get('batchesSucceeded'),
    failed: deps.statistics.get('batchesFailed'),
  });
  return results;
}
