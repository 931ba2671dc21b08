import {
  REFRESH_DETAIL_TOP,
  REFRESH_SUMMARY_TOP,
  durationMinutes,
  errorMessage,
  isNotFoundError,
  nullLogger,
  type DatasetRecord,
  type Logger,
  type RefreshHistoryRecord,
} from '@scan-harvest/shared';
import type { RefreshEntry } from '@scan-harvest/admin-api';
import type { RunStatistics } from './stats.js';

/**
 * Per-dataset refresh-history lookup, e.g. `getRefreshHistory` bound to a
 * gateway.
 */
export type RefreshHistorySource = (
  workspaceId: string,
  datasetId: string,
  top: number
) => Promise<RefreshEntry[]>;

export type RefreshLookup =
  | { status: 'HasRefreshHistory'; entries: RefreshEntry[] }
  | { status: 'NoHistory' }
  | { status: 'NotSupported' }
  | { status: 'Error'; message: string };

/**
 * Classifies one lookup into exactly one of four outcomes. Not-found means
 * the dataset's content type exposes no refresh history; it is never
 * reported as Error.
 */
export async function lookupRefreshHistory(
  source: RefreshHistorySource,
  workspaceId: string,
  datasetId: string,
  top: number
): Promise<RefreshLookup> {
  try {
    const entries = await source(workspaceId, datasetId, top);
    return entries.length > 0 ? { status: 'HasRefreshHistory', entries } : { status: 'NoHistory' };
  } catch (error) {
    if (isNotFoundError(error)) {
      return { status: 'NotSupported' };
    }
    return { status: 'Error', message: errorMessage(error) };
  }
}

function applySummary(dataset: DatasetRecord, lookup: RefreshLookup): void {
  dataset.refreshHistoryStatus = lookup.status;

  switch (lookup.status) {
    case 'HasRefreshHistory': {
      const latest = lookup.entries[0];
      dataset.hasRefreshHistory = true;
      dataset.lastRefreshStatus = latest?.status ?? null;
      dataset.lastRefreshType = latest?.refreshType ?? null;
      dataset.lastRefreshStartTime = latest?.startTime ?? null;
      dataset.lastRefreshEndTime = latest?.endTime ?? null;
      dataset.lastRefreshError = latest?.serviceExceptionJson ?? null;
      break;
    }
    case 'NoHistory':
    case 'NotSupported':
      dataset.hasRefreshHistory = false;
      break;
    case 'Error':
      dataset.hasRefreshHistory = null;
      dataset.refreshHistoryError = lookup.message;
      break;
  }
}

function toHistoryRecords(
  dataset: DatasetRecord,
  workspaceId: string,
  datasetId: string,
  entries: RefreshEntry[]
): RefreshHistoryRecord[] {
  return entries.map((entry) => ({
    workspaceId,
    workspaceName: dataset.workspaceName,
    datasetId,
    datasetName: dataset.datasetName,
    requestId: entry.requestId ?? entry.id,
    refreshType: entry.refreshType,
    status: entry.status,
    startTime: entry.startTime,
    endTime: entry.endTime,
    durationMinutes: durationMinutes(entry.startTime, entry.endTime),
    serviceExceptionJson: entry.serviceExceptionJson,
  }));
}

export interface ApplyRefreshHistoryOptions {
  statistics?: RunStatistics;
  logger?: Logger;
  /** Also pull the detailed top-5 history (default true) */
  detailed?: boolean;
  summaryTop?: number;
  detailTop?: number;
}

/**
 * Enriches dataset records in place with the latest refresh (top 1) and
 * returns the detailed history rows (top 5). Lookups run one dataset at a
 * time; a failing lookup only marks its own dataset.
 */
export async function applyRefreshHistory(
  datasets: DatasetRecord[],
  source: RefreshHistorySource,
  options: ApplyRefreshHistoryOptions = {}
): Promise<RefreshHistoryRecord[]> {
  const log = options.logger ?? nullLogger;
  const detailed = options.detailed ?? true;
  const summaryTop = options.summaryTop ?? REFRESH_SUMMARY_TOP;
  const detailTop = options.detailTop ?? REFRESH_DETAIL_TOP;
  const history: RefreshHistoryRecord[] = [];

  for (const dataset of datasets) {
    const { workspaceId, datasetId } = dataset;
    if (!workspaceId || !datasetId) continue;

    const summary = await lookupRefreshHistory(source, workspaceId, datasetId, summaryTop);
    applySummary(dataset, summary);

    switch (summary.status) {
      case 'HasRefreshHistory':
        options.statistics?.increment('refreshHistoryHits');
        break;
      case 'NoHistory':
        options.statistics?.increment('refreshHistoryNoHistory');
        break;
      case 'NotSupported':
        options.statistics?.increment('refreshHistoryNotSupported');
        break;
      case 'Error':
        options.statistics?.increment('refreshHistoryErrors');
        options.statistics?.recordError(
          `Refresh history lookup failed for ${workspaceId}/${datasetId}: ${summary.message}`
        );
        log.warn('Refresh history lookup failed', { workspaceId, datasetId, error: summary.message });
        break;
    }

    if (!detailed || summary.status !== 'HasRefreshHistory') continue;

    const detail = await lookupRefreshHistory(source, workspaceId, datasetId, detailTop);
    if (detail.status === 'HasRefreshHistory') {
      history.push(...toHistoryRecords(dataset, workspaceId, datasetId, detail.entries));
    } else if (detail.status === 'Error') {
      options.statistics?.recordError(
        `Detailed refresh history lookup failed for ${workspaceId}/${datasetId}: ${detail.message}`
      );
      log.warn('Detailed refresh history lookup failed', { workspaceId, datasetId, error: detail.message });
    }
  }

  log.info('Refresh history collected', {
    datasets: datasets.length,
    historyRows: history.length,
  });
  return history;
}
