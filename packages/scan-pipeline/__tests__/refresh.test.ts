import { describe, it, expect, vi } from 'vitest';
import { HttpError } from '@scan-harvest/shared';
import { createMockDatasetNode, createMockLogger, createMockWorkspaceNode } from '@scan-harvest/shared/testing';
import type { RefreshEntry } from '@scan-harvest/admin-api';
import { flattenScanDocument } from '../src/flatten.js';
import { applyRefreshHistory, lookupRefreshHistory, type RefreshHistorySource } from '../src/refresh.js';
import { RunStatistics } from '../src/stats.js';

function entry(overrides: Partial<RefreshEntry> = {}): RefreshEntry {
  return {
    requestId: 'req-1',
    id: null,
    refreshType: 'Scheduled',
    status: 'Completed',
    startTime: '2024-03-01T10:00:00Z',
    endTime: '2024-03-01T10:02:30Z',
    serviceExceptionJson: null,
    ...overrides,
  };
}

const latest = entry();
const older = entry({
  requestId: 'req-0',
  status: 'Failed',
  startTime: '2024-02-29T10:00:00Z',
  endTime: '2024-02-29T10:01:00Z',
  serviceExceptionJson: '{"errorCode":"ModelRefreshFailed"}',
});

const source = vi.fn<RefreshHistorySource>(async (_workspaceId, datasetId, top) => {
  switch (datasetId) {
    case 'd-hit':
      return top === 1 ? [latest] : [latest, older];
    case 'd-none':
      return [];
    case 'd-lake':
      throw new HttpError(404, 'GET', 'groups/w1/datasets/d-lake/refreshes', 'Not Found');
    default:
      throw new Error('socket hang up');
  }
});

function buildDatasets() {
  return flattenScanDocument({
    workspaces: [
      createMockWorkspaceNode({
        id: 'w1',
        name: 'Sales',
        datasets: ['d-hit', 'd-none', 'd-lake', 'd-err'].map((id) => createMockDatasetNode({ id, name: id })),
      }),
    ],
    datasourceInstances: [],
    sourceDocuments: 1,
  }).datasets;
}

describe('lookupRefreshHistory', () => {
  it('should classify each outcome exactly once', async () => {
    await expect(lookupRefreshHistory(source, 'w1', 'd-hit', 1)).resolves.toEqual({
      status: 'HasRefreshHistory',
      entries: [latest],
    });
    await expect(lookupRefreshHistory(source, 'w1', 'd-none', 1)).resolves.toEqual({ status: 'NoHistory' });
    await expect(lookupRefreshHistory(source, 'w1', 'd-lake', 1)).resolves.toEqual({ status: 'NotSupported' });
    await expect(lookupRefreshHistory(source, 'w1', 'd-err', 1)).resolves.toEqual({
      status: 'Error',
      message: 'socket hang up',
    });
  });
});

describe('applyRefreshHistory', () => {
  it('should enrich each dataset with its own classification', async () => {
    const datasets = buildDatasets();
    const statistics = new RunStatistics('run-1');

    await applyRefreshHistory(datasets, source, { statistics, logger: createMockLogger() });

    expect(datasets.map((d) => [d.datasetId, d.refreshHistoryStatus, d.hasRefreshHistory])).toEqual([
      ['d-hit', 'HasRefreshHistory', true],
      ['d-none', 'NoHistory', false],
      ['d-lake', 'NotSupported', false],
      ['d-err', 'Error', null],
    ]);
    expect(datasets[0]).toMatchObject({
      lastRefreshStatus: 'Completed',
      lastRefreshType: 'Scheduled',
      lastRefreshStartTime: '2024-03-01T10:00:00Z',
      lastRefreshEndTime: '2024-03-01T10:02:30Z',
      lastRefreshError: null,
      refreshHistoryError: null,
    });
    expect(datasets[2]?.refreshHistoryError).toBeNull();
    expect(datasets[3]?.refreshHistoryError).toBe('socket hang up');
  });

  it('should count outcomes and record only the real failure as an error', async () => {
    const statistics = new RunStatistics('run-2');

    await applyRefreshHistory(buildDatasets(), source, { statistics });

    expect(statistics.get('refreshHistoryHits')).toBe(1);
    expect(statistics.get('refreshHistoryNoHistory')).toBe(1);
    expect(statistics.get('refreshHistoryNotSupported')).toBe(1);
    expect(statistics.get('refreshHistoryErrors')).toBe(1);
    expect(statistics.getErrors()).toEqual(['Refresh history lookup failed for w1/d-err: socket hang up']);
  });

  it('should record a failed detailed lookup without losing the summary', async () => {
    const statistics = new RunStatistics('run-3');
    const flaky: RefreshHistorySource = async (_workspaceId, _datasetId, top) => {
      if (top === 1) return [latest];
      throw new Error('read ECONNRESET');
    };
    const datasets = buildDatasets().slice(0, 1);

    const history = await applyRefreshHistory(datasets, flaky, { statistics });

    expect(history).toEqual([]);
    expect(datasets[0]?.refreshHistoryStatus).toBe('HasRefreshHistory');
    expect(statistics.get('refreshHistoryHits')).toBe(1);
    expect(statistics.get('refreshHistoryErrors')).toBe(0);
    expect(statistics.getErrors()).toEqual(['Detailed refresh history lookup failed for w1/d-hit: read ECONNRESET']);
  });

  it('should return detailed history rows only for datasets that have history', async () => {
    const history = await applyRefreshHistory(buildDatasets(), source);

    expect(history).toEqual([
      {
        workspaceId: 'w1',
        workspaceName: 'Sales',
        datasetId: 'd-hit',
        datasetName: 'd-hit',
        requestId: 'req-1',
        refreshType: 'Scheduled',
        status: 'Completed',
        startTime: '2024-03-01T10:00:00Z',
        endTime: '2024-03-01T10:02:30Z',
        durationMinutes: 2.5,
        serviceExceptionJson: null,
      },
      {
        workspaceId: 'w1',
        workspaceName: 'Sales',
        datasetId: 'd-hit',
        datasetName: 'd-hit',
        requestId: 'req-0',
        refreshType: 'Scheduled',
        status: 'Failed',
        startTime: '2024-02-29T10:00:00Z',
        endTime: '2024-02-29T10:01:00Z',
        durationMinutes: 1,
        serviceExceptionJson: '{"errorCode":"ModelRefreshFailed"}',
      },
    ]);
  });

  it('should skip the detailed lookup when disabled', async () => {
    const calls: number[] = [];
    const counting: RefreshHistorySource = async (workspaceId, datasetId, top) => {
      calls.push(top);
      return source(workspaceId, datasetId, top);
    };

    const history = await applyRefreshHistory(buildDatasets(), counting, { detailed: false });

    expect(history).toEqual([]);
    expect(calls).toEqual([1, 1, 1, 1]);
  });
});
