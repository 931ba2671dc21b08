import { describe, it, expect } from 'vitest';
import {
  createMockDatasetNode,
  createMockTableNode,
  createMockWorkspaceNode,
} from '@scan-harvest/shared/testing';
import { flattenScanDocument } from '../src/flatten.js';
import { mergeScanDocuments } from '../src/merger.js';
import { RunStatistics } from '../src/stats.js';

function buildDocument() {
  return mergeScanDocuments([
    {
      workspaces: [
        createMockWorkspaceNode({
          id: 'w1',
          name: 'Sales',
          reports: [
            { id: 'r1', name: 'Overview', datasetId: 'd2', endorsementDetails: { endorsement: 'Promoted' } },
          ],
          dataflows: [{ objectId: 'df1', name: 'Prep' }],
          datasets: [
            createMockDatasetNode({
              id: 'd1',
              name: 'Lake',
              tables: [],
              datasourceUsages: [{ datasourceInstanceId: 'inst-1' }],
            }),
            createMockDatasetNode({
              id: 'd2',
              name: 'Orders',
              tables: [createMockTableNode({ name: 'Fact' })],
              datasources: [
                { datasourceId: 'src-1', datasourceType: 'Sql', connectionDetails: { server: 'sql01' } },
              ],
              upstreamDatasets: [{ targetDatasetId: 'd9', groupId: 'w2' }],
              expressions: [{ name: 'Server', expression: '"sql01"' }],
            }),
          ],
        }),
      ],
      datasourceInstances: [
        { datasourceId: 'inst-1', datasourceType: 'AzureBlobs', connectionDetails: { account: 'store' }, gatewayId: 'gw-1' },
      ],
    },
  ]);
}

describe('flattenScanDocument', () => {
  it('should emit one workspace row with child counts', () => {
    const tables = flattenScanDocument(buildDocument());

    expect(tables.workspaces).toEqual([
      {
        workspaceId: 'w1',
        workspaceName: 'Sales',
        workspaceType: 'Workspace',
        workspaceState: 'Active',
        description: null,
        isOnDedicatedCapacity: false,
        capacityId: null,
        reportCount: 1,
        datasetCount: 2,
        dataflowCount: 1,
      },
    ]);
    expect(tables.reports[0]).toMatchObject({ reportId: 'r1', datasetId: 'd2', endorsement: 'Promoted' });
    expect(tables.dataflows[0]).toMatchObject({ workspaceId: 'w1', dataflowId: 'df1', dataflowName: 'Prep' });
  });

  it('should mark a dataset without tables and still flatten its siblings', () => {
    const tables = flattenScanDocument(buildDocument());

    const [lake, orders] = tables.datasets;
    expect(lake).toMatchObject({ datasetId: 'd1', tableCount: 0, hasSchemaData: false });
    expect(orders).toMatchObject({ datasetId: 'd2', tableCount: 1, hasSchemaData: true });

    expect(tables.tables).toHaveLength(1);
    expect(tables.tables[0]).toMatchObject({
      workspaceId: 'w1',
      datasetId: 'd2',
      tableName: 'Fact',
      columnCount: 2,
      measureCount: 1,
      sourceExpression: 'let Source = Sql.Database("sql01", "sales") in Source',
    });
    expect(tables.columns.map((c) => [c.datasetId, c.tableName, c.columnName])).toEqual([
      ['d2', 'Fact', 'Id'],
      ['d2', 'Fact', 'Amount'],
    ]);
    expect(tables.measures).toEqual([
      {
        workspaceId: 'w1',
        datasetId: 'd2',
        datasetName: 'Orders',
        tableName: 'Fact',
        measureName: 'Total Amount',
        expression: 'SUM(Amount)',
        description: null,
        isHidden: false,
      },
    ]);
  });

  it('should leave refresh columns unset', () => {
    const [lake] = flattenScanDocument(buildDocument()).datasets;

    expect(lake).toMatchObject({ refreshHistoryStatus: null, hasRefreshHistory: null, lastRefreshStatus: null });
  });

  it('should join datasource usages to the document-level instances', () => {
    const tables = flattenScanDocument(buildDocument());

    expect(tables.datasources).toEqual([
      {
        workspaceId: 'w1',
        datasetId: 'd1',
        datasetName: 'Lake',
        datasourceId: 'inst-1',
        datasourceType: 'AzureBlobs',
        connectionDetails: '{"account":"store"}',
        gatewayId: 'gw-1',
        origin: 'instance',
      },
      {
        workspaceId: 'w1',
        datasetId: 'd2',
        datasetName: 'Orders',
        datasourceId: 'src-1',
        datasourceType: 'Sql',
        connectionDetails: '{"server":"sql01"}',
        gatewayId: null,
        origin: 'dataset',
      },
    ]);
  });

  it('should emit lineage and expression rows', () => {
    const tables = flattenScanDocument(buildDocument());

    expect(tables.lineage).toEqual([
      {
        workspaceId: 'w1',
        datasetId: 'd2',
        datasetName: 'Orders',
        upstreamType: 'Dataset',
        upstreamId: 'd9',
        upstreamWorkspaceId: 'w2',
      },
    ]);
    expect(tables.expressions[0]).toMatchObject({ expressionName: 'Server', expression: '"sql01"' });
  });

  it('should add its counts to the run statistics', () => {
    const statistics = new RunStatistics('run-1');

    flattenScanDocument(buildDocument(), statistics);

    expect(statistics.toJSON()).toMatchObject({
      workspaces: 1,
      reports: 1,
      datasets: 2,
      datasetsWithSchema: 1,
      tables: 1,
      columns: 2,
      measures: 1,
      datasources: 2,
      lineageEdges: 1,
    });
  });

  it('should tolerate workspaces with no collections at all', () => {
    const tables = flattenScanDocument({ workspaces: [{ id: 'bare' }], datasourceInstances: [], sourceDocuments: 1 });

    expect(tables.workspaces[0]).toMatchObject({ workspaceId: 'bare', reportCount: 0, datasetCount: 0 });
    expect(tables.datasets).toEqual([]);
  });
});
