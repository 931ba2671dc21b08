import {
  readBoolean,
  readJson,
  readNodes,
  readObject,
  readString,
  type ColumnRecord,
  type DataflowRecord,
  type DatasetRecord,
  type DatasourceRecord,
  type ExpressionRecord,
  type FlatTables,
  type JsonObject,
  type LineageRecord,
  type MeasureRecord,
  type MergedDocument,
  type ReportRecord,
  type TableRecord,
  type WorkspaceRecord,
} from '@scan-harvest/shared';
import type { RunStatistics } from './stats.js';

interface WorkspaceKeys {
  workspaceId: string | null;
  workspaceName: string | null;
}

interface DatasetKeys extends WorkspaceKeys {
  datasetId: string | null;
  datasetName: string | null;
}

export function emptyFlatTables(): FlatTables {
  return {
    workspaces: [],
    reports: [],
    datasets: [],
    tables: [],
    columns: [],
    measures: [],
    datasources: [],
    lineage: [],
    expressions: [],
    dataflows: [],
    refreshHistory: [],
  };
}

function toWorkspaceRecord(workspace: JsonObject, keys: WorkspaceKeys): WorkspaceRecord {
  return {
    ...keys,
    workspaceType: readString(workspace, 'type'),
    workspaceState: readString(workspace, 'state'),
    description: readString(workspace, 'description'),
    isOnDedicatedCapacity: readBoolean(workspace, 'isOnDedicatedCapacity'),
    capacityId: readString(workspace, 'capacityId'),
    reportCount: readNodes(workspace, 'reports').length,
    datasetCount: readNodes(workspace, 'datasets').length,
    dataflowCount: readNodes(workspace, 'dataflows').length,
  };
}

function toReportRecord(report: JsonObject, keys: WorkspaceKeys): ReportRecord {
  return {
    ...keys,
    reportId: readString(report, 'id'),
    reportName: readString(report, 'name'),
    reportType: readString(report, 'reportType'),
    datasetId: readString(report, 'datasetId'),
    createdBy: readString(report, 'createdBy'),
    createdDateTime: readString(report, 'createdDateTime'),
    modifiedBy: readString(report, 'modifiedBy'),
    modifiedDateTime: readString(report, 'modifiedDateTime'),
    endorsement: readString(readObject(report, 'endorsementDetails'), 'endorsement'),
  };
}

function toDatasetRecord(dataset: JsonObject, keys: DatasetKeys): DatasetRecord {
  const tableCount = readNodes(dataset, 'tables').length;
  return {
    ...keys,
    configuredBy: readString(dataset, 'configuredBy'),
    createdDate: readString(dataset, 'createdDate'),
    contentProviderType: readString(dataset, 'contentProviderType'),
    targetStorageMode: readString(dataset, 'targetStorageMode'),
    isRefreshable: readBoolean(dataset, 'isRefreshable'),
    isEffectiveIdentityRequired: readBoolean(dataset, 'isEffectiveIdentityRequired'),
    tableCount,
    hasSchemaData: tableCount > 0,
    refreshHistoryStatus: null,
    hasRefreshHistory: null,
    refreshHistoryError: null,
    lastRefreshStatus: null,
    lastRefreshType: null,
    lastRefreshStartTime: null,
    lastRefreshEndTime: null,
    lastRefreshError: null,
  };
}

function flattenTables(dataset: JsonObject, keys: DatasetKeys, out: FlatTables): void {
  const { workspaceId, datasetId, datasetName } = keys;

  for (const table of readNodes(dataset, 'tables')) {
    const tableName = readString(table, 'name');
    const columns = readNodes(table, 'columns');
    const measures = readNodes(table, 'measures');

    out.tables.push({
      ...keys,
      tableName,
      isHidden: readBoolean(table, 'isHidden'),
      storageMode: readString(table, 'storageMode'),
      columnCount: columns.length,
      measureCount: measures.length,
      sourceExpression: readString(readNodes(table, 'source')[0], 'expression'),
    } satisfies TableRecord);

    for (const column of columns) {
      out.columns.push({
        workspaceId,
        datasetId,
        datasetName,
        tableName,
        columnName: readString(column, 'name'),
        dataType: readString(column, 'dataType'),
        columnType: readString(column, 'columnType'),
        isHidden: readBoolean(column, 'isHidden'),
        expression: readString(column, 'expression'),
      } satisfies ColumnRecord);
    }

    for (const measure of measures) {
      out.measures.push({
        workspaceId,
        datasetId,
        datasetName,
        tableName,
        measureName: readString(measure, 'name'),
        expression: readString(measure, 'expression'),
        description: readString(measure, 'description'),
        isHidden: readBoolean(measure, 'isHidden'),
      } satisfies MeasureRecord);
    }
  }
}

function flattenDatasources(
  dataset: JsonObject,
  keys: DatasetKeys,
  instances: ReadonlyMap<string, JsonObject>,
  out: FlatTables
): void {
  const { workspaceId, datasetId, datasetName } = keys;

  for (const datasource of readNodes(dataset, 'datasources')) {
    out.datasources.push({
      workspaceId,
      datasetId,
      datasetName,
      datasourceId: readString(datasource, 'datasourceId'),
      datasourceType: readString(datasource, 'datasourceType'),
      connectionDetails: readJson(datasource, 'connectionDetails'),
      gatewayId: readString(datasource, 'gatewayId'),
      origin: 'dataset',
    } satisfies DatasourceRecord);
  }

  for (const usage of readNodes(dataset, 'datasourceUsages')) {
    const instanceId = readString(usage, 'datasourceInstanceId');
    const instance = instanceId ? instances.get(instanceId) : undefined;
    out.datasources.push({
      workspaceId,
      datasetId,
      datasetName,
      datasourceId: instanceId,
      datasourceType: readString(instance, 'datasourceType'),
      connectionDetails: readJson(instance, 'connectionDetails'),
      gatewayId: readString(instance, 'gatewayId'),
      origin: 'instance',
    } satisfies DatasourceRecord);
  }
}

function flattenLineage(dataset: JsonObject, keys: DatasetKeys, out: FlatTables): void {
  const { workspaceId, datasetId, datasetName } = keys;

  for (const upstream of readNodes(dataset, 'upstreamDatasets')) {
    out.lineage.push({
      workspaceId,
      datasetId,
      datasetName,
      upstreamType: 'Dataset',
      upstreamId: readString(upstream, 'targetDatasetId') ?? readString(upstream, 'datasetId'),
      upstreamWorkspaceId: readString(upstream, 'groupId'),
    } satisfies LineageRecord);
  }

  for (const upstream of readNodes(dataset, 'upstreamDataflows')) {
    out.lineage.push({
      workspaceId,
      datasetId,
      datasetName,
      upstreamType: 'Dataflow',
      upstreamId: readString(upstream, 'targetDataflowId') ?? readString(upstream, 'dataflowId'),
      upstreamWorkspaceId: readString(upstream, 'groupId'),
    } satisfies LineageRecord);
  }
}

function flattenExpressions(dataset: JsonObject, keys: DatasetKeys, out: FlatTables): void {
  for (const expression of readNodes(dataset, 'expressions')) {
    out.expressions.push({
      workspaceId: keys.workspaceId,
      datasetId: keys.datasetId,
      datasetName: keys.datasetName,
      expressionName: readString(expression, 'name'),
      expression: readString(expression, 'expression'),
      description: readString(expression, 'description'),
    } satisfies ExpressionRecord);
  }
}

function indexDatasourceInstances(document: MergedDocument): Map<string, JsonObject> {
  const instances = new Map<string, JsonObject>();
  for (const instance of document.datasourceInstances) {
    const id = readString(instance, 'datasourceId');
    if (id && !instances.has(id)) instances.set(id, instance);
  }
  return instances;
}

/**
 * Walks the merged document top-down and emits one flat record per entity,
 * carrying parent keys. Absent collections at any level are skipped and
 * absent fields read as null. Refresh-history columns are left null; see
 * `applyRefreshHistory`.
 */
export function flattenScanDocument(document: MergedDocument, statistics?: RunStatistics): FlatTables {
  const out = emptyFlatTables();
  const instances = indexDatasourceInstances(document);

  for (const workspace of document.workspaces) {
    const workspaceKeys: WorkspaceKeys = {
      workspaceId: readString(workspace, 'id'),
      workspaceName: readString(workspace, 'name'),
    };
    out.workspaces.push(toWorkspaceRecord(workspace, workspaceKeys));

    for (const report of readNodes(workspace, 'reports')) {
      out.reports.push(toReportRecord(report, workspaceKeys));
    }

    for (const dataflow of readNodes(workspace, 'dataflows')) {
      out.dataflows.push({
        ...workspaceKeys,
        dataflowId: readString(dataflow, 'objectId') ?? readString(dataflow, 'id'),
        dataflowName: readString(dataflow, 'name'),
        description: readString(dataflow, 'description'),
        configuredBy: readString(dataflow, 'configuredBy'),
        modifiedDateTime: readString(dataflow, 'modifiedDateTime'),
      } satisfies DataflowRecord);
    }

    for (const dataset of readNodes(workspace, 'datasets')) {
      const datasetKeys: DatasetKeys = {
        ...workspaceKeys,
        datasetId: readString(dataset, 'id'),
        datasetName: readString(dataset, 'name'),
      };
      out.datasets.push(toDatasetRecord(dataset, datasetKeys));
      flattenTables(dataset, datasetKeys, out);
      flattenDatasources(dataset, datasetKeys, instances, out);
      flattenLineage(dataset, datasetKeys, out);
      flattenExpressions(dataset, datasetKeys, out);
    }
  }

  if (statistics) {
    statistics.increment('workspaces', out.workspaces.length);
    statistics.increment('reports', out.reports.length);
    statistics.increment('datasets', out.datasets.length);
    statistics.increment('datasetsWithSchema', out.datasets.filter((d) => d.hasSchemaData).length);
    statistics.increment('tables', out.tables.length);
    statistics.increment('columns', out.columns.length);
    statistics.increment('measures', out.measures.length);
    statistics.increment('datasources', out.datasources.length);
    statistics.increment('lineageEdges', out.lineage.length);
  }

  return out;
}
