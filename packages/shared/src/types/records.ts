/**
 * Flat record families produced by the flattener. Foreign keys
 * (workspaceId, datasetId, tableName) are carried through; nothing else
 * links the families together.
 */

export type FlatValue = string | number | boolean | null;

export interface WorkspaceRecord {
  workspaceId: string | null;
  workspaceName: string | null;
  workspaceType: string | null;
  workspaceState: string | null;
  description: string | null;
  isOnDedicatedCapacity: boolean | null;
  capacityId: string | null;
  reportCount: number;
  datasetCount: number;
  dataflowCount: number;
}

export interface ReportRecord {
  workspaceId: string | null;
  workspaceName: string | null;
  reportId: string | null;
  reportName: string | null;
  reportType: string | null;
  datasetId: string | null;
  createdBy: string | null;
  createdDateTime: string | null;
  modifiedBy: string | null;
  modifiedDateTime: string | null;
  endorsement: string | null;
}

/** Outcome of a refresh-history lookup; never conflate NotSupported with Error */
export type RefreshHistoryStatus = 'HasRefreshHistory' | 'NoHistory' | 'NotSupported' | 'Error';

export interface DatasetRecord {
  workspaceId: string | null;
  workspaceName: string | null;
  datasetId: string | null;
  datasetName: string | null;
  configuredBy: string | null;
  createdDate: string | null;
  contentProviderType: string | null;
  targetStorageMode: string | null;
  isRefreshable: boolean | null;
  isEffectiveIdentityRequired: boolean | null;
  tableCount: number;
  hasSchemaData: boolean;
  /** Null when refresh history was not requested for this run */
  refreshHistoryStatus: RefreshHistoryStatus | null;
  hasRefreshHistory: boolean | null;
  /** Lookup failure message when refreshHistoryStatus is 'Error' */
  refreshHistoryError: string | null;
  lastRefreshStatus: string | null;
  lastRefreshType: string | null;
  lastRefreshStartTime: string | null;
  lastRefreshEndTime: string | null;
  lastRefreshError: string | null;
}

export interface TableRecord {
  workspaceId: string | null;
  workspaceName: string | null;
  datasetId: string | null;
  datasetName: string | null;
  tableName: string | null;
  isHidden: boolean | null;
  storageMode: string | null;
  columnCount: number;
  measureCount: number;
  sourceExpression: string | null;
}

export interface ColumnRecord {
  workspaceId: string | null;
  datasetId: string | null;
  datasetName: string | null;
  tableName: string | null;
  columnName: string | null;
  dataType: string | null;
  columnType: string | null;
  isHidden: boolean | null;
  expression: string | null;
}

export interface MeasureRecord {
  workspaceId: string | null;
  datasetId: string | null;
  datasetName: string | null;
  tableName: string | null;
  measureName: string | null;
  expression: string | null;
  description: string | null;
  isHidden: boolean | null;
}

export interface DatasourceRecord {
  workspaceId: string | null;
  datasetId: string | null;
  datasetName: string | null;
  datasourceId: string | null;
  datasourceType: string | null;
  /** Serialized connectionDetails object */
  connectionDetails: string | null;
  gatewayId: string | null;
  /** 'dataset' for inline entries, 'instance' for usages joined to datasourceInstances */
  origin: 'dataset' | 'instance';
}

export interface LineageRecord {
  workspaceId: string | null;
  datasetId: string | null;
  datasetName: string | null;
  upstreamType: 'Dataset' | 'Dataflow';
  upstreamId: string | null;
  upstreamWorkspaceId: string | null;
}

export interface ExpressionRecord {
  workspaceId: string | null;
  datasetId: string | null;
  datasetName: string | null;
  expressionName: string | null;
  expression: string | null;
  description: string | null;
}

export interface DataflowRecord {
  workspaceId: string | null;
  workspaceName: string | null;
  dataflowId: string | null;
  dataflowName: string | null;
  description: string | null;
  configuredBy: string | null;
  modifiedDateTime: string | null;
}

export interface RefreshHistoryRecord {
  workspaceId: string;
  workspaceName: string | null;
  datasetId: string;
  datasetName: string | null;
  requestId: string | null;
  refreshType: string | null;
  status: string | null;
  startTime: string | null;
  endTime: string | null;
  durationMinutes: number | null;
  serviceExceptionJson: string | null;
}

export interface FlatTables {
  workspaces: WorkspaceRecord[];
  reports: ReportRecord[];
  datasets: DatasetRecord[];
  tables: TableRecord[];
  columns: ColumnRecord[];
  measures: MeasureRecord[];
  datasources: DatasourceRecord[];
  lineage: LineageRecord[];
  expressions: ExpressionRecord[];
  dataflows: DataflowRecord[];
  refreshHistory: RefreshHistoryRecord[];
}

export type FlatFamily = keyof FlatTables;

export const FLAT_FAMILIES: readonly FlatFamily[] = [
  'workspaces',
  'reports',
  'datasets',
  'tables',
  'columns',
  'measures',
  'datasources',
  'lineage',
  'expressions',
  'dataflows',
  'refreshHistory',
];
