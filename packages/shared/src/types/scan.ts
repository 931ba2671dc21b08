/**
 * Scan domain types.
 *
 * Scan documents are loosely typed: every nested field is optional and an
 * absent collection is an expected state. Nodes are therefore plain JSON
 * objects read through the accessors in `utils/json.ts`, never a strict schema.
 */

export type JsonObject = Record<string, unknown>;

export interface WorkspaceRef {
  id: string;
  name: string;
  /** 'Active', 'Deleted', 'Removing', ... */
  state: string | null;
  /** 'Workspace', 'PersonalGroup', 'Group', ... */
  type: string | null;
  isOnDedicatedCapacity: boolean;
  capacityId: string | null;
}

export interface ScanOptions {
  lineage: boolean;
  datasourceDetails: boolean;
  datasetSchema: boolean;
  datasetExpressions: boolean;
}

export interface ScanRequest {
  /** 1-based ordinal of the batch within the run */
  batchId: number;
  workspaceIds: string[];
  options: ScanOptions;
}

export type ScanJobStatus = 'NotStarted' | 'Running' | 'Succeeded' | 'Failed' | (string & {});

export interface ScanJob {
  scanId: string;
  status: ScanJobStatus;
  submittedRequest: ScanRequest;
}

/**
 * Workspace node. Known fields: id, name, type, state, description,
 * isOnDedicatedCapacity, capacityId, reports, datasets, dataflows, dashboards.
 */
export type WorkspaceNode = JsonObject;
/** Dataset node. Known fields: id, name, tables, datasources, datasourceUsages, expressions, upstreamDatasets, upstreamDataflows. */
export type DatasetNode = JsonObject;
/** Table node. Known fields: name, isHidden, storageMode, columns, measures, source. */
export type TableNode = JsonObject;

export interface ScanDocument {
  workspaces: WorkspaceNode[];
  /** Document-level datasource catalogue referenced by `datasourceUsages` */
  datasourceInstances: JsonObject[];
}

/** Same shape as a ScanDocument, workspaces unique by id (first seen wins) */
export interface MergedDocument extends ScanDocument {
  /** Number of raw documents that contributed */
  sourceDocuments: number;
}

/** Raw result of one succeeded batch, passed through the pipeline unparsed */
export interface BatchResult {
  request: ScanRequest;
  scanId: string;
  rawResult: string;
}
