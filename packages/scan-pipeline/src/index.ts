export { RunStatistics } from './stats.js';
export { wildcardToRegExp, matchesWildcard } from './glob.js';
export {
  selectWorkspaces,
  isScannableWorkspace,
  type SelectWorkspacesOptions,
  type SelectionResult,
  type WorkspacePrompt,
} from './selector.js';
export { partitionIds } from './batches.js';
export {
  ScanJobRunner,
  isPendingStatus,
  type ScanJobClient,
  type ScanJobRunnerOptions,
  type ScanJobTransition,
} from './job.js';
export { runScans, buildScanRequests, type RunScansDeps, type ScanRunner } from './scheduler.js';
export { parseScanDocument } from './document.js';
export { validateScanResult, type ValidateOptions } from './validator.js';
export { mergeScanDocuments, mergeScanResults, type MergeScanResultsOptions } from './merger.js';
export { flattenScanDocument, emptyFlatTables } from './flatten.js';
export {
  applyRefreshHistory,
  lookupRefreshHistory,
  type ApplyRefreshHistoryOptions,
  type RefreshHistorySource,
  type RefreshLookup,
} from './refresh.js';
export { RunExporter, toCsv, type ExportedFile } from './exporter.js';
