export interface RunCounters {
  workspaces: number;
  reports: number;
  datasets: number;
  datasetsWithSchema: number;
  tables: number;
  columns: number;
  measures: number;
  datasources: number;
  lineageEdges: number;
  refreshHistoryHits: number;
  refreshHistoryNoHistory: number;
  refreshHistoryNotSupported: number;
  refreshHistoryErrors: number;
  batchesSucceeded: number;
  batchesFailed: number;
}

export type RunCounter = keyof RunCounters;

/** Serialized form written to run_statistics_<ts>.json */
export interface RunStatisticsSnapshot extends RunCounters {
  runId: string;
  startedAt: string;
  completedAt: string | null;
  errors: string[];
  validationIssues: string[];
}
