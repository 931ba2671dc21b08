import {
  capErrorMessage,
  generateRunId,
  type RunCounter,
  type RunCounters,
  type RunStatisticsSnapshot,
} from '@scan-harvest/shared';

function emptyCounters(): RunCounters {
  return {
    workspaces: 0,
    reports: 0,
    datasets: 0,
    datasetsWithSchema: 0,
    tables: 0,
    columns: 0,
    measures: 0,
    datasources: 0,
    lineageEdges: 0,
    refreshHistoryHits: 0,
    refreshHistoryNoHistory: 0,
    refreshHistoryNotSupported: 0,
    refreshHistoryErrors: 0,
    batchesSucceeded: 0,
    batchesFailed: 0,
  };
}

/**
 * Run-wide counters and error list. One instance per run, passed by
 * reference through the pipeline stages; append-only.
 */
export class RunStatistics {
  readonly runId: string;
  readonly startedAt: Date;
  private completedAt: Date | null = null;
  private readonly counters: RunCounters = emptyCounters();
  private readonly errors: string[] = [];
  private readonly validationIssues: string[] = [];

  constructor(runId: string = generateRunId(), startedAt: Date = new Date()) {
    this.runId = runId;
    this.startedAt = startedAt;
  }

  increment(counter: RunCounter, by = 1): void {
    this.counters[counter] += by;
  }

  get(counter: RunCounter): number {
    return this.counters[counter];
  }

  recordError(message: string): void {
    this.errors.push(capErrorMessage(message));
  }

  recordValidationIssue(issue: string): void {
    this.validationIssues.push(issue);
  }

  getErrors(): readonly string[] {
    return this.errors;
  }

  getValidationIssues(): readonly string[] {
    return this.validationIssues;
  }

  complete(at: Date = new Date()): void {
    this.completedAt = at;
  }

  toJSON(): RunStatisticsSnapshot {
    return {
      runId: this.runId,
      startedAt: this.startedAt.toISOString(),
      completedAt: this.completedAt ? this.completedAt.toISOString() : null,
      ...this.counters,
      errors: [...this.errors],
      validationIssues: [...this.validationIssues],
    };
  }
}
