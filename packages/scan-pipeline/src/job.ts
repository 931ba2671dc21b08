import {
  DEFAULT_POLL_INTERVAL_SECONDS,
  SCAN_JOB_STATUSES,
  ScanJobError,
  nullLogger,
  sleep as realSleep,
  type BatchResult,
  type Logger,
  type ScanJob,
  type ScanJobStatus,
  type ScanOptions,
  type ScanRequest,
} from '@scan-harvest/shared';
import type { ScanJobResponse } from '@scan-harvest/admin-api';

/**
 * The scan endpoints the state machine drives. `ScanApi` implements it;
 * tests substitute an in-memory fake.
 */
export interface ScanJobClient {
  submitScan(workspaceIds: string[], options: ScanOptions): Promise<ScanJobResponse>;
  getScanStatus(scanId: string): Promise<ScanJobResponse>;
  getScanResult(scanId: string): Promise<string>;
}

export interface ScanJobTransition {
  job: Readonly<ScanJob>;
  from: ScanJobStatus | 'Submitted';
  to: ScanJobStatus;
  /** Status polls made so far */
  polls: number;
}

export interface ScanJobRunnerOptions {
  pollIntervalSeconds?: number;
  /**
   * Optional ceiling on status polls. Unset means poll until terminal; a
   * stuck job then blocks its batch indefinitely.
   */
  maxPollAttempts?: number;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
  onTransition?: (transition: ScanJobTransition) => void;
}

export function isPendingStatus(status: ScanJobStatus): boolean {
  return status === SCAN_JOB_STATUSES.NOT_STARTED || status === SCAN_JOB_STATUSES.RUNNING;
}

/**
 * Drives one batch through submit -> poll -> terminal -> fetch.
 *
 *   Submitted -> {NotStarted, Running}* -> Succeeded | Failed
 *
 * Any terminal status other than Succeeded fails the batch with a
 * ScanJobError. Gateway errors propagate unchanged.
 */
export class ScanJobRunner {
  private readonly client: ScanJobClient;
  private readonly pollIntervalMs: number;
  private readonly maxPollAttempts?: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly logger: Logger;
  private readonly onTransition?: (transition: ScanJobTransition) => void;

  constructor(client: ScanJobClient, options: ScanJobRunnerOptions = {}) {
    this.client = client;
    this.pollIntervalMs = (options.pollIntervalSeconds ?? DEFAULT_POLL_INTERVAL_SECONDS) * 1000;
    this.maxPollAttempts = options.maxPollAttempts;
    this.sleep = options.sleep ?? realSleep;
    this.logger = options.logger ?? nullLogger;
    this.onTransition = options.onTransition;
  }

  async run(request: ScanRequest): Promise<BatchResult> {
    const log = this.logger.child({ batchId: String(request.batchId) });

    log.info('Submitting scan', { workspaces: request.workspaceIds.length });
    const submitted = await this.client.submitScan(request.workspaceIds, request.options);

    const scanId = submitted.id;
    if (!scanId) {
      throw new ScanJobError(`Scan submit for batch ${request.batchId} returned no scan id`, request.batchId);
    }

    const job: ScanJob = {
      scanId,
      status: submitted.status ?? SCAN_JOB_STATUSES.NOT_STARTED,
      submittedRequest: request,
    };
    const jobLog = log.child({ scanId });
    this.emit(job, 'Submitted', job.status, 0, jobLog);

    let polls = 0;
    while (isPendingStatus(job.status)) {
      if (this.maxPollAttempts !== undefined && polls >= this.maxPollAttempts) {
        throw new ScanJobError(
          `Scan ${scanId} for batch ${request.batchId} still ${job.status} after ${polls} status polls`,
          request.batchId,
          scanId,
          job.status
        );
      }

      await this.sleep(this.pollIntervalMs);
      const status = await this.client.getScanStatus(scanId);
      polls++;

      // A response without a status leaves the job where it was
      const next = status.status ?? job.status;
      if (next !== job.status) {
        const previous = job.status;
        job.status = next;
        this.emit(job, previous, next, polls, jobLog);
      } else {
        jobLog.debug('Scan still pending', { status: job.status, polls });
      }
    }

    if (job.status !== SCAN_JOB_STATUSES.SUCCEEDED) {
      throw new ScanJobError(
        `Scan ${scanId} for batch ${request.batchId} ended with status ${job.status}`,
        request.batchId,
        scanId,
        job.status
      );
    }

    const rawResult = await this.client.getScanResult(scanId);
    jobLog.info('Scan result fetched', { polls, bytes: rawResult.length });

    return { request, scanId, rawResult };
  }

  private emit(
    job: ScanJob,
    from: ScanJobStatus | 'Submitted',
    to: ScanJobStatus,
    polls: number,
    log: Logger
  ): void {
    log.info('Scan status changed', { from, to, polls });
    this.onTransition?.({ job: { ...job }, from, to, polls });
  }
}
