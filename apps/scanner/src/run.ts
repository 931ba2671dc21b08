import {
  AdminApiGateway,
  ScanApi,
  StaticTokenProvider,
  createInteractiveTokenProvider,
  getRefreshHistory,
  listAllWorkspaces,
  type AccessTokenProvider,
} from '@scan-harvest/admin-api';
import {
  RunExporter,
  RunStatistics,
  ScanJobRunner,
  applyRefreshHistory,
  flattenScanDocument,
  mergeScanResults,
  parseScanDocument,
  runScans,
  selectWorkspaces,
  validateScanResult,
  type WorkspacePrompt,
} from '@scan-harvest/scan-pipeline';
import {
  errorMessage,
  formatDuration,
  type BatchResult,
  type Logger,
  type RunStatisticsSnapshot,
} from '@scan-harvest/shared';
import { scanOptionsOf, type ScannerConfig } from './config.js';

export interface ScannerDeps {
  logger: Logger;
  /** Overrides the provider derived from the config */
  tokenProvider?: AccessTokenProvider;
  prompt?: WorkspacePrompt;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
}

export interface ScannerOutcome {
  ok: boolean;
  statistics: RunStatisticsSnapshot;
  /** Null when the run stopped before the output directory existed */
  outputDirectory: string | null;
  files: string[];
}

export function createTokenProvider(config: ScannerConfig, logger: Logger): AccessTokenProvider {
  if (config.accessToken) {
    return new StaticTokenProvider(config.accessToken);
  }
  return createInteractiveTokenProvider({
    tenantId: config.tenantId,
    clientId: config.clientId,
    logger,
  });
}

function recordValidation(
  result: BatchResult,
  datasetSchema: boolean,
  statistics: RunStatistics,
  log: Logger
): void {
  const issues = validateScanResult(parseScanDocument(result.rawResult), result.request.workspaceIds, {
    datasetSchema,
  });
  for (const issue of issues) {
    statistics.recordValidationIssue(`Batch ${result.request.batchId}: ${issue}`);
    log.warn('Scan result validation issue', {
      batchId: result.request.batchId,
      scanId: result.scanId,
      issue,
    });
  }
}

/**
 * One harvest run: enumerate, select, scan in batches, merge, flatten,
 * enrich and export.
 *
 * Run-fatal failures (sign-in, enumeration, nothing selected, output
 * directory) are caught here once; the statistics file is still written
 * whenever the output directory exists.
 */
export async function runScanner(config: ScannerConfig, deps: ScannerDeps): Promise<ScannerOutcome> {
  const now = deps.now ?? (() => new Date());
  const startedAt = now();
  const statistics = new RunStatistics(undefined, startedAt);
  const log = deps.logger.child({ runId: statistics.runId });
  const exporter = new RunExporter(config.outputDir, { now: startedAt, logger: log });
  const files: string[] = [];

  try {
    await exporter.prepare();
    log.info('Run started', { outputDirectory: exporter.directory, baseUrl: config.baseUrl });

    const tokenProvider = deps.tokenProvider ?? createTokenProvider(config, log);
    // Sign in before any API call so a missing session aborts immediately
    await tokenProvider.getToken();

    const gateway = new AdminApiGateway({
      baseUrl: config.baseUrl,
      tokenProvider,
      maxRetries: config.maxRetries,
      retryDelaySeconds: config.retryDelaySeconds,
      requestTimeoutMs: config.requestTimeoutMs,
      logger: log,
      sleep: deps.sleep,
    });

    const workspaces = await listAllWorkspaces(gateway, { logger: log });
    const selection = await selectWorkspaces(workspaces, {
      likePattern: config.workspaceFilter,
      interactive: config.interactive,
      prompt: deps.prompt,
      logger: log,
    });
    if (!selection.ok) {
      throw new Error(`Nothing to scan: ${selection.reason}`);
    }

    const options = scanOptionsOf(config);
    const runner = new ScanJobRunner(new ScanApi(gateway, config.retrySubmit), {
      pollIntervalSeconds: config.pollIntervalSeconds,
      maxPollAttempts: config.maxPollAttempts,
      sleep: deps.sleep,
      logger: log,
    });

    const results = await runScans(selection.ids, options, {
      runner,
      statistics,
      logger: log,
      onBatchResult: (result) => recordValidation(result, options.datasetSchema, statistics, log),
    });

    const merged = mergeScanResults(
      results.map((result) => result.rawResult),
      {
        onInvalidDocument: (index) => {
          log.warn('Skipping scan result that is not valid JSON', { batchId: results[index]?.request.batchId });
        },
      }
    );
    const tables = flattenScanDocument(merged, statistics);

    if (config.refreshHistory) {
      tables.refreshHistory = await applyRefreshHistory(
        tables.datasets,
        (workspaceId, datasetId, top) => getRefreshHistory(gateway, workspaceId, datasetId, top),
        { statistics, logger: log }
      );
    }

    files.push(await exporter.writeMergedDocument(merged));
    for (const file of await exporter.writeTables(tables)) {
      files.push(file.path);
    }

    statistics.complete(now());
    files.push(await exporter.writeStatistics(statistics));
    log.info('Run completed', {
      batchesSucceeded: statistics.get('batchesSucceeded'),
      batchesFailed: statistics.get('batchesFailed'),
      files: files.length,
    });

    return { ok: true, statistics: statistics.toJSON(), outputDirectory: exporter.directory, files };
  } catch (error) {
    statistics.recordError(`Run aborted: ${errorMessage(error)}`);
    statistics.complete(now());
    log.fatal('Run aborted', error, { outputDirectory: exporter.directory });

    if (exporter.isPrepared()) {
      try {
        files.push(await exporter.writeStatistics(statistics));
      } catch (writeError) {
        log.error('Failed to write run statistics', writeError);
      }
    }

    return {
      ok: false,
      statistics: statistics.toJSON(),
      outputDirectory: exporter.isPrepared() ? exporter.directory : null,
      files,
    };
  }
}

export function formatSummary(outcome: ScannerOutcome): string[] {
  const s = outcome.statistics;
  const elapsed = s.completedAt ? Date.parse(s.completedAt) - Date.parse(s.startedAt) : 0;

  const lines = [
    `Run ${s.runId} ${outcome.ok ? 'completed' : 'aborted'} in ${formatDuration(elapsed)}`,
    `  Batches:     ${s.batchesSucceeded} succeeded, ${s.batchesFailed} failed`,
    `  Workspaces:  ${s.workspaces}`,
    `  Reports:     ${s.reports}`,
    `  Datasets:    ${s.datasets} (${s.datasetsWithSchema} with schema)`,
    `  Tables:      ${s.tables} (${s.columns} columns, ${s.measures} measures)`,
    `  Datasources: ${s.datasources}`,
    `  Lineage:     ${s.lineageEdges} edges`,
  ];
  const refreshLookups =
    s.refreshHistoryHits + s.refreshHistoryNoHistory + s.refreshHistoryNotSupported + s.refreshHistoryErrors;
  if (refreshLookups > 0) {
    lines.push(
      `  Refresh:     ${s.refreshHistoryHits} with history, ${s.refreshHistoryNoHistory} without, ` +
        `${s.refreshHistoryNotSupported} not supported, ${s.refreshHistoryErrors} errors`
    );
  }
  lines.push(`  Issues:      ${s.validationIssues.length} validation, ${s.errors.length} errors`);
  if (outcome.outputDirectory) {
    lines.push(`  Output:      ${outcome.outputDirectory}`);
  }
  return lines;
}
