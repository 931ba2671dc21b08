import { Command } from 'commander';
import { z } from 'zod';
import {
  DEFAULT_ADMIN_API_BASE_URL,
  DEFAULT_MAX_RETRIES,
  DEFAULT_OUTPUT_DIR,
  DEFAULT_POLL_INTERVAL_SECONDS,
  DEFAULT_REQUEST_TIMEOUT_MS,
  DEFAULT_RETRY_DELAY_SECONDS,
  ConfigError,
  readEnv,
  type ScanOptions,
} from '@scan-harvest/shared';

const BOOLEAN_TEXT: Record<string, boolean> = {
  true: true,
  false: false,
  '1': true,
  '0': false,
  yes: true,
  no: false,
};

/** Env booleans arrive as text; flags arrive as real booleans */
function toggle(fallback: boolean) {
  return z
    .preprocess((value) => {
      if (typeof value !== 'string') return value;
      return BOOLEAN_TEXT[value.toLowerCase()] ?? value;
    }, z.boolean())
    .default(fallback);
}

export const scannerConfigSchema = z.object({
  baseUrl: z.string().url().default(DEFAULT_ADMIN_API_BASE_URL),
  maxRetries: z.coerce.number().int().min(0).default(DEFAULT_MAX_RETRIES),
  retryDelaySeconds: z.coerce.number().int().min(0).default(DEFAULT_RETRY_DELAY_SECONDS),
  pollIntervalSeconds: z.coerce.number().int().min(0).default(DEFAULT_POLL_INTERVAL_SECONDS),
  maxPollAttempts: z.coerce.number().int().min(1).optional(),
  requestTimeoutMs: z.coerce.number().int().positive().default(DEFAULT_REQUEST_TIMEOUT_MS),
  lineage: toggle(true),
  datasourceDetails: toggle(true),
  datasetSchema: toggle(true),
  datasetExpressions: toggle(true),
  refreshHistory: toggle(false),
  retrySubmit: toggle(true),
  workspaceFilter: z.string().min(1).optional(),
  interactive: toggle(false),
  outputDir: z.string().min(1).default(DEFAULT_OUTPUT_DIR),
  accessToken: z.string().min(1).optional(),
  tenantId: z.string().min(1).optional(),
  clientId: z.string().min(1).optional(),
});

export type ScannerConfig = z.infer<typeof scannerConfigSchema>;

const cliFlagsSchema = z.object({
  baseUrl: z.string().optional(),
  maxRetries: z.string().optional(),
  retryDelay: z.string().optional(),
  pollInterval: z.string().optional(),
  maxPollAttempts: z.string().optional(),
  lineage: z.boolean().optional(),
  datasourceDetails: z.boolean().optional(),
  datasetSchema: z.boolean().optional(),
  datasetExpressions: z.boolean().optional(),
  refreshHistory: z.boolean().optional(),
  retrySubmit: z.boolean().optional(),
  filter: z.string().optional(),
  interactive: z.boolean().optional(),
  output: z.string().optional(),
});

export type CliFlags = z.infer<typeof cliFlagsSchema>;

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
  );
}

/**
 * Paired --x / --no-x flags leave the value undefined when neither is given,
 * so the environment still applies.
 */
export function createProgram(): Command {
  return new Command('scan-harvest')
    .description('Harvest workspace metadata through the admin scanner API')
    .option('--base-url <url>', 'admin API root URL')
    .option('--max-retries <n>', 'retries after the first attempt of each call')
    .option('--retry-delay <seconds>', 'fixed delay between attempts')
    .option('--poll-interval <seconds>', 'delay between scan status polls')
    .option('--max-poll-attempts <n>', 'give up on a scan after this many status polls')
    .option('--lineage', 'request lineage')
    .option('--no-lineage')
    .option('--datasource-details', 'request datasource details')
    .option('--no-datasource-details')
    .option('--dataset-schema', 'request tables, columns and measures')
    .option('--no-dataset-schema')
    .option('--dataset-expressions', 'request DAX and M expressions')
    .option('--no-dataset-expressions')
    .option('--refresh-history', 'look up dataset refresh history')
    .option('--no-refresh-history')
    .option('--retry-submit', 'retry failed scan submits')
    .option('--no-retry-submit')
    .option('--filter <pattern>', 'workspace name wildcard (* and ?)')
    .option('--interactive', 'pick workspaces from a list')
    .option('--output <dir>', 'output root directory')
    .exitOverride();
}

export function parseCliFlags(argv: readonly string[]): CliFlags {
  const program = createProgram();
  program.parse([...argv], { from: 'user' });

  const result = cliFlagsSchema.safeParse(program.opts());
  if (!result.success) {
    throw new ConfigError(formatIssues(result.error));
  }
  return result.data;
}

/**
 * Command-line flags win over environment variables, which win over the
 * defaults.
 */
export function loadConfig(argv: readonly string[], env: NodeJS.ProcessEnv = process.env): ScannerConfig {
  const flags = parseCliFlags(argv);

  const result = scannerConfigSchema.safeParse({
    baseUrl: flags.baseUrl ?? readEnv('ADMIN_API_BASE_URL', env),
    maxRetries: flags.maxRetries ?? readEnv('MAX_RETRIES', env),
    retryDelaySeconds: flags.retryDelay ?? readEnv('RETRY_DELAY_SECONDS', env),
    pollIntervalSeconds: flags.pollInterval ?? readEnv('POLL_INTERVAL_SECONDS', env),
    maxPollAttempts: flags.maxPollAttempts ?? readEnv('MAX_POLL_ATTEMPTS', env),
    requestTimeoutMs: readEnv('REQUEST_TIMEOUT_MS', env),
    lineage: flags.lineage ?? readEnv('SCAN_LINEAGE', env),
    datasourceDetails: flags.datasourceDetails ?? readEnv('SCAN_DATASOURCE_DETAILS', env),
    datasetSchema: flags.datasetSchema ?? readEnv('SCAN_DATASET_SCHEMA', env),
    datasetExpressions: flags.datasetExpressions ?? readEnv('SCAN_DATASET_EXPRESSIONS', env),
    refreshHistory: flags.refreshHistory ?? readEnv('SCAN_REFRESH_HISTORY', env),
    retrySubmit: flags.retrySubmit ?? readEnv('RETRY_SCAN_SUBMIT', env),
    workspaceFilter: flags.filter ?? readEnv('WORKSPACE_FILTER', env),
    interactive: flags.interactive,
    outputDir: flags.output ?? readEnv('OUTPUT_DIR', env),
    accessToken: readEnv('ACCESS_TOKEN', env),
    tenantId: readEnv('AZURE_TENANT_ID', env),
    clientId: readEnv('AZURE_CLIENT_ID', env),
  });

  if (!result.success) {
    throw new ConfigError(formatIssues(result.error));
  }
  return result.data;
}

export function scanOptionsOf(config: ScannerConfig): ScanOptions {
  return {
    lineage: config.lineage,
    datasourceDetails: config.datasourceDetails,
    datasetSchema: config.datasetSchema,
    datasetExpressions: config.datasetExpressions,
  };
}
