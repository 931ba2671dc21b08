/** Default admin REST root (tenant-scoped "myorg" path) */
export const DEFAULT_ADMIN_API_BASE_URL = 'https://api.powerbi.com/v1.0/myorg';
/** OAuth scope requested for the signed-in principal */
export const ADMIN_API_SCOPE = 'https://analysis.windows.net/powerbi/api/.default';

/** Hard per-request cap on workspace ids accepted by the scan submit endpoint */
export const SCAN_BATCH_MAX_WORKSPACES = 100;
/** Page size used when enumerating workspaces through the admin listing */
export const WORKSPACE_PAGE_SIZE = 5000;

export const DEFAULT_MAX_RETRIES = 3;
export const DEFAULT_RETRY_DELAY_SECONDS = 5;
export const DEFAULT_POLL_INTERVAL_SECONDS = 5;
/** Per-request timeout; scan results for 100 workspaces can be large */
export const DEFAULT_REQUEST_TIMEOUT_MS = 120_000;

/** Refresh entries pulled for the inline Dataset summary columns */
export const REFRESH_SUMMARY_TOP = 1;
/** Refresh entries pulled for the detailed refresh-history export */
export const REFRESH_DETAIL_TOP = 5;

export const TOKEN_EXPIRY_BUFFER_MS = 5 * 60 * 1000; // 5 minutes

export const SCAN_JOB_STATUSES = {
  NOT_STARTED: 'NotStarted',
  RUNNING: 'Running',
  SUCCEEDED: 'Succeeded',
  FAILED: 'Failed',
} as const;

export const ADMIN_API_PATHS = {
  WORKSPACES: 'admin/groups',
  SCAN_SUBMIT: 'admin/workspaces/getInfo',
  SCAN_STATUS: 'admin/workspaces/scanStatus',
  SCAN_RESULT: 'admin/workspaces/scanResult',
} as const;

export const DEFAULT_OUTPUT_DIR = './output';
