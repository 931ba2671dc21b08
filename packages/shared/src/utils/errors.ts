/**
 * Error thrown by the admin API gateway for every non-2xx response.
 */
export class HttpError extends Error {
  public readonly statusCode: number;
  public readonly method: string;
  public readonly path: string;
  public readonly body: string;

  constructor(statusCode: number, method: string, path: string, body: string) {
    super(`Admin API error ${statusCode} on ${method} ${path}: ${body.substring(0, 500) || '(empty body)'}`);
    this.name = 'HttpError';
    this.statusCode = statusCode;
    this.method = method;
    this.path = path;
    this.body = body;
  }
}

/**
 * Not-found is a semantic signal ("this resource/capability does not exist"),
 * not a transient fault.
 */
export function isNotFoundError(error: unknown): boolean {
  return error instanceof HttpError && error.statusCode === 404;
}

/**
 * Batch-scoped scan job failure: missing scan id, non-succeeded terminal
 * status, or poll ceiling exceeded.
 */
export class ScanJobError extends Error {
  public readonly batchId: number;
  public readonly scanId: string | null;
  public readonly status: string | null;

  constructor(message: string, batchId: number, scanId: string | null = null, status: string | null = null) {
    super(message);
    this.name = 'ScanJobError';
    this.batchId = batchId;
    this.scanId = scanId;
    this.status = status;
  }
}

/**
 * Error thrown when a bearer credential cannot be acquired
 */
export class AuthenticationError extends Error {
  public readonly originalError?: Error;

  constructor(message: string, originalError?: Error) {
    super(message);
    this.name = 'AuthenticationError';
    this.originalError = originalError;
  }
}

export class ConfigError extends Error {
  public readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
