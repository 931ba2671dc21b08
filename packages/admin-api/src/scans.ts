import {
  ADMIN_API_PATHS,
  type ScanOptions,
} from '@scan-harvest/shared';
import type { AdminApiGateway } from './gateway.js';
import { scanJobResponseSchema, type ScanJobResponse } from './types.js';

/**
 * Scan flags are sent as `True` when requested and omitted otherwise.
 */
export function scanQueryFlags(options: ScanOptions): Record<string, string | undefined> {
  return {
    lineage: options.lineage ? 'True' : undefined,
    datasourceDetails: options.datasourceDetails ? 'True' : undefined,
    datasetSchema: options.datasetSchema ? 'True' : undefined,
    datasetExpressions: options.datasetExpressions ? 'True' : undefined,
  };
}

/**
 * Scanner endpoints: submit, status and result of asynchronous scan jobs.
 */
export class ScanApi {
  constructor(
    private readonly gateway: AdminApiGateway,
    private readonly retrySubmit = true
  ) {}

  async submitScan(workspaceIds: string[], options: ScanOptions): Promise<ScanJobResponse> {
    return this.gateway.post(
      ADMIN_API_PATHS.SCAN_SUBMIT,
      { workspaces: workspaceIds },
      scanJobResponseSchema,
      { query: scanQueryFlags(options), retry: this.retrySubmit }
    );
  }

  async getScanStatus(scanId: string): Promise<ScanJobResponse> {
    return this.gateway.get(
      `${ADMIN_API_PATHS.SCAN_STATUS}/${encodeURIComponent(scanId)}`,
      scanJobResponseSchema
    );
  }

  /**
   * Raw ScanDocument JSON text, passed through the pipeline unparsed.
   */
  async getScanResult(scanId: string): Promise<string> {
    return this.gateway.getText(`${ADMIN_API_PATHS.SCAN_RESULT}/${encodeURIComponent(scanId)}`);
  }
}
