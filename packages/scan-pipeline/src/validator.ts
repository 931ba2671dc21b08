import {
  readNodes,
  readString,
  type ScanDocument,
} from '@scan-harvest/shared';

export interface ValidateOptions {
  /** Whether dataset schema (tables) was requested for the scan */
  datasetSchema: boolean;
}

/**
 * Sanity checks a fetched scan against the ids that were requested.
 * Issues are informational: this never throws.
 */
export function validateScanResult(
  document: ScanDocument | null,
  expectedIds: readonly string[],
  options: ValidateOptions
): string[] {
  if (!document) {
    return ['Scan result is not valid JSON'];
  }

  const issues: string[] = [];
  const returnedIds = new Set<string>();
  for (const workspace of document.workspaces) {
    const id = readString(workspace, 'id');
    if (id) returnedIds.add(id);
  }

  const missing = expectedIds.filter((id) => !returnedIds.has(id));
  if (missing.length > 0) {
    issues.push(`Missing ${missing.length} of ${expectedIds.length} requested workspaces: ${missing.join(', ')}`);
  }

  const withoutDatasets = document.workspaces.filter((w) => readNodes(w, 'datasets').length === 0).length;
  if (withoutDatasets > 0) {
    issues.push(`${withoutDatasets} workspace(s) returned without datasets`);
  }

  if (options.datasetSchema) {
    const withoutSchema: string[] = [];
    for (const workspace of document.workspaces) {
      const workspaceLabel = readString(workspace, 'name') ?? readString(workspace, 'id') ?? '(unnamed)';
      for (const dataset of readNodes(workspace, 'datasets')) {
        if (readNodes(dataset, 'tables').length > 0) continue;
        const datasetLabel = readString(dataset, 'name') ?? readString(dataset, 'id') ?? '(unnamed)';
        withoutSchema.push(`${workspaceLabel}/${datasetLabel}`);
      }
    }
    if (withoutSchema.length > 0) {
      issues.push(`${withoutSchema.length} dataset(s) without schema (tables): ${withoutSchema.join(', ')}`);
    }
  }

  return issues;
}

