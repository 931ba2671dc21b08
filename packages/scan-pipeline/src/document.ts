import {
  parseJsonObject,
  readNodes,
  type ScanDocument,
} from '@scan-harvest/shared';

/**
 * Parses raw scan result text. Returns null when the text is not a JSON
 * object; missing collections read as empty.
 */
export function parseScanDocument(raw: string): ScanDocument | null {
  const parsed = parseJsonObject(raw);
  if (!parsed) return null;
  return {
    workspaces: readNodes(parsed, 'workspaces'),
    datasourceInstances: readNodes(parsed, 'datasourceInstances'),
  };
}
