import { isJsonObject, readJson, readString, type JsonObject } from '@scan-harvest/shared';
import type { AdminApiGateway } from './gateway.js';
import { listEnvelopeSchema, type RefreshEntry } from './types.js';

function toRefreshEntry(item: JsonObject): RefreshEntry {
  return {
    requestId: readString(item, 'requestId'),
    id: readString(item, 'id'),
    refreshType: readString(item, 'refreshType'),
    status: readString(item, 'status'),
    startTime: readString(item, 'startTime'),
    endTime: readString(item, 'endTime'),
    serviceExceptionJson: readJson(item, 'serviceExceptionJson'),
  };
}

export function refreshHistoryPath(workspaceId: string, datasetId: string): string {
  return `groups/${encodeURIComponent(workspaceId)}/datasets/${encodeURIComponent(datasetId)}/refreshes`;
}

/**
 * Most recent `top` refreshes of a dataset, newest first.
 *
 * Content types without refresh history (lakehouse, warehouse, ...) answer
 * 404; the HttpError is left for the caller to classify.
 */
export async function getRefreshHistory(
  gateway: AdminApiGateway,
  workspaceId: string,
  datasetId: string,
  top: number
): Promise<RefreshEntry[]> {
  const page = await gateway.get(refreshHistoryPath(workspaceId, datasetId), listEnvelopeSchema, {
    query: { $top: top },
  });
  return (page.value ?? []).filter(isJsonObject).map(toRefreshEntry);
}
