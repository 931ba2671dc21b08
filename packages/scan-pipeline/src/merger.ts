import {
  readString,
  type JsonObject,
  type MergedDocument,
  type ScanDocument,
} from '@scan-harvest/shared';
import { parseScanDocument } from './document.js';

function appendFirstSeen(
  target: JsonObject[],
  seen: Set<string>,
  nodes: JsonObject[],
  key: string
): void {
  for (const node of nodes) {
    const id = readString(node, key);
    if (id === null) {
      // Without a key there is nothing to collide on
      target.push(node);
      continue;
    }
    if (seen.has(id)) continue;
    seen.add(id);
    target.push(node);
  }
}

/**
 * Concatenates scan documents in order. The first workspace seen for an id
 * wins and later duplicates are dropped whole, never merged field by field.
 * Datasource instances are deduplicated the same way by `datasourceId`.
 */
export function mergeScanDocuments(documents: readonly ScanDocument[]): MergedDocument {
  const workspaces: JsonObject[] = [];
  const datasourceInstances: JsonObject[] = [];
  const seenWorkspaces = new Set<string>();
  const seenDatasources = new Set<string>();

  for (const document of documents) {
    appendFirstSeen(workspaces, seenWorkspaces, document.workspaces, 'id');
    appendFirstSeen(datasourceInstances, seenDatasources, document.datasourceInstances, 'datasourceId');
  }

  return { workspaces, datasourceInstances, sourceDocuments: documents.length };
}

export interface MergeScanResultsOptions {
  /** Called with the index of each raw document that is not a JSON object */
  onInvalidDocument?: (index: number) => void;
}

/**
 * Parses raw scan result texts in order and merges them.
 */
export function mergeScanResults(
  rawDocuments: readonly string[],
  options: MergeScanResultsOptions = {}
): MergedDocument {
  const documents: ScanDocument[] = [];
  rawDocuments.forEach((raw, index) => {
    const document = parseScanDocument(raw);
    if (document) {
      documents.push(document);
    } else {
      options.onInvalidDocument?.(index);
    }
  });
  return mergeScanDocuments(documents);
}
