import { describe, it, expect } from 'vitest';
import {
  createMockDatasetNode,
  createMockScanDocument,
  createMockWorkspaceNode,
} from '@scan-harvest/shared/testing';
import { parseScanDocument } from '../src/document.js';
import { validateScanResult } from '../src/validator.js';

describe('parseScanDocument', () => {
  it('should return null for text that is not a JSON object', () => {
    expect(parseScanDocument('not json')).toBeNull();
    expect(parseScanDocument('[1,2]')).toBeNull();
  });

  it('should read missing collections as empty', () => {
    expect(parseScanDocument('{}')).toEqual({ workspaces: [], datasourceInstances: [] });
  });
});

describe('validateScanResult', () => {
  it('should report invalid JSON', () => {
    expect(validateScanResult(null, ['a'], { datasetSchema: true })).toEqual(['Scan result is not valid JSON']);
  });

  it('should return no issues for a complete result', () => {
    const document = createMockScanDocument([
      createMockWorkspaceNode({ id: 'a' }),
      createMockWorkspaceNode({ id: 'b' }),
    ]);

    expect(validateScanResult(document, ['a', 'b'], { datasetSchema: true })).toEqual([]);
  });

  it('should name the requested workspaces missing from the result', () => {
    const document = createMockScanDocument([createMockWorkspaceNode({ id: 'a' })]);

    expect(validateScanResult(document, ['a', 'b', 'c'], { datasetSchema: true })).toEqual([
      'Missing 2 of 3 requested workspaces: b, c',
    ]);
  });

  it('should count workspaces without datasets', () => {
    const document = createMockScanDocument([
      createMockWorkspaceNode({ id: 'a', datasets: [] }),
      createMockWorkspaceNode({ id: 'b' }),
    ]);

    expect(validateScanResult(document, ['a', 'b'], { datasetSchema: true })).toEqual([
      '1 workspace(s) returned without datasets',
    ]);
  });

  it('should raise exactly one schema issue for a dataset without tables', () => {
    const document = createMockScanDocument([
      createMockWorkspaceNode({
        id: 'a',
        name: 'Sales',
        datasets: [
          createMockDatasetNode({ id: 'd1', name: 'Orders' }),
          createMockDatasetNode({ id: 'd2', name: 'Lakehouse', tables: [] }),
        ],
      }),
    ]);

    expect(validateScanResult(document, ['a'], { datasetSchema: true })).toEqual([
      '1 dataset(s) without schema (tables): Sales/Lakehouse',
    ]);
  });

  it('should skip the schema check when schema was not requested', () => {
    const document = createMockScanDocument([
      createMockWorkspaceNode({ id: 'a', datasets: [createMockDatasetNode({ tables: [] })] }),
    ]);

    expect(validateScanResult(document, ['a'], { datasetSchema: false })).toEqual([]);
  });
});
