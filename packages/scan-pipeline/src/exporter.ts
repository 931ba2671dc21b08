import { mkdir, rename, writeFile } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { stringify } from 'csv-stringify/sync';
import {
  FLAT_FAMILIES,
  formatFileTimestamp,
  nullLogger,
  type FlatFamily,
  type FlatTables,
  type Logger,
  type MergedDocument,
} from '@scan-harvest/shared';
import type { RunStatistics } from './stats.js';

const FAMILY_FILE_NAMES: Record<FlatFamily, string> = {
  workspaces: 'workspaces',
  reports: 'reports',
  datasets: 'datasets',
  tables: 'tables',
  columns: 'columns',
  measures: 'measures',
  datasources: 'datasources',
  lineage: 'lineage',
  expressions: 'expressions',
  dataflows: 'dataflows',
  refreshHistory: 'refresh_history',
};

export interface ExportedFile {
  family: FlatFamily;
  path: string;
  rows: number;
}

/**
 * CSV with a header row taken from the record's own field order.
 * Booleans are written as true/false, nulls as empty cells.
 */
export function toCsv(records: readonly object[]): string {
  const first = records[0];
  if (!first) return '';
  return stringify([...records], {
    header: true,
    columns: Object.keys(first),
    cast: {
      boolean: (value) => (value ? 'true' : 'false'),
    },
  });
}

/**
 * Writes one run's outputs under `<outputRoot>/scan_<timestamp>/`.
 *
 * Every file is written to a .tmp sibling first and then renamed, so a
 * reader never sees a half-written table.
 */
export class RunExporter {
  readonly timestamp: string;
  readonly directory: string;
  private readonly logger: Logger;
  private prepared = false;

  constructor(outputRoot: string, options: { now?: Date; logger?: Logger } = {}) {
    this.timestamp = formatFileTimestamp(options.now ?? new Date());
    this.directory = resolve(outputRoot, `scan_${this.timestamp}`);
    this.logger = options.logger ?? nullLogger;
  }

  /**
   * Creates the run directory. Failure here is fatal for the run.
   */
  async prepare(): Promise<void> {
    try {
      await mkdir(this.directory, { recursive: true });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new Error(`Cannot create output directory ${this.directory}: ${message}`);
    }
    this.prepared = true;
  }

  isPrepared(): boolean {
    return this.prepared;
  }

  async writeMergedDocument(document: MergedDocument): Promise<string> {
    const payload = {
      workspaces: document.workspaces,
      datasourceInstances: document.datasourceInstances,
    };
    return this.writeAtomic(`scan_result_${this.timestamp}.json`, JSON.stringify(payload, null, 2));
  }

  /**
   * Writes one CSV per family that has at least one record.
   */
  async writeTables(tables: FlatTables): Promise<ExportedFile[]> {
    const written: ExportedFile[] = [];
    for (const family of FLAT_FAMILIES) {
      const records: readonly object[] = tables[family];
      if (records.length === 0) {
        this.logger.debug('Skipping empty export family', { family });
        continue;
      }
      const path = await this.writeAtomic(`${FAMILY_FILE_NAMES[family]}_${this.timestamp}.csv`, toCsv(records));
      written.push({ family, path, rows: records.length });
    }
    return written;
  }

  async writeStatistics(statistics: RunStatistics): Promise<string> {
    return this.writeAtomic(
      `run_statistics_${this.timestamp}.json`,
      JSON.stringify(statistics.toJSON(), null, 2)
    );
  }

  private async writeAtomic(fileName: string, content: string): Promise<string> {
    const target = join(this.directory, fileName);
    const temp = `${target}.tmp`;
    await writeFile(temp, content, 'utf8');
    await rename(temp, target);
    this.logger.info('Export written', { file: fileName, bytes: Buffer.byteLength(content, 'utf8') });
    return target;
  }
}
