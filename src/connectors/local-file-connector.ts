/**
 * Local-file SourceConnector
 * Re-reads and re-parses the file on every call; nothing is cached between calls.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { SourceUnreachableError, errorCodeOf } from '../lib/error-handler';
import type { Logger } from '../lib/logger';
import type { LocalFileSource } from '../models/data-source';
import { parseWorkbook, readSheet, sheetRecords, type ParsedSheet } from './workbook-parser';
import {
  projectRow,
  restartable,
  type ColumnSample,
  type SourceConnector,
  type SourceRow
} from './source-connector';

export class LocalFileConnector implements SourceConnector {
  readonly kind = 'local-file' as const;

  constructor(
    private readonly source: LocalFileSource,
    private readonly logger: Logger,
    private readonly baseDirectory: string = process.cwd()
  ) {}

  async listContainers(): Promise<string[]> {
    const workbook = parseWorkbook(await this.readFile(), this.source.path);
    return [...workbook.SheetNames];
  }

  async readSchema(container: string, sampleSize: number): Promise<ColumnSample[]> {
    const sheet = await this.loadSheet(container);
    const sampled = sheet.rows.slice(0, sampleSize);

    return sheet.columns.map((name, index) => ({
      name,
      samples: sampled.map(row => row[index])
    }));
  }

  fetchRows(container: string, columns: string[]): AsyncIterable<SourceRow> {
    const load = (): Promise<ParsedSheet> => this.loadSheet(container);

    return restartable(async function* () {
      const sheet = await load();
      for (const record of sheetRecords(sheet)) {
        yield projectRow(record, columns);
      }
    });
  }

  async close(): Promise<void> {
    // no resources held between calls
  }

  private resolvedPath(): string {
    return path.resolve(this.baseDirectory, this.source.path);
  }

  private async loadSheet(container: string): Promise<ParsedSheet> {
    const workbook = parseWorkbook(await this.readFile(), this.source.path);
    return readSheet(workbook, container, this.source.displayName);
  }

  private async readFile(): Promise<Buffer> {
    const filePath = this.resolvedPath();
    try {
      const data = await fs.readFile(filePath);
      this.logger.debug('Read source file', { path: filePath, bytes: data.length });
      return data;
    } catch (error) {
      const code = errorCodeOf(error);
      throw new SourceUnreachableError(
        code === 'ENOENT' ? `File not found: ${filePath}` : `Cannot read file ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
        { path: filePath, code }
      );
    }
  }
}
