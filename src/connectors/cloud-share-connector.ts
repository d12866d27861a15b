/**
 * Cloud-share SourceConnector
 *
 * Resolves a share link to its direct-download form and fetches the workbook into
 * memory on every call. The buffer lives only for the duration of one parse.
 */

import axios, { type AxiosInstance, type AxiosResponse } from 'axios';
import { ShareExpiredError, SourceUnreachableError, type MigrationBaseError } from '../lib/error-handler';
import type { Logger } from '../lib/logger';
import { DataSourceModel, type CloudShareSource } from '../models/data-source';
import { parseWorkbook, readSheet, sheetRecords, type ParsedSheet } from './workbook-parser';
import {
  projectRow,
  restartable,
  type ColumnSample,
  type SourceConnector,
  type SourceRow
} from './source-connector';

export interface CloudShareOptions {
  fetchTimeoutMs: number;
  /** Injected client; defaults to a fresh axios instance */
  http?: AxiosInstance;
}

/** Statuses that mean the link itself is no longer valid */
const REVOKED_STATUSES = [401, 403, 404, 410];

/**
 * Convert a share link into a URL that returns the file bytes
 */
export function toDirectDownloadUrl(shareUrl: string): string {
  DataSourceModel.assertShareUrl(shareUrl);
  const url = new URL(shareUrl.trim());

  if (url.searchParams.get('download') === '1' || url.pathname.includes('/download')) {
    return url.toString();
  }

  if (url.pathname.includes('view.aspx')) {
    url.pathname = url.pathname.replace('view.aspx', 'download.aspx');
    return url.toString();
  }

  url.searchParams.set('download', '1');
  return url.toString();
}

/**
 * Map a response status onto the connector taxonomy; null means success
 */
export function statusError(status: number, url: string): MigrationBaseError | null {
  if (status >= 200 && status < 300) {
    return null;
  }
  if (REVOKED_STATUSES.includes(status)) {
    return new ShareExpiredError(`Shared link is no longer accessible (HTTP ${status})`, { status, url });
  }
  return new SourceUnreachableError(`Remote host answered HTTP ${status}`, { status, url });
}

export class CloudShareConnector implements SourceConnector {
  readonly kind = 'cloud-share' as const;
  private readonly http: AxiosInstance;
  private readonly fetchTimeoutMs: number;

  constructor(
    private readonly source: CloudShareSource,
    private readonly logger: Logger,
    options: CloudShareOptions
  ) {
    this.http = options.http ?? axios.create();
    this.fetchTimeoutMs = options.fetchTimeoutMs;
  }

  get downloadUrl(): string {
    return toDirectDownloadUrl(this.source.shareUrl);
  }

  /**
   * Check the link still answers and return the source with a fresh validatedAt
   */
  async validate(now: Date = new Date()): Promise<CloudShareSource> {
    const url = this.downloadUrl;
    const response = await this.request(() => this.http.head(url, this.requestConfig('arraybuffer')), url);

    const error = statusError(response.status, url);
    if (error) {
      throw error;
    }

    this.logger.info('Shared link validated', { source: this.source.displayName });
    return DataSourceModel.markValidated(this.source, now);
  }

  async listContainers(): Promise<string[]> {
    const workbook = parseWorkbook(await this.download(), this.source.displayName);
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
    // every call fetches afresh; nothing to release
  }

  private async loadSheet(container: string): Promise<ParsedSheet> {
    const workbook = parseWorkbook(await this.download(), this.source.displayName);
    return readSheet(workbook, container, this.source.displayName);
  }

  private async download(): Promise<Buffer> {
    const url = this.downloadUrl;
    const response = await this.request(() => this.http.get<ArrayBuffer>(url, this.requestConfig('arraybuffer')), url);

    const error = statusError(response.status, url);
    if (error) {
      throw error;
    }

    const data = Buffer.from(response.data);
    this.logger.debug('Downloaded shared workbook', { source: this.source.displayName, bytes: data.length });
    return data;
  }

  private requestConfig(responseType: 'arraybuffer') {
    return {
      responseType,
      timeout: this.fetchTimeoutMs,
      maxRedirects: 5,
      // statuses are mapped by statusError
      validateStatus: () => true
    };
  }

  private async request<T>(send: () => Promise<AxiosResponse<T>>, url: string): Promise<AxiosResponse<T>> {
    try {
      return await send();
    } catch (error) {
      if (axios.isAxiosError(error)) {
        throw new SourceUnreachableError(`Could not reach shared file: ${error.message}`, {
          url,
          code: error.code
        });
      }
      throw error;
    }
  }
}
