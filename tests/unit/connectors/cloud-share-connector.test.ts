/**
 * Unit Tests: CloudShareConnector
 * Share links are served by an in-process axios adapter
 */

import axios, { AxiosError, type AxiosResponse, type InternalAxiosRequestConfig } from 'axios';
import * as XLSX from 'xlsx';
import { CloudShareConnector, statusError, toDirectDownloadUrl } from '../../../src/connectors/cloud-share-connector';
import { ShareExpiredError, SourceUnreachableError } from '../../../src/lib/error-handler';
import { DataSourceModel, type CloudShareSource } from '../../../src/models/data-source';
import { quietLogger } from '../../helpers/fakes';

const SHARE_URL = 'https://files.example.com/s/inventario';

function shareSource(): CloudShareSource {
  const source = DataSourceModel.create({ kind: 'cloud-share', shareUrl: SHARE_URL, displayName: 'inventario.xlsx' });
  if (source.kind !== 'cloud-share') {
    throw new Error('expected a cloud-share source');
  }
  return source;
}

function workbookBytes(): Buffer {
  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet([['Codigo', 'Cantidad'], ['A-1', 3], ['B-2', 7]]), 'Stock');
  return XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' });
}

type Responder = (config: InternalAxiosRequestConfig) => Promise<AxiosResponse>;

function connectorWith(respond: Responder) {
  const requests: InternalAxiosRequestConfig[] = [];
  const http = axios.create({
    adapter: config => {
      requests.push(config);
      return respond(config);
    }
  });
  return { connector: new CloudShareConnector(shareSource(), quietLogger(), { fetchTimeoutMs: 1000, http }), requests };
}

function reply(config: InternalAxiosRequestConfig, status: number, data: unknown = null): Promise<AxiosResponse> {
  return Promise.resolve({ data, status, statusText: String(status), headers: {}, config });
}

describe('toDirectDownloadUrl', () => {
  test('adds download=1 to plain share links', () => {
    expect(toDirectDownloadUrl(SHARE_URL)).toBe('https://files.example.com/s/inventario?download=1');
  });

  test('rewrites view pages to download pages', () => {
    expect(toDirectDownloadUrl('https://files.example.com/_layouts/15/view.aspx?id=7'))
      .toBe('https://files.example.com/_layouts/15/download.aspx?id=7');
  });

  test('leaves direct links unchanged', () => {
    expect(toDirectDownloadUrl('https://files.example.com/s/abc?download=1')).toBe('https://files.example.com/s/abc?download=1');
    expect(toDirectDownloadUrl('https://files.example.com/download/abc')).toBe('https://files.example.com/download/abc');
  });
});

describe('statusError', () => {
  test('maps revoked-link statuses to ShareExpired and others to SourceUnreachable', () => {
    expect(statusError(200, SHARE_URL)).toBeNull();
    expect(statusError(404, SHARE_URL)).toBeInstanceOf(ShareExpiredError);
    expect(statusError(410, SHARE_URL)?.message).toBe('Shared link is no longer accessible (HTTP 410)');
    expect(statusError(503, SHARE_URL)).toBeInstanceOf(SourceUnreachableError);
  });
});

describe('CloudShareConnector', () => {
  test('downloads the workbook on every call', async () => {
    const { connector, requests } = connectorWith(config => reply(config, 200, workbookBytes()));

    expect(await connector.listContainers()).toEqual(['Stock']);
    expect(await connector.readSchema('Stock', 10)).toEqual([
      { name: 'Codigo', samples: ['A-1', 'B-2'] },
      { name: 'Cantidad', samples: [3, 7] }
    ]);
    expect(requests.map(request => [request.method, request.url])).toEqual([
      ['get', 'https://files.example.com/s/inventario?download=1'],
      ['get', 'https://files.example.com/s/inventario?download=1']
    ]);
    expect(requests[0].timeout).toBe(1000);
  });

  test('an expired link fails with ShareExpired', async () => {
    const { connector } = connectorWith(config => reply(config, 403));

    await expect(connector.listContainers()).rejects.toBeInstanceOf(ShareExpiredError);
  });

  test('network failures are SourceUnreachable', async () => {
    const { connector } = connectorWith(() => Promise.reject(new AxiosError('connect ECONNREFUSED', 'ECONNREFUSED')));

    await expect(connector.listContainers()).rejects.toThrow('Could not reach shared file: connect ECONNREFUSED');
  });

  test('validate stamps validatedAt when the link answers', async () => {
    const at = new Date('2024-05-01T09:00:00Z');
    const { connector, requests } = connectorWith(config => reply(config, 200));

    const validated = await connector.validate(at);

    expect(validated.validatedAt).toEqual(at);
    expect(validated.shareUrl).toBe(SHARE_URL);
    expect(requests[0].method).toBe('head');
  });
});
