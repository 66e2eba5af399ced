import type { EntryResult } from '../types';
import { decodeEntry } from './entryDecoder';

export interface EntryClient {
  fetchLatest(): Promise<EntryResult>;
  fetchByNumber(number: number): Promise<EntryResult>;
}

interface HttpEntryClientOptions {
  baseUrl: string;
  fetchImpl?: typeof fetch;
}

const INFO_DOCUMENT = 'info.0.json';

function describeNetworkFailure(error: unknown): string {
  return error instanceof Error ? error.message : 'request failed';
}

/**
 * Reads archive entries through a proxy prefix. The archive itself does not
 * allow cross-origin reads, so `baseUrl` points at whatever relays
 * `<baseUrl>/info.0.json` and `<baseUrl>/<n>/info.0.json`.
 */
export class HttpEntryClient implements EntryClient {
  private readonly baseUrl: string;
  private readonly fetchImpl: (input: RequestInfo | URL, init?: RequestInit) => Promise<Response>;

  constructor(options: HttpEntryClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    const selectedFetch = options.fetchImpl ?? globalThis.fetch.bind(globalThis);
    // Wrap to avoid calling a Window-bound fetch with the client as `this`.
    this.fetchImpl = (input, init) => selectedFetch(input, init);
  }

  fetchLatest(): Promise<EntryResult> {
    return this.fetchEntry(`${this.baseUrl}/${INFO_DOCUMENT}`);
  }

  fetchByNumber(number: number): Promise<EntryResult> {
    return this.fetchEntry(`${this.baseUrl}/${number}/${INFO_DOCUMENT}`);
  }

  private async fetchEntry(url: string): Promise<EntryResult> {
    let response: Response;
    try {
      response = await this.fetchImpl(url, { headers: { Accept: 'application/json' } });
    } catch (error) {
      console.warn(`[archive] Request to ${url} failed`, error);
      return { ok: false, error: { kind: 'network', message: describeNetworkFailure(error) } };
    }

    if (!response.ok) {
      return { ok: false, error: { kind: 'http', status: response.status } };
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch {
      return { ok: false, error: { kind: 'decode', field: null } };
    }

    return decodeEntry(payload);
  }
}

export function createEntryClient(options: HttpEntryClientOptions): EntryClient {
  return new HttpEntryClient(options);
}
