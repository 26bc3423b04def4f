// src/core/fetch/http.ts
import * as fs from 'fs/promises';
import * as path from 'path';
import { ErrorCode, SitewatchError, errorMessage } from '../errors.js';

export interface FetchResponse {
  ok: boolean;
  status: number;
  headers: { get(name: string): string | null };
  arrayBuffer(): Promise<ArrayBufferLike>;
  body: {
    getReader(): {
      read(): Promise<{ done: boolean; value?: Uint8Array }>;
      cancel(): Promise<void>;
    };
  } | null;
}

export interface FetchInit {
  method: 'GET';
  headers: Record<string, string>;
  redirect: 'follow';
  signal: AbortSignal;
}

/** Structural subset of the global fetch, so tests can pass an in-process fake. */
export type FetchLike = (url: string, init: FetchInit) => Promise<FetchResponse>;

export interface HttpClientOptions {
  timeoutSeconds: number;
  userAgent: string;
  fetchFn?: FetchLike;
}

const SNIFF_BYTES = 4096;

export class HttpClient {
  private readonly timeoutMs: number;
  private readonly userAgent: string;
  private readonly fetchFn: FetchLike;

  constructor(options: HttpClientOptions) {
    this.timeoutMs = options.timeoutSeconds * 1000;
    this.userAgent = options.userAgent;
    this.fetchFn = options.fetchFn ?? fetch;
  }

  async get(url: string): Promise<FetchResponse> {
    let response: FetchResponse;
    try {
      response = await this.fetchFn(url, {
        method: 'GET',
        headers: { 'user-agent': this.userAgent },
        redirect: 'follow',
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
        throw new SitewatchError(ErrorCode.TIMEOUT, `Request timed out after ${this.timeoutMs}ms: ${url}`, true);
      }
      throw new SitewatchError(ErrorCode.NETWORK_ERROR, `Request failed for ${url}: ${errorMessage(error)}`, true);
    }

    if (!response.ok) {
      throw new SitewatchError(
        ErrorCode.HTTP_ERROR,
        `HTTP ${response.status} for ${url}`,
        response.status >= 500,
        undefined,
        { status: response.status }
      );
    }

    return response;
  }

  async getText(url: string): Promise<string> {
    const response = await this.get(url);
    return decodeBody(await response.arrayBuffer(), response.headers.get('content-type'));
  }

  /**
   * Fetch a page's markup. Resolves to null when the server answers with a
   * non-HTML document (a PDF served from an article URL, for instance).
   */
  async getHtml(url: string): Promise<string | null> {
    const response = await this.get(url);
    const contentType = response.headers.get('content-type');
    if (!isHtmlContentType(contentType)) {
      // The caller downloads the file with a fresh request
      await response.body?.getReader().cancel();
      return null;
    }
    return decodeBody(await response.arrayBuffer(), contentType);
  }

  async download(url: string, targetPath: string): Promise<void> {
    const response = await this.get(url);
    if (!response.body) {
      throw new SitewatchError(ErrorCode.NETWORK_ERROR, `Empty response body for ${url}`, true);
    }

    await fs.mkdir(path.dirname(targetPath), { recursive: true });
    const handle = await fs.open(targetPath, 'w');
    const reader = response.body.getReader();
    try {
      for (;;) {
        const { done, value } = await reader.read();
        if (done) break;
        if (value) await handle.write(value);
      }
    } catch (error) {
      await reader.cancel().catch(() => undefined);
      await handle.close();
      await fs.rm(targetPath, { force: true });
      throw new SitewatchError(ErrorCode.NETWORK_ERROR, `Download interrupted for ${url}: ${errorMessage(error)}`, true);
    }
    await handle.close();
  }
}

export function isHtmlContentType(contentType: string | null): boolean {
  if (!contentType) return true;
  const lowered = contentType.toLowerCase();
  if (lowered.includes('application/pdf')) return false;
  return lowered.includes('html') || lowered.includes('xml') || lowered.startsWith('text/');
}

export function detectCharset(contentType: string | null, bytes: Uint8Array): string {
  const fromHeader = contentType?.match(/charset\s*=\s*["']?([\w.:-]+)/i);
  if (fromHeader) {
    return fromHeader[1].toLowerCase();
  }

  const head = Buffer.from(bytes.subarray(0, SNIFF_BYTES)).toString('latin1');
  const fromMeta = head.match(/<meta[^>]+charset\s*=\s*["']?([\w.:-]+)/i);
  if (fromMeta) {
    return fromMeta[1].toLowerCase();
  }

  return 'utf-8';
}

export function decodeBody(buffer: ArrayBufferLike, contentType: string | null): string {
  const bytes = new Uint8Array(buffer);
  const charset = detectCharset(contentType, bytes);
  try {
    return new TextDecoder(charset).decode(bytes);
  } catch {
    // Unknown label
    return new TextDecoder('utf-8').decode(bytes);
  }
}
