// src/test-utils/fake-fetch.ts
import type { FetchLike, FetchResponse } from '../core/fetch/http.js';

export interface FakeRoute {
  status?: number;
  contentType?: string | null;
  body: string | Uint8Array;
}

export interface FakeFetch {
  fetch: FetchLike;
  calls: string[];
  routes: Map<string, FakeRoute>;
  /** URLs whose response body was cancelled before being read. */
  cancelled: string[];
}

function toBytes(body: string | Uint8Array): Uint8Array {
  return typeof body === 'string' ? new TextEncoder().encode(body) : body;
}

export function fakeResponse(route: FakeRoute, onCancel?: () => void): FetchResponse {
  const status = route.status ?? 200;
  const bytes = toBytes(route.body);
  const contentType = route.contentType === undefined ? 'text/html; charset=utf-8' : route.contentType;

  return {
    ok: status >= 200 && status < 300,
    status,
    headers: {
      get: (name: string) => (name.toLowerCase() === 'content-type' ? contentType : null),
    },
    arrayBuffer: async () => bytes.buffer.slice(bytes.byteOffset, bytes.byteOffset + bytes.byteLength),
    body: {
      getReader: () => {
        let sent = false;
        return {
          read: async () => {
            if (sent) return { done: true };
            sent = true;
            return { done: false, value: bytes };
          },
          cancel: async () => {
            onCancel?.();
          },
        };
      },
    },
  };
}

/**
 * In-process stand-in for the network. Unknown URLs reject like a refused
 * connection.
 */
export function createFakeFetch(routes: Record<string, FakeRoute | string> = {}): FakeFetch {
  const table = new Map<string, FakeRoute>();
  for (const [url, route] of Object.entries(routes)) {
    table.set(url, typeof route === 'string' ? { body: route } : route);
  }
  const calls: string[] = [];
  const cancelled: string[] = [];

  const fetch: FetchLike = async url => {
    calls.push(url);
    const route = table.get(url);
    if (!route) {
      throw new Error(`connect ECONNREFUSED ${url}`);
    }
    return fakeResponse(route, () => cancelled.push(url));
  };

  return { fetch, calls, routes: table, cancelled };
}
