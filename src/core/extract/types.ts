// src/core/extract/types.ts
import type { DetailInfo, SearchResult } from '../types/index.js';
import type { HttpClient } from '../fetch/http.js';
import type { HtmlRenderer } from '../render/types.js';

export type AdapterKind = 'heuristic' | 'rule';

/**
 * Per-domain strategy: turns a keyword into candidate results and a result
 * into its detail page. Either call may reject; callers contain the failure.
 */
export interface SiteAdapter {
  readonly kind: AdapterKind;
  readonly baseUrl: string;

  search(keyword: string): Promise<SearchResult[]>;
  fetchDetailInfo(result: SearchResult): Promise<DetailInfo>;
}

export interface AdapterOptions {
  baseUrl: string;
  timeoutSeconds: number;
  userAgent: string;
}

export interface AdapterContext {
  http: HttpClient;
  renderer: HtmlRenderer;
}
