// src/core/extract/adapters/base.ts
import * as cheerio from 'cheerio';
import type { AdapterContext, AdapterKind, AdapterOptions, SiteAdapter } from '../types.js';
import type { DetailInfo, SearchResult } from '../../types/index.js';
import type { DetailPageRules, FetchMode } from '../../config/schema.js';
import { extractAttachments, extractTitle } from '../detail.js';
import { isAttachmentUrl, normalizeExtensions } from '../text.js';
import {
  DEFAULT_ATTACHMENT_EXTENSIONS,
  DEFAULT_ATTACHMENT_SELECTORS,
  DEFAULT_TITLE_SELECTORS,
  DETAIL_RENDER_SETTLE_MS,
} from '../../config/constants.js';

export abstract class BaseAdapter implements SiteAdapter {
  abstract readonly kind: AdapterKind;

  readonly baseUrl: string;
  protected readonly timeoutSeconds: number;
  protected readonly userAgent: string;

  constructor(
    options: AdapterOptions,
    protected readonly context: AdapterContext,
    protected readonly detailRules: DetailPageRules
  ) {
    this.baseUrl = options.baseUrl;
    this.timeoutSeconds = options.timeoutSeconds;
    this.userAgent = options.userAgent;
  }

  abstract search(keyword: string): Promise<SearchResult[]>;

  async fetchDetailInfo(result: SearchResult): Promise<DetailInfo> {
    const rules = this.detailRules;
    if (!rules.enabled) {
      return directFile(result);
    }

    const extensions = this.attachmentExtensions();
    if (isAttachmentUrl(result.url, extensions)) {
      return directFile(result);
    }

    const html = await this.fetchDetailHtml(result.url, rules.fetch_mode ?? this.detailFetchMode());
    if (!html) {
      return directFile(result);
    }

    const $ = cheerio.load(html);
    const title = extractTitle($, orDefault(rules.title_selectors, DEFAULT_TITLE_SELECTORS)) ?? result.title;
    const attachments = extractAttachments($, {
      baseUrl: result.url,
      selectors: orDefault(rules.attachment_selectors, DEFAULT_ATTACHMENT_SELECTORS),
      extensions,
      textKeywords: rules.attachment_text_keywords.map(keyword => keyword.toLowerCase()),
    });

    const content = this.prepareContent(html);
    if (content === null) {
      return { title, contentDropped: true, attachments };
    }
    return { title, html: content, attachments };
  }

  /** Detail markup to keep; null drops the page body. */
  protected prepareContent(html: string): string | null {
    return html;
  }

  protected detailFetchMode(): FetchMode {
    return 'http';
  }

  protected attachmentExtensions(): Set<string> {
    return normalizeExtensions(orDefault(this.detailRules.attachment_extensions, DEFAULT_ATTACHMENT_EXTENSIONS));
  }

  protected get timeoutMs(): number {
    return this.timeoutSeconds * 1000;
  }

  /** Null when the URL serves something other than HTML. */
  protected async fetchDetailHtml(url: string, mode: FetchMode): Promise<string | null> {
    if (mode === 'browser') {
      return this.context.renderer.render(url, {
        userAgent: this.userAgent,
        timeoutMs: this.timeoutMs,
        settleMs: DETAIL_RENDER_SETTLE_MS,
      });
    }
    return this.context.http.getHtml(url);
  }
}

function directFile(result: SearchResult): DetailInfo {
  return { title: result.title, attachments: [] };
}

export function orDefault(values: string[], fallback: string[]): string[] {
  return values.length > 0 ? values : [...fallback];
}
