// src/core/extract/adapters/rule-driven.ts
import * as cheerio from 'cheerio';
import { isTag, type Element } from 'domhandler';
import { BaseAdapter, orDefault } from './base.js';
import type { AdapterContext, AdapterOptions } from '../types.js';
import type { SearchResult } from '../../types/index.js';
import type { FetchMode, RuleSiteConfig } from '../../config/schema.js';
import { bestDate } from '../dates.js';
import { buildTrimmedHtml, compilePatterns, extractDetailDate } from '../detail.js';
import { buildSearchUrl, encodeQuery, isAttachmentUrl, matchesKeyword, nodeText, resolveUrl } from '../text.js';
import { errorMessage } from '../../errors.js';
import { logger } from '../../logger.js';
import {
  DEFAULT_DETAIL_DATE_REGEXES,
  DEFAULT_TITLE_SELECTORS,
  SEARCH_RENDER_SETTLE_MS,
} from '../../config/constants.js';

/**
 * Adapter driven by per-site selectors. Listings can be rendered in the
 * shared browser, and results without a listing date can have one read from
 * their detail page.
 */
export class RuleDrivenAdapter extends BaseAdapter {
  readonly kind = 'rule' as const;

  private readonly datePatterns: RegExp[];

  constructor(options: AdapterOptions, context: AdapterContext, private readonly site: RuleSiteConfig) {
    super(options, context, site.detail_page);

    const sources = site.detail_date.regexes.length > 0 ? site.detail_date.regexes : DEFAULT_DETAIL_DATE_REGEXES;
    const { patterns, invalid } = compilePatterns(sources);
    for (const source of invalid) {
      logger.warn(`Ignoring invalid detail date pattern for ${this.baseUrl}: ${source}`);
    }
    this.datePatterns = patterns;
  }

  async search(keyword: string): Promise<SearchResult[]> {
    const url = buildSearchUrl(this.baseUrl, this.site.search_url, encodeQuery(keyword, this.site.query_encoding));
    logger.debug(`Searching ${url} (${this.site.fetch_mode})`);

    const html = await this.fetchSearchHtml(url);
    const results = this.parseResults(html, keyword, url);

    for (const result of results) {
      await this.fillDetailDate(result);
    }
    return results;
  }

  parseResults(html: string, keyword: string, pageUrl: string): SearchResult[] {
    const $ = cheerio.load(html);
    const { selectors } = this.site;
    const items = selectors.item ? $(selectors.item).toArray() : $('a[href]').toArray();
    const results: SearchResult[] = [];

    for (const item of items) {
      if (!isTag(item)) continue;
      const link = item.name === 'a' ? item : $(item).find(selectors.title).first().get(0);
      if (!link || !isTag(link)) continue;
      const href = link.attribs.href;
      if (!href) continue;

      if (this.site.link_href_contains && !href.includes(this.site.link_href_contains)) continue;

      const title = link.attribs.title || nodeText(link);
      const itemText = nodeText(item);
      const matchText = this.site.match_in_title_only ? title : itemText;
      if (this.site.match_keyword && !matchesKeyword(matchText, keyword)) continue;

      const url = resolveUrl(href, pageUrl);
      if (!url) continue;

      let publishTime = this.itemDate($, item);
      if (!publishTime && this.site.date_from_item) {
        publishTime = bestDate(itemText);
      }

      results.push({ title: title || keyword, url, publishTime });
    }

    return results;
  }

  private itemDate($: cheerio.CheerioAPI, item: Element): Date | undefined {
    if (!this.site.selectors.date) return undefined;
    const node = $(item).find(this.site.selectors.date).first().get(0);
    return node ? bestDate(nodeText(node)) : undefined;
  }

  private async fetchSearchHtml(url: string): Promise<string> {
    if (this.site.fetch_mode === 'http') {
      return this.context.http.getText(url);
    }
    const { selectors } = this.site;
    return this.context.renderer.render(url, {
      userAgent: this.userAgent,
      timeoutMs: this.timeoutMs,
      waitForSelector: selectors.wait_for ?? selectors.item,
      settleMs: SEARCH_RENDER_SETTLE_MS,
    });
  }

  /**
   * Read a missing publish date from the result's detail page. A page that
   * cannot be fetched leaves the date unset.
   */
  private async fillDetailDate(result: SearchResult): Promise<void> {
    const rules = this.site.detail_date;
    if (result.publishTime || !rules.enabled) return;
    if (isAttachmentUrl(result.url, this.attachmentExtensions())) return;

    let html: string | null;
    try {
      html = await this.fetchDetailHtml(result.url, rules.fetch_mode);
    } catch (error) {
      logger.warn(`Could not read detail date from ${result.url}: ${errorMessage(error)}`);
      return;
    }
    if (!html) return;

    const date = extractDetailDate(html, rules.selectors, this.datePatterns);
    if (date) {
      result.publishTime = date;
      logger.debug(`Detail date for ${result.url}: ${date.toISOString()}`);
    }
  }

  protected detailFetchMode(): FetchMode {
    return this.site.fetch_mode;
  }

  protected prepareContent(html: string): string | null {
    const rules = this.detailRules.content_extract;
    if (!rules.enabled) return html;

    return buildTrimmedHtml(html, {
      titleSelectors: orDefault(rules.title_selectors, DEFAULT_TITLE_SELECTORS),
      dateSelectors: rules.date_selectors,
      bodySelectors: rules.body_selectors,
      removeSelectors: rules.remove_selectors,
      fallbackToOriginal: rules.fallback_to_original_on_empty,
    });
  }
}
