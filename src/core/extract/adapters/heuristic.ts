// src/core/extract/adapters/heuristic.ts
import * as cheerio from 'cheerio';
import { BaseAdapter } from './base.js';
import type { AdapterContext, AdapterOptions } from '../types.js';
import type { SearchResult } from '../../types/index.js';
import type { HeuristicSiteConfig } from '../../config/schema.js';
import { bestDate } from '../dates.js';
import { buildSearchUrl, matchesKeyword, nodeText, quotePlus, resolveUrl } from '../text.js';
import { logger } from '../../logger.js';

/**
 * Adapter for sites without rules: every link whose text (or its parent's)
 * mentions the keyword is a candidate, dated by the latest date found in that
 * text or in the href.
 */
export class HeuristicAdapter extends BaseAdapter {
  readonly kind = 'heuristic' as const;

  private readonly searchUrlTemplate?: string;

  constructor(options: AdapterOptions, context: AdapterContext, site: HeuristicSiteConfig) {
    super(options, context, site.detail_page);
    this.searchUrlTemplate = site.search_url;
  }

  async search(keyword: string): Promise<SearchResult[]> {
    const url = buildSearchUrl(this.baseUrl, this.searchUrlTemplate, quotePlus(keyword));
    logger.debug(`Searching ${url}`);

    const html = await this.context.http.getText(url);
    return this.parseResults(html, keyword, url);
  }

  parseResults(html: string, keyword: string, pageUrl: string): SearchResult[] {
    const $ = cheerio.load(html);
    const results: SearchResult[] = [];

    for (const link of $('a[href]').toArray()) {
      const linkText = nodeText(link);
      const parentText = link.parent ? nodeText(link.parent) : '';
      const combined = `${linkText} ${parentText}`;
      if (!matchesKeyword(combined, keyword)) continue;

      const href = link.attribs.href ?? '';
      const url = resolveUrl(href, pageUrl);
      if (!url) continue;

      results.push({
        title: linkText || keyword,
        url,
        publishTime: bestDate(`${combined} ${href}`),
      });
    }

    return results;
  }
}
