// src/core/extract/detail.ts
import * as cheerio from 'cheerio';
import { isTag } from 'domhandler';
import type { AttachmentLink } from '../types/index.js';
import { bestDate } from './dates.js';
import {
  cleanAttachmentName,
  extractNodeText,
  isAttachmentUrl,
  nodeText,
  resolveUrl,
  textParts,
} from './text.js';
import { DETAIL_DATE_LABELS } from '../config/constants.js';

export function extractTitle($: cheerio.CheerioAPI, selectors: string[]): string | undefined {
  for (const selector of selectors) {
    const node = $(selector).first().get(0);
    if (!node) continue;

    const text = extractNodeText(node);
    if (text) return text;
  }

  const ogTitle = ($('meta[property="og:title"]').attr('content') ?? '').trim();
  if (ogTitle) return ogTitle;

  const documentTitle = $('title').first().text().trim();
  return documentTitle || undefined;
}

export interface AttachmentQuery {
  baseUrl: string;
  selectors: string[];
  extensions: Set<string>;
  /** Lowercased; when non-empty a link's own or parent text must contain one. */
  textKeywords: string[];
}

export function extractAttachments($: cheerio.CheerioAPI, query: AttachmentQuery): AttachmentLink[] {
  const results: AttachmentLink[] = [];
  const seen = new Set<string>();

  for (const selector of query.selectors) {
    for (const node of $(selector).toArray()) {
      if (!isTag(node)) continue;
      const href = (node.attribs.href ?? '').trim();
      if (!href) continue;

      const url = resolveUrl(href, query.baseUrl);
      if (!url || !isAttachmentUrl(url, query.extensions)) continue;

      if (query.textKeywords.length > 0) {
        const parentText = node.parent ? nodeText(node.parent) : '';
        const context = `${nodeText(node)} ${parentText}`.toLowerCase();
        if (!query.textKeywords.some(keyword => context.includes(keyword))) continue;
      }

      if (seen.has(url)) continue;
      seen.add(url);

      const label = nodeText(node) || node.attribs.title || node.attribs['aria-label'] || '';
      const name = cleanAttachmentName(label);
      results.push(name ? { url, name } : { url });
    }
  }

  return results;
}

/**
 * Compile user-supplied patterns, returning the ones that failed separately
 * so the caller can report them.
 */
export function compilePatterns(sources: string[]): { patterns: RegExp[]; invalid: string[] } {
  const patterns: RegExp[] = [];
  const invalid: string[] = [];
  for (const source of sources) {
    try {
      patterns.push(new RegExp(source));
    } catch {
      invalid.push(source);
    }
  }
  return { patterns, invalid };
}

/**
 * Publish date of a detail page. Tried in order: the date selectors, the
 * labelled patterns against the raw markup (first capture group), then any
 * text node carrying a date label.
 */
export function extractDetailDate(html: string, selectors: string[], patterns: RegExp[]): Date | undefined {
  const $ = cheerio.load(html);

  for (const selector of selectors) {
    const node = $(selector).first().get(0);
    if (!node) continue;
    const parsed = bestDate(extractNodeText(node));
    if (parsed) return parsed;
  }

  for (const pattern of patterns) {
    const match = html.match(pattern);
    if (!match) continue;
    const parsed = bestDate(match[1] ?? match[0]);
    if (parsed) return parsed;
  }

  $('script, style, noscript').remove();
  const root = $.root().get(0);
  const strings = root ? textParts(root) : [];
  for (const text of strings) {
    if (!DETAIL_DATE_LABELS.some(label => text.includes(label))) continue;
    const parsed = bestDate(text);
    if (parsed) return parsed;
  }

  return undefined;
}

export interface TrimRules {
  titleSelectors: string[];
  dateSelectors: string[];
  bodySelectors: string[];
  removeSelectors: string[];
  fallbackToOriginal: boolean;
}

/**
 * Reduce a detail page to its title, date line and body fragments.
 *
 * Body selectors are tried in order and the first that yields fragments wins.
 * With no fragments the original markup (or null) is returned, per
 * `fallbackToOriginal`.
 */
export function buildTrimmedHtml(html: string, rules: TrimRules): string | null {
  const $ = cheerio.load(html);

  const title = extractTitle($, rules.titleSelectors) ?? '';

  let dateText = '';
  for (const selector of rules.dateSelectors) {
    const node = $(selector).first().get(0);
    if (!node) continue;
    dateText = extractNodeText(node);
    if (dateText) break;
  }

  const blocks: string[] = [];
  for (const selector of rules.bodySelectors) {
    for (const node of $(selector).toArray()) {
      const fragment = cheerio.load($.html(node), null, false);
      for (const removeSelector of rules.removeSelectors) {
        fragment(removeSelector).remove();
      }
      const rendered = fragment.html().trim();
      if (rendered) blocks.push(rendered);
    }
    if (blocks.length > 0) break;
  }

  if (blocks.length === 0) {
    return rules.fallbackToOriginal ? html : null;
  }

  const out = cheerio.load('<html><head><meta charset="utf-8"></head><body></body></html>');
  const body = out('body');
  if (title) {
    body.append(out('<h1></h1>').text(title));
  }
  if (dateText) {
    body.append(out('<div class="publish-date"></div>').text(dateText));
  }
  const content = out('<div class="content"></div>');
  for (const block of blocks) {
    content.append(block);
  }
  body.append(content);

  return out.html();
}
