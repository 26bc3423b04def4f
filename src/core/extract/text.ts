// src/core/extract/text.ts
import { hasChildren, isTag, isText, type AnyNode } from 'domhandler';

/**
 * Text content of a node: every text descendant trimmed, empties dropped,
 * joined with single spaces.
 */
export function nodeText(node: AnyNode): string {
  return textParts(node).join(' ');
}

/** Trimmed, non-empty text nodes under `node`, in document order. */
export function textParts(node: AnyNode): string[] {
  const parts: string[] = [];
  collectText(node, parts);
  return parts;
}

function collectText(node: AnyNode, parts: string[]): void {
  if (isText(node)) {
    const text = node.data.trim();
    if (text) parts.push(text);
    return;
  }
  if (hasChildren(node)) {
    for (const child of node.children) {
      collectText(child, parts);
    }
  }
}

/** Text of a node, reading `content` for `<meta>` tags. */
export function extractNodeText(node: AnyNode): string {
  if (isTag(node) && node.name === 'meta') {
    return (node.attribs.content ?? '').trim();
  }
  return nodeText(node);
}

export function normalizeText(value: string): string {
  return value.replace(/\s+/g, '').toLowerCase();
}

export function matchesKeyword(text: string, keyword: string): boolean {
  const needle = normalizeText(keyword);
  if (!needle) return false;
  return normalizeText(text).includes(needle);
}

export function normalizeExtensions(values: string[]): Set<string> {
  const extensions = new Set<string>();
  for (const value of values) {
    const ext = value.trim().toLowerCase().replace(/^\.+/, '');
    if (ext) extensions.add(ext);
  }
  return extensions;
}

export function resolveUrl(href: string, baseUrl: string): string | undefined {
  try {
    return new URL(href, baseUrl).toString();
  } catch {
    return undefined;
  }
}

/**
 * Whether a link points at a downloadable file: its path ends in one of
 * `extensions`, or `.ext` appears anywhere in the URL (download handlers such
 * as `/download?file=a.pdf`).
 */
export function isAttachmentUrl(url: string, extensions: Set<string>): boolean {
  if (!url) return false;
  const lowered = url.trim().toLowerCase();
  if (
    lowered.startsWith('javascript:') ||
    lowered.startsWith('mailto:') ||
    lowered.startsWith('#')
  ) {
    return false;
  }

  let pathname = lowered;
  try {
    pathname = new URL(lowered).pathname;
  } catch {
    pathname = lowered.split(/[?#]/)[0];
  }
  const dot = pathname.lastIndexOf('.');
  if (dot >= 0 && dot > pathname.lastIndexOf('/')) {
    if (extensions.has(pathname.slice(dot + 1))) return true;
  }

  for (const ext of extensions) {
    if (lowered.includes(`.${ext}`)) return true;
  }
  return false;
}

/** Drop `附件1：` style prefixes from an attachment label. */
export function cleanAttachmentName(name: string): string {
  return name.trim().replace(/^\s*附件\s*\d*\s*[:：]?\s*/, '').trim();
}

/** Form-style encoding: spaces become `+`. */
export function quotePlus(value: string): string {
  return encodeURIComponent(value)
    .replace(/[!'()*]/g, c => `%${c.charCodeAt(0).toString(16).toUpperCase()}`)
    .replace(/%20/g, '+');
}

export type QueryEncoding = 'none' | 'single' | 'double';

export function encodeQuery(keyword: string, encoding: QueryEncoding): string {
  switch (encoding) {
    case 'none':
      return keyword;
    case 'double':
      return quotePlus(quotePlus(keyword));
    default:
      return quotePlus(keyword);
  }
}

/**
 * Search URL for an encoded keyword: `{query}` in the template (or in the
 * base URL when there is no template) is replaced. Without a placeholder the
 * URL is used as is.
 */
export function buildSearchUrl(
  baseUrl: string,
  template: string | undefined,
  encodedKeyword: string
): string {
  const source = template ?? baseUrl;
  return source.split('{query}').join(encodedKeyword);
}
