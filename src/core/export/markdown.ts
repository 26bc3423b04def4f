// src/core/export/markdown.ts
import * as cheerio from 'cheerio';
import { hasChildren, isTag, isText, type AnyNode, type Element } from 'domhandler';
import { nodeText } from '../extract/text.js';

const SKIPPED_TAGS = new Set(['script', 'style', 'noscript']);
const HEADING_TAGS = new Set(['h1', 'h2', 'h3', 'h4', 'h5', 'h6']);
const BLOCK_TAGS = new Set([...HEADING_TAGS, 'p', 'ul', 'ol', 'li', 'table', 'blockquote']);

function collapseWhitespace(value: string): string {
  return value.replace(/\s+/g, ' ');
}

// Collapse runs of spaces and trim each line; newlines come only from <br>.
function finalizeLines(value: string): string {
  return value
    .split('\n')
    .map(line => line.replace(/ {2,}/g, ' ').trim())
    .join('\n')
    .trim();
}

function hasBlockDescendant(node: Element): boolean {
  return node.children.some(child => isTag(child) && (BLOCK_TAGS.has(child.name) || hasBlockDescendant(child)));
}

/** Re-apply the whitespace that surrounded `inner` around `body`. */
function keepSpacing(inner: string, body: string): string {
  const lead = /^\s/.test(inner) ? ' ' : '';
  const trail = /\s$/.test(inner) ? ' ' : '';
  return `${lead}${body}${trail}`;
}

function wrapInline(inner: string, marker: string): string {
  const trimmed = inner.trim();
  if (!trimmed) return inner ? ' ' : '';
  return keepSpacing(inner, `${marker}${trimmed}${marker}`);
}

/**
 * Converts detail page markup to plain markdown: headings, paragraphs, lists,
 * blockquotes, emphasis, links and line breaks. Everything else contributes
 * its text only. Never throws; unusable input yields ''.
 */
export class MarkdownConverter {
  convert(html: string): string {
    const $ = cheerio.load(html);
    $('script, style, noscript').remove();

    const root = $('body').get(0) ?? $.root().get(0);
    if (!root) return '';

    const lines: string[] = [];
    this.walk(root, lines);
    return lines.filter(Boolean).join('\n\n').trim();
  }

  private walk(node: AnyNode, lines: string[]): void {
    if (!hasChildren(node)) return;

    for (const child of node.children) {
      if (isText(child)) {
        const text = collapseWhitespace(child.data).trim();
        if (text) lines.push(text);
        continue;
      }
      if (!isTag(child) || SKIPPED_TAGS.has(child.name)) continue;

      const name = child.name;

      if (HEADING_TAGS.has(name)) {
        const text = collapseWhitespace(nodeText(child)).trim();
        if (text) lines.push(`${'#'.repeat(Number(name[1]))} ${text}`);
        continue;
      }

      switch (name) {
        case 'p': {
          const text = finalizeLines(this.inline(child));
          if (text) lines.push(text);
          break;
        }
        case 'ul':
        case 'ol': {
          let index = 1;
          for (const item of child.children) {
            if (!isTag(item) || item.name !== 'li') continue;
            const text = finalizeLines(this.inline(item));
            if (!text) continue;
            lines.push(name === 'ol' ? `${index}. ${text}` : `- ${text}`);
            index++;
          }
          break;
        }
        case 'blockquote': {
          const text = finalizeLines(this.inline(child));
          if (text) lines.push(`> ${text}`);
          break;
        }
        case 'div': {
          if (hasBlockDescendant(child)) {
            this.walk(child, lines);
          } else {
            const text = finalizeLines(this.inline(child));
            if (text) lines.push(text);
          }
          break;
        }
        default:
          this.walk(child, lines);
      }
    }
  }

  private inline(node: AnyNode): string {
    if (isText(node)) {
      return collapseWhitespace(node.data);
    }
    if (!isTag(node) || SKIPPED_TAGS.has(node.name)) {
      return '';
    }
    if (node.name === 'br') {
      return '\n';
    }

    const inner = node.children.map(child => this.inline(child)).join('');

    switch (node.name) {
      case 'strong':
      case 'b':
        return wrapInline(inner, '**');
      case 'em':
      case 'i':
        return wrapInline(inner, '*');
      case 'a': {
        const href = (node.attribs.href ?? '').trim();
        const label = finalizeLines(inner) || collapseWhitespace(nodeText(node)).trim();
        if (!label) return '';
        return keepSpacing(inner, href ? `[${label}](${href})` : label);
      }
      default:
        return inner;
    }
  }
}

export function htmlToMarkdown(html: string): string {
  return new MarkdownConverter().convert(html);
}
