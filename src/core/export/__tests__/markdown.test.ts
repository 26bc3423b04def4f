// src/core/export/__tests__/markdown.test.ts
import { describe, it, expect } from '@jest/globals';
import { MarkdownConverter, htmlToMarkdown } from '../markdown.js';

describe('MarkdownConverter', () => {
  const converter = new MarkdownConverter();

  it('separates blocks with a blank line', () => {
    expect(converter.convert('<p>A</p><p>B</p>')).toBe('A\n\nB');
  });

  it('renders headings by level and ignores the document head', () => {
    const html = '<html><head><title>Ignored</title></head><body><h1>Title</h1><h3> Sub  title </h3><p>Body text</p></body></html>';

    expect(converter.convert(html)).toBe('# Title\n\n### Sub title\n\nBody text');
  });

  it('returns an empty string when only scripts and styles remain', () => {
    expect(converter.convert('<script>var a = 1;</script><style>p { color: red }</style>')).toBe('');
  });

  it('keeps emphasis, links and line breaks inside a paragraph', () => {
    const html = '<p>Read <strong>this</strong> and <a href="/doc">the  doc</a><br>next line</p>';

    expect(converter.convert(html)).toBe('Read **this** and [the doc](/doc)\nnext line');
  });

  it('writes a link without href as its label', () => {
    expect(converter.convert('<p>See <a>Label</a> here</p>')).toBe('See Label here');
  });

  it('numbers ordered lists and skips empty items', () => {
    const html = '<ul><li>one</li><li> </li><li>two</li></ul><ol><li>first</li><li>second</li></ol>';

    expect(converter.convert(html)).toBe('- one\n\n- two\n\n1. first\n\n2. second');
  });

  it('prefixes blockquotes', () => {
    expect(converter.convert('<blockquote>Quoted   text</blockquote>')).toBe('> Quoted text');
  });

  it('descends into containers holding blocks and inlines the rest', () => {
    const html = '<div><h2>Sub</h2><div>plain <em>words</em></div></div>';

    expect(converter.convert(html)).toBe('## Sub\n\nplain *words*');
  });

  it('keeps loose text between blocks', () => {
    expect(converter.convert('Loose text\n  <p>Para</p>')).toBe('Loose text\n\nPara');
  });

  it('is deterministic', () => {
    const html = '<h1>Title</h1><p>Body <b>bold</b></p>';

    expect(htmlToMarkdown(html)).toBe(converter.convert(html));
    expect(htmlToMarkdown(html)).toBe('# Title\n\nBody **bold**');
  });
});
