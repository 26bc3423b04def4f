// src/core/extract/adapters/__tests__/heuristic.adapter.test.ts
import { describe, it, expect, beforeEach, jest } from '@jest/globals';
import { HeuristicAdapter } from '../heuristic.js';
import { HttpClient } from '../../../fetch/http.js';
import { HeuristicSiteSchema } from '../../../config/schema.js';
import type { RenderOptions } from '../../../render/types.js';
import { ErrorCode } from '../../../errors.js';
import { createFakeFetch, type FakeFetch } from '../../../../test-utils/fake-fetch.js';

const SEARCH_URL = 'https://example.org/search?q=annual+report';

const SEARCH_PAGE = `
  <ul>
    <li><a href="/n/1.html">Annual Report 2023</a><span>2024-01-10</span></li>
    <li><a href="/n/2024-02-20/2.html">annual report (draft)</a></li>
    <li><a href="/n/3.html">Other news</a> 2024-05-01</li>
    <li>Annual report <a href="/n/4.html"></a></li>
  </ul>`;

describe('HeuristicAdapter', () => {
  let network: FakeFetch;
  let render: jest.Mock<(url: string, options: RenderOptions) => Promise<string>>;

  function createAdapter(site: unknown = {}): HeuristicAdapter {
    const http = new HttpClient({ timeoutSeconds: 5, userAgent: 'test-agent', fetchFn: network.fetch });
    return new HeuristicAdapter(
      { baseUrl: 'https://example.org/search?q={query}', timeoutSeconds: 5, userAgent: 'test-agent' },
      { http, renderer: { render } },
      HeuristicSiteSchema.parse(site)
    );
  }

  beforeEach(() => {
    network = createFakeFetch({ [SEARCH_URL]: SEARCH_PAGE });
    render = jest.fn<(url: string, options: RenderOptions) => Promise<string>>();
  });

  describe('search', () => {
    it('keeps links whose neighbourhood mentions the keyword', async () => {
      const results = await createAdapter().search('annual report');

      expect(network.calls).toEqual([SEARCH_URL]);
      expect(results).toEqual([
        { title: 'Annual Report 2023', url: 'https://example.org/n/1.html', publishTime: new Date(2024, 0, 10) },
        {
          title: 'annual report (draft)',
          url: 'https://example.org/n/2024-02-20/2.html',
          publishTime: new Date(2024, 1, 20),
        },
        { title: 'annual report', url: 'https://example.org/n/4.html', publishTime: undefined },
      ]);
    });

    it('uses the search_url template when configured', async () => {
      network.routes.set('https://example.org/find/annual+report', { body: SEARCH_PAGE });

      const results = await createAdapter({ search_url: 'https://example.org/find/{query}' }).search('annual report');

      expect(network.calls).toEqual(['https://example.org/find/annual+report']);
      expect(results).toHaveLength(3);
    });

    it('rejects with an http_error when the search page fails', async () => {
      network.routes.set(SEARCH_URL, { status: 503, body: 'busy' });

      await expect(createAdapter().search('annual report')).rejects.toMatchObject({
        code: ErrorCode.HTTP_ERROR,
        retryable: true,
      });
    });
  });

  describe('fetchDetailInfo', () => {
    const result = { title: 'Annual Report 2023', url: 'https://example.org/n/1.html' };

    it('extracts the title and attachments from the detail page', async () => {
      const html = '<h1>Notice One</h1><p><a href="/f/plan.pdf">附件：Plan</a><a href="/about">About</a></p>';
      network.routes.set(result.url, { body: html });

      const detail = await createAdapter().fetchDetailInfo(result);

      expect(detail).toEqual({
        title: 'Notice One',
        html,
        attachments: [{ url: 'https://example.org/f/plan.pdf', name: 'Plan' }],
      });
    });

    it('treats a file URL as a direct download without fetching it', async () => {
      const detail = await createAdapter().fetchDetailInfo({ title: 'Plan', url: 'https://example.org/f/plan.pdf' });

      expect(detail).toEqual({ title: 'Plan', attachments: [] });
      expect(network.calls).toEqual([]);
    });

    it('treats a non-HTML response as a direct download', async () => {
      network.routes.set(result.url, { contentType: 'application/pdf', body: '%PDF-1.4' });

      const detail = await createAdapter().fetchDetailInfo(result);

      expect(detail).toEqual({ title: 'Annual Report 2023', attachments: [] });
    });

    it('skips the detail page when disabled', async () => {
      const detail = await createAdapter({ detail_page: { enabled: false } }).fetchDetailInfo(result);

      expect(detail).toEqual({ title: 'Annual Report 2023', attachments: [] });
      expect(network.calls).toEqual([]);
    });

    it('renders the detail page in the browser when configured', async () => {
      render.mockResolvedValue('<html><head><title>Rendered</title></head><body></body></html>');

      const detail = await createAdapter({ detail_page: { fetch_mode: 'browser' } }).fetchDetailInfo(result);

      expect(render).toHaveBeenCalledWith(result.url, { userAgent: 'test-agent', timeoutMs: 5000, settleMs: 500 });
      expect(detail.title).toBe('Rendered');
      expect(network.calls).toEqual([]);
    });

    it('keeps the result title when the page has none', async () => {
      network.routes.set(result.url, { body: '<p>No headings</p>' });

      const detail = await createAdapter().fetchDetailInfo(result);

      expect(detail.title).toBe('Annual Report 2023');
    });
  });
});
