// src/core/batch/runner.ts
import { BrowserManager } from '../render/browser.js';
import { PageRenderer } from '../render/page.js';
import type { HtmlRenderer } from '../render/types.js';
import { HttpClient, type FetchLike } from '../fetch/http.js';
import { AdapterRegistry, domainOf } from '../extract/registry.js';
import type { SiteAdapter } from '../extract/types.js';
import { DownloadIndex } from '../dedupe/download-index.js';
import { ResultDownloader } from '../export/downloader.js';
import { formatTime } from '../extract/dates.js';
import type { AppConfig } from '../config/schema.js';
import type { RowItem, SearchResult } from '../types/index.js';
import {
  createFailureLog,
  createSuccessLog,
  type AuditLog,
  type FailureRecord,
  type SuccessRecord,
} from './audit.js';
import { errorMessage } from '../errors.js';
import { logger } from '../logger.js';

export interface RunnerOptions {
  config: AppConfig;
  fetchFn?: FetchLike;
  /** Replaces the shared headless browser. */
  renderer?: HtmlRenderer;
  now?: () => Date;
}

export interface RunSummary {
  rows: number;
  searched: number;
  candidates: number;
  fresh: number;
  downloaded: number;
  skipped: number;
  failed: number;
  durationMs: number;
}

interface RunState {
  registry: AdapterRegistry;
  downloader: ResultDownloader;
  successLog: AuditLog<SuccessRecord>;
  failureLog: AuditLog<FailureRecord>;
  summary: RunSummary;
}

/** Results published strictly after `since`; undated results never qualify. */
export function filterFresh(results: SearchResult[], since: Date): SearchResult[] {
  return results.filter(result => result.publishTime !== undefined && result.publishTime.getTime() > since.getTime());
}

function latestPublishTime(results: SearchResult[]): Date | undefined {
  let latest: Date | undefined;
  for (const { publishTime } of results) {
    if (publishTime && (!latest || publishTime.getTime() > latest.getTime())) {
      latest = publishTime;
    }
  }
  return latest;
}

export class BatchRunner {
  private readonly now: () => Date;

  constructor(private options: RunnerOptions) {
    this.now = options.now ?? (() => new Date());
  }

  async run(rows: RowItem[]): Promise<RunSummary> {
    const { config } = this.options;
    const startTime = Date.now();

    const http = new HttpClient({
      timeoutSeconds: config.request_timeout_seconds,
      userAgent: config.user_agent,
      fetchFn: this.options.fetchFn,
    });
    const browserManager = new BrowserManager();
    const renderer = this.options.renderer ?? new PageRenderer(browserManager);

    const index = new DownloadIndex(config.index_path);
    await index.load();

    const state: RunState = {
      registry: new AdapterRegistry(
        {
          timeoutSeconds: config.request_timeout_seconds,
          userAgent: config.user_agent,
          overrides: config.site_overrides,
        },
        { http, renderer }
      ),
      downloader: new ResultDownloader({ downloadRoot: config.download_root, http, index, now: this.now }),
      successLog: createSuccessLog(config.success_path),
      failureLog: createFailureLog(config.failures_path),
      summary: {
        rows: rows.length,
        searched: 0,
        candidates: 0,
        fresh: 0,
        downloaded: 0,
        skipped: 0,
        failed: 0,
        durationMs: 0,
      },
    };

    if (config.dry_run) {
      logger.info('Dry run: nothing will be downloaded');
    }

    try {
      for (const row of rows) {
        await this.processRow(row, state);
      }
    } finally {
      await browserManager.close();
    }

    await index.save();

    state.summary.durationMs = Date.now() - startTime;
    this.printSummary(state.summary);
    return state.summary;
  }

  private async processRow(row: RowItem, state: RunState): Promise<void> {
    const { summary } = state;

    let adapter: SiteAdapter;
    let results: SearchResult[];
    try {
      adapter = state.registry.resolve(row.url);
      results = await adapter.search(row.name);
    } catch (error) {
      logger.error(`Search failed: ${row.url} ${errorMessage(error)}`);
      summary.failed++;
      await this.recordFailure(state, { name: row.name, url: row.url, reason: `search_error: ${errorMessage(error)}` });
      return;
    }

    summary.searched++;
    summary.candidates += results.length;
    this.logCandidates(row, results);

    const fresh = filterFresh(results, row.referenceTime);
    summary.fresh += fresh.length;
    if (fresh.length === 0) {
      logger.info(`No newer documents for ${row.name}`);
      return;
    }

    const domain = domainOf(row.url);
    for (const result of fresh) {
      if (this.options.config.dry_run) {
        logger.info(`Match (dry-run): ${result.title} -> ${result.url}`);
        continue;
      }
      await this.processResult(row, result, adapter, domain, state);
    }
  }

  private async processResult(
    row: RowItem,
    result: SearchResult,
    adapter: SiteAdapter,
    domain: string,
    state: RunState
  ): Promise<void> {
    const { summary } = state;
    try {
      const outcome = await state.downloader.download(result, adapter, domain);
      switch (outcome.status) {
        case 'saved':
          summary.downloaded++;
          logger.info(`Downloaded: ${outcome.folder}`);
          await this.appendAudit(state.successLog, {
            name: row.name,
            url: result.url,
            path: outcome.mainPath ?? '',
            folder_path: outcome.folder,
            publish_time: formatTime(result.publishTime),
            time: formatTime(this.now()),
          });
          break;
        case 'skipped':
          summary.skipped++;
          break;
        case 'empty':
          summary.skipped++;
          logger.info(`Nothing new to keep for ${result.url}`);
          break;
      }
    } catch (error) {
      logger.error(`Download failed: ${result.url} ${errorMessage(error)}`);
      summary.failed++;
      await this.recordFailure(state, { name: row.name, url: result.url, reason: `download_error: ${errorMessage(error)}` });
    }
  }

  private async recordFailure(state: RunState, failure: Omit<FailureRecord, 'time'>): Promise<void> {
    await this.appendAudit(state.failureLog, { ...failure, time: formatTime(this.now()) });
  }

  // Audit write failures are logged, not raised.
  private async appendAudit<Row extends Record<string, string>>(log: AuditLog<Row>, row: Row): Promise<void> {
    try {
      await log.append(row);
    } catch (error) {
      logger.error(`Could not write ${log.path}: ${errorMessage(error)}`);
    }
  }

  private logCandidates(row: RowItem, results: SearchResult[]): void {
    const reference = formatTime(row.referenceTime);
    const latest = formatTime(latestPublishTime(results)) || 'none';

    if (results.length === 0) {
      logger.info(`No candidates for ${row.name} | reference=${reference} | latest=${latest}`);
      return;
    }

    logger.info(`${results.length} candidates for ${row.name} | reference=${reference} | latest=${latest}`);
    for (const result of results) {
      logger.info(
        `Candidate: ${result.title} | published=${formatTime(result.publishTime) || 'none'} | reference=${reference} | ${result.url}`
      );
    }
  }

  private printSummary(summary: RunSummary): void {
    console.log('\n' + '━'.repeat(50));
    console.log(
      `Summary: ${summary.rows} rows, ${summary.candidates} candidates, ${summary.fresh} newer, ` +
        `${summary.downloaded} downloaded, ${summary.skipped} skipped, ${summary.failed} failed, ` +
        `${(summary.durationMs / 1000).toFixed(1)}s`
    );
  }
}
