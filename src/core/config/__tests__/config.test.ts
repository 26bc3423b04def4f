// src/core/config/__tests__/config.test.ts
import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { loadConfig, parseConfig } from '../config.js';
import { DEFAULT_TIMEOUT_SECONDS, DEFAULT_USER_AGENT } from '../constants.js';
import { ErrorCode } from '../../errors.js';

function caught(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

describe('loadConfig', () => {
  let dir: string;
  let configPath: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'sitewatch-config-'));
    configPath = path.join(dir, 'sitewatch.toml');
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('applies defaults and resolves paths against the config directory', async () => {
    await fs.writeFile(configPath, 'manifest_path = "targets.csv"\n', 'utf-8');

    const config = loadConfig(configPath, { env: {} });

    expect(config).toEqual({
      manifest_path: path.join(dir, 'targets.csv'),
      download_root: path.join(dir, 'downloads'),
      index_path: path.join(dir, 'state', 'download_index.json'),
      success_path: path.join(dir, 'logs', 'success.csv'),
      failures_path: path.join(dir, 'logs', 'failures.csv'),
      request_timeout_seconds: DEFAULT_TIMEOUT_SECONDS,
      user_agent: DEFAULT_USER_AGENT,
      dry_run: false,
      site_overrides: {},
    });
  });

  it('keeps absolute paths', async () => {
    await fs.writeFile(configPath, 'manifest_path = "/srv/targets.csv"\nlog_path = "/var/log/../log/sw.log"\n', 'utf-8');

    const config = loadConfig(configPath, { env: {} });

    expect(config.manifest_path).toBe(path.normalize('/srv/targets.csv'));
    expect(config.log_path).toBe(path.normalize('/var/log/sw.log'));
  });

  it('turns on dry run from the option or the environment', async () => {
    await fs.writeFile(configPath, 'manifest_path = "targets.csv"\n', 'utf-8');

    expect(loadConfig(configPath, { dryRun: true, env: {} }).dry_run).toBe(true);
    expect(loadConfig(configPath, { env: { SITEWATCH_DRY_RUN: '1' } }).dry_run).toBe(true);
    expect(loadConfig(configPath, { env: { SITEWATCH_DRY_RUN: '0' } }).dry_run).toBe(false);
  });

  it('reports a missing file with a hint', () => {
    expect(caught(() => loadConfig(path.join(dir, 'missing.toml')))).toMatchObject({
      code: ErrorCode.CONFIG_INVALID,
      suggestion: 'Pass --config <path> or create sitewatch.toml in the working directory',
    });
  });

  it('reports malformed TOML', async () => {
    await fs.writeFile(configPath, 'manifest_path = \n', 'utf-8');

    expect(caught(() => loadConfig(configPath))).toMatchObject({ code: ErrorCode.CONFIG_INVALID });
  });

  it('parses the bundled example', () => {
    const config = loadConfig(path.join(__dirname, '..', '..', '..', '..', 'sitewatch.example.toml'), { env: {} });

    const rule = config.site_overrides['news.example.com'];
    expect(rule?.adapter).toBe('rule');
    if (rule?.adapter === 'rule') {
      expect(rule.query_encoding).toBe('double');
      expect(rule.selectors).toEqual({ item: 'ul.results > li', title: 'a.title', date: 'span.date' });
      expect(rule.detail_page.content_extract.remove_selectors).toEqual(['div.share', 'script']);
    }
    expect(config.site_overrides['www.example.gov.cn']?.adapter).toBe('heuristic');
  });
});

describe('parseConfig', () => {
  it('lists every invalid field', () => {
    expect(caught(() => parseConfig({ request_timeout_seconds: 0 }, 'test.toml'))).toMatchObject({
      code: ErrorCode.CONFIG_INVALID,
      message:
        'Invalid configuration in test.toml: manifest_path: Required; request_timeout_seconds: Number must be greater than 0',
    });
  });

  it('defaults an override without an adapter key to the heuristic adapter', () => {
    const config = parseConfig({
      manifest_path: 'targets.csv',
      site_overrides: { 'example.org': { search_url: 'https://example.org/s?q={query}' } },
    });

    expect(config.site_overrides['example.org']).toMatchObject({
      adapter: 'heuristic',
      search_url: 'https://example.org/s?q={query}',
      detail_page: { enabled: true, attachment_extensions: [] },
    });
  });

  it('accepts a single selector string where a list is expected', () => {
    const config = parseConfig({
      manifest_path: 'targets.csv',
      site_overrides: { 'example.org': { adapter: 'rule', detail_date: { selectors: ' .meta ' } } },
    });

    const site = config.site_overrides['example.org'];
    expect(site?.adapter === 'rule' && site.detail_date.selectors).toEqual(['.meta']);
  });
});
