// src/core/config/schema.ts
import { z } from 'zod';
import { DEFAULT_TIMEOUT_SECONDS, DEFAULT_USER_AGENT } from './constants.js';

const SelectorListSchema = z
  .union([z.string(), z.array(z.string())])
  .transform(value => (typeof value === 'string' ? [value] : value).map(item => item.trim()).filter(Boolean));

const WordListSchema = z.array(z.string()).transform(values => values.map(item => item.trim()).filter(Boolean));

export const FetchModeSchema = z.enum(['http', 'browser']);

export const ContentExtractSchema = z.object({
  enabled: z.boolean().default(false),
  fallback_to_original_on_empty: z.boolean().default(true),
  title_selectors: SelectorListSchema.default([]),
  date_selectors: SelectorListSchema.default([]),
  body_selectors: SelectorListSchema.default([]),
  remove_selectors: SelectorListSchema.default([]),
});

export const DetailPageSchema = z.object({
  enabled: z.boolean().default(true),
  fetch_mode: FetchModeSchema.optional(),
  attachment_extensions: WordListSchema.default([]),
  title_selectors: SelectorListSchema.default([]),
  attachment_selectors: SelectorListSchema.default([]),
  attachment_text_keywords: WordListSchema.default([]),
  content_extract: ContentExtractSchema.default({}),
});

export const DetailDateSchema = z.object({
  enabled: z.boolean().default(false),
  selectors: SelectorListSchema.default([]),
  regexes: z.array(z.string()).default([]),
  fetch_mode: FetchModeSchema.default('http'),
});

export const RuleSelectorsSchema = z.object({
  item: z.string().optional(),
  title: z.string().default('a'),
  date: z.string().optional(),
  wait_for: z.string().optional(),
});

export const HeuristicSiteSchema = z.object({
  adapter: z.literal('heuristic').default('heuristic'),
  search_url: z.string().optional(),
  detail_page: DetailPageSchema.default({}),
});

export const RuleSiteSchema = z.object({
  adapter: z.literal('rule'),
  search_url: z.string().optional(),
  query_encoding: z.enum(['none', 'single', 'double']).default('single'),
  fetch_mode: FetchModeSchema.default('browser'),
  selectors: RuleSelectorsSchema.default({}),
  match_keyword: z.boolean().default(true),
  match_in_title_only: z.boolean().default(false),
  date_from_item: z.boolean().default(false),
  link_href_contains: z.string().optional(),
  detail_date: DetailDateSchema.default({}),
  detail_page: DetailPageSchema.default({}),
});

// Rule first: the heuristic variant also accepts an override with no `adapter` key.
export const SiteConfigSchema = z.union([RuleSiteSchema, HeuristicSiteSchema]);

export const AppConfigSchema = z.object({
  manifest_path: z.string().min(1),
  download_root: z.string().default('downloads'),
  index_path: z.string().default('state/download_index.json'),
  success_path: z.string().default('logs/success.csv'),
  failures_path: z.string().default('logs/failures.csv'),
  log_path: z.string().optional(),
  request_timeout_seconds: z.number().positive().default(DEFAULT_TIMEOUT_SECONDS),
  user_agent: z.string().min(1).default(DEFAULT_USER_AGENT),
  dry_run: z.boolean().default(false),
  site_overrides: z.record(SiteConfigSchema).default({}),
});

export type FetchMode = z.infer<typeof FetchModeSchema>;
export type DetailPageRules = z.infer<typeof DetailPageSchema>;
export type HeuristicSiteConfig = z.infer<typeof HeuristicSiteSchema>;
export type RuleSiteConfig = z.infer<typeof RuleSiteSchema>;
export type SiteConfig = z.infer<typeof SiteConfigSchema>;
export type AppConfig = z.infer<typeof AppConfigSchema>;
