// src/core/extract/registry.ts
import type { AdapterContext, AdapterOptions, SiteAdapter } from './types.js';
import type { SiteConfig } from '../config/schema.js';
import { HeuristicSiteSchema } from '../config/schema.js';
import { HeuristicAdapter } from './adapters/heuristic.js';
import { RuleDrivenAdapter } from './adapters/rule-driven.js';
import { ErrorCode, SitewatchError } from '../errors.js';
import { logger } from '../logger.js';

export interface RegistryOptions {
  timeoutSeconds: number;
  userAgent: string;
  overrides: Record<string, SiteConfig>;
}

export function createAdapter(options: AdapterOptions, context: AdapterContext, site: SiteConfig): SiteAdapter {
  switch (site.adapter) {
    case 'rule':
      return new RuleDrivenAdapter(options, context, site);
    case 'heuristic':
      return new HeuristicAdapter(options, context, site);
  }
}

export function domainOf(url: string): string {
  try {
    return new URL(url).host.toLowerCase();
  } catch {
    throw new SitewatchError(ErrorCode.INVALID_URL, `Invalid target URL: ${url}`);
  }
}

/**
 * One adapter per domain, created on first use from that domain's override
 * (or the heuristic defaults) and kept for the rest of the run. The first
 * row seen for a domain fixes the adapter's base URL.
 */
export class AdapterRegistry {
  private adapters = new Map<string, SiteAdapter>();
  private overrides = new Map<string, SiteConfig>();
  private readonly defaultSite = HeuristicSiteSchema.parse({});

  constructor(private options: RegistryOptions, private context: AdapterContext) {
    for (const [domain, site] of Object.entries(options.overrides)) {
      this.overrides.set(domain.toLowerCase(), site);
    }
  }

  resolve(url: string): SiteAdapter {
    const domain = domainOf(url);
    const existing = this.adapters.get(domain);
    if (existing) {
      return existing;
    }

    const site = this.overrides.get(domain) ?? this.defaultSite;
    const adapter = createAdapter(
      { baseUrl: url, timeoutSeconds: this.options.timeoutSeconds, userAgent: this.options.userAgent },
      this.context,
      site
    );
    logger.debug(`Using ${adapter.kind} adapter for ${domain}`);
    this.register(domain, adapter);
    return adapter;
  }

  register(domain: string, adapter: SiteAdapter): void {
    this.adapters.set(domain.toLowerCase(), adapter);
  }

  get(url: string): SiteAdapter | undefined {
    return this.adapters.get(domainOf(url));
  }
}
