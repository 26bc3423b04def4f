// src/core/render/types.ts
export interface RenderOptions {
  userAgent: string;
  timeoutMs: number;
  waitForSelector?: string;
  settleMs?: number;
}

/** Anything that can turn a URL into script-rendered markup. */
export interface HtmlRenderer {
  render(url: string, options: RenderOptions): Promise<string>;
}
