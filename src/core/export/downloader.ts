// src/core/export/downloader.ts
import * as path from 'path';
import * as fs from 'fs/promises';
import type { HttpClient } from '../fetch/http.js';
import type { SiteAdapter } from '../extract/types.js';
import type { ArtifactKind, AttachmentRef, DetailInfo, SearchResult } from '../types/index.js';
import type { DownloadIndex } from '../dedupe/download-index.js';
import { sha256File } from '../dedupe/hash.js';
import { MarkdownConverter } from './markdown.js';
import {
  attachmentFileName,
  ensureUniquePath,
  extractFilenameFromUrl,
  resultFolder,
  safeFilename,
} from './path.js';
import { ErrorCode, SitewatchError, errorMessage } from '../errors.js';
import { logger } from '../logger.js';

export type DownloadOutcome =
  | { status: 'saved'; folder: string; mainPath?: string; saved: string[] }
  | { status: 'skipped' }
  | { status: 'empty' };

export interface ResultDownloaderOptions {
  downloadRoot: string;
  http: HttpClient;
  index: DownloadIndex;
  converter?: MarkdownConverter;
  now?: () => Date;
}

interface ArtifactContext {
  result: SearchResult;
  title: string;
}

/**
 * Fetches one search result into `<root>/<domain>/<date>/<title>/`: the
 * detail page (HTML plus its markdown rendering) or the file itself, then
 * every attachment. Each artifact is checked against the index by URL before
 * it is fetched and by content hash after it is written.
 */
export class ResultDownloader {
  private readonly converter: MarkdownConverter;
  private readonly now: () => Date;

  constructor(private options: ResultDownloaderOptions) {
    this.converter = options.converter ?? new MarkdownConverter();
    this.now = options.now ?? (() => new Date());
  }

  async download(result: SearchResult, adapter: SiteAdapter, domain: string): Promise<DownloadOutcome> {
    const { index } = this.options;
    if (index.containsUrl(result.url)) {
      logger.info(`Already downloaded, skipping: ${result.url}`);
      return { status: 'skipped' };
    }

    const detail = await adapter.fetchDetailInfo(result);
    const title = detail.title || result.title;
    const folder = resultFolder(this.options.downloadRoot, domain, result.publishTime, title);
    const context: ArtifactContext = { result, title };
    const saved: string[] = [];
    let mainPath: string | undefined;

    if (detail.html) {
      const htmlPath = await this.writeArtifact(
        detail.html,
        path.join(folder, `detail${safeFilename(title)}.html`),
        'detail_html',
        context
      );
      if (htmlPath) {
        saved.push(htmlPath);
        const markdownPath = await this.writeMarkdown(detail.html, htmlPath, context);
        if (markdownPath) saved.push(markdownPath);
        mainPath = markdownPath ?? htmlPath;
      }
    } else if (!detail.contentDropped) {
      const fileName = safeFilename(extractFilenameFromUrl(result.url) ?? result.title);
      const filePath = await this.downloadArtifact(result.url, path.join(folder, fileName), 'direct_file', context);
      if (filePath) {
        saved.push(filePath);
        mainPath = filePath;
      }
    }

    saved.push(...(await this.downloadAttachments(detail, folder, context)));

    if (saved.length === 0) {
      return { status: 'empty' };
    }
    return { status: 'saved', folder, mainPath, saved };
  }

  private async downloadAttachments(detail: DetailInfo, folder: string, context: ArtifactContext): Promise<string[]> {
    const saved: string[] = [];

    for (const [offset, attachment] of detail.attachments.entries()) {
      const { url, name } = normalizeAttachment(attachment);
      if (!url) continue;

      const target = path.join(folder, attachmentFileName(url, name, offset + 1));
      try {
        const filePath = await this.downloadArtifact(url, target, 'attachment', context);
        if (filePath) saved.push(filePath);
      } catch (error) {
        logger.error(`Attachment download failed: ${url} ${errorMessage(error)}`);
      }
    }

    return saved;
  }

  private async writeMarkdown(html: string, htmlPath: string, context: ArtifactContext): Promise<string | undefined> {
    const markdown = this.converter.convert(html);
    if (!markdown) {
      logger.debug(`No markdown content for ${context.result.url}`);
      return undefined;
    }
    const base = htmlPath.slice(0, htmlPath.length - path.extname(htmlPath).length);
    return this.writeArtifact(markdown, `${base}.md`, 'detail_markdown', context);
  }

  private async writeArtifact(
    content: string,
    target: string,
    kind: ArtifactKind,
    context: ArtifactContext
  ): Promise<string | undefined> {
    const filePath = await ensureUniquePath(target);
    try {
      await fs.mkdir(path.dirname(filePath), { recursive: true });
      await fs.writeFile(filePath, content, 'utf-8');
    } catch (error) {
      throw new SitewatchError(ErrorCode.WRITE_FAILED, `Failed to write ${filePath}: ${errorMessage(error)}`);
    }
    return this.keepIfNew(filePath, context.result.url, kind, context);
  }

  private async downloadArtifact(
    url: string,
    target: string,
    kind: ArtifactKind,
    context: ArtifactContext
  ): Promise<string | undefined> {
    if (this.options.index.containsUrl(url)) {
      logger.info(`Already downloaded, skipping: ${url}`);
      return undefined;
    }
    const filePath = await ensureUniquePath(target);
    await this.options.http.download(url, filePath);
    return this.keepIfNew(filePath, url, kind, context);
  }

  /** Index a freshly written file, or delete it when its bytes are already indexed. */
  private async keepIfNew(
    filePath: string,
    url: string,
    kind: ArtifactKind,
    context: ArtifactContext
  ): Promise<string | undefined> {
    const contentHash = await sha256File(filePath);
    if (this.options.index.containsHash(contentHash)) {
      await fs.rm(filePath, { force: true });
      logger.info(`Duplicate content, removed: ${filePath}`);
      return undefined;
    }

    this.options.index.record({
      title: context.title,
      url,
      publishTime: context.result.publishTime,
      path: filePath,
      contentHash,
      downloadedAt: this.now(),
      kind,
    });
    return filePath;
  }
}

function normalizeAttachment(attachment: AttachmentRef): { url: string; name?: string } {
  if (typeof attachment === 'string') {
    return { url: attachment.trim() };
  }
  const name = attachment.name?.trim();
  return { url: attachment.url.trim(), name: name || undefined };
}
