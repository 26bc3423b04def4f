// src/core/dedupe/download-index.ts
import * as path from 'path';
import * as fs from 'fs/promises';
import { existsSync } from 'fs';
import type { DownloadIndexEntry } from '../types/index.js';
import { IndexFileSchema, type IndexFile, type IndexRecord } from './types.js';
import { ErrorCode, SitewatchError, errorMessage } from '../errors.js';
import { logger } from '../logger.js';

/**
 * Everything downloaded so far, deduplicated two ways: by source URL before a
 * fetch and by content hash after a write. Loaded once per run and written
 * back once at the end.
 */
export class DownloadIndex {
  private items: DownloadIndexEntry[] = [];
  private urls = new Set<string>();
  private hashes = new Set<string>();
  private loaded: boolean = false;

  constructor(private indexPath: string) {}

  get path(): string {
    return this.indexPath;
  }

  async load(): Promise<void> {
    if (this.loaded) return;
    this.loaded = true;

    if (!existsSync(this.indexPath)) {
      return;
    }

    let file: IndexFile;
    try {
      const content = await fs.readFile(this.indexPath, 'utf-8');
      file = IndexFileSchema.parse(JSON.parse(content));
    } catch (error) {
      logger.warn(`Download index ${this.indexPath} is unreadable (${errorMessage(error)}); starting empty`);
      await this.backup();
      return;
    }

    for (const record of file.items) {
      this.add(fromRecord(record));
    }
    logger.debug(`Loaded ${this.items.length} index entries from ${this.indexPath}`);
  }

  async save(): Promise<void> {
    const file: IndexFile = { items: this.items.map(toRecord) };
    try {
      await fs.mkdir(path.dirname(this.indexPath), { recursive: true });
      await fs.writeFile(this.indexPath, JSON.stringify(file, null, 2), 'utf-8');
    } catch (error) {
      throw new SitewatchError(
        ErrorCode.WRITE_FAILED,
        `Failed to write download index ${this.indexPath}: ${errorMessage(error)}`
      );
    }
  }

  containsUrl(url: string): boolean {
    return this.urls.has(url);
  }

  containsHash(hash: string): boolean {
    return this.hashes.has(hash);
  }

  record(entry: DownloadIndexEntry): void {
    this.add(entry);
  }

  entries(): readonly DownloadIndexEntry[] {
    return this.items;
  }

  get size(): number {
    return this.items.length;
  }

  private add(entry: DownloadIndexEntry): void {
    this.items.push(entry);
    this.urls.add(entry.url);
    this.hashes.add(entry.contentHash);
  }

  private async backup(): Promise<void> {
    const backupPath = `${this.indexPath}.bak`;
    try {
      await fs.rename(this.indexPath, backupPath);
      logger.warn(`Moved unreadable index to ${backupPath}`);
    } catch (error) {
      logger.warn(`Could not back up ${this.indexPath}: ${errorMessage(error)}`);
    }
  }
}

function fromRecord(record: IndexRecord): DownloadIndexEntry {
  return {
    title: record.title,
    url: record.url,
    publishTime: record.publish_time ? new Date(record.publish_time) : undefined,
    path: record.path,
    contentHash: record.sha256,
    downloadedAt: new Date(record.downloaded_at),
    kind: record.kind,
  };
}

function toRecord(entry: DownloadIndexEntry): IndexRecord {
  return {
    title: entry.title,
    url: entry.url,
    publish_time: entry.publishTime ? entry.publishTime.toISOString() : null,
    path: entry.path,
    sha256: entry.contentHash,
    downloaded_at: entry.downloadedAt.toISOString(),
    kind: entry.kind,
  };
}
