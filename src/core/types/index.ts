// src/core/types/index.ts
export interface RowItem {
  name: string;
  url: string;
  referenceTime: Date;
}

export interface SearchResult {
  title: string;
  url: string;
  publishTime?: Date;
}

export interface AttachmentLink {
  url: string;
  name?: string;
}

// Adapters emit AttachmentLink; bare URLs are accepted from hand-built details.
export type AttachmentRef = AttachmentLink | string;

export interface DetailInfo {
  title?: string;
  /** Absent when the result itself is a downloadable file. */
  html?: string;
  /** The page was fetched but content rules kept nothing; only attachments remain. */
  contentDropped?: boolean;
  attachments: AttachmentRef[];
}

export type ArtifactKind = 'detail_html' | 'detail_markdown' | 'direct_file' | 'attachment';

export interface DownloadIndexEntry {
  title: string;
  url: string;
  publishTime?: Date;
  path: string;
  contentHash: string;
  downloadedAt: Date;
  kind: ArtifactKind;
}
