// src/core/dedupe/types.ts
import { z } from 'zod';

export const ArtifactKindSchema = z.enum(['detail_html', 'detail_markdown', 'direct_file', 'attachment']);

const TimestampSchema = z.string().refine(value => !Number.isNaN(Date.parse(value)), 'Invalid timestamp');

// On-disk shape of one index item
export const IndexRecordSchema = z.object({
  title: z.string(),
  url: z.string(),
  publish_time: TimestampSchema.nullable(),
  path: z.string(),
  sha256: z.string(),
  downloaded_at: TimestampSchema,
  kind: ArtifactKindSchema,
});

export const IndexFileSchema = z.object({
  items: z.array(IndexRecordSchema),
});

export type IndexRecord = z.infer<typeof IndexRecordSchema>;
export type IndexFile = z.infer<typeof IndexFileSchema>;
