// src/core/manifest/reader.ts
import { readFileSync } from 'fs';
import { parse as parseCSV } from 'csv-parse/sync';
import type { RowItem } from '../types/index.js';
import { parseDateTime } from '../extract/dates.js';
import { ErrorCode, SitewatchError, errorMessage } from '../errors.js';
import { logger } from '../logger.js';

type Role = 'name' | 'url' | 'time';

// Checked in this order; a header is claimed by at most one role.
const ROLE_HINTS: Array<[Role, string[]]> = [
  ['name', ['文件名', 'name', 'keyword']],
  ['url', ['网址', '网站', '链接', 'url']],
  ['time', ['发布', '时间', 'date', 'time']],
];

export type ColumnMap = Record<Role, string>;

export function detectColumns(headers: string[]): ColumnMap {
  const claimed = new Set<string>();
  const found: Partial<ColumnMap> = {};

  for (const [role, hints] of ROLE_HINTS) {
    const header = headers.find(
      candidate => !claimed.has(candidate) && hints.some(hint => candidate.trim().toLowerCase().includes(hint))
    );
    if (header !== undefined) {
      found[role] = header;
      claimed.add(header);
    }
  }

  const { name, url, time } = found;
  if (name === undefined || url === undefined || time === undefined) {
    const missing = ROLE_HINTS.filter(([role]) => found[role] === undefined).map(([role]) => role);
    throw new SitewatchError(
      ErrorCode.MANIFEST_INVALID,
      `Manifest is missing required columns: ${missing.join(', ')}`,
      false,
      'Expected headers like 文件名/name, 网址/url and 发布时间/date'
    );
  }
  return { name, url, time };
}

export function parseManifest(content: string, source: string = 'manifest'): RowItem[] {
  let records: string[][];
  try {
    records = parseCSV(content, {
      bom: true,
      skip_empty_lines: true,
      relax_column_count: true,
    });
  } catch (error) {
    throw new SitewatchError(ErrorCode.MANIFEST_INVALID, `Cannot parse ${source}: ${errorMessage(error)}`);
  }

  const [headers, ...body] = records;
  if (!headers) {
    throw new SitewatchError(ErrorCode.MANIFEST_INVALID, `${source} is empty`);
  }

  const columns = detectColumns(headers);
  const indexOf = (header: string) => headers.indexOf(header);
  const nameIndex = indexOf(columns.name);
  const urlIndex = indexOf(columns.url);
  const timeIndex = indexOf(columns.time);

  const rows: RowItem[] = [];
  body.forEach((record, offset) => {
    const name = (record[nameIndex] ?? '').trim();
    const url = (record[urlIndex] ?? '').trim();
    const referenceTime = parseDateTime(record[timeIndex] ?? '');

    if (!name || !url || !referenceTime) {
      logger.warn(`Skipping ${source} row ${offset + 1}: empty name/url or unparsable time`);
      return;
    }
    rows.push({ name, url, referenceTime });
  });

  return rows;
}

export function readManifest(filePath: string): RowItem[] {
  let content: string;
  try {
    content = readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new SitewatchError(ErrorCode.MANIFEST_INVALID, `Cannot read manifest ${filePath}: ${errorMessage(error)}`);
  }
  return parseManifest(content, filePath);
}
