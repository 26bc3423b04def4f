// src/core/export/path.ts
import * as path from 'path';
import * as fs from 'fs/promises';
import { formatDateDir } from '../extract/dates.js';
import { UNKNOWN_DATE_DIR } from '../config/constants.js';

const ILLEGAL_FILENAME_CHARS = /[\\/:*?"<>|]/g;

export function safeFilename(value: string): string {
  return value.replace(ILLEGAL_FILENAME_CHARS, '').trim() || 'file';
}

function urlPathname(url: string): string {
  try {
    return new URL(url).pathname;
  } catch {
    return url.split(/[?#]/)[0];
  }
}

function decodeSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    return segment;
  }
}

/** Last path segment of a URL, percent-decoded; undefined for `/` or `/dir/`. */
export function extractFilenameFromUrl(url: string): string | undefined {
  const pathname = urlPathname(url);
  const base = pathname.slice(pathname.lastIndexOf('/') + 1);
  return base ? decodeSegment(base) : undefined;
}

/** Extension of a URL's path including the dot, or '' */
export function urlExtension(url: string): string {
  return path.posix.extname(urlPathname(url));
}

export function buildFileNameFromUrl(url: string, fallbackPrefix: string, index: number): string {
  const name = extractFilenameFromUrl(url);
  if (name) {
    return safeFilename(name);
  }
  return safeFilename(`${fallbackPrefix}_${index}${urlExtension(url)}`);
}

/** File name for an attachment: its label (plus the URL's extension when the label has none), else the URL. */
export function attachmentFileName(url: string, name: string | undefined, index: number): string {
  if (!name) {
    return buildFileNameFromUrl(url, 'attachment', index);
  }
  const fileName = safeFilename(name);
  if (path.extname(fileName)) {
    return fileName;
  }
  return `${fileName}${urlExtension(url)}`;
}

async function pathExists(target: string): Promise<boolean> {
  try {
    await fs.access(target);
    return true;
  } catch {
    return false;
  }
}

/**
 * `target` if nothing exists there yet, otherwise the first free
 * `name_1.ext`, `name_2.ext`, ...
 */
export async function ensureUniquePath(target: string): Promise<string> {
  if (!(await pathExists(target))) {
    return target;
  }

  const ext = path.extname(target);
  const base = target.slice(0, target.length - ext.length);
  for (let counter = 1; ; counter++) {
    const candidate = `${base}_${counter}${ext}`;
    if (!(await pathExists(candidate))) {
      return candidate;
    }
  }
}

/** `<root>/<domain>/<YYYYMMDD | unknown_date>/<title>` */
export function resultFolder(
  downloadRoot: string,
  domain: string,
  publishTime: Date | undefined,
  title: string
): string {
  const dateDir = publishTime ? formatDateDir(publishTime) : UNKNOWN_DATE_DIR;
  return path.join(downloadRoot, safeFilename(domain), dateDir, safeFilename(title));
}
