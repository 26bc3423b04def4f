// src/core/config/constants.ts
export const DEFAULT_TIMEOUT_SECONDS = 20;
export const DEFAULT_USER_AGENT = 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

export const DEFAULT_ATTACHMENT_EXTENSIONS = [
  'pdf',
  'doc',
  'docx',
  'xls',
  'xlsx',
  'zip',
  'rar',
  '7z',
  'csv',
  'ppt',
  'pptx',
];

export const DEFAULT_TITLE_SELECTORS = ['h1', 'title'];
export const DEFAULT_ATTACHMENT_SELECTORS = ['a[href]'];

// Labelled publish dates on detail pages, e.g. "发布日期：2024-01-01"
export const DEFAULT_DETAIL_DATE_REGEXES = [
  '(?:发布日期|发布时间|日期)[：:\\s]*([0-9]{4}[./-][0-9]{1,2}[./-][0-9]{1,2})',
  '(?:发布日期|发布时间|日期)[：:\\s]*([0-9]{4}年[0-9]{1,2}月[0-9]{1,2}日)',
];
export const DETAIL_DATE_LABELS = ['日期', '发布时间', '发布日期'];

// Wait after navigation so late scripts can settle
export const DETAIL_RENDER_SETTLE_MS = 500;
export const SEARCH_RENDER_SETTLE_MS = 1000;

export const UNKNOWN_DATE_DIR = 'unknown_date';
