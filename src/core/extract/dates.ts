// src/core/extract/dates.ts

// `YYYY[./-]M[./-]D` and `YYYY年M月D日`
const DATE_PATTERNS: RegExp[] = [
  /(\d{4})[./-](\d{1,2})[./-](\d{1,2})/g,
  /(\d{4})年(\d{1,2})月(\d{1,2})日/g,
];

/** Local-time date, or undefined when the parts do not name a real day. */
export function buildDate(
  year: number,
  month: number,
  day: number,
  hour: number = 0,
  minute: number = 0,
  second: number = 0
): Date | undefined {
  if (month < 1 || month > 12 || day < 1 || year < 1) return undefined;
  if (hour > 23 || minute > 59 || second > 59) return undefined;

  const date = new Date(year, month - 1, day, hour, minute, second);
  if (date.getFullYear() !== year || date.getMonth() !== month - 1 || date.getDate() !== day) {
    return undefined;
  }
  return date;
}

export function extractDates(text: string): Date[] {
  const dates: Date[] = [];
  for (const pattern of DATE_PATTERNS) {
    for (const match of text.matchAll(pattern)) {
      const date = buildDate(Number(match[1]), Number(match[2]), Number(match[3]));
      if (date) {
        dates.push(date);
      }
    }
  }
  return dates;
}

/**
 * Latest date mentioned anywhere in `text`.
 *
 * Link neighbourhoods and detail pages usually mention several dates (list
 * ordinals, sidebars, copyright lines); the latest one is taken as the publish
 * date. This knowingly picks up unrelated later dates.
 */
export function bestDate(text: string): Date | undefined {
  let best: Date | undefined;
  for (const date of extractDates(text)) {
    if (!best || date.getTime() > best.getTime()) {
      best = date;
    }
  }
  return best;
}

/**
 * Parse one date/time value as written in a manifest cell.
 */
export function parseDateTime(value: string): Date | undefined {
  const raw = value.replace(/\s+/g, ' ').trim();
  if (!raw) return undefined;

  // Spreadsheet serial day (days since 1899-12-30)
  if (/^\d+(\.\d+)?$/.test(raw)) {
    const serial = Number(raw);
    if (serial < 1 || serial > 2958465) return undefined;
    const days = Math.floor(serial);
    const base = new Date(1899, 11, 30);
    return new Date(base.getFullYear(), base.getMonth(), base.getDate() + days);
  }

  const cnMatch = raw.match(
    /^(\d{4})\s*年\s*(\d{1,2})\s*月\s*(\d{1,2})\s*日(?:\s*(\d{1,2})[:：](\d{2})(?::(\d{2}))?)?$/
  );
  if (cnMatch) {
    const [, year, month, day, hour, minute, second] = cnMatch;
    return buildDate(Number(year), Number(month), Number(day), Number(hour ?? 0), Number(minute ?? 0), Number(second ?? 0));
  }

  const simpleMatch = raw.match(
    /^(\d{4})[./-](\d{1,2})[./-](\d{1,2})(?:[ T](\d{1,2}):(\d{2})(?::(\d{2}))?)?$/
  );
  if (simpleMatch) {
    const [, year, month, day, hour, minute, second] = simpleMatch;
    return buildDate(Number(year), Number(month), Number(day), Number(hour ?? 0), Number(minute ?? 0), Number(second ?? 0));
  }

  // ISO-8601 with an explicit offset
  if (/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:?\d{2})$/.test(raw)) {
    const parsed = new Date(raw);
    return Number.isNaN(parsed.getTime()) ? undefined : parsed;
  }

  return undefined;
}

export function formatDateDir(date: Date): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${year}${month}${day}`;
}

export function formatTime(date: Date | undefined): string {
  if (!date) return '';
  const pad = (value: number) => String(value).padStart(2, '0');
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}
