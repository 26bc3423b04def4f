// src/core/extract/__tests__/dates.test.ts
import { describe, it, expect } from '@jest/globals';
import { bestDate, buildDate, extractDates, formatDateDir, formatTime, parseDateTime } from '../dates.js';

describe('extractDates', () => {
  it('finds dashed, dotted, slashed and CJK dates', () => {
    const dates = extractDates('a 2024-01-05 b 2023.2.3 c 2022/12/31 d 2021年7月1日');

    expect(dates.map(formatDateDir).sort()).toEqual(['20210701', '20221231', '20230203', '20240105']);
  });

  it('drops matches that are not real days', () => {
    expect(extractDates('2024-13-01 2023-02-30 2024-02-29')).toEqual([new Date(2024, 1, 29)]);
  });

  it('finds dates embedded in URLs', () => {
    expect(extractDates('/news/2024-03-08/notice.html')).toEqual([new Date(2024, 2, 8)]);
  });
});

describe('bestDate', () => {
  it('picks the latest date in the text', () => {
    expect(bestDate('发布日期：2024-03-01 更新 2024-02-15')).toEqual(new Date(2024, 2, 1));
  });

  it('is fooled by a later unrelated date', () => {
    const text = '关于开展年度检查的通知 2024-03-01 | 版权所有 © 2025.12.31 网站维护';

    expect(bestDate(text)).toEqual(new Date(2025, 11, 31));
  });

  it('returns undefined when no date is present', () => {
    expect(bestDate('no dates here 2024')).toBeUndefined();
  });
});

describe('buildDate', () => {
  it('rejects out-of-range time parts', () => {
    expect(buildDate(2024, 1, 1, 24, 0, 0)).toBeUndefined();
    expect(buildDate(2024, 1, 1, 23, 59, 59)).toEqual(new Date(2024, 0, 1, 23, 59, 59));
  });
});

describe('parseDateTime', () => {
  it('parses date-only values as local midnight', () => {
    expect(parseDateTime('2024-01-01')).toEqual(new Date(2024, 0, 1));
    expect(parseDateTime('2024/3/5')).toEqual(new Date(2024, 2, 5));
    expect(parseDateTime('2024.3.5')).toEqual(new Date(2024, 2, 5));
  });

  it('parses a time of day', () => {
    expect(parseDateTime('2024-03-15 09:30')).toEqual(new Date(2024, 2, 15, 9, 30, 0));
    expect(parseDateTime('2024-03-15T09:30:15')).toEqual(new Date(2024, 2, 15, 9, 30, 15));
  });

  it('parses CJK dates', () => {
    expect(parseDateTime('2024年3月5日')).toEqual(new Date(2024, 2, 5));
    expect(parseDateTime('2024年3月5日 8:05')).toEqual(new Date(2024, 2, 5, 8, 5, 0));
  });

  it('parses ISO timestamps with an offset', () => {
    expect(parseDateTime('2024-01-01T00:00:00Z')).toEqual(new Date(Date.UTC(2024, 0, 1)));
  });

  it('parses spreadsheet serial days', () => {
    expect(parseDateTime('45292')).toEqual(new Date(2024, 0, 1));
  });

  it('returns undefined for junk', () => {
    expect(parseDateTime('')).toBeUndefined();
    expect(parseDateTime('soon')).toBeUndefined();
    expect(parseDateTime('2024-02-30')).toBeUndefined();
  });
});

describe('formatting', () => {
  it('formats folder dates and log timestamps in local time', () => {
    const date = new Date(2024, 2, 1, 7, 5, 9);

    expect(formatDateDir(date)).toBe('20240301');
    expect(formatTime(date)).toBe('2024-03-01 07:05:09');
    expect(formatTime(undefined)).toBe('');
  });
});
