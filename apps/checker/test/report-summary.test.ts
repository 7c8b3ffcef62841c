import { describe, expect, it } from 'vitest';

import {
  formatNotificationText,
  formatRunTimestamp,
  formatSummaryText,
  isValidTimeZone,
  toReportPayload,
} from '../src/report/summary';
import { buildMixedRun } from './helpers/data-builders';

const TIMESTAMP = '2026-10-19 08:05:03 UTC';

describe('report/summary', () => {
  it('lists every target and a counts line', () => {
    expect(formatSummaryText(buildMixedRun(), TIMESTAMP)).toBe(
      [
        '🔍 Uptime check @ 2026-10-19 08:05:03 UTC',
        '✅ https://a.example.com',
        '⏭️  https://b.example.com (skipped)',
        '❌ https://c.example.com: Unexpected status 500',
        'OK:1 | FAIL:1 | SKIP:1 | Total:3',
      ].join('\n'),
    );
  });

  it('falls back to a generic cause when a failure has no message', () => {
    const run = {
      results: [{ url: 'https://x.example.com', status: 'fail' as const, error: '', attempts: 1 }],
      summary: { ok: 0, fail: 1, skip: 0, total: 1 },
      passed: false,
    };

    expect(formatSummaryText(run, TIMESTAMP).split('\n')[1]).toBe(
      '❌ https://x.example.com: unknown error',
    );
  });

  it('prefixes the notification text with the run verdict', () => {
    const failed = buildMixedRun();
    expect(formatNotificationText(failed, 'summary')).toBe('❌ summary');
    expect(formatNotificationText({ ...failed, passed: true }, 'summary')).toBe('✅ summary');
  });

  it('builds the serializable report payload', () => {
    expect(toReportPayload(buildMixedRun(), TIMESTAMP)).toEqual({
      timestamp: TIMESTAMP,
      summary: { ok: 1, fail: 1, skip: 1, total: 3 },
      results: [
        { url: 'https://a.example.com', status: 'ok', http_status: 200, attempts: 1 },
        { url: 'https://b.example.com', status: 'skipped', reason: 'disabled' },
        {
          url: 'https://c.example.com',
          status: 'fail',
          error: 'Unexpected status 500',
          attempts: 2,
        },
      ],
    });
  });

  it('formats run timestamps in the requested zone with a 24-hour clock', () => {
    expect(formatRunTimestamp(new Date('2026-10-19T08:05:03Z'), 'UTC')).toBe(TIMESTAMP);
    expect(formatRunTimestamp(new Date('2026-01-02T00:00:09Z'), 'UTC')).toBe(
      '2026-01-02 00:00:09 UTC',
    );
    expect(formatRunTimestamp(new Date('2026-10-19T08:05:03Z'), 'Asia/Tokyo')).toBe(
      '2026-10-19 17:05:03 GMT+9',
    );
  });

  it('recognizes IANA time zones', () => {
    expect(isValidTimeZone('UTC')).toBe(true);
    expect(isValidTimeZone('Europe/Berlin')).toBe(true);
    expect(isValidTimeZone('Mars/Olympus')).toBe(false);
  });
});
