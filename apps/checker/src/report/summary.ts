import type { BatchRun } from '../monitor/batch';
import type { TargetResult } from '../monitor/types';

export type ReportResult = {
  url: string;
  status: TargetResult['status'];
  http_status?: number;
  error?: string;
  reason?: 'disabled';
  attempts?: number;
};

export type ReportPayload = {
  timestamp: string;
  summary: { ok: number; fail: number; skip: number; total: number };
  results: ReportResult[];
};

export function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
    return true;
  } catch {
    return false;
  }
}

/**
 * Formats `date` as `YYYY-MM-DD HH:mm:ss <zone>` in the given IANA zone,
 * e.g. `2026-10-19 08:05:03 UTC`.
 */
export function formatRunTimestamp(date: Date, timeZone: string): string {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
    hourCycle: 'h23',
    timeZoneName: 'short',
  }).formatToParts(date);

  const get = (type: Intl.DateTimeFormatPartTypes): string =>
    parts.find((p) => p.type === type)?.value ?? '';

  return `${get('year')}-${get('month')}-${get('day')} ${get('hour')}:${get('minute')}:${get('second')} ${get('timeZoneName')}`;
}

function formatResultLine(r: TargetResult): string {
  switch (r.status) {
    case 'ok':
      return `✅ ${r.url}`;
    case 'skipped':
      return `⏭️  ${r.url} (skipped)`;
    case 'fail':
      return `❌ ${r.url}: ${r.error || 'unknown error'}`;
  }
}

export function formatSummaryText(run: BatchRun, timestamp: string): string {
  const { ok, fail, skip, total } = run.summary;
  const lines = [`🔍 Uptime check @ ${timestamp}`];
  for (const r of run.results) {
    lines.push(formatResultLine(r));
  }
  lines.push(`OK:${ok} | FAIL:${fail} | SKIP:${skip} | Total:${total}`);
  return lines.join('\n');
}

export function formatNotificationText(run: BatchRun, summaryText: string): string {
  return `${run.passed ? '✅' : '❌'} ${summaryText}`;
}

function toReportResult(r: TargetResult): ReportResult {
  switch (r.status) {
    case 'ok':
      return { url: r.url, status: 'ok', http_status: r.httpStatus, attempts: r.attempts };
    case 'fail':
      return { url: r.url, status: 'fail', error: r.error, attempts: r.attempts };
    case 'skipped':
      return { url: r.url, status: 'skipped', reason: r.reason };
  }
}

export function toReportPayload(run: BatchRun, timestamp: string): ReportPayload {
  return {
    timestamp,
    summary: { ...run.summary },
    results: run.results.map(toReportResult),
  };
}
