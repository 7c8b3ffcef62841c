import type { CheckDefaults, StatusRange, Target } from '@pulsecheck/config';

import { runTargetCheck } from './retry';
import { Semaphore } from './semaphore';
import type { BatchSummary, TargetResult } from './types';

export const DEFAULT_CONCURRENCY = 10;

export type BatchOptions = {
  defaults: CheckDefaults;
  okRanges: readonly StatusRange[];
  concurrency?: number;
};

export type BatchRun = {
  results: TargetResult[];
  summary: BatchSummary;
  passed: boolean;
};

export function summarizeResults(results: readonly TargetResult[]): BatchSummary {
  const summary: BatchSummary = { ok: 0, fail: 0, skip: 0, total: results.length };
  for (const r of results) {
    if (r.status === 'ok') summary.ok++;
    else if (r.status === 'fail') summary.fail++;
    else summary.skip++;
  }
  return summary;
}

export async function runBatch(targets: readonly Target[], options: BatchOptions): Promise<BatchRun> {
  const gate = new Semaphore(options.concurrency ?? DEFAULT_CONCURRENCY);

  // Promise.all keeps input order no matter which check finishes first.
  const results = await Promise.all(
    targets.map((target) =>
      gate.use(() => runTargetCheck(target, options.defaults, options.okRanges)),
    ),
  );

  const summary = summarizeResults(results);
  return { results, summary, passed: summary.fail === 0 };
}
