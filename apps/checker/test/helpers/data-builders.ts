import type { Target } from '@pulsecheck/config';

import type { BatchRun } from '../../src/monitor/batch';

export function buildTarget(overrides: Partial<Target> = {}): Target {
  return {
    url: 'https://example.com/health',
    expectedStatus: null,
    keyword: null,
    disabled: false,
    timeoutSeconds: null,
    retries: null,
    ...overrides,
  };
}

export function buildMixedRun(): BatchRun {
  return {
    results: [
      { url: 'https://a.example.com', status: 'ok', httpStatus: 200, attempts: 1 },
      { url: 'https://b.example.com', status: 'skipped', reason: 'disabled' },
      { url: 'https://c.example.com', status: 'fail', error: 'Unexpected status 500', attempts: 2 },
    ],
    summary: { ok: 1, fail: 1, skip: 1, total: 3 },
    passed: false,
  };
}
