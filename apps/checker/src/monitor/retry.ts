import {
  MAX_TIMEOUT_SECONDS,
  type CheckDefaults,
  type StatusRange,
  type Target,
} from '@pulsecheck/config';

import { attemptHttpProbe } from './http';
import { containsKeyword, isStatusOk } from './status';
import { validateHttpTarget } from './targets';
import type { AttemptOutcome, TargetResult } from './types';

export const DEFAULT_TIMEOUT_SECONDS = 10;
export const DEFAULT_RETRIES = 1;
export const RETRY_DELAY_MS = 500;

export type AttemptVerdict = { ok: true; httpStatus: number } | { ok: false; error: string };

export type AttemptingState = { phase: 'attempting'; attempts: number; lastError: string | null };
export type SucceededState = { phase: 'succeeded'; attempts: number; httpStatus: number };
export type ExhaustedState = { phase: 'exhausted'; attempts: number; lastError: string };

export type RetryState = AttemptingState | SucceededState | ExhaustedState;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function resolveCheckPolicy(
  target: Target,
  defaults: CheckDefaults,
): { timeoutMs: number; maxAttempts: number } {
  const timeoutSeconds = target.timeoutSeconds ?? defaults.timeoutSeconds ?? DEFAULT_TIMEOUT_SECONDS;
  const retries = target.retries ?? defaults.retries ?? DEFAULT_RETRIES;
  return {
    timeoutMs: Math.min(timeoutSeconds, MAX_TIMEOUT_SECONDS) * 1000,
    maxAttempts: Math.max(0, Math.trunc(retries)) + 1,
  };
}

export function evaluateAttempt(
  outcome: AttemptOutcome,
  target: Target,
  okRanges: readonly StatusRange[],
): AttemptVerdict {
  if (outcome.kind === 'error') {
    return { ok: false, error: outcome.error };
  }

  const { httpStatus, bodyPrefix } = outcome;
  if (!isStatusOk(httpStatus, target.expectedStatus, okRanges)) {
    const expected = target.expectedStatus !== null ? ` (expected ${target.expectedStatus})` : '';
    return { ok: false, error: `Unexpected status ${httpStatus}${expected}` };
  }

  if (!containsKeyword(bodyPrefix, target.keyword)) {
    return { ok: false, error: `Keyword "${target.keyword ?? ''}" not found in response` };
  }

  return { ok: true, httpStatus };
}

/**
 * A success ends the loop regardless of the remaining budget. A failure only
 * keeps the latest cause.
 */
export function advanceRetryState(
  state: AttemptingState,
  verdict: AttemptVerdict,
  maxAttempts: number,
): RetryState {
  const attempts = state.attempts + 1;

  if (verdict.ok) {
    return { phase: 'succeeded', attempts, httpStatus: verdict.httpStatus };
  }
  if (attempts >= maxAttempts) {
    return { phase: 'exhausted', attempts, lastError: verdict.error };
  }
  return { phase: 'attempting', attempts, lastError: verdict.error };
}

export async function runTargetCheck(
  target: Target,
  defaults: CheckDefaults,
  okRanges: readonly StatusRange[],
): Promise<TargetResult> {
  if (target.disabled) {
    return { url: target.url, status: 'skipped', reason: 'disabled' };
  }

  const targetErr = validateHttpTarget(target.url);
  if (targetErr) {
    return { url: target.url, status: 'fail', error: targetErr, attempts: 0 };
  }

  const { timeoutMs, maxAttempts } = resolveCheckPolicy(target, defaults);
  let state: AttemptingState = { phase: 'attempting', attempts: 0, lastError: null };

  while (true) {
    const outcome = await attemptHttpProbe(target.url, timeoutMs);
    const next = advanceRetryState(state, evaluateAttempt(outcome, target, okRanges), maxAttempts);

    if (next.phase === 'succeeded') {
      return { url: target.url, status: 'ok', httpStatus: next.httpStatus, attempts: next.attempts };
    }
    if (next.phase === 'exhausted') {
      return { url: target.url, status: 'fail', error: next.lastError, attempts: next.attempts };
    }

    state = next;
    await sleep(RETRY_DELAY_MS);
  }
}
