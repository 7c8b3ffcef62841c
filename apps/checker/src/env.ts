import { slackWebhookUrlSchema } from '@pulsecheck/config';

import { DEFAULT_CONCURRENCY } from './monitor/batch';

export type Env = {
  slackWebhookUrl: string | null;
  concurrency: number;
};

export const MAX_CONCURRENCY = 1_000;

export function parsePositiveInt(
  raw: unknown,
  fallback: number,
  opts: { min: number; max: number },
): number {
  if (typeof raw !== 'string' || raw.trim().length === 0) return fallback;
  const n = Number.parseInt(raw, 10);
  if (!Number.isFinite(n)) return fallback;
  const v = Math.trunc(n);
  if (v < opts.min) return opts.min;
  if (v > opts.max) return opts.max;
  return v;
}

export function readEnv(source: Record<string, string | undefined>): Env {
  let slackWebhookUrl: string | null = null;
  const rawWebhook = source.SLACK_WEBHOOK_URL?.trim();
  if (rawWebhook) {
    const r = slackWebhookUrlSchema.safeParse(rawWebhook);
    if (r.success) {
      slackWebhookUrl = r.data;
    } else {
      console.warn('notify: SLACK_WEBHOOK_URL is not a valid http(s) URL; notifications disabled');
    }
  }

  return {
    slackWebhookUrl,
    concurrency: parsePositiveInt(source.PULSECHECK_CONCURRENCY, DEFAULT_CONCURRENCY, {
      min: 1,
      max: MAX_CONCURRENCY,
    }),
  };
}
