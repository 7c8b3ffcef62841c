import { toErrorMessage } from '../monitor/http';

export type NotificationDeliveryOutcome = {
  status: 'success' | 'failed';
  httpStatus: number | null;
  error: string | null;
};

const DEFAULT_TIMEOUT_MS = 10_000;

export function buildSlackPayload(text: string): { text: string } {
  return { text };
}

/**
 * Posts `text` to a Slack incoming webhook. Delivery problems are reported in
 * the returned outcome; this never rejects.
 */
export async function sendSlackNotification(
  webhookUrl: string,
  text: string,
  opts: { timeoutMs?: number } = {},
): Promise<NotificationDeliveryOutcome> {
  const timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const controller = new AbortController();
  const t = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const res = await fetch(webhookUrl, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(buildSlackPayload(text)),
      signal: controller.signal,
    });
    // Drain so the connection can be reused.
    await res.text();

    if (!res.ok) {
      return { status: 'failed', httpStatus: res.status, error: `HTTP ${res.status}` };
    }
    return { status: 'success', httpStatus: res.status, error: null };
  } catch (err) {
    const error = controller.signal.aborted ? `Timeout after ${timeoutMs}ms` : toErrorMessage(err);
    return { status: 'failed', httpStatus: null, error };
  } finally {
    clearTimeout(t);
  }
}
