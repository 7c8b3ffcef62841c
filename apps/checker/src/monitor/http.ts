import type { AttemptOutcome } from './types';

export const USER_AGENT = 'pulsecheck/1.0';
// Servers may ignore the range; the read below is bounded either way.
export const RANGE_HEADER = 'bytes=0-1024';
export const MAX_BODY_PREFIX_BYTES = 4096;

export function toErrorMessage(err: unknown): string {
  if (err instanceof Error) {
    // undici reports "fetch failed" and keeps the actual reason in `cause`.
    const cause = err.cause;
    if (cause instanceof Error && cause.message && cause.message !== err.message) {
      return `${err.message}: ${cause.message}`;
    }
    return err.message;
  }
  return String(err);
}

function isAbortError(err: unknown): boolean {
  if (err && typeof err === 'object' && 'name' in err) {
    return (err as { name?: unknown }).name === 'AbortError';
  }
  return false;
}

async function readTextUpTo(stream: ReadableStream<Uint8Array>, maxBytes: number): Promise<string> {
  const reader = stream.getReader();
  // Non-fatal decoder: malformed sequences become U+FFFD instead of throwing.
  const decoder = new TextDecoder('utf-8');
  let bytes = 0;
  let text = '';
  let truncated = false;

  try {
    while (true) {
      const r = await reader.read();
      if (r.done) break;

      const chunk = r.value;
      if (!chunk || chunk.length === 0) continue;

      const remaining = maxBytes - bytes;
      if (chunk.length < remaining) {
        bytes += chunk.length;
        text += decoder.decode(chunk, { stream: true });
        continue;
      }

      bytes += remaining;
      text += decoder.decode(chunk.subarray(0, remaining), { stream: true });
      truncated = true;
      break;
    }
  } finally {
    if (truncated) {
      await reader.cancel().catch(() => undefined);
    }
    reader.releaseLock();
  }

  text += decoder.decode();
  return text;
}

/**
 * Performs a single GET against `url`. The timeout covers both the response
 * headers and the bounded body read. Never rejects.
 */
export async function attemptHttpProbe(url: string, timeoutMs: number): Promise<AttemptOutcome> {
  const controller = new AbortController();
  const t = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const res = await fetch(url, {
      method: 'GET',
      redirect: 'follow',
      headers: {
        Range: RANGE_HEADER,
        'User-Agent': USER_AGENT,
      },
      signal: controller.signal,
    });

    const bodyPrefix = res.body ? await readTextUpTo(res.body, MAX_BODY_PREFIX_BYTES) : '';
    return { kind: 'response', httpStatus: res.status, bodyPrefix };
  } catch (err) {
    if (isAbortError(err)) {
      return { kind: 'error', error: `Timeout after ${timeoutMs}ms` };
    }
    return { kind: 'error', error: toErrorMessage(err) };
  } finally {
    clearTimeout(t);
  }
}
