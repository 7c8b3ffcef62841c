export type StatusRange = {
  low: number;
  high: number;
};

export const DEFAULT_OK_STATUS_RANGES: readonly StatusRange[] = [
  { low: 200, high: 299 },
  { low: 300, high: 399 },
];

const INT_PATTERN = /^\+?\d+$/;

function parseIntStrict(raw: string): number | null {
  const trimmed = raw.trim();
  if (!INT_PATTERN.test(trimmed)) return null;
  const n = Number.parseInt(trimmed, 10);
  return Number.isSafeInteger(n) ? n : null;
}

/**
 * Parses a single `"<low>-<high>"` entry. Bounds given in reverse order are swapped.
 */
export function parseStatusRange(raw: unknown): StatusRange | null {
  if (typeof raw !== 'string') return null;

  const parts = raw.split('-');
  if (parts.length !== 2) return null;

  const a = parseIntStrict(parts[0] ?? '');
  const b = parseIntStrict(parts[1] ?? '');
  if (a === null || b === null) return null;

  return { low: Math.min(a, b), high: Math.max(a, b) };
}

/**
 * Malformed entries are dropped. When nothing valid remains the built-in
 * 2xx/3xx ranges are returned.
 */
export function parseStatusRanges(raw: readonly unknown[] | null | undefined): StatusRange[] {
  const out: StatusRange[] = [];
  for (const entry of raw ?? []) {
    const range = parseStatusRange(entry);
    if (range) out.push(range);
  }
  return out.length > 0 ? out : DEFAULT_OK_STATUS_RANGES.map((r) => ({ ...r }));
}
