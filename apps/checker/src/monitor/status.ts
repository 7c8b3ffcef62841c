import type { StatusRange } from '@pulsecheck/config';

export function isStatusOk(
  httpStatus: number,
  expectedStatus: number | null,
  okRanges: readonly StatusRange[],
): boolean {
  if (expectedStatus !== null) {
    return httpStatus === expectedStatus;
  }
  return okRanges.some((r) => r.low <= httpStatus && httpStatus <= r.high);
}

export function containsKeyword(bodyPrefix: string, keyword: string | null): boolean {
  if (!keyword) return true;
  return bodyPrefix.toLowerCase().includes(keyword.toLowerCase());
}
