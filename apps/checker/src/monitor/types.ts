export type AttemptOutcome =
  | { kind: 'response'; httpStatus: number; bodyPrefix: string }
  | { kind: 'error'; error: string };

export type TargetResult =
  | { url: string; status: 'ok'; httpStatus: number; attempts: number }
  | { url: string; status: 'fail'; error: string; attempts: number }
  | { url: string; status: 'skipped'; reason: 'disabled' };

export type TargetStatus = TargetResult['status'];

export type BatchSummary = {
  ok: number;
  fail: number;
  skip: number;
  total: number;
};
