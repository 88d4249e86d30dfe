/**
 * Result model shared by every check.
 *
 *   SUCCESS — the observed behavior matched the protocol
 *   ERROR   — the server violated the protocol, or the check could not complete
 *   SKIPPED — the check did not apply (capability not advertised, prerequisite missing)
 */
export enum Status {
  SUCCESS = 'SUCCESS',
  ERROR = 'ERROR',
  SKIPPED = 'SKIPPED',
}

export interface CheckResult {
  readonly status: Status;
  /** Identifies the check that ran; set by decorateCheck(). */
  readonly title: string;
  readonly reason?: string;
  /** Raw response body, parsed object or other diagnostic payload. */
  readonly data?: unknown;
}

/** What a check returns before decorateCheck() attaches its title. */
export interface CheckResultInit {
  status: Status;
  title?: string;
  reason?: string;
  data?: unknown;
}

/** An ordered report: one entry per result, in execution order. */
export type Report = CheckResult[];

export function isStatus(value: unknown): value is Status {
  return value === Status.SUCCESS || value === Status.ERROR || value === Status.SKIPPED;
}

export function success(reason?: string, data?: unknown): CheckResultInit {
  return { status: Status.SUCCESS, reason, data };
}

export function error(reason: string, data?: unknown): CheckResultInit {
  return { status: Status.ERROR, reason, data };
}

export function skipped(reason: string): CheckResultInit {
  return { status: Status.SKIPPED, reason };
}

/** Freeze a result, dropping absent optional members. */
export function toCheckResult(init: CheckResultInit, title: string): CheckResult {
  const result: { status: Status; title: string; reason?: string; data?: unknown } = {
    status: init.status,
    title: init.title ?? title,
  };
  if (init.reason !== undefined) result.reason = init.reason;
  if (init.data !== undefined) result.data = init.data;
  return Object.freeze(result);
}

/** Count results per status, e.g. for a summary line. */
export function summarize(report: readonly CheckResult[]): Record<Status, number> {
  const counts: Record<Status, number> = {
    [Status.SUCCESS]: 0,
    [Status.ERROR]: 0,
    [Status.SKIPPED]: 0,
  };
  for (const result of report) {
    counts[result.status] += 1;
  }
  return counts;
}
