import type { CheckerLogger } from '../logging/checker-logger.service';
import { LogCategory } from '../logging/log-levels';
import { ScimParseError, ScimTransportError, describeError } from '../scim/common/scim-errors';
import { CheckResult, CheckResultInit, error, isStatus, toCheckResult } from './check-result';

/** A check returns a result, or a result plus a payload later checks consume. */
export type CheckReturn<T> = CheckResultInit | [CheckResultInit, T];

/** Normalised outcome: the payload is undefined whenever the check did not produce one. */
export type CheckOutcome<T> = [CheckResult, T | undefined];

export type CheckTitle<TArgs extends unknown[]> = string | ((...args: TArgs) => string);

export type CheckFunction<TArgs extends unknown[], T> = (...args: TArgs) => CheckReturn<T> | Promise<CheckReturn<T>>;

export type DecoratedCheck<TArgs extends unknown[], T> = (...args: TArgs) => Promise<CheckOutcome<T>>;

function isPair<T>(value: CheckReturn<T>): value is [CheckResultInit, T] {
  return Array.isArray(value);
}

function isResultInit(value: unknown): value is CheckResultInit {
  return typeof value === 'object' && value !== null && 'status' in value && isStatus(value.status);
}

/**
 * Map anything a check may raise to an ERROR result.
 *
 *   ScimTransportError → reason = error message
 *   ScimParseError     → reason = description, data = raw response body
 *   anything else      → reason = stringified value
 */
export function resultFromError(err: unknown): CheckResultInit {
  if (err instanceof ScimParseError) {
    return error(err.message, err.rawBody);
  }
  if (err instanceof ScimTransportError) {
    return error(err.message);
  }
  return error(describeError(err));
}

function resolveTitle<TArgs extends unknown[]>(title: CheckTitle<TArgs>, args: TArgs): string {
  if (typeof title === 'string') return title;
  try {
    return title(...args);
  } catch (err) {
    return `Unnamed check (${describeError(err)})`;
  }
}

/**
 * Wrap a check so that it always resolves to exactly one CheckResult.
 *
 * The returned function calls `fn` once. Whatever happens inside — a normal
 * result, a thrown transport or parse error, a synchronous throw, a rejected
 * promise, a malformed return value — the caller gets `[result, payload]` and
 * never a rejection. The title is derived from `title` unless the check set one.
 */
export function decorateCheck<TArgs extends unknown[], T = undefined>(
  title: CheckTitle<TArgs>,
  fn: CheckFunction<TArgs, T>,
): DecoratedCheck<TArgs, T> {
  return async (...args: TArgs): Promise<CheckOutcome<T>> => {
    const resolvedTitle = resolveTitle(title, args);
    let returned: CheckReturn<T>;
    try {
      returned = await fn(...args);
    } catch (err) {
      return [toCheckResult(resultFromError(err), resolvedTitle), undefined];
    }

    if (isPair(returned)) {
      const [init, payload] = returned;
      if (!isResultInit(init)) {
        return [toCheckResult(error('Check returned a malformed result'), resolvedTitle), undefined];
      }
      return [toCheckResult(init, resolvedTitle), payload];
    }
    if (!isResultInit(returned)) {
      return [toCheckResult(error('Check returned a malformed result'), resolvedTitle), undefined];
    }
    return [toCheckResult(returned, resolvedTitle), undefined];
  };
}

export type ResultListener = (result: CheckResult) => void;

/**
 * Wrap a caller's result listener so that a throwing listener cannot abort
 * the run. Failures are logged and the run carries on.
 */
export function guardListener(onResult: ResultListener | undefined, logger?: CheckerLogger): ResultListener {
  return (result) => {
    if (!onResult) return;
    try {
      onResult(result);
    } catch (err) {
      logger?.error(LogCategory.CHECK, `Result listener failed for "${result.title}"`, err);
    }
  };
}
