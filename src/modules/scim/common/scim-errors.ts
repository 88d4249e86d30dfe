/**
 * Error taxonomy for talking to a SCIM server.
 *
 *   ScimTransportError — the server could not be reached or the HTTP exchange failed
 *   ScimParseError     — a response arrived but is not a recognised SCIM message
 *
 * Protocol violations (wrong object type, wrong status) are not exceptions:
 * checks report them as ERROR results.
 */
export class ScimTesterError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ScimTransportError extends ScimTesterError {
  constructor(
    message: string,
    readonly url: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class ScimParseError extends ScimTesterError {
  constructor(
    message: string,
    /** Raw response body as received. */
    readonly rawBody: string,
    readonly httpStatus?: number,
  ) {
    super(message);
  }
}

export class ConfigurationError extends ScimTesterError {}

/** Stringify any thrown value; never throws itself. */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message || error.name;
  }
  try {
    return String(error);
  } catch {
    return Object.prototype.toString.call(error);
  }
}
