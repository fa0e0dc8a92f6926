/** Timeout, rate limit or network failure. Safe to retry; never implies state changed. */
export class TransientGatewayError extends Error {
  readonly name = "TransientGatewayError";

  constructor(
    message: string,
    readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/** The brokerage refused the request (validation, margin, unknown trade). Not retried within a cycle. */
export class RejectedOrderError extends Error {
  readonly name = "RejectedOrderError";

  constructor(
    message: string,
    readonly status?: number,
    readonly rejectReason?: string
  ) {
    super(message);
  }
}

/** Credentials permanently rejected. Stops the scheduler. */
export class GatewayAuthError extends Error {
  readonly name = "GatewayAuthError";

  constructor(message: string) {
    super(message);
  }
}

export class DataInsufficientError extends Error {
  readonly name = "DataInsufficientError";

  constructor(
    readonly instrument: string,
    readonly available: number,
    readonly required: number
  ) {
    super(`${instrument}: ${available} price points, ${required} required`);
  }
}

/** Persisted state is unreadable or fails validation. New trading halts; status stays readable. */
export class StateCorruptionError extends Error {
  readonly name = "StateCorruptionError";

  constructor(
    message: string,
    readonly filePath: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export type ExecutionErrorKind = "COOLDOWN" | "MARGIN" | "REJECTED" | "TRANSIENT" | "PARTIAL_FILL" | "AUTH";

export class ExecutionError extends Error {
  readonly name = "ExecutionError";

  constructor(
    readonly kind: ExecutionErrorKind,
    message: string,
    readonly details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function isTransientError(err: unknown): err is TransientGatewayError {
  return err instanceof TransientGatewayError;
}
