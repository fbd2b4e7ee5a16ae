export type MonitorErrorCode =
  | "UPSTREAM_UNAVAILABLE"
  | "SYMBOL_NOT_FOUND"
  | "INVALID_QUOTE"
  | "CONVERGENCE_FAILURE"
  | "DELIVERY_FAILURE"
  | "STORE_CONFLICT"
  | "VALIDATION_ERROR";

export class MonitorError extends Error {
  readonly code: MonitorErrorCode;
  readonly retryable: boolean;
  readonly details?: Record<string, unknown>;

  constructor(
    code: MonitorErrorCode,
    message: string,
    opts: { retryable?: boolean; details?: Record<string, unknown>; cause?: unknown } = {},
  ) {
    super(message, opts.cause === undefined ? undefined : { cause: opts.cause });
    this.name = new.target.name;
    this.code = code;
    this.retryable = opts.retryable ?? false;
    this.details = opts.details;
  }
}

export class UpstreamUnavailable extends MonitorError {
  readonly status: number | null;

  constructor(message: string, opts: { status?: number | null; retryable?: boolean; cause?: unknown } = {}) {
    super("UPSTREAM_UNAVAILABLE", message, {
      retryable: opts.retryable ?? false,
      details: { status: opts.status ?? null },
      cause: opts.cause,
    });
    this.status = opts.status ?? null;
  }
}

export class SymbolNotFound extends MonitorError {
  constructor(contractId: string) {
    super("SYMBOL_NOT_FOUND", `No market data for ${contractId.replace(/\s+/g, " ")}.`, { details: { contractId } });
  }
}

export class InvalidQuote extends MonitorError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("INVALID_QUOTE", message, { details });
  }
}

export class ConvergenceFailure extends MonitorError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("CONVERGENCE_FAILURE", message, { details });
  }
}

export class DeliveryFailure extends MonitorError {
  readonly status: number | null;

  constructor(message: string, opts: { status?: number | null; retryable?: boolean; cause?: unknown } = {}) {
    super("DELIVERY_FAILURE", message, {
      retryable: opts.retryable ?? false,
      details: { status: opts.status ?? null },
      cause: opts.cause,
    });
    this.status = opts.status ?? null;
  }
}

export class StoreConflict extends MonitorError {
  constructor(contractId: string, ruleId: string, expectedVersion: number) {
    super("STORE_CONFLICT", `Alert state for ${ruleId} changed concurrently (expected version ${expectedVersion}).`, {
      retryable: true,
      details: { contractId, ruleId, expectedVersion },
    });
  }
}

export class ValidationError extends MonitorError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super("VALIDATION_ERROR", issues.length > 0 ? `${message} ${issues.join("; ")}` : message, {
      details: { issues },
    });
    this.issues = issues;
  }
}

export function isMonitorError(err: unknown): err is MonitorError {
  return err instanceof MonitorError;
}

export function describeError(err: unknown): { code: MonitorErrorCode | "UNKNOWN"; message: string } {
  if (err instanceof MonitorError) return { code: err.code, message: err.message };
  if (err instanceof Error) return { code: "UNKNOWN", message: err.message };
  return { code: "UNKNOWN", message: String(err) };
}
