import { DeliveryFailure, describeError, isMonitorError } from "@/lib/errors";
import type { Logger } from "@/lib/server/logger";
import { DEFAULT_NOTIFY_RETRY, withRetry, type RetryPolicy, type Sleep } from "@/lib/server/retry";

export type MessageTransport = {
  readonly destination: string;
  deliver: (text: string) => Promise<void>;
};

export type DeliveryResult =
  | { ok: true; attempts: number }
  | { ok: false; attempts: number; error: DeliveryFailure };

export type NotifierOptions = {
  transport: MessageTransport;
  logger: Logger;
  policy?: RetryPolicy;
  sleep?: Sleep;
};

function isTransient(err: unknown): boolean {
  // Unknown transport errors are treated like network blips.
  return isMonitorError(err) ? err.retryable : true;
}

function toDeliveryFailure(err: unknown): DeliveryFailure {
  if (err instanceof DeliveryFailure) return err;
  return new DeliveryFailure(describeError(err).message, { cause: err });
}

/** Dry-run transport: every message becomes a log line. */
export class LogTransport implements MessageTransport {
  readonly destination = "log";
  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger;
  }

  async deliver(text: string): Promise<void> {
    this.logger.info("notify_dry_run", { text });
  }
}

export class Notifier {
  private readonly opts: NotifierOptions;

  constructor(opts: NotifierOptions) {
    this.opts = opts;
  }

  async send(text: string): Promise<DeliveryResult> {
    const { transport, logger } = this.opts;
    const outcome = await withRetry(() => transport.deliver(text), {
      policy: this.opts.policy ?? DEFAULT_NOTIFY_RETRY,
      isRetryable: isTransient,
      sleep: this.opts.sleep,
      onRetry: ({ attempt, delayMs, error }) =>
        logger.warn("notify_retry", { destination: transport.destination, attempt, delay_ms: delayMs, ...describeError(error) }),
    });

    if (outcome.ok) return { ok: true, attempts: outcome.attempts };

    const error = toDeliveryFailure(outcome.error);
    logger.error("notify_failed", {
      destination: transport.destination,
      attempts: outcome.attempts,
      status: error.status,
      message: error.message,
    });
    return { ok: false, attempts: outcome.attempts, error };
  }
}
