import type { AppConfig } from "../types/config.js";
import { systemClock, type Clock } from "../shared/clock.js";
import { messageOf } from "../shared/errors.js";
import { logger as rootLogger, type Logger } from "../logger.js";

/** linear: wait attempt × base after each failure. fixed: wait base every time. */
export type BackoffMode = "linear" | "fixed";

export interface RetryPolicy {
  readonly maxAttempts: number;
  readonly baseBackoffMs: number;
  readonly backoff?: BackoffMode;
}

export interface RetryOptions extends Partial<RetryPolicy> {
  /** Failures this rejects are propagated at once, without another attempt. */
  shouldRetry?: (err: unknown, attempt: number) => boolean;
  /** Name used in log entries. */
  label?: string;
}

/**
 * Bounded retry over an opaque operation. The executor knows nothing about what it
 * retries: the operation either resolves (success) or throws (failure).
 */
export class RetryExecutor {
  private readonly log: Logger;

  constructor(
    private readonly defaults: RetryPolicy,
    private readonly clock: Clock = systemClock,
    logger: Logger = rootLogger,
  ) {
    this.log = logger.child({ component: "retry" });
  }

  static fromConfig(config: Pick<AppConfig, "retry">, clock?: Clock, logger?: Logger): RetryExecutor {
    return new RetryExecutor(
      { maxAttempts: config.retry.max_attempts, baseBackoffMs: config.retry.backoff_seconds * 1000, backoff: "linear" },
      clock,
      logger,
    );
  }

  async execute<T>(op: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
    const maxAttempts = Math.max(1, options.maxAttempts ?? this.defaults.maxAttempts);
    const base = options.baseBackoffMs ?? this.defaults.baseBackoffMs;
    const mode = options.backoff ?? this.defaults.backoff ?? "linear";
    const label = options.label ?? "operation";

    for (let attempt = 1; ; attempt++) {
      try {
        return await op();
      } catch (err) {
        if (attempt >= maxAttempts || (options.shouldRetry && !options.shouldRetry(err, attempt))) throw err;
        const delayMs = mode === "fixed" ? base : attempt * base;
        this.log.debug({ label, attempt, maxAttempts, delayMs, error: messageOf(err) }, "Attempt failed, retrying");
        await this.clock.sleep(delayMs);
      }
    }
  }
}
