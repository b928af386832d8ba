import { Logger } from "../config/logger";
import { GenerationError, errorMessage } from "../shared/errors";

export interface RetryPolicyOptions {
  maxAttempts: number;
  backoffMs: number;
  timeoutMs: number;
}

export type RetryFailureCode = "timeout" | "transient_failure" | "llm_failure" | "rejected";

export interface RetryRunOptions<T> {
  label: string;
  /** Returning false counts the attempt as used and asks again. */
  accept?: (value: T) => boolean;
}

export type RetryResult<T> =
  | {
      ok: true;
      value: T;
      attempts: number;
      rejected: T[];
    }
  | {
      ok: false;
      error_code: RetryFailureCode;
      attempts: number;
      rejected: T[];
    };

export type Sleep = (ms: number) => Promise<void>;

const defaultSleep: Sleep = (ms) =>
  new Promise<void>((resolve) => {
    setTimeout(resolve, ms);
  });

/**
 * Bounded retry around a single collaborator call: per-attempt timeout, linear
 * backoff on transient failures, and an optional acceptance check on the value.
 */
export class RetryPolicy {
  readonly maxAttempts: number;
  readonly backoffMs: number;
  readonly timeoutMs: number;

  constructor(
    options: RetryPolicyOptions,
    private readonly logger?: Logger,
    private readonly sleep: Sleep = defaultSleep,
  ) {
    this.maxAttempts = Math.max(1, Math.floor(options.maxAttempts));
    this.backoffMs = Math.max(0, Math.floor(options.backoffMs));
    this.timeoutMs = normalizeTimeout(options.timeoutMs);
  }

  async run<T>(
    operation: (attempt: number) => Promise<T>,
    options: RetryRunOptions<T>,
  ): Promise<RetryResult<T>> {
    const rejected: T[] = [];
    let lastCode: RetryFailureCode = "llm_failure";

    for (let attempt = 1; attempt <= this.maxAttempts; attempt += 1) {
      let value: T;
      try {
        value = await withTimeout(operation(attempt), this.timeoutMs);
      } catch (error) {
        lastCode = classifyFailure(error);
        this.logger?.warn("llm.retry.attempt_failed", {
          label: options.label,
          attempt,
          errorCode: lastCode,
          error: errorMessage(error),
        });
        if (!isTransientError(error)) {
          return { ok: false, error_code: lastCode, attempts: attempt, rejected };
        }
        if (attempt < this.maxAttempts && this.backoffMs > 0) {
          await this.sleep(this.backoffMs * attempt);
        }
        continue;
      }

      if (options.accept && !options.accept(value)) {
        rejected.push(value);
        lastCode = "rejected";
        this.logger?.debug("llm.retry.value_rejected", {
          label: options.label,
          attempt,
        });
        continue;
      }
      return { ok: true, value, attempts: attempt, rejected };
    }

    return { ok: false, error_code: lastCode, attempts: this.maxAttempts, rejected };
  }
}

function normalizeTimeout(value: number): number {
  if (Number.isFinite(value) && value > 0) {
    return Math.round(value);
  }
  return 10_000;
}

export function withTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(new GenerationError("timeout", "timeout"));
    }, timeoutMs);
    promise
      .then((value) => {
        clearTimeout(timer);
        resolve(value);
      })
      .catch((error: unknown) => {
        clearTimeout(timer);
        reject(error);
      });
  });
}

function classifyFailure(error: unknown): RetryFailureCode {
  if (isTimeoutError(error)) {
    return "timeout";
  }
  return isTransientError(error) ? "transient_failure" : "llm_failure";
}

export function isTimeoutError(error: unknown): boolean {
  if (error instanceof GenerationError && error.code === "timeout") {
    return true;
  }
  const message = error instanceof Error ? error.message.toLowerCase() : "";
  return message.includes("timeout");
}

export function isTransientError(error: unknown): boolean {
  if (error instanceof GenerationError) {
    if (error.code === "timeout" || error.code === "network") {
      return true;
    }
    if (error.code === "http_error" && typeof error.status === "number") {
      return error.status === 429 || error.status >= 500;
    }
    if (error.code === "not_configured") {
      return false;
    }
  }
  const message = error instanceof Error ? error.message.toLowerCase() : "";
  return (
    message.includes("timeout") ||
    message.includes("econnreset") ||
    message.includes("network") ||
    message.includes("429") ||
    message.includes("rate limit") ||
    message.includes("http 500") ||
    message.includes("http 502") ||
    message.includes("http 503") ||
    message.includes("http 504")
  );
}
