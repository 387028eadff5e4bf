import retry from "async-retry";
import { toErrorName, toHttpStatusCode } from "./errors.js";

const TRANSIENT_ERROR_NAMES = new Set([
  "TimeoutError",
  "AbortError",
  "RequestTimeout",
  "RequestTimeoutException",
  "ThrottlingException",
  "TooManyRequestsException",
  "SlowDown",
  "InternalError",
  "InternalServiceError",
  "InternalServiceErrorException",
  "ServiceUnavailable",
]);

const TRANSIENT_NETWORK_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ETIMEDOUT",
  "ENOTFOUND",
  "EAI_AGAIN",
  "EPIPE",
  "EHOSTUNREACH",
  "ENETUNREACH",
]);

/**
 * Network failures, timeouts, throttling and 5xx responses. Anything else is a
 * definitive answer from the remote side and is not worth a second attempt.
 */
export const isTransientError = (error: unknown): boolean => {
  if (!error || typeof error !== "object") {
    return false;
  }

  const name = toErrorName(error);

  if (name && (TRANSIENT_ERROR_NAMES.has(name) || TRANSIENT_NETWORK_CODES.has(name))) {
    return true;
  }

  if ("code" in error && typeof error.code === "string" && TRANSIENT_NETWORK_CODES.has(error.code)) {
    return true;
  }

  if ("$retryable" in error && error.$retryable) {
    return true;
  }

  const statusCode = toHttpStatusCode(error);
  return statusCode === 429 || (statusCode !== undefined && statusCode >= 500);
};

export type RetryOptions = {
  retries?: number;
  minDelayMs?: number;
  isTransient?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number) => void;
};

type AttemptOutcome<T> = { ok: true; value: T } | { ok: false; error: unknown };

/**
 * Runs `task` and retries it (once by default) when it fails transiently.
 * Non-transient failures are rethrown without another attempt.
 */
export const retryTransient = async <T>(
  task: (attempt: number) => Promise<T>,
  options: RetryOptions = {},
): Promise<T> => {
  const isTransient = options.isTransient ?? isTransientError;

  const outcome = await retry<AttemptOutcome<T>>(
    async (_bail, attempt) => {
      try {
        return { ok: true, value: await task(attempt) };
      } catch (error) {
        if (isTransient(error)) {
          throw error;
        }

        return { ok: false, error };
      }
    },
    {
      retries: options.retries ?? 1,
      minTimeout: options.minDelayMs ?? 100,
      maxTimeout: 1000,
      randomize: true,
      onRetry: (error, attempt) => {
        options.onRetry?.(error, attempt);
      },
    },
  );

  if (!outcome.ok) {
    throw outcome.error;
  }

  return outcome.value;
};

/** `retryTransient` with a fresh timeout signal for every attempt. */
export const withTimeoutAndRetry = <T>(
  task: (signal: AbortSignal, attempt: number) => Promise<T>,
  options: RetryOptions & { timeoutMs: number },
): Promise<T> => {
  return retryTransient((attempt) => task(AbortSignal.timeout(options.timeoutMs), attempt), options);
};
