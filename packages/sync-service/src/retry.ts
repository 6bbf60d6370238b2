export type RetryConfig = {
  /** Total attempts including the first (default: 1, i.e. no retries). */
  attempts?: number;
  /** Exponential backoff base delay (default: 500ms). */
  baseDelayMs?: number;
  /** Max backoff delay (default: 10000ms). */
  maxDelayMs?: number;
  /** Random jitter factor between 0 and 1 (default: 0.2). */
  jitter?: number;
};

export type RetryContext = {
  attempt: number;
  attempts: number;
  delayMs?: number;
};

export type RetryHooks = {
  /** Called before a retry is attempted, with the failure that caused it. */
  onRetry?: (err: unknown, next: RetryContext) => void;
  /** Sleep implementation (tests pass a no-op). */
  sleep?: (ms: number) => Promise<void>;
};

function clampNumber(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

export function computeBackoffDelayMs(
  cfg: Required<RetryConfig>,
  attempt: number,
  random: () => number = Math.random
): number {
  if (attempt <= 1) return 0;
  const raw = cfg.baseDelayMs * 2 ** (attempt - 2);
  const capped = Math.min(cfg.maxDelayMs, raw);
  const jitterFactor = 1 + (random() * 2 - 1) * cfg.jitter;
  return Math.max(0, Math.round(capped * jitterFactor));
}

export function resolveRetryConfig(cfg: RetryConfig | undefined): Required<RetryConfig> {
  return {
    attempts: Math.max(1, cfg?.attempts ?? 1),
    baseDelayMs: Math.max(0, cfg?.baseDelayMs ?? 500),
    maxDelayMs: Math.max(0, cfg?.maxDelayMs ?? 10_000),
    jitter: clampNumber(cfg?.jitter ?? 0.2, 0, 1),
  };
}

export async function sleep(ms: number): Promise<void> {
  await new Promise<void>((resolve) => setTimeout(resolve, ms));
}

/**
 * Run `fn` until it succeeds, the error is not retryable, or attempts run out.
 * The last error is rethrown.
 */
export async function withRetries<T>(
  fn: (ctx: RetryContext) => Promise<T>,
  cfg: RetryConfig | undefined,
  isRetryable: (err: unknown) => boolean,
  hooks: RetryHooks = {}
): Promise<T> {
  const config = resolveRetryConfig(cfg);
  const wait = hooks.sleep ?? sleep;

  let delayMs = 0;
  for (let attempt = 1; ; attempt++) {
    if (delayMs > 0) {
      await wait(delayMs);
    }

    try {
      return await fn({ attempt, attempts: config.attempts, delayMs: delayMs > 0 ? delayMs : undefined });
    } catch (err) {
      if (attempt >= config.attempts || !isRetryable(err)) {
        throw err;
      }
      delayMs = computeBackoffDelayMs(config, attempt + 1);
      hooks.onRetry?.(err, { attempt: attempt + 1, attempts: config.attempts, delayMs });
    }
  }
}
