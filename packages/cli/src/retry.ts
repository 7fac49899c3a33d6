export type RetryConfig = {
  /** Total attempts including the first (default: 1, i.e. no retries). */
  attempts?: number;
  /** Exponential backoff base delay (default: 200ms). */
  baseDelayMs?: number;
  /** Max backoff delay (default: 5000ms). */
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
  isRetryable: (err: unknown) => boolean;
  /** Called before each retry with the error that caused it */
  onRetry?: (err: unknown, next: RetryContext) => void;
  sleep?: (ms: number) => Promise<void>;
};

function clampNumber(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

export function computeBackoffDelayMs(cfg: Required<RetryConfig>, attempt: number, random = Math.random): number {
  if (attempt <= 1) return 0;
  const raw = cfg.baseDelayMs * 2 ** (attempt - 2);
  const capped = Math.min(cfg.maxDelayMs, raw);
  const jitterFactor = 1 + (random() * 2 - 1) * cfg.jitter;
  return Math.max(0, Math.round(capped * jitterFactor));
}

export async function sleep(ms: number): Promise<void> {
  await new Promise<void>((resolve) => setTimeout(resolve, ms));
}

export async function withRetries<T>(
  fn: (ctx: RetryContext) => Promise<T>,
  cfg: RetryConfig | undefined,
  hooks: RetryHooks
): Promise<T> {
  const attempts = Math.max(1, cfg?.attempts ?? 1);
  const config: Required<RetryConfig> = {
    attempts,
    baseDelayMs: cfg?.baseDelayMs ?? 200,
    maxDelayMs: cfg?.maxDelayMs ?? 5000,
    jitter: clampNumber(cfg?.jitter ?? 0.2, 0, 1),
  };
  const wait = hooks.sleep ?? sleep;

  for (let attempt = 1; ; attempt++) {
    const delayMs = computeBackoffDelayMs(config, attempt);
    if (delayMs > 0) {
      await wait(delayMs);
    }

    try {
      return await fn({ attempt, attempts, delayMs: delayMs > 0 ? delayMs : undefined });
    } catch (err) {
      if (attempt >= attempts || !hooks.isRetryable(err)) {
        throw err;
      }
      hooks.onRetry?.(err, { attempt: attempt + 1, attempts });
    }
  }
}
