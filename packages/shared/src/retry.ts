/**
 * Retry utility with exponential backoff, jitter, and custom retry conditions.
 */

export type RetryConfig = {
  /** Number of attempts, first try included (default: 3) */
  attempts?: number
  /** Minimum delay between retries in ms (default: 300) */
  minDelayMs?: number
  /** Maximum delay between retries in ms (default: 30000) */
  maxDelayMs?: number
  /** Jitter factor 0-1 to randomize delays (default: 0) */
  jitter?: number
}

export type RetryInfo = {
  /** Current attempt number (1-based) */
  attempt: number
  maxAttempts: number
  /** Delay before next retry in ms */
  delayMs: number
  err: unknown
  label?: string
}

export type RetryOptions = RetryConfig & {
  label?: string
  /** Return false to stop retrying and rethrow immediately */
  shouldRetry?: (err: unknown, attempt: number) => boolean
  onRetry?: (info: RetryInfo) => void
  /** Aborting interrupts the backoff sleep */
  signal?: AbortSignal
}

const DEFAULT_RETRY_CONFIG: Required<RetryConfig> = {
  attempts: 3,
  minDelayMs: 300,
  maxDelayMs: 30_000,
  jitter: 0,
}

const asFiniteNumber = (value: unknown): number | undefined =>
  typeof value === "number" && Number.isFinite(value) ? value : undefined

const clampNumber = (value: unknown, fallback: number, min?: number, max?: number) => {
  const next = asFiniteNumber(value)
  if (next === undefined) {
    return fallback
  }
  const floor = typeof min === "number" ? min : Number.NEGATIVE_INFINITY
  const ceiling = typeof max === "number" ? max : Number.POSITIVE_INFINITY
  return Math.min(Math.max(next, floor), ceiling)
}

/**
 * Resolve retry config with defaults
 */
export function resolveRetryConfig(
  defaults: Required<RetryConfig> = DEFAULT_RETRY_CONFIG,
  overrides?: RetryConfig,
): Required<RetryConfig> {
  const attempts = Math.max(1, Math.round(clampNumber(overrides?.attempts, defaults.attempts, 1)))
  const minDelayMs = Math.max(0, Math.round(clampNumber(overrides?.minDelayMs, defaults.minDelayMs, 0)))
  const maxDelayMs = Math.max(minDelayMs, Math.round(clampNumber(overrides?.maxDelayMs, defaults.maxDelayMs, 0)))
  const jitter = clampNumber(overrides?.jitter, defaults.jitter, 0, 1)
  return { attempts, minDelayMs, maxDelayMs, jitter }
}

function applyJitter(delayMs: number, jitter: number): number {
  if (jitter <= 0) {
    return delayMs
  }
  const offset = (Math.random() * 2 - 1) * jitter
  return Math.max(0, Math.round(delayMs * (1 + offset)))
}

/**
 * Retry an async function with exponential backoff.
 *
 * @example
 * ```ts
 * const issued = await retryAsync(() => client.issue(request), {
 *   attempts: 2,
 *   minDelayMs: 5_000,
 *   shouldRetry: err => !(err instanceof ValidationUnreachableError),
 * })
 * ```
 */
export async function retryAsync<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const resolved = resolveRetryConfig(DEFAULT_RETRY_CONFIG, options)
  const maxAttempts = resolved.attempts
  const shouldRetry = options.shouldRetry ?? (() => true)
  let lastErr: unknown

  for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
    try {
      return await fn(attempt)
    } catch (err) {
      lastErr = err
      if (attempt >= maxAttempts || !shouldRetry(err, attempt)) {
        break
      }

      let delay = Math.min(resolved.minDelayMs * 2 ** (attempt - 1), resolved.maxDelayMs)
      delay = applyJitter(delay, resolved.jitter)
      delay = Math.min(Math.max(delay, resolved.minDelayMs), resolved.maxDelayMs)

      options.onRetry?.({
        attempt,
        maxAttempts,
        delayMs: delay,
        err,
        label: options.label,
      })
      await sleep(delay, options.signal)
    }
  }

  throw lastErr ?? new Error("Retry failed")
}

/**
 * Sleep with abort signal support
 */
export async function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (ms <= 0) {
    return
  }
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new Error("aborted"))
      return
    }
    const timeout = setTimeout(resolve, ms)
    signal?.addEventListener(
      "abort",
      () => {
        clearTimeout(timeout)
        reject(new Error("aborted"))
      },
      { once: true },
    )
  })
}
