import { describe, expect, it, vi } from "vitest"
import { resolveRetryConfig, retryAsync, sleep } from "../retry.js"

describe("retry utilities", () => {
  describe("resolveRetryConfig", () => {
    it("should return defaults when no overrides", () => {
      expect(resolveRetryConfig()).toEqual({
        attempts: 3,
        minDelayMs: 300,
        maxDelayMs: 30_000,
        jitter: 0,
      })
    })

    it("should clamp attempts to minimum 1", () => {
      expect(resolveRetryConfig(undefined, { attempts: 0 }).attempts).toBe(1)
    })

    it("should clamp jitter to 0-1 range", () => {
      expect(resolveRetryConfig(undefined, { jitter: -0.5 }).jitter).toBe(0)
      expect(resolveRetryConfig(undefined, { jitter: 1.5 }).jitter).toBe(1)
    })

    it("should ensure maxDelayMs >= minDelayMs", () => {
      expect(resolveRetryConfig(undefined, { minDelayMs: 1000, maxDelayMs: 500 }).maxDelayMs).toBe(1000)
    })
  })

  describe("retryAsync", () => {
    it("should succeed on first attempt", async () => {
      const fn = vi.fn().mockResolvedValue("issued")
      await expect(retryAsync(fn, { attempts: 2 })).resolves.toBe("issued")
      expect(fn).toHaveBeenCalledTimes(1)
    })

    it("should pass the 1-based attempt number", async () => {
      const seen: number[] = []
      await retryAsync(
        async attempt => {
          seen.push(attempt)
          if (attempt < 3) throw new Error(`fail ${attempt}`)
          return "ok"
        },
        { attempts: 3, minDelayMs: 0 },
      )
      expect(seen).toEqual([1, 2, 3])
    })

    it("should throw the last error after all attempts", async () => {
      const fn = vi.fn().mockRejectedValueOnce(new Error("first")).mockRejectedValueOnce(new Error("second"))
      await expect(retryAsync(fn, { attempts: 2, minDelayMs: 0 })).rejects.toThrow("second")
      expect(fn).toHaveBeenCalledTimes(2)
    })

    it("should stop when shouldRetry returns false", async () => {
      const fn = vi.fn().mockRejectedValue(new Error("permanent"))
      await expect(retryAsync(fn, { attempts: 5, minDelayMs: 0, shouldRetry: () => false })).rejects.toThrow(
        "permanent",
      )
      expect(fn).toHaveBeenCalledTimes(1)
    })

    it("should report each retry with its delay", async () => {
      const onRetry = vi.fn()
      const fn = vi.fn().mockRejectedValueOnce(new Error("transient")).mockResolvedValue("ok")
      await retryAsync(fn, { attempts: 3, minDelayMs: 1, maxDelayMs: 1, label: "acme", onRetry })
      expect(onRetry).toHaveBeenCalledTimes(1)
      expect(onRetry.mock.calls[0]?.[0]).toMatchObject({ attempt: 1, maxAttempts: 3, delayMs: 1, label: "acme" })
    })
  })

  describe("sleep", () => {
    it("should resolve immediately for non-positive delays", async () => {
      await expect(sleep(0)).resolves.toBeUndefined()
    })

    it("should reject when the signal is already aborted", async () => {
      const controller = new AbortController()
      controller.abort()
      await expect(sleep(1000, controller.signal)).rejects.toThrow("aborted")
    })

    it("should reject when aborted mid-sleep", async () => {
      const controller = new AbortController()
      const pending = sleep(10_000, controller.signal)
      controller.abort()
      await expect(pending).rejects.toThrow("aborted")
    })
  })
})
