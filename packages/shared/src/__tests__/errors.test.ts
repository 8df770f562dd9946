import { describe, expect, it } from "vitest"
import {
  ConfigError,
  describeError,
  extractErrorCode,
  formatUncaughtError,
  isNotFoundError,
} from "../errors.js"

describe("extractErrorCode", () => {
  it("should extract code from error with code property", () => {
    expect(extractErrorCode({ code: "ENOENT" })).toBe("ENOENT")
  })

  it("should return undefined for null/undefined", () => {
    expect(extractErrorCode(null)).toBeUndefined()
    expect(extractErrorCode(undefined)).toBeUndefined()
  })

  it("should return undefined for non-string code", () => {
    expect(extractErrorCode({ code: 123 })).toBeUndefined()
  })
})

describe("isNotFoundError", () => {
  it("should match ENOENT only", () => {
    expect(isNotFoundError({ code: "ENOENT" })).toBe(true)
    expect(isNotFoundError({ code: "EACCES" })).toBe(false)
    expect(isNotFoundError(new Error("missing"))).toBe(false)
  })
})

describe("describeError", () => {
  it("should use the message of Error instances", () => {
    expect(describeError(new Error("disk full"))).toBe("disk full")
  })

  it("should stringify everything else", () => {
    expect(describeError("plain")).toBe("plain")
    expect(describeError(42)).toBe("42")
  })
})

describe("formatUncaughtError", () => {
  it("should include the stack for errors", () => {
    const err = new Error("kaboom")
    expect(formatUncaughtError(err)).toBe(err.stack)
  })

  it("should JSON-encode plain objects", () => {
    expect(formatUncaughtError({ reason: "x" })).toBe('{"reason":"x"}')
  })
})

describe("ConfigError", () => {
  it("should carry its code and issues", () => {
    const error = new ConfigError("INVALID_CONFIG", "bad config", ["intent.mode: Required"])
    expect(error).toBeInstanceOf(Error)
    expect(error.name).toBe("ConfigError")
    expect(error.code).toBe("INVALID_CONFIG")
    expect(extractErrorCode(error)).toBe("INVALID_CONFIG")
    expect(error.issues).toEqual(["intent.mode: Required"])
  })
})
