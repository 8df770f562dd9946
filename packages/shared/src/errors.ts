/**
 * Error utilities
 *
 * Classification helpers for unknown throwables and the config error type.
 */

/**
 * Raised when hostkit.json is missing, malformed or fails the schema.
 */
export class ConfigError extends Error {
  readonly code: "INVALID_CONFIG" | "MISSING_CONFIG"
  readonly issues: string[]

  constructor(code: "INVALID_CONFIG" | "MISSING_CONFIG", message: string, issues: string[] = []) {
    super(message)
    this.name = "ConfigError"
    this.code = code
    this.issues = issues
  }
}

/**
 * Extract error code from an error object.
 * Handles Node.js style errors with 'code' property.
 */
export function extractErrorCode(err: unknown): string | undefined {
  if (!err || typeof err !== "object" || !("code" in err)) {
    return undefined
  }
  return typeof err.code === "string" ? err.code : undefined
}

/**
 * ENOENT from fs calls: the path (or a parent) does not exist.
 */
export function isNotFoundError(err: unknown): boolean {
  return extractErrorCode(err) === "ENOENT"
}

/**
 * One-line message for any throwable.
 */
export function describeError(err: unknown): string {
  if (err instanceof Error) {
    return err.message
  }
  return typeof err === "string" ? err : String(err)
}

/**
 * Format an error for logging.
 */
export function formatUncaughtError(err: unknown): string {
  if (err instanceof Error) {
    return err.stack ?? err.message
  }
  if (typeof err === "string") {
    return err
  }
  try {
    return JSON.stringify(err)
  } catch {
    return String(err)
  }
}
