/**
 * Host config loading
 *
 * hostkit.json is optional: every section has defaults, and the intent can
 * come entirely from CLI flags. When the file exists it must be valid.
 */

import { readFile } from "node:fs/promises"
import { ZodError } from "zod"
import { DEFAULT_PATHS, type HostPaths } from "./constants.js"
import { ConfigError, isNotFoundError } from "./errors.js"
import { type HostConfig, hostConfigSchema, type PathOverrides } from "./host-config-schema.js"

/**
 * Path to hostkit.json. Set via HOSTKIT_CONFIG_PATH env var.
 */
export const CONFIG_PATH = process.env.HOSTKIT_CONFIG_PATH ?? "/etc/hostkit/hostkit.json"

/**
 * Drop keys starting with `_` (recursively). The example file uses them
 * for documentation, but they must not reach the strict schema.
 */
function stripCommentKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(stripCommentKeys)
  }
  if (value === null || typeof value !== "object") {
    return value
  }
  return Object.fromEntries(
    Object.entries(value)
      .filter(([key]) => !key.startsWith("_"))
      .map(([key, entry]) => [key, stripCommentKeys(entry)]),
  )
}

export function formatZodIssues(error: ZodError): string[] {
  return error.issues.map(issue => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
}

/**
 * Parse and validate raw JSON as HostConfig.
 * Throws ConfigError on malformed JSON or schema failure.
 */
export function parseHostConfig(raw: string, source = "hostkit.json"): HostConfig {
  let data: unknown
  try {
    data = JSON.parse(raw)
  } catch (e) {
    throw new ConfigError("INVALID_CONFIG", `Invalid JSON in ${source}: ${e instanceof Error ? e.message : String(e)}`)
  }

  const result = hostConfigSchema.safeParse(stripCommentKeys(data))
  if (!result.success) {
    const issues = formatZodIssues(result.error)
    throw new ConfigError("INVALID_CONFIG", `Invalid ${source}:\n  ${issues.join("\n  ")}`, issues)
  }
  return result.data
}

/**
 * Load hostkit.json. Returns null when the file does not exist.
 */
export async function loadHostConfig(path: string = CONFIG_PATH): Promise<HostConfig | null> {
  let raw: string
  try {
    raw = await readFile(path, "utf8")
  } catch (err) {
    if (isNotFoundError(err)) {
      return null
    }
    throw err
  }
  return parseHostConfig(raw, path)
}

/**
 * Merge config path overrides onto DEFAULT_PATHS.
 */
export function resolvePaths(overrides: PathOverrides = {}): HostPaths {
  return { ...DEFAULT_PATHS, ...overrides }
}

/**
 * Point every path below a single root directory. Used for dry runs and tests.
 */
export function rootedPaths(root: string): HostPaths {
  return {
    stateDir: `${root}${DEFAULT_PATHS.stateDir}`,
    logDir: `${root}${DEFAULT_PATHS.logDir}`,
    certDir: `${root}${DEFAULT_PATHS.certDir}`,
    caDir: `${root}${DEFAULT_PATHS.caDir}`,
    firewallRules: `${root}${DEFAULT_PATHS.firewallRules}`,
    nginxSitesAvailable: `${root}${DEFAULT_PATHS.nginxSitesAvailable}`,
    nginxSitesEnabled: `${root}${DEFAULT_PATHS.nginxSitesEnabled}`,
    fail2banJail: `${root}${DEFAULT_PATHS.fail2banJail}`,
    systemdDir: `${root}${DEFAULT_PATHS.systemdDir}`,
    acmeWebroot: `${root}${DEFAULT_PATHS.acmeWebroot}`,
    acmeStaging: `${root}${DEFAULT_PATHS.acmeStaging}`,
    letsencryptLive: `${root}${DEFAULT_PATHS.letsencryptLive}`,
  }
}
