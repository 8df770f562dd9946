/**
 * @hostkit/shared
 *
 * Constants, config loading and error/retry helpers used across hostkit packages.
 *
 * @example
 * ```typescript
 * import { loadHostConfig, PORTS, resolvePaths } from "@hostkit/shared"
 *
 * const config = await loadHostConfig()
 * const paths = resolvePaths(config?.paths)
 * const lanPort = PORTS.LAN_HTTPS // 8443
 * ```
 */

export {
  CONFIG_PATH,
  formatZodIssues,
  loadHostConfig,
  parseHostConfig,
  resolvePaths,
  rootedPaths,
} from "./config.js"
export {
  ADMINISTRATIVE_PORTS,
  ANY_CIDR,
  DEFAULT_PATHS,
  DEFAULTS,
  type HostPaths,
  INTERNAL_PORTS,
  LOOPBACK_CIDR,
  PORTS,
  TIMEOUTS,
} from "./constants.js"
export {
  ConfigError,
  describeError,
  extractErrorCode,
  formatUncaughtError,
  isNotFoundError,
} from "./errors.js"
export {
  ACME_CLIENTS,
  ACME_PROVIDERS,
  type AppConfig,
  type HostConfig,
  hostConfigSchema,
  type Intent,
  intentSchema,
  LOCAL_CERT_STRATEGIES,
  MONITORING_LEVELS,
  NETWORK_MODES,
  type PathOverrides,
  type RenewalConfig,
  SSH_ACCESS,
} from "./host-config-schema.js"
export { type RetryConfig, type RetryInfo, type RetryOptions, resolveRetryConfig, retryAsync, sleep } from "./retry.js"
