/**
 * ============================================================================
 * HOST CONSTANTS
 * ============================================================================
 *
 * Fixed ports, timeouts and defaults used by every hostkit package.
 * Import from here instead of hardcoding values.
 *
 * Organization:
 * - PORTS: listen and internal service ports
 * - ADMINISTRATIVE_PORTS: ports a firewall allow-rule may use without a proxy binding
 * - TIMEOUTS: timing constants
 * - DEFAULTS: intent defaults and certificate parameters
 * - DEFAULT_PATHS: filesystem locations (overridable via config `paths`)
 */

// =============================================================================
// Ports
// =============================================================================

export const PORTS = {
  /** LAN zone TLS listener */
  LAN_HTTPS: 8443,
  /** WAN zone TLS listener */
  WAN_HTTPS: 443,
  /** Plain HTTP: redirect + ACME HTTP-01 challenge */
  HTTP: 80,
  SSH: 22,
  /** HTTP application server upstream */
  APP: 8000,
  /** Long-lived / streaming connection upstream */
  STREAM: 8001,
  CACHE: 6379,
  DATABASE: 5432,
} as const

/** Loopback-only ports for internal services, in rule order */
export const INTERNAL_PORTS = [
  { port: PORTS.APP, name: "application server" },
  { port: PORTS.STREAM, name: "streaming server" },
  { port: PORTS.CACHE, name: "cache" },
  { port: PORTS.DATABASE, name: "database" },
] as const

export const ADMINISTRATIVE_PORTS: readonly number[] = [PORTS.SSH, ...INTERNAL_PORTS.map(p => p.port)]

export const LOOPBACK_CIDR = "127.0.0.0/8"
export const ANY_CIDR = "0.0.0.0/0"

// =============================================================================
// Timeouts
// =============================================================================

export const TIMEOUTS = {
  /** Upper bound for a single system command */
  COMMAND_MS: 120_000,
  /** ACME issuance can wait on remote validation */
  ACME_COMMAND_MS: 300_000,
  /** Wait for systemd to report a unit active */
  SERVICE_START_MS: 30_000,
  SERVICE_POLL_MS: 500,
  ACME_RETRY_DELAY_MS: 5_000,
} as const

// =============================================================================
// Defaults
// =============================================================================

export const DEFAULTS = {
  LAN_SUBNET: "192.168.10.0/24",
  LAN_INTERFACE: "eth1",
  LAN_HOSTNAME: "webapp.local",
  LAN_CERT_STRATEGY: "LocalCA",
  WAN_INTERFACE: "eth0",
  ACME_PROVIDER: "LetsEncrypt",
  ACME_CLIENT: "acme.sh",
  MONITORING_LEVEL: "standard",

  RSA_KEY_BITS: 2048,
  SELF_SIGNED_VALIDITY_DAYS: 365,
  LOCAL_CA_VALIDITY_YEARS: 10,
  LOCAL_CA_LEAF_VALIDITY_DAYS: 825,
  /** Renew once fewer than this many days remain */
  RENEW_BEFORE_DAYS: 30,
  /** Verification warns below this horizon */
  EXPIRY_WARNING_DAYS: 7,
  ACME_MAX_ATTEMPTS: 2,
  /** Certificate releases kept under archive/ */
  RELEASES_KEPT: 2,

  RENEWAL_SCHEDULE: "17 3 * * *",
  RENEWAL_COMMAND: "/usr/local/bin/hostkit renew --daemon",

  RATE_LIMIT: {
    RATE_PER_SECOND: 10,
    BURST: 20,
    ZONE_SIZE: "10m",
  },
  CLIENT_MAX_BODY_SIZE: "10M",
  STREAM_READ_TIMEOUT: "3600s",

  APP: {
    USER: "webapp",
    GROUP: "webapp",
    WORKING_DIRECTORY: "/opt/webapp",
    HTTP_EXEC_START: "/opt/webapp/bin/http-server",
    STREAM_EXEC_START: "/opt/webapp/bin/stream-server",
  },
} as const

// =============================================================================
// Paths
// =============================================================================

export const DEFAULT_PATHS = {
  stateDir: "/var/lib/hostkit",
  logDir: "/var/log/hostkit",
  certDir: "/etc/hostkit/certs",
  caDir: "/etc/hostkit/ca",
  firewallRules: "/etc/hostkit/firewall.rules",
  nginxSitesAvailable: "/etc/nginx/sites-available",
  nginxSitesEnabled: "/etc/nginx/sites-enabled",
  fail2banJail: "/etc/fail2ban/jail.d/hostkit.local",
  systemdDir: "/etc/systemd/system",
  acmeWebroot: "/var/www/acme-challenge",
  acmeStaging: "/var/lib/hostkit/acme",
  letsencryptLive: "/etc/letsencrypt/live",
} as const

export type HostPaths = { readonly [K in keyof typeof DEFAULT_PATHS]: string }
