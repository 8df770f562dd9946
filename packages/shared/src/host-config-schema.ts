/**
 * Host Config Zod Schema
 *
 * Validates hostkit.json at parse time. Unknown keys cause errors.
 * Semantic checks (domain syntax, subnet membership) happen in topology
 * resolution; this schema only guards the shape.
 */

import { z } from "zod"
import { DEFAULTS } from "./constants.js"

// ---------------------------------------------------------------------------
// Reusable validators
// ---------------------------------------------------------------------------

const pathStr = z.string().min(1).startsWith("/", "must be an absolute path")
const interfaceStr = z.string().regex(/^[a-zA-Z0-9_.:-]{1,15}$/, "invalid interface name")

// ---------------------------------------------------------------------------
// Intent
// ---------------------------------------------------------------------------

export const NETWORK_MODES = ["LAN", "WAN", "HYBRID"] as const
export const LOCAL_CERT_STRATEGIES = ["SelfSigned", "LocalCA"] as const
export const ACME_PROVIDERS = ["LetsEncrypt", "ZeroSSL"] as const
export const ACME_CLIENTS = ["acme.sh", "certbot"] as const
export const MONITORING_LEVELS = ["basic", "standard", "full"] as const
export const SSH_ACCESS = ["lan", "any"] as const

export const intentSchema = z
  .object({
    mode: z.enum(NETWORK_MODES),
    domain: z.string().min(1).optional(),
    lanSubnet: z.string().min(1).optional(),
    lanServerIp: z.string().min(1).optional(),
    lanInterface: interfaceStr.optional(),
    lanHostname: z.string().min(1).optional(),
    lanCertStrategy: z.enum(LOCAL_CERT_STRATEGIES).optional(),
    wanInterface: interfaceStr.optional(),
    acmeProvider: z.enum(ACME_PROVIDERS).optional(),
    acmeClient: z.enum(ACME_CLIENTS).optional(),
    acmeEmail: z.string().email().optional(),
    acmeEab: z
      .object({
        kid: z.string().min(1),
        hmacKey: z.string().min(1),
      })
      .strict()
      .optional(),
    monitoringLevel: z.enum(MONITORING_LEVELS).optional(),
    sshAccess: z.enum(SSH_ACCESS).optional(),
  })
  .strict()

export type Intent = z.infer<typeof intentSchema>

// ---------------------------------------------------------------------------
// Host config
// ---------------------------------------------------------------------------

const pathsSchema = z
  .object({
    stateDir: pathStr,
    logDir: pathStr,
    certDir: pathStr,
    caDir: pathStr,
    firewallRules: pathStr,
    nginxSitesAvailable: pathStr,
    nginxSitesEnabled: pathStr,
    fail2banJail: pathStr,
    systemdDir: pathStr,
    acmeWebroot: pathStr,
    acmeStaging: pathStr,
    letsencryptLive: pathStr,
  })
  .strict()
  .partial()

export const hostConfigSchema = z
  .object({
    intent: intentSchema,

    app: z
      .object({
        user: z.string().min(1).default(DEFAULTS.APP.USER),
        group: z.string().min(1).default(DEFAULTS.APP.GROUP),
        workingDirectory: pathStr.default(DEFAULTS.APP.WORKING_DIRECTORY),
        httpExecStart: z.string().min(1).default(DEFAULTS.APP.HTTP_EXEC_START),
        streamExecStart: z.string().min(1).default(DEFAULTS.APP.STREAM_EXEC_START),
        environment: z.record(z.string().regex(/^[A-Z_][A-Z0-9_]*$/), z.string()).default({}),
      })
      .strict()
      .default({}),

    paths: pathsSchema.default({}),

    renewal: z
      .object({
        schedule: z.string().min(1).default(DEFAULTS.RENEWAL_SCHEDULE),
        command: z.string().min(1).default(DEFAULTS.RENEWAL_COMMAND),
      })
      .strict()
      .default({}),
  })
  .strict()

export type HostConfig = z.infer<typeof hostConfigSchema>
export type AppConfig = HostConfig["app"]
export type RenewalConfig = HostConfig["renewal"]
export type PathOverrides = z.infer<typeof pathsSchema>
