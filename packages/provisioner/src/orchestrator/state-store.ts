import { dirname, join } from "node:path"
import {
  ACME_CLIENTS,
  ACME_PROVIDERS,
  ConfigError,
  formatZodIssues,
  LOCAL_CERT_STRATEGIES,
  MONITORING_LEVELS,
  SSH_ACCESS,
} from "@hostkit/shared"
import lockfile from "proper-lockfile"
import { z } from "zod"
import { atomicWrite, ensureDir, readTextIfExists } from "../executors/files.js"
import {
  type CertificateZone,
  PHASES,
  type PhaseName,
  type PhaseRecord,
  type ReadinessReport,
  type Topology,
} from "../types.js"

// =============================================================================
// Schemas
// =============================================================================

const errorSummarySchema = z.object({
  code: z.string(),
  message: z.string(),
  remediation: z.string().optional(),
})

const common = {
  monitoringLevel: z.enum(MONITORING_LEVELS),
  sshAccess: z.enum(SSH_ACCESS),
}

const lanFields = {
  lanSubnet: z.string(),
  lanInterface: z.string(),
  lanServerIp: z.string(),
  lanHostname: z.string(),
  lanCertStrategy: z.enum(LOCAL_CERT_STRATEGIES),
}

const wanFields = {
  wanInterface: z.string(),
  wanDomain: z.string(),
  wanAcmeEmail: z.string(),
  acmeProvider: z.enum(ACME_PROVIDERS),
  acmeClient: z.enum(ACME_CLIENTS),
  acmeEab: z.object({ kid: z.string(), hmacKey: z.string() }).optional(),
}

export const topologySchema = z.discriminatedUnion("mode", [
  z.object({ mode: z.literal("LAN"), ...common, ...lanFields }).strict(),
  z.object({ mode: z.literal("WAN"), ...common, ...wanFields }).strict(),
  z.object({ mode: z.literal("HYBRID"), ...common, ...lanFields, ...wanFields }).strict(),
])

const zoneIdSchema = z.enum(["LAN", "WAN"])

const zoneSchema = z.object({
  zoneId: zoneIdSchema,
  strategy: z.discriminatedUnion("kind", [
    z.object({ kind: z.literal("SelfSigned") }),
    z.object({ kind: z.literal("LocalCA") }),
    z.object({ kind: z.literal("ACME"), provider: z.enum(ACME_PROVIDERS), client: z.enum(ACME_CLIENTS) }),
  ]),
  subjectNames: z.array(z.string()),
  certPath: z.string(),
  keyPath: z.string(),
  renewalPolicy: z.object({ schedule: z.string(), renewBeforeDays: z.number() }),
  issued: z
    .object({ serial: z.string(), fingerprint: z.string(), notBefore: z.string(), notAfter: z.string() })
    .optional(),
})

const phaseRecordSchema = z.object({
  phaseName: z.enum(PHASES),
  startedAt: z.string(),
  completedAt: z.string().optional(),
  status: z.enum(["pending", "running", "success", "failed"]),
  logRef: z.string(),
  error: errorSummarySchema.optional(),
})

const reportSchema = z.object({
  checkedAt: z.string(),
  overall: z.enum(["pass", "warn", "fail"]),
  checks: z.array(
    z.object({
      id: z.string(),
      category: z.enum(["interface", "certificate", "proxy", "firewall", "service"]),
      zoneId: zoneIdSchema.optional(),
      status: z.enum(["pass", "warn", "fail"]),
      message: z.string(),
      remediation: z.string().optional(),
    }),
  ),
})

const pendingActivationSchema = z.object({
  vhostsChanged: z.boolean(),
  jailChanged: z.boolean(),
  unitsChanged: z.array(z.string()),
})

export const hostStateSchema = z.object({
  version: z.literal(1),
  topology: topologySchema.optional(),
  zones: z.array(zoneSchema).default([]),
  phases: z
    .object({
      Prerequisites: phaseRecordSchema.optional(),
      Configuration: phaseRecordSchema.optional(),
      ServiceActivation: phaseRecordSchema.optional(),
      Verification: phaseRecordSchema.optional(),
    })
    .default({}),
  pendingActivation: pendingActivationSchema.optional(),
  lastReport: reportSchema.optional(),
})

/**
 * What Configuration changed and ServiceActivation still has to apply
 */
export interface PendingActivation {
  vhostsChanged: boolean
  jailChanged: boolean
  unitsChanged: string[]
}

export interface HostState {
  version: 1
  topology?: Topology
  zones: CertificateZone[]
  /** Last record per phase */
  phases: Partial<Record<PhaseName, PhaseRecord>>
  pendingActivation?: PendingActivation
  lastReport?: ReadinessReport
}

export function emptyState(): HostState {
  return { version: 1, zones: [], phases: {} }
}

// =============================================================================
// Store
// =============================================================================

// Lock is a `state.json.lock` directory; a holder that died leaves it stale
const LOCK_OPTIONS = {
  realpath: false,
  stale: 30_000,
  retries: {
    retries: 10,
    factor: 2,
    minTimeout: 50,
    maxTimeout: 2_000,
    randomize: true,
  },
} as const

/**
 * `<stateDir>/state.json`. Validated on every read, replaced atomically
 * on every write.
 */
export class StateStore {
  readonly path: string

  constructor(stateDir: string) {
    this.path = join(stateDir, "state.json")
  }

  async load(): Promise<HostState> {
    const raw = await readTextIfExists(this.path)
    if (raw === null) {
      return emptyState()
    }

    let data: unknown
    try {
      data = JSON.parse(raw)
    } catch (err) {
      throw new ConfigError("INVALID_CONFIG", `${this.path} is not valid JSON: ${String(err)}`)
    }

    const result = hostStateSchema.safeParse(data)
    if (!result.success) {
      const issues = formatZodIssues(result.error)
      throw new ConfigError("INVALID_CONFIG", `${this.path} failed validation: ${issues.join("; ")}`, issues)
    }
    return result.data
  }

  async save(state: HostState): Promise<void> {
    await atomicWrite(this.path, `${JSON.stringify(state, null, 2)}\n`, 0o600)
  }

  /**
   * Read-modify-write under the state lock. The pipeline, `renew` and
   * `verify` may write from separate processes; `mutate` sees the state
   * as it is once the lock is held.
   */
  async update(mutate: (state: HostState) => HostState): Promise<HostState> {
    await ensureDir(dirname(this.path), 0o700)
    const release = await lockfile.lock(this.path, LOCK_OPTIONS)
    try {
      const next = mutate(await this.load())
      await this.save(next)
      return next
    } finally {
      await release()
    }
  }
}
