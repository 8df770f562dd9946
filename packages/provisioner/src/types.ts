import type {
  ACME_CLIENTS,
  ACME_PROVIDERS,
  LOCAL_CERT_STRATEGIES,
  MONITORING_LEVELS,
  NETWORK_MODES,
  SSH_ACCESS,
} from "@hostkit/shared"

// =============================================================================
// Topology
// =============================================================================

export type NetworkMode = (typeof NETWORK_MODES)[number]
export type ZoneId = "LAN" | "WAN"
export type LocalCertStrategy = (typeof LOCAL_CERT_STRATEGIES)[number]
export type AcmeProvider = (typeof ACME_PROVIDERS)[number]
export type AcmeClientName = (typeof ACME_CLIENTS)[number]
export type MonitoringLevel = (typeof MONITORING_LEVELS)[number]
export type SshAccess = (typeof SSH_ACCESS)[number]

export interface AcmeEab {
  readonly kid: string
  readonly hmacKey: string
}

export interface LanFields {
  readonly lanSubnet: string
  readonly lanInterface: string
  readonly lanServerIp: string
  readonly lanHostname: string
  readonly lanCertStrategy: LocalCertStrategy
}

export interface WanFields {
  readonly wanInterface: string
  readonly wanDomain: string
  readonly wanAcmeEmail: string
  readonly acmeProvider: AcmeProvider
  readonly acmeClient: AcmeClientName
  readonly acmeEab?: AcmeEab
}

interface TopologyCommon {
  readonly monitoringLevel: MonitoringLevel
  readonly sshAccess: SshAccess
}

export type LanTopology = TopologyCommon & LanFields & { readonly mode: "LAN" }
export type WanTopology = TopologyCommon & WanFields & { readonly mode: "WAN" }
export type HybridTopology = TopologyCommon & LanFields & WanFields & { readonly mode: "HYBRID" }

export type Topology = LanTopology | WanTopology | HybridTopology

// =============================================================================
// Certificates
// =============================================================================

export type CertificateStrategy =
  | { readonly kind: "SelfSigned" }
  | { readonly kind: "LocalCA" }
  | { readonly kind: "ACME"; readonly provider: AcmeProvider; readonly client: AcmeClientName }

export interface RenewalPolicy {
  /** "manual" or a cron expression for the renewal scheduler */
  readonly schedule: string
  readonly renewBeforeDays: number
}

export interface IssuedCertificate {
  readonly serial: string
  /** SHA-256 of the DER encoding, lowercase hex */
  readonly fingerprint: string
  readonly notBefore: string
  readonly notAfter: string
}

export interface CertificateZone {
  readonly zoneId: ZoneId
  readonly strategy: CertificateStrategy
  /** Ordered, duplicate-free; the first entry becomes the subject CN */
  readonly subjectNames: readonly string[]
  readonly certPath: string
  readonly keyPath: string
  readonly renewalPolicy: RenewalPolicy
  readonly issued?: IssuedCertificate
}

export type ZoneOutcome =
  | { readonly zoneId: ZoneId; readonly status: "issued" | "unchanged"; readonly zone: CertificateZone }
  | {
      readonly zoneId: ZoneId
      readonly status: "failed"
      readonly error: { readonly code: string; readonly message: string; readonly remediation?: string }
      /** Previously installed certificate that is still valid and stays in service */
      readonly zone?: CertificateZone
    }

// =============================================================================
// Synthesis
// =============================================================================

export interface ListenBinding {
  readonly ip: string
  readonly port: number
  readonly tls: boolean
}

export interface UpstreamTarget {
  readonly pathPrefix: string
  /** host:port */
  readonly target: string
  readonly kind: "http" | "stream"
}

export interface RateLimit {
  readonly ratePerSecond: number
  readonly burst: number
}

export interface TlsCertRef {
  readonly zoneId: ZoneId
  readonly certPath: string
  readonly keyPath: string
}

export interface ProxyRoute {
  readonly zoneId: ZoneId
  readonly serverNames: readonly string[]
  readonly listenBindings: readonly ListenBinding[]
  readonly tlsCertRef: TlsCertRef
  readonly allowedSourceCidrs: readonly string[]
  readonly upstreamTargets: readonly UpstreamTarget[]
  readonly rateLimit?: RateLimit
  /** Served on the plain-HTTP binding for ACME HTTP-01 */
  readonly acmeWebroot?: string
}

export type FirewallProtocol = "tcp" | "udp" | "any"

export interface FirewallRule {
  readonly action: "allow" | "deny"
  readonly sourceCidr: string
  /** null matches every port */
  readonly port: number | null
  readonly protocol: FirewallProtocol
  readonly comment: string
  readonly interface?: string
  /** Per-source connection rate limiting (ufw `limit`) */
  readonly rateLimited?: boolean
}

export interface FirewallRuleSet {
  readonly zoneId: ZoneId
  readonly defaultIncoming: "deny"
  readonly rules: readonly FirewallRule[]
}

export interface Jail {
  readonly name: string
  readonly description: string
  readonly port: string
  readonly logpath: string
  readonly filter?: string
  readonly maxretry?: number
  readonly bantime?: number
}

export interface IntrusionPreventionPolicy {
  readonly bantime: number
  readonly findtime: number
  readonly maxretry: number
  readonly ignoreCidrs: readonly string[]
  readonly jails: readonly Jail[]
}

export interface SynthesisResult {
  readonly routes: readonly ProxyRoute[]
  readonly rules: readonly FirewallRuleSet[]
  readonly intrusion: IntrusionPreventionPolicy
  readonly firewallLogging: "low" | "medium" | "high"
}

// =============================================================================
// Phases
// =============================================================================

export const PHASES = ["Prerequisites", "Configuration", "ServiceActivation", "Verification"] as const
export type PhaseName = (typeof PHASES)[number]

export type PhaseStatus = "pending" | "running" | "success" | "failed"

export interface PhaseRecord {
  readonly phaseName: PhaseName
  readonly startedAt: string
  readonly completedAt?: string
  readonly status: PhaseStatus
  readonly logRef: string
  readonly error?: { readonly code: string; readonly message: string; readonly remediation?: string }
}

// =============================================================================
// Verification
// =============================================================================

export type CheckStatus = "pass" | "warn" | "fail"
export type CheckCategory = "interface" | "certificate" | "proxy" | "firewall" | "service"

export interface VerificationCheck {
  readonly id: string
  readonly category: CheckCategory
  readonly zoneId?: ZoneId
  readonly status: CheckStatus
  readonly message: string
  readonly remediation?: string
}

export interface ReadinessReport {
  readonly checkedAt: string
  readonly overall: CheckStatus
  readonly checks: readonly VerificationCheck[]
}
