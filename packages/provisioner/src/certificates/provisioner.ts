import { join } from "node:path"
import { DEFAULTS, describeError, type HostPaths, retryAsync, TIMEOUTS } from "@hostkit/shared"
import type { Logger } from "@hostkit/logger"
import { ProvisionError, summarizeError, ValidationUnreachableError } from "../errors.js"
import type { CommandRunner } from "../executors/command.js"
import type { DnsResolver } from "../executors/dns.js"
import { atomicWrite, ensureDir } from "../executors/files.js"
import { hasWan } from "../topology/resolve.js"
import { describeStrategy, zoneDir } from "../topology/zones.js"
import type { CertificateStrategy, CertificateZone, IssuedCertificate, Topology, ZoneOutcome } from "../types.js"
import { type AcmeClient, createAcmeShClient, createCertbotClient } from "./acme.js"
import { installCertificatePair, readCertificatePair } from "./store.js"
import {
  type CertificatePair,
  createCertificateAuthority,
  createSelfSigned,
  daysUntil,
  isIssuedBy,
  issueFromAuthority,
  type ParsedCertificate,
  parseCertificate,
} from "./x509.js"

export interface ProvisionerDeps {
  paths: HostPaths
  runner: CommandRunner
  resolver: DnsResolver
  clock: () => Date
  log: Logger
  /** Backoff between ACME attempts */
  acmeRetryDelayMs?: number
  /** Override the ACME client selection (tests) */
  acmeClients?: Partial<Record<AcmeClient["name"], AcmeClient>>
}

export interface ProvisionResult {
  zone: CertificateZone
  status: "issued" | "unchanged"
}

export interface ProvisionHooks {
  /** Runs right before an ACME zone is issued (challenge vhost setup) */
  beforeAcme?: (zone: CertificateZone) => Promise<void>
}

const LOCAL_CA_NAME = "hostkit local CA"

function toIssued(parsed: ParsedCertificate): IssuedCertificate {
  return {
    serial: parsed.serial,
    fingerprint: parsed.fingerprint,
    notBefore: parsed.notBefore.toISOString(),
    notAfter: parsed.notAfter.toISOString(),
  }
}

/**
 * Obtains and renews TLS certificates per zone.
 *
 * The only place that branches on CertificateStrategy. Every strategy
 * ends in the same atomic pair install under <certDir>/<zone>.
 */
export class CertificateProvisioner {
  private readonly log: Logger

  constructor(private readonly deps: ProvisionerDeps) {
    this.log = deps.log.child("Certificates")
  }

  get localAuthorityPath(): string {
    return join(this.deps.paths.caDir, "rootCA.pem")
  }

  /**
   * Metadata of the installed certificate, or null when missing or unreadable.
   */
  async inspect(zone: CertificateZone): Promise<ParsedCertificate | null> {
    const pair = await readCertificatePair(zone.certPath, zone.keyPath)
    if (!pair) return null
    try {
      return parseCertificate(pair.certPem)
    } catch {
      return null
    }
  }

  /**
   * Existing certificate still satisfies the zone: same names, same
   * strategy family, outside the renewal window.
   */
  private async reusable(zone: CertificateZone): Promise<ParsedCertificate | null> {
    const pair = await readCertificatePair(zone.certPath, zone.keyPath)
    if (!pair) return null

    let parsed: ParsedCertificate
    try {
      parsed = parseCertificate(pair.certPem)
    } catch (err) {
      this.log.warn(`${zone.zoneId} certificate is unreadable, reissuing`, err, { zone: zone.zoneId })
      return null
    }

    const covered = new Set(parsed.subjectNames)
    if (!zone.subjectNames.every(name => covered.has(name))) {
      return null
    }
    if (daysUntil(parsed.notAfter, this.deps.clock()) < zone.renewalPolicy.renewBeforeDays) {
      return null
    }
    if (!(await this.matchesStrategy(zone.strategy, pair.certPem, parsed))) {
      return null
    }
    return parsed
  }

  /**
   * Installed certificate that has not expired and still covers the zone's names.
   */
  private async stillServing(zone: CertificateZone): Promise<ParsedCertificate | null> {
    const parsed = await this.inspect(zone)
    if (!parsed || parsed.notAfter <= this.deps.clock()) {
      return null
    }
    const names = new Set(parsed.subjectNames)
    return zone.subjectNames.every(name => names.has(name)) ? parsed : null
  }

  private async matchesStrategy(strategy: CertificateStrategy, certPem: string, parsed: ParsedCertificate) {
    switch (strategy.kind) {
      case "SelfSigned":
        return isIssuedBy(certPem, certPem)
      case "LocalCA": {
        const ca = await readCertificatePair(this.localAuthorityPath, join(this.deps.paths.caDir, "rootCA-key.pem"))
        return ca !== null && isIssuedBy(certPem, ca.certPem)
      }
      case "ACME":
        return parsed.issuerCommonName !== parsed.commonName
    }
  }

  /**
   * Provision one zone. A valid certificate outside its renewal window is
   * left untouched.
   */
  async provision(zone: CertificateZone, topology: Topology, hooks: ProvisionHooks = {}): Promise<ProvisionResult> {
    const existing = await this.reusable(zone)
    if (existing) {
      this.log.info(`${zone.zoneId} certificate valid until ${existing.notAfter.toISOString()}, nothing to do`, {
        zone: zone.zoneId,
      })
      return { zone: { ...zone, issued: toIssued(existing) }, status: "unchanged" }
    }

    this.log.info(`Issuing ${zone.zoneId} certificate (${describeStrategy(zone.strategy)})`, { zone: zone.zoneId })

    let pair: CertificatePair
    try {
      pair = await this.issue(zone, topology, hooks)
    } catch (err) {
      if (err instanceof ProvisionError) throw err
      throw ProvisionError.issuanceFailed(zone.zoneId, describeStrategy(zone.strategy), err)
    }

    const parsed = parseCertificate(pair.certPem)
    await installCertificatePair(zoneDir(this.deps.paths.certDir, zone.zoneId), pair, parsed.fingerprint)
    this.log.info(`${zone.zoneId} certificate installed, expires ${parsed.notAfter.toISOString()}`, {
      zone: zone.zoneId,
    })
    return { zone: { ...zone, issued: toIssued(parsed) }, status: "issued" }
  }

  /**
   * Provision zones in order (LAN before WAN). A failing zone does not
   * block its siblings. When nothing is left to serve, the first error is
   * rethrown.
   */
  async provisionAll(
    zones: readonly CertificateZone[],
    topology: Topology,
    hooks: ProvisionHooks = {},
  ): Promise<ZoneOutcome[]> {
    const outcomes: ZoneOutcome[] = []
    let firstError: ProvisionError | undefined

    for (const zone of zones) {
      try {
        const result = await this.provision(zone, topology, hooks)
        outcomes.push({ zoneId: zone.zoneId, status: result.status, zone: result.zone })
      } catch (err) {
        const error =
          err instanceof ProvisionError
            ? err
            : ProvisionError.issuanceFailed(zone.zoneId, describeStrategy(zone.strategy), err)
        firstError ??= error
        this.log.error(`${zone.zoneId} certificate failed`, error, { zone: zone.zoneId })
        const previous = await this.stillServing(zone)
        if (previous) {
          this.log.warn(`${zone.zoneId} keeps serving the certificate valid until ${previous.notAfter.toISOString()}`)
        }
        outcomes.push({
          zoneId: zone.zoneId,
          status: "failed",
          error: summarizeError(error),
          ...(previous ? { zone: { ...zone, issued: toIssued(previous) } } : {}),
        })
      }
    }

    if (firstError && outcomes.every(o => o.status === "failed" && !o.zone)) {
      throw firstError
    }
    return outcomes
  }

  // ===========================================================================
  // Strategies
  // ===========================================================================

  private async issue(zone: CertificateZone, topology: Topology, hooks: ProvisionHooks): Promise<CertificatePair> {
    const strategy = zone.strategy
    const now = this.deps.clock()

    switch (strategy.kind) {
      case "SelfSigned":
        return createSelfSigned({
          subjectNames: zone.subjectNames,
          validityDays: DEFAULTS.SELF_SIGNED_VALIDITY_DAYS,
          now,
        })

      case "LocalCA": {
        const ca = await this.ensureLocalAuthority(now)
        return issueFromAuthority(ca, {
          subjectNames: zone.subjectNames,
          validityDays: DEFAULTS.LOCAL_CA_LEAF_VALIDITY_DAYS,
          now,
        })
      }

      case "ACME":
        return this.issueAcme(zone, strategy, topology, hooks)
    }
  }

  /**
   * Bootstrap the host CA once. An existing, unexpired CA is reused.
   */
  async ensureLocalAuthority(now: Date = this.deps.clock()): Promise<CertificatePair> {
    const certPath = this.localAuthorityPath
    const keyPath = join(this.deps.paths.caDir, "rootCA-key.pem")
    const existing = await readCertificatePair(certPath, keyPath)

    if (existing) {
      try {
        const parsed = parseCertificate(existing.certPem)
        if (parsed.isCA && parsed.notAfter > now) {
          return existing
        }
        this.log.warn("Local CA is expired or not a CA, replacing it")
      } catch (err) {
        this.log.warn("Local CA certificate is unreadable, replacing it", err)
      }
    }

    const ca = createCertificateAuthority({
      commonName: LOCAL_CA_NAME,
      validityYears: DEFAULTS.LOCAL_CA_VALIDITY_YEARS,
      now,
    })
    await ensureDir(this.deps.paths.caDir, 0o700)
    await atomicWrite(keyPath, ca.keyPem, 0o600)
    await atomicWrite(certPath, ca.certPem, 0o644)
    this.log.info(`Bootstrapped local CA at ${certPath}; add it to client trust stores`)
    return ca
  }

  private acmeClient(name: AcmeClient["name"]): AcmeClient {
    const override = this.deps.acmeClients?.[name]
    if (override) return override
    switch (name) {
      case "certbot":
        return createCertbotClient(this.deps.runner, this.deps.paths.letsencryptLive)
      case "acme.sh":
        return createAcmeShClient(this.deps.runner, this.deps.paths.acmeStaging)
    }
  }

  private async checkReachable(zone: CertificateZone, domain: string): Promise<void> {
    let addresses: string[]
    try {
      addresses = await this.deps.resolver(domain)
    } catch (err) {
      throw ValidationUnreachableError.unresolvable(zone.zoneId, domain, err)
    }
    if (addresses.length === 0) {
      throw ValidationUnreachableError.unresolvable(zone.zoneId, domain)
    }
  }

  private async issueAcme(
    zone: CertificateZone,
    strategy: Extract<CertificateStrategy, { kind: "ACME" }>,
    topology: Topology,
    hooks: ProvisionHooks,
  ): Promise<CertificatePair> {
    if (!hasWan(topology)) {
      throw ValidationUnreachableError.lanOnly(zone.zoneId)
    }
    const domain = topology.wanDomain
    await this.checkReachable(zone, domain)
    await ensureDir(this.deps.paths.acmeWebroot)
    await hooks.beforeAcme?.(zone)

    const client = this.acmeClient(strategy.client)
    try {
      return await retryAsync(
        () =>
          client.issue({
            zoneId: zone.zoneId,
            domains: zone.subjectNames,
            email: topology.wanAcmeEmail,
            provider: strategy.provider,
            eab: topology.acmeEab,
            webroot: this.deps.paths.acmeWebroot,
          }),
        {
          attempts: DEFAULTS.ACME_MAX_ATTEMPTS,
          minDelayMs: this.deps.acmeRetryDelayMs ?? TIMEOUTS.ACME_RETRY_DELAY_MS,
          label: `acme:${domain}`,
          shouldRetry: err => !(err instanceof ProvisionError),
          onRetry: ({ attempt, maxAttempts, delayMs, err }) =>
            this.log.warn(
              `${client.name} attempt ${attempt}/${maxAttempts} failed, retrying in ${delayMs}ms: ${describeError(err)}`,
            ),
        },
      )
    } catch (err) {
      if (err instanceof ProvisionError) throw err
      throw ProvisionError.acmeFailed(zone.zoneId, domain, err)
    }
  }
}
