import { join } from "node:path"
import { DEFAULTS } from "@hostkit/shared"
import type { CertificateStrategy, CertificateZone, Topology, ZoneId } from "../types.js"
import { hasLan, hasWan } from "./resolve.js"

export interface ZonePlanOptions {
  certDir: string
  /** Cron expression used for ACME zones */
  renewalSchedule?: string
}

export function zoneDir(certDir: string, zoneId: ZoneId): string {
  return join(certDir, zoneId.toLowerCase())
}

export function zoneCertPaths(certDir: string, zoneId: ZoneId): { certPath: string; keyPath: string } {
  const live = join(zoneDir(certDir, zoneId), "live")
  return { certPath: join(live, "cert.pem"), keyPath: join(live, "key.pem") }
}

/**
 * apex.tld also gets www.apex.tld; deeper names stay single.
 */
export function wanSubjectNames(domain: string): string[] {
  return domain.split(".").length === 2 ? [domain, `www.${domain}`] : [domain]
}

const LOOPBACK_NAMES = ["localhost", "127.0.0.1", "::1"]

function unique(names: readonly string[]): string[] {
  return [...new Set(names)]
}

/**
 * Mode → zones derivation table. LAN always precedes WAN.
 *
 * | mode   | zones                                 |
 * |--------|---------------------------------------|
 * | LAN    | LAN (SelfSigned or LocalCA)           |
 * | WAN    | WAN (ACME)                            |
 * | HYBRID | LAN (SelfSigned or LocalCA), WAN (ACME) |
 */
export function planZones(topology: Topology, options: ZonePlanOptions): CertificateZone[] {
  const zones: CertificateZone[] = []

  if (hasLan(topology)) {
    const strategy: CertificateStrategy =
      topology.lanCertStrategy === "LocalCA" ? { kind: "LocalCA" } : { kind: "SelfSigned" }
    zones.push({
      zoneId: "LAN",
      strategy,
      // HYBRID LAN clients may also reach the host by its public name
      subjectNames: unique([
        topology.lanHostname,
        topology.lanServerIp,
        ...(hasWan(topology) ? [topology.wanDomain] : []),
        ...LOOPBACK_NAMES,
      ]),
      ...zoneCertPaths(options.certDir, "LAN"),
      renewalPolicy: { schedule: "manual", renewBeforeDays: DEFAULTS.RENEW_BEFORE_DAYS },
    })
  }

  if (hasWan(topology)) {
    zones.push({
      zoneId: "WAN",
      strategy: { kind: "ACME", provider: topology.acmeProvider, client: topology.acmeClient },
      subjectNames: wanSubjectNames(topology.wanDomain),
      ...zoneCertPaths(options.certDir, "WAN"),
      renewalPolicy: {
        schedule: options.renewalSchedule ?? DEFAULTS.RENEWAL_SCHEDULE,
        renewBeforeDays: DEFAULTS.RENEW_BEFORE_DAYS,
      },
    })
  }

  return zones
}

export function describeStrategy(strategy: CertificateStrategy): string {
  switch (strategy.kind) {
    case "SelfSigned":
      return "self-signed"
    case "LocalCA":
      return "local CA"
    case "ACME":
      return `ACME ${strategy.provider} via ${strategy.client}`
  }
}
