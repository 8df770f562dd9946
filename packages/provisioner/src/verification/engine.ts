import { DEFAULTS, describeError, type HostPaths } from "@hostkit/shared"
import type { Logger } from "@hostkit/logger"
import { readCertificatePair } from "../certificates/store.js"
import { daysUntil, parseCertificate } from "../certificates/x509.js"
import type { CommandRunner } from "../executors/command.js"
import { readLinkIfExists, readTextIfExists } from "../executors/files.js"
import { addedRules, firewallStatus, hasRule } from "../executors/firewall.js"
import { interfaceAddresses } from "../executors/network.js"
import { validateNginxConfig } from "../executors/nginx.js"
import { isUnitActive } from "../executors/service.js"
import { renderVhost, vhostPaths } from "../render/nginx.js"
import { UNITS } from "../render/systemd.js"
import { ufwRuleArgs } from "../render/ufw.js"
import { hasLan, hasWan } from "../topology/resolve.js"
import type {
  CertificateZone,
  CheckStatus,
  FirewallRuleSet,
  ProxyRoute,
  ReadinessReport,
  Topology,
  VerificationCheck,
  ZoneId,
} from "../types.js"

export interface VerificationDeps {
  runner: CommandRunner
  paths: HostPaths
  clock: () => Date
  log: Logger
}

export interface VerificationInput {
  topology: Topology
  zones: readonly CertificateZone[]
  routes: readonly ProxyRoute[]
  rules: readonly FirewallRuleSet[]
}

/**
 * fail beats warn beats pass
 */
export function aggregateStatus(checks: readonly VerificationCheck[]): CheckStatus {
  if (checks.some(c => c.status === "fail")) return "fail"
  if (checks.some(c => c.status === "warn")) return "warn"
  return "pass"
}

export function requiredZones(topology: Topology): ZoneId[] {
  return [...(hasLan(topology) ? (["LAN"] as const) : []), ...(hasWan(topology) ? (["WAN"] as const) : [])]
}

const pass = (check: Omit<VerificationCheck, "status" | "remediation">): VerificationCheck => ({
  ...check,
  status: "pass",
})

const fail = (check: Omit<VerificationCheck, "status">): VerificationCheck => ({ ...check, status: "fail" })

/**
 * Read-only probes of the running host. Never writes, never restarts.
 * Every check runs even when an earlier one failed.
 */
export class VerificationEngine {
  private readonly log: Logger

  constructor(private readonly deps: VerificationDeps) {
    this.log = deps.log.child("Verify")
  }

  async verify(input: VerificationInput): Promise<ReadinessReport> {
    const checks: VerificationCheck[] = [
      ...(await this.checkInterfaces(input.topology)),
      ...(await this.checkCertificates(input.topology, input.zones)),
      ...(await this.checkProxy(input.topology, input.routes)),
      ...(await this.checkFirewall(input.topology, input.rules)),
      ...(await this.checkServices(input.topology)),
    ]

    const report: ReadinessReport = {
      checkedAt: this.deps.clock().toISOString(),
      overall: aggregateStatus(checks),
      checks,
    }

    const failed = checks.filter(c => c.status !== "pass")
    for (const check of failed) {
      this.log.warn(`${check.id}: ${check.status} - ${check.message}`)
    }
    this.log.info(`Readiness ${report.overall} (${checks.length - failed.length}/${checks.length} checks passed)`)
    return report
  }

  // ===========================================================================
  // interface
  // ===========================================================================

  private async checkInterfaces(topology: Topology): Promise<VerificationCheck[]> {
    const checks: VerificationCheck[] = []

    if (hasLan(topology)) {
      const id = "interface:lan"
      const addresses = await interfaceAddresses(this.deps.runner, topology.lanInterface)
      if (addresses === null) {
        checks.push(
          fail({
            id,
            category: "interface",
            zoneId: "LAN",
            message: `Interface ${topology.lanInterface} not found`,
            remediation: `Set lanInterface to an existing interface (see \`ip -o link\`).`,
          }),
        )
      } else if (!addresses.includes(topology.lanServerIp)) {
        checks.push(
          fail({
            id,
            category: "interface",
            zoneId: "LAN",
            message: `${topology.lanInterface} does not carry ${topology.lanServerIp}`,
            remediation: `Assign ${topology.lanServerIp} to ${topology.lanInterface} in the host network configuration.`,
          }),
        )
      } else {
        checks.push(
          pass({
            id,
            category: "interface",
            zoneId: "LAN",
            message: `${topology.lanInterface} carries ${topology.lanServerIp}`,
          }),
        )
      }
    }

    if (hasWan(topology)) {
      const id = "interface:wan"
      const addresses = await interfaceAddresses(this.deps.runner, topology.wanInterface)
      checks.push(
        addresses === null
          ? fail({
              id,
              category: "interface",
              zoneId: "WAN",
              message: `Interface ${topology.wanInterface} not found`,
              remediation: "Set wanInterface to the internet-facing interface.",
            })
          : pass({ id, category: "interface", zoneId: "WAN", message: `${topology.wanInterface} is present` }),
      )
    }

    return checks
  }

  // ===========================================================================
  // certificate
  // ===========================================================================

  private async checkCertificate(zoneId: ZoneId, zone: CertificateZone | undefined): Promise<VerificationCheck> {
    const id = `certificate:${zoneId.toLowerCase()}`
    const base = { id, category: "certificate", zoneId } as const
    const reissue = "Run `hostkit deploy --phase Configuration` to provision it."

    if (!zone) {
      return fail({ ...base, message: `No ${zoneId} certificate was provisioned`, remediation: reissue })
    }

    const pair = await readCertificatePair(zone.certPath, zone.keyPath)
    if (!pair) {
      return fail({ ...base, message: `${zone.certPath} or its key is missing`, remediation: reissue })
    }

    let notAfter: Date
    let names: string[]
    try {
      const parsed = parseCertificate(pair.certPem)
      notAfter = parsed.notAfter
      names = parsed.subjectNames
    } catch (err) {
      return fail({ ...base, message: `${zone.certPath} is unreadable: ${describeError(err)}`, remediation: reissue })
    }

    const missing = zone.subjectNames.filter(name => !names.includes(name))
    if (missing.length > 0) {
      return fail({ ...base, message: `Certificate does not cover ${missing.join(", ")}`, remediation: reissue })
    }

    const days = daysUntil(notAfter, this.deps.clock())
    if (notAfter <= this.deps.clock()) {
      return fail({ ...base, message: `Certificate expired ${notAfter.toISOString()}`, remediation: reissue })
    }
    if (days < DEFAULTS.EXPIRY_WARNING_DAYS) {
      return {
        ...base,
        status: "warn",
        message: `Certificate expires in ${days} days`,
        remediation: "Run `hostkit renew` and check the renewal service logs.",
      }
    }
    return pass({ ...base, message: `Certificate valid for ${days} more days` })
  }

  private async checkCertificates(
    topology: Topology,
    zones: readonly CertificateZone[],
  ): Promise<VerificationCheck[]> {
    const checks: VerificationCheck[] = []
    for (const zoneId of requiredZones(topology)) {
      checks.push(await this.checkCertificate(zoneId, zones.find(z => z.zoneId === zoneId)))
    }
    return checks
  }

  // ===========================================================================
  // proxy
  // ===========================================================================

  private async checkVhost(zoneId: ZoneId, route: ProxyRoute | undefined): Promise<VerificationCheck> {
    const id = `proxy:${zoneId.toLowerCase()}`
    const base = { id, category: "proxy", zoneId } as const
    const reapply = "Run `hostkit deploy --phase Configuration` to rewrite the vhost."

    if (!route) {
      return fail({ ...base, message: `No ${zoneId} route (zone not provisioned)`, remediation: reapply })
    }

    const { available, enabled } = vhostPaths(this.deps.paths, zoneId)
    const content = await readTextIfExists(available)
    if (content === null) {
      return fail({ ...base, message: `${available} is missing`, remediation: reapply })
    }
    if (content !== renderVhost(route)) {
      return fail({ ...base, message: `${available} differs from the synthesized vhost`, remediation: reapply })
    }
    if ((await readLinkIfExists(enabled)) !== available) {
      return fail({ ...base, message: `${enabled} does not link to ${available}`, remediation: reapply })
    }
    return pass({ ...base, message: `Vhost for ${route.serverNames.join(", ")} is in place` })
  }

  private async checkProxy(topology: Topology, routes: readonly ProxyRoute[]): Promise<VerificationCheck[]> {
    const validation = await validateNginxConfig(this.deps.runner)
    const checks: VerificationCheck[] = [
      validation.isValid
        ? pass({ id: "proxy:config", category: "proxy", message: "nginx -t passed" })
        : fail({
            id: "proxy:config",
            category: "proxy",
            message: `nginx -t failed: ${validation.output.split("\n")[0] ?? ""}`,
            remediation: "Fix the reported nginx configuration error, then re-run `hostkit verify`.",
          }),
    ]

    for (const zoneId of requiredZones(topology)) {
      checks.push(
        await this.checkVhost(
          zoneId,
          routes.find(r => r.zoneId === zoneId),
        ),
      )
    }
    return checks
  }

  // ===========================================================================
  // firewall
  // ===========================================================================

  private async checkFirewall(topology: Topology, rules: readonly FirewallRuleSet[]): Promise<VerificationCheck[]> {
    const reapply = "Run `hostkit deploy --phase Configuration` to reapply the firewall."
    const status = await firewallStatus(this.deps.runner)
    const checks: VerificationCheck[] = [
      status.active
        ? pass({ id: "firewall:active", category: "firewall", message: "ufw is active" })
        : fail({ id: "firewall:active", category: "firewall", message: "ufw is inactive", remediation: reapply }),
    ]

    let added: string[] | null = null
    try {
      added = await addedRules(this.deps.runner)
    } catch (err) {
      this.log.warn("Could not list ufw rules", err)
    }

    for (const zoneId of requiredZones(topology)) {
      const base = { id: `firewall:${zoneId.toLowerCase()}`, category: "firewall", zoneId } as const
      const set = rules.find(r => r.zoneId === zoneId)
      if (!set) {
        checks.push(fail({ ...base, message: `No ${zoneId} rule set (zone not provisioned)`, remediation: reapply }))
        continue
      }
      if (added === null) {
        checks.push(fail({ ...base, message: "ufw show added failed", remediation: reapply }))
        continue
      }
      const present = added
      const allows = set.rules.filter(rule => rule.action === "allow")
      const missing = allows.filter(rule => !hasRule(present, ufwRuleArgs(rule)))
      checks.push(
        missing.length === 0
          ? pass({ ...base, message: `All ${allows.length} allow rules present` })
          : fail({
              ...base,
              message: `Missing rules: ${missing.map(rule => rule.comment).join(", ")}`,
              remediation: reapply,
            }),
      )
    }
    return checks
  }

  // ===========================================================================
  // service
  // ===========================================================================

  private async checkServices(topology: Topology): Promise<VerificationCheck[]> {
    const units = ["nginx", "fail2ban", UNITS.APP, UNITS.STREAM, ...(hasWan(topology) ? [UNITS.RENEWAL] : [])]
    const checks: VerificationCheck[] = []
    for (const unit of units) {
      const name = unit.replace(/\.service$/, "")
      const id = `service:${name}`
      checks.push(
        (await isUnitActive(this.deps.runner, unit))
          ? pass({ id, category: "service", message: `${name} is active` })
          : fail({
              id,
              category: "service",
              message: `${name} is not active`,
              remediation: `Inspect \`journalctl -u ${unit}\`, then run \`hostkit deploy --phase ServiceActivation\`.`,
            }),
      )
    }
    return checks
  }
}
