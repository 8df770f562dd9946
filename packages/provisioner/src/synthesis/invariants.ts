import { ADMINISTRATIVE_PORTS } from "@hostkit/shared"
import { SynthesisInvariantViolation } from "../errors.js"
import type { CertificateZone, FirewallRuleSet, ProxyRoute } from "../types.js"

/**
 * Cross-check routes and rules before anything is written.
 *
 * @returns every violation found; empty when consistent
 */
export function findViolations(
  routes: readonly ProxyRoute[],
  ruleSets: readonly FirewallRuleSet[],
  zones: readonly CertificateZone[],
): string[] {
  const violations: string[] = []

  for (const route of routes) {
    const ref = route.tlsCertRef
    const zone = zones.find(z => z.zoneId === route.zoneId)
    if (ref.zoneId !== route.zoneId) {
      violations.push(`${route.zoneId} route references the ${ref.zoneId} certificate`)
    } else if (!zone) {
      violations.push(`${route.zoneId} route has no provisioned certificate zone`)
    } else if (zone.certPath !== ref.certPath || zone.keyPath !== ref.keyPath) {
      violations.push(`${route.zoneId} route certificate paths differ from the zone's`)
    }
    if (route.zoneId === "WAN" && !route.rateLimit) {
      violations.push("WAN route has no rate limit")
    }
  }

  for (const set of ruleSets) {
    const route = routes.find(r => r.zoneId === set.zoneId)
    if (!route) {
      violations.push(`${set.zoneId} rule set has no matching route`)
      continue
    }
    const listenPorts = new Set(route.listenBindings.map(b => b.port))

    set.rules.forEach((rule, index) => {
      if (rule.action !== "allow") return
      if (rule.port === null) {
        violations.push(`${set.zoneId} rule #${index + 1} (${rule.comment}) allows every port`)
      } else if (!listenPorts.has(rule.port) && !ADMINISTRATIVE_PORTS.includes(rule.port)) {
        violations.push(
          `${set.zoneId} rule #${index + 1} (${rule.comment}) opens port ${rule.port} with no route or administrative use`,
        )
      }
    })
  }

  return violations
}

export function assertSynthesisInvariants(
  routes: readonly ProxyRoute[],
  ruleSets: readonly FirewallRuleSet[],
  zones: readonly CertificateZone[],
): void {
  const violations = findViolations(routes, ruleSets, zones)
  if (violations.length > 0) {
    throw new SynthesisInvariantViolation(violations)
  }
}
