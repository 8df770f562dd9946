import type { CertificateZone, SynthesisResult, Topology } from "../types.js"
import { buildRuleSet } from "./firewall.js"
import { buildIntrusionPolicy, firewallLoggingFor } from "./intrusion.js"
import { assertSynthesisInvariants } from "./invariants.js"
import { buildRoutes } from "./routes.js"

export { buildRuleSet, evaluateRuleSet, LOOPBACK_INTERFACE, type Packet, ruleMatches, type Verdict } from "./firewall.js"
export {
  buildIntrusionPolicy,
  firewallLoggingFor,
  type JailCatalogue,
  loadJailCatalogue,
  POLICY_DEFAULTS,
} from "./intrusion.js"
export { assertSynthesisInvariants, findViolations } from "./invariants.js"
export { buildRoutes, UPSTREAMS } from "./routes.js"

export interface SynthesisOptions {
  acmeWebroot: string
}

/**
 * Routes, rule sets and intrusion policy from one topology and the zones
 * that were actually provisioned. Throws SynthesisInvariantViolation
 * before returning anything inconsistent.
 */
export function synthesize(
  topology: Topology,
  zones: readonly CertificateZone[],
  options: SynthesisOptions,
): SynthesisResult {
  const routes = buildRoutes(topology, zones, options)
  const rules = routes.map(route => buildRuleSet(topology, route))
  assertSynthesisInvariants(routes, rules, zones)

  return {
    routes,
    rules,
    intrusion: buildIntrusionPolicy(topology.monitoringLevel),
    firewallLogging: firewallLoggingFor(topology.monitoringLevel),
  }
}
