import { ANY_CIDR, INTERNAL_PORTS, LOOPBACK_CIDR, PORTS } from "@hostkit/shared"
import { inCidr } from "../topology/cidr.js"
import { hasLan } from "../topology/resolve.js"
import type { FirewallProtocol, FirewallRule, FirewallRuleSet, ProxyRoute, Topology } from "../types.js"

export const LOOPBACK_INTERFACE = "lo"

function loopbackRules(): FirewallRule[] {
  return INTERNAL_PORTS.map(({ port, name }) => ({
    action: "allow",
    sourceCidr: LOOPBACK_CIDR,
    port,
    protocol: "tcp",
    comment: `loopback ${name}`,
    interface: LOOPBACK_INTERFACE,
  }))
}

function sshRule(topology: Topology): FirewallRule {
  if (topology.sshAccess === "lan" && hasLan(topology)) {
    return {
      action: "allow",
      sourceCidr: topology.lanSubnet,
      port: PORTS.SSH,
      protocol: "tcp",
      comment: "ssh from lan",
      interface: topology.lanInterface,
    }
  }
  return {
    action: "allow",
    sourceCidr: ANY_CIDR,
    port: PORTS.SSH,
    protocol: "tcp",
    comment: "ssh rate limited",
    rateLimited: true,
  }
}

function uniquePorts(route: ProxyRoute): number[] {
  return [...new Set(route.listenBindings.map(b => b.port))]
}

/**
 * Ordered rules for one route:
 *
 *   1. loopback allows for internal services
 *   2. ssh
 *   3. each allowed CIDR on each listen port
 *   4. LAN only: trailing deny on the LAN interface
 *
 * Everything not matched falls through to the default-deny baseline.
 */
export function buildRuleSet(topology: Topology, route: ProxyRoute): FirewallRuleSet {
  const rules: FirewallRule[] = [...loopbackRules(), sshRule(topology)]
  const zoneInterface = route.zoneId === "LAN" && hasLan(topology) ? topology.lanInterface : undefined
  const label = route.zoneId.toLowerCase()

  for (const cidr of route.allowedSourceCidrs) {
    for (const port of uniquePorts(route)) {
      const loopback = cidr === LOOPBACK_CIDR
      rules.push({
        action: "allow",
        sourceCidr: cidr,
        port,
        protocol: "tcp",
        comment: loopback ? `${label} proxy loopback` : `${label} proxy`,
        ...(loopback ? { interface: LOOPBACK_INTERFACE } : zoneInterface ? { interface: zoneInterface } : {}),
      })
    }
  }

  if (zoneInterface) {
    rules.push({
      action: "deny",
      sourceCidr: ANY_CIDR,
      port: null,
      protocol: "any",
      comment: `${label} deny rest`,
      interface: zoneInterface,
    })
  }

  return { zoneId: route.zoneId, defaultIncoming: "deny", rules }
}

// =============================================================================
// Evaluation
// =============================================================================

export interface Packet {
  sourceIp: string
  port: number
  protocol: Exclude<FirewallProtocol, "any">
  /** Ingress interface; rules scoped to another interface do not match */
  interface?: string
}

export interface Verdict {
  action: "allow" | "deny"
  /** Index of the matching rule, or null when the baseline decided */
  ruleIndex: number | null
}

export function ruleMatches(rule: FirewallRule, packet: Packet): boolean {
  if (rule.interface !== undefined && rule.interface !== packet.interface) return false
  if (rule.port !== null && rule.port !== packet.port) return false
  if (rule.protocol !== "any" && rule.protocol !== packet.protocol) return false
  return inCidr(packet.sourceIp, rule.sourceCidr)
}

/**
 * First match wins; no match means the default-deny baseline.
 */
export function evaluateRuleSet(set: FirewallRuleSet, packet: Packet): Verdict {
  const index = set.rules.findIndex(rule => ruleMatches(rule, packet))
  const rule = set.rules[index]
  if (!rule) {
    return { action: set.defaultIncoming, ruleIndex: null }
  }
  return { action: rule.action, ruleIndex: index }
}
