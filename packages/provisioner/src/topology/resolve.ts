import { DEFAULTS, formatZodIssues, type Intent, intentSchema } from "@hostkit/shared"
import { InvalidIntentError } from "../errors.js"
import type { HybridTopology, LanFields, LanTopology, Topology, WanFields, WanTopology } from "../types.js"
import { broadcastAddress, cidrContains, firstHost, formatIpv4, parseCidr, parseIpv4 } from "./cidr.js"

const LABEL = /^[a-z0-9]([a-z0-9-]{0,61}[a-z0-9])?$/

/**
 * Public DNS name: at least two labels, alphabetic TLD, no trailing dot.
 */
export function isValidDomain(value: string): boolean {
  if (value.length > 253) return false
  const labels = value.toLowerCase().split(".")
  const tld = labels[labels.length - 1] ?? ""
  return labels.length >= 2 && labels.every(l => LABEL.test(l)) && /^[a-z]{2,63}$/.test(tld)
}

function isValidHostname(value: string): boolean {
  return value.length <= 253 && value.toLowerCase().split(".").every(l => LABEL.test(l))
}

const WAN_ONLY_FIELDS = ["domain", "wanInterface", "acmeProvider", "acmeClient", "acmeEmail", "acmeEab"] as const
const LAN_ONLY_FIELDS = ["lanSubnet", "lanServerIp", "lanInterface", "lanHostname", "lanCertStrategy"] as const

export function hasLan(topology: Topology): topology is LanTopology | HybridTopology {
  return topology.mode !== "WAN"
}

export function hasWan(topology: Topology): topology is WanTopology | HybridTopology {
  return topology.mode !== "LAN"
}

/**
 * Validate untyped input (config file section, CLI flags) into an Intent.
 */
export function parseIntent(raw: unknown): Intent {
  const result = intentSchema.safeParse(raw)
  if (!result.success) {
    throw new InvalidIntentError(formatZodIssues(result.error))
  }
  return result.data
}

function resolveLan(intent: Intent, issues: string[]): LanFields | null {
  const subnetText = intent.lanSubnet ?? DEFAULTS.LAN_SUBNET
  const subnet = parseCidr(subnetText)
  if (!subnet) {
    issues.push(`lanSubnet "${subnetText}" is not an IPv4 CIDR with zero host bits`)
    return null
  }

  const serverIp = intent.lanServerIp ?? formatIpv4(firstHost(subnet))
  const address = parseIpv4(serverIp)
  if (address === null) {
    issues.push(`lanServerIp "${serverIp}" is not an IPv4 address`)
    return null
  }
  if (!cidrContains(subnet, address)) {
    issues.push(`lanServerIp ${serverIp} is outside lanSubnet ${subnetText}`)
    return null
  }
  if (subnet.prefix < 31 && (address === subnet.network || address === broadcastAddress(subnet))) {
    issues.push(`lanServerIp ${serverIp} is the network or broadcast address of ${subnetText}`)
    return null
  }

  const hostname = (intent.lanHostname ?? DEFAULTS.LAN_HOSTNAME).toLowerCase()
  if (!isValidHostname(hostname)) {
    issues.push(`lanHostname "${hostname}" is not a valid hostname`)
    return null
  }

  return {
    lanSubnet: subnetText,
    lanServerIp: serverIp,
    lanInterface: intent.lanInterface ?? DEFAULTS.LAN_INTERFACE,
    lanHostname: hostname,
    lanCertStrategy: intent.lanCertStrategy ?? DEFAULTS.LAN_CERT_STRATEGY,
  }
}

function resolveWan(intent: Intent, issues: string[]): WanFields | null {
  if (!intent.domain) {
    issues.push(`domain is required for ${intent.mode} mode`)
    return null
  }
  const domain = intent.domain.toLowerCase()
  if (!isValidDomain(domain)) {
    issues.push(`domain "${intent.domain}" is not a valid DNS name`)
    return null
  }
  return {
    wanInterface: intent.wanInterface ?? DEFAULTS.WAN_INTERFACE,
    wanDomain: domain,
    wanAcmeEmail: intent.acmeEmail ?? `admin@${domain}`,
    acmeProvider: intent.acmeProvider ?? DEFAULTS.ACME_PROVIDER,
    acmeClient: intent.acmeClient ?? DEFAULTS.ACME_CLIENT,
    ...(intent.acmeEab ? { acmeEab: { ...intent.acmeEab } } : {}),
  }
}

/**
 * Resolve operator intent into an immutable Topology.
 *
 * Pure: reads nothing but its argument. Every validation problem is
 * collected and thrown together as an InvalidIntentError.
 *
 * Defaults: lanSubnet 192.168.10.0/24, lanServerIp = first host of the
 * subnet, lanInterface eth1, wanInterface eth0, lanHostname webapp.local,
 * lanCertStrategy LocalCA, acmeProvider LetsEncrypt, acmeClient acme.sh,
 * acmeEmail admin@<domain>, monitoringLevel standard, sshAccess lan when
 * a LAN zone exists (any otherwise).
 */
export function resolveTopology(intent: Intent): Topology {
  const issues: string[] = []
  const wantsLan = intent.mode !== "WAN"
  const wantsWan = intent.mode !== "LAN"

  if (!wantsWan) {
    for (const field of WAN_ONLY_FIELDS) {
      if (intent[field] !== undefined) issues.push(`${field} is only valid in WAN or HYBRID mode`)
    }
  }
  if (!wantsLan) {
    for (const field of LAN_ONLY_FIELDS) {
      if (intent[field] !== undefined) issues.push(`${field} is only valid in LAN or HYBRID mode`)
    }
    if (intent.sshAccess === "lan") issues.push("sshAccess lan requires a LAN zone")
  }

  const lan = wantsLan ? resolveLan(intent, issues) : null
  const wan = wantsWan ? resolveWan(intent, issues) : null

  if (issues.length > 0) {
    throw new InvalidIntentError(issues)
  }

  const monitoringLevel = intent.monitoringLevel ?? DEFAULTS.MONITORING_LEVEL
  const sshAccess = intent.sshAccess ?? (wantsLan ? "lan" : "any")

  let topology: Topology
  if (lan && wan) {
    topology = { mode: "HYBRID", ...lan, ...wan, monitoringLevel, sshAccess }
  } else if (lan) {
    topology = { mode: "LAN", ...lan, monitoringLevel, sshAccess }
  } else if (wan) {
    topology = { mode: "WAN", ...wan, monitoringLevel, sshAccess }
  } else {
    throw new InvalidIntentError([`mode ${intent.mode} resolved no zones`])
  }
  return Object.freeze(topology)
}
