import { ANY_CIDR } from "@hostkit/shared"
import type { FirewallRule, FirewallRuleSet, SynthesisResult } from "../types.js"

/**
 * ufw argument vector for one rule, in the form `ufw show added` prints it.
 * Rules open to any source on every interface take the short form
 * (`allow 443/tcp comment "wan proxy"`); the rest spell out
 * `allow in on eth1 from 192.168.10.0/24 to any port 8443 proto tcp comment "lan proxy"`.
 */
export function ufwRuleArgs(rule: FirewallRule): string[] {
  const action = rule.rateLimited ? "limit" : rule.action
  const comment = ["comment", rule.comment]
  if (!rule.interface && rule.sourceCidr === ANY_CIDR && rule.port !== null) {
    return [action, rule.protocol === "any" ? String(rule.port) : `${rule.port}/${rule.protocol}`, ...comment]
  }
  return [
    action,
    ...(rule.interface ? ["in", "on", rule.interface] : []),
    "from",
    rule.sourceCidr === ANY_CIDR ? "any" : rule.sourceCidr,
    "to",
    "any",
    ...(rule.port !== null ? ["port", String(rule.port)] : []),
    ...(rule.protocol !== "any" ? ["proto", rule.protocol] : []),
    ...comment,
  ]
}

function quoteShellArg(arg: string): string {
  return /^[A-Za-z0-9_./:,=@+-]+$/.test(arg) ? arg : `'${arg.replace(/'/g, `'\\''`)}'`
}

/**
 * Shell-quoted `ufw ...` line
 */
export function ufwCommandLine(args: readonly string[]): string {
  return ["ufw", ...args].map(quoteShellArg).join(" ")
}

/**
 * Rule arg vectors for all sets, in set order, without repeats.
 * HYBRID sets share the loopback and ssh rules.
 */
export function collectRuleArgs(sets: readonly FirewallRuleSet[]): string[][] {
  const seen = new Set<string>()
  const out: string[][] = []
  for (const set of sets) {
    for (const rule of set.rules) {
      const args = ufwRuleArgs(rule)
      const key = ufwCommandLine(args)
      if (!seen.has(key)) {
        seen.add(key)
        out.push(args)
      }
    }
  }
  return out
}

/**
 * Full ufw command sequence: reset, baseline, ordered rules, logging, enable.
 */
export function ufwApplyPlan(result: Pick<SynthesisResult, "rules" | "firewallLogging">): string[][] {
  return [
    ["--force", "reset"],
    ["default", "deny", "incoming"],
    ["default", "allow", "outgoing"],
    ...collectRuleArgs(result.rules),
    ["logging", result.firewallLogging],
    ["--force", "enable"],
  ]
}

export function renderFirewallRules(result: Pick<SynthesisResult, "rules" | "firewallLogging">): string {
  const zones = result.rules.map(set => set.zoneId).join(", ")
  const lines = [
    "# hostkit firewall rules",
    `# zones: ${zones || "(none)"}`,
    "# applied top to bottom; first match wins, unmatched incoming traffic is denied",
    ...ufwApplyPlan(result).map(ufwCommandLine),
  ]
  return `${lines.join("\n")}\n`
}
