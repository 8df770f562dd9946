import { ufwCommandLine } from "../render/ufw.js"
import { type CommandRunner, runChecked } from "./command.js"

export interface FirewallStatus {
  active: boolean
  output: string
}

/**
 * `ufw status`: first line reads "Status: active" or "Status: inactive"
 */
export async function firewallStatus(runner: CommandRunner): Promise<FirewallStatus> {
  const result = await runner.run("ufw", ["status"])
  return {
    active: result.exitCode === 0 && /^Status:\s+active\b/m.test(result.stdout),
    output: result.stdout,
  }
}

/**
 * Rules as `ufw show added` prints them, one `ufw ...` line each
 */
export async function addedRules(runner: CommandRunner): Promise<string[]> {
  const stdout = await runChecked(runner, "ufw", ["show", "added"])
  return stdout
    .split("\n")
    .map(line => line.trim())
    .filter(line => line.startsWith("ufw "))
}

/**
 * Run an apply plan in order. Stops at the first failing command.
 */
export async function applyFirewall(runner: CommandRunner, plan: readonly string[][]): Promise<void> {
  for (const args of plan) {
    await runChecked(runner, "ufw", args)
  }
}

/** Fields that identify a ufw rule, whichever form it is written in */
export interface UfwRuleFields {
  action: string
  direction: string
  interface: string
  from: string
  to: string
  port: string
  proto: string
  comment: string
}

const RULE_ACTIONS = new Set(["allow", "deny", "reject", "limit"])
const ANY_ADDRESSES = new Set(["any", "0.0.0.0/0", "::/0"])

/**
 * Split a shell-quoted line into words. Handles single and double quotes
 * and backslash escapes, enough for what `ufw show added` prints.
 */
export function splitShellWords(line: string): string[] {
  const words: string[] = []
  let current = ""
  let inWord = false
  let quote: string | null = null
  let escaped = false
  for (const ch of line) {
    if (escaped) {
      current += ch
      escaped = false
    } else if (quote) {
      if (ch === quote) quote = null
      else current += ch
    } else if (ch === "\\") {
      escaped = true
      inWord = true
    } else if (ch === "'" || ch === '"') {
      quote = ch
      inWord = true
    } else if (/\s/.test(ch)) {
      if (inWord) words.push(current)
      current = ""
      inWord = false
    } else {
      current += ch
      inWord = true
    }
  }
  if (inWord) words.push(current)
  return words
}

/**
 * Parse a `ufw <rule>` line in either the short (`allow 443/tcp`) or the
 * long (`allow in on eth1 from ... to any port 8443 proto tcp`) form.
 * Returns null for anything that is not a rule.
 */
export function parseUfwRule(line: string): UfwRuleFields | null {
  const [ufw, action, ...rest] = splitShellWords(line.trim())
  if (ufw !== "ufw" || action === undefined || !RULE_ACTIONS.has(action)) {
    return null
  }
  const fields: UfwRuleFields = {
    action,
    direction: "in",
    interface: "",
    from: "any",
    to: "any",
    port: "any",
    proto: "any",
    comment: "",
  }
  for (let i = 0; i < rest.length; i++) {
    const word = rest[i] ?? ""
    const value = rest[i + 1] ?? ""
    switch (word) {
      case "in":
      case "out":
        fields.direction = word
        break
      case "on":
        fields.interface = value
        i++
        break
      case "from":
        fields.from = ANY_ADDRESSES.has(value) ? "any" : value
        i++
        break
      case "to":
        fields.to = ANY_ADDRESSES.has(value) ? "any" : value
        i++
        break
      case "port":
        fields.port = value
        i++
        break
      case "proto":
        fields.proto = value
        i++
        break
      case "comment":
        fields.comment = value
        i++
        break
      default: {
        // short form: 443/tcp or 443
        const [port = "any", proto] = word.split("/")
        fields.port = port
        if (proto) fields.proto = proto
      }
    }
  }
  return fields
}

function sameRule(a: UfwRuleFields, b: UfwRuleFields): boolean {
  return (
    a.action === b.action &&
    a.direction === b.direction &&
    a.interface === b.interface &&
    a.from === b.from &&
    a.to === b.to &&
    a.port === b.port &&
    a.proto === b.proto &&
    a.comment === b.comment
  )
}

export function hasRule(added: readonly string[], ruleArgs: readonly string[]): boolean {
  const wanted = parseUfwRule(ufwCommandLine(ruleArgs))
  if (!wanted) return false
  return added.some(line => {
    const rule = parseUfwRule(line)
    return rule !== null && sameRule(rule, wanted)
  })
}

/**
 * True when some rule lets any source reach `port` on every interface
 */
export function admitsPort(added: readonly string[], port: number, protocol: "tcp" | "udp"): boolean {
  return added.some(line => {
    const rule = parseUfwRule(line)
    return (
      rule !== null &&
      (rule.action === "allow" || rule.action === "limit") &&
      rule.direction === "in" &&
      rule.interface === "" &&
      rule.from === "any" &&
      rule.port === String(port) &&
      (rule.proto === "any" || rule.proto === protocol)
    )
  })
}

export async function allowPort(runner: CommandRunner, port: number, comment: string): Promise<void> {
  await runChecked(runner, "ufw", ["allow", `${port}/tcp`, "comment", comment])
}

export async function deletePortAllow(runner: CommandRunner, port: number): Promise<void> {
  await runChecked(runner, "ufw", ["delete", "allow", `${port}/tcp`])
}
