import { mkdtemp, rm } from "node:fs/promises"
import { tmpdir } from "node:os"
import { join } from "node:path"
import { type HostPaths, rootedPaths } from "@hostkit/shared"
import { createLogger, type LogEntry, type Logger } from "@hostkit/logger"
import type { AcmeClient, AcmeRequest } from "../../src/certificates/acme.js"
import {
  type CertificatePair,
  createCertificateAuthority,
  issueFromAuthority,
} from "../../src/certificates/x509.js"
import type { CommandResult, CommandRunner } from "../../src/executors/command.js"
import type { DnsResolver } from "../../src/executors/dns.js"

export const NOW = new Date("2026-03-01T12:00:00.000Z")

export const fixedClock = (at: Date = NOW) => () => at

const ok = (stdout = ""): CommandResult => ({ exitCode: 0, stdout, stderr: "" })
const fail = (exitCode: number, stderr = ""): CommandResult => ({ exitCode, stdout: "", stderr })

/** Commands that change host state; an idempotent re-run issues none of them */
const MUTATING_SYSTEMCTL = new Set(["start", "restart", "reload", "enable", "daemon-reload"])
const READONLY_UFW = new Set(["status", "show"])

export interface FakeHostOptions {
  /** interface name → IPv4 addresses */
  interfaces?: Record<string, string[]>
  missingCommands?: string[]
  nginxValid?: boolean
  /** Units that refuse to come up after start */
  brokenUnits?: string[]
}

/**
 * In-process stand-in for the handful of system tools the pipeline drives:
 * systemctl, ufw, nginx, ip and which.
 */
export class FakeHost implements CommandRunner {
  readonly calls: string[] = []
  readonly active = new Set<string>()
  readonly enabled = new Set<string>()
  ufwActive = false
  ufwRules: string[] = []
  nginxValid: boolean
  interfaces: Record<string, string[]>
  private readonly missing: Set<string>
  private readonly broken: Set<string>

  constructor(options: FakeHostOptions = {}) {
    this.interfaces = options.interfaces ?? { eth0: ["203.0.113.10"], eth1: ["192.168.10.1"] }
    this.missing = new Set(options.missingCommands ?? [])
    this.nginxValid = options.nginxValid ?? true
    this.broken = new Set(options.brokenUnits ?? [])
  }

  async run(command: string, args: readonly string[]): Promise<CommandResult> {
    this.calls.push([command, ...args].join(" "))
    switch (command) {
      case "which":
        return this.missing.has(args[0] ?? "") ? fail(1) : ok(`/usr/bin/${args[0]}`)
      case "ip":
        return this.ip(args)
      case "systemctl":
        return this.systemctl(args)
      case "ufw":
        return this.ufw(args)
      case "nginx":
        return this.nginxValid
          ? { exitCode: 0, stdout: "", stderr: "nginx: configuration file /etc/nginx/nginx.conf test is successful" }
          : fail(1, 'nginx: [emerg] unknown directive "bogus" in /etc/nginx/sites-enabled/hostkit-lan.conf:3')
      default:
        return ok()
    }
  }

  /** Calls that changed something on the host */
  mutatingCalls(): string[] {
    return this.calls.filter(call => {
      const [command, verb] = call.split(" ")
      if (command === "systemctl") return MUTATING_SYSTEMCTL.has(verb ?? "")
      if (command === "ufw") return !READONLY_UFW.has(verb ?? "")
      return false
    })
  }

  private ip(args: readonly string[]): CommandResult {
    const name = args[args.length - 1] ?? ""
    const addresses = this.interfaces[name]
    if (!addresses) {
      return fail(1, `Device "${name}" does not exist.`)
    }
    return ok(addresses.map((a, i) => `${i + 2}: ${name}    inet ${a}/24 brd 0.0.0.0 scope global ${name}`).join("\n"))
  }

  private systemctl(args: readonly string[]): CommandResult {
    const [verb, ...rest] = args
    const unit = rest[rest.length - 1] ?? ""
    switch (verb) {
      case "is-active":
        return this.active.has(unit) ? ok() : fail(3)
      case "is-enabled":
        return this.enabled.has(unit) ? ok() : fail(1)
      case "enable":
        this.enabled.add(unit)
        return ok()
      case "start":
      case "restart":
      case "reload":
        if (!this.broken.has(unit)) this.active.add(unit)
        return ok()
      default:
        return ok()
    }
  }

  private ufw(args: readonly string[]): CommandResult {
    const line = args.join(" ")
    if (line === "status") {
      return ok(this.ufwActive ? "Status: active" : "Status: inactive")
    }
    if (line === "show added") {
      return ok(["Added user rules (see 'ufw status' for running firewall):", ...this.ufwRules].join("\n"))
    }
    if (line === "--force reset") {
      this.ufwRules = []
      this.ufwActive = false
    } else if (line === "--force enable") {
      this.ufwActive = true
    } else if (args[0] === "delete") {
      const target = listedRule(args.slice(1))
      this.ufwRules = this.ufwRules.filter(rule => rule !== target && !rule.startsWith(`${target} comment `))
    } else if (args[0] === "allow" || args[0] === "deny" || args[0] === "limit") {
      this.ufwRules.push(listedRule(args))
    }
    return ok()
  }
}

/**
 * A rule the way `ufw show added` lists it: the short `443/tcp` form when
 * it applies to any source on every interface, comments always quoted.
 */
function listedRule(args: readonly string[]): string {
  const [action = "", ...rest] = args
  const field = (name: string): string | undefined => {
    const index = rest.indexOf(name)
    return index === -1 ? undefined : rest[index + 1]
  }
  const comment = field("comment")
  const suffix = comment === undefined ? "" : ` comment '${comment}'`
  const iface = field("on")
  const from = field("from") ?? "any"
  const port = field("port")
  const proto = field("proto")

  if (!rest.includes("from")) {
    return `ufw ${action} ${rest[0] ?? ""}${suffix}`
  }
  if (!iface && from === "any" && port !== undefined) {
    return `ufw ${action} ${port}${proto ? `/${proto}` : ""}${suffix}`
  }
  const long = [
    "ufw",
    action,
    ...(iface ? ["in", "on", iface] : []),
    "from",
    from,
    "to",
    field("to") ?? "any",
    ...(port ? ["port", port] : []),
    ...(proto ? ["proto", proto] : []),
  ]
  return `${long.join(" ")}${suffix}`
}

// =============================================================================
// ACME / DNS
// =============================================================================

let testAuthority: CertificatePair | undefined

function authority(): CertificatePair {
  testAuthority ??= createCertificateAuthority({ commonName: "Test ACME Issuer", validityYears: 5, now: NOW })
  return testAuthority
}

/**
 * ACME client that signs with a throwaway issuer instead of talking to a CA.
 */
export class FakeAcmeClient implements AcmeClient {
  readonly name = "acme.sh" as const
  readonly requests: AcmeRequest[] = []
  failures: Error[] = []
  /** Runs where the CA would start validating */
  onIssue?: (request: AcmeRequest) => void | Promise<void>

  constructor(private readonly now: Date = NOW) {}

  async issue(request: AcmeRequest): Promise<CertificatePair> {
    this.requests.push(request)
    await this.onIssue?.(request)
    const failure = this.failures.shift()
    if (failure) throw failure
    return issueFromAuthority(authority(), { subjectNames: request.domains, validityDays: 90, now: this.now })
  }
}

export function fakeResolver(records: Record<string, string[]>): DnsResolver {
  return async hostname => {
    const addresses = records[hostname]
    if (!addresses) {
      throw Object.assign(new Error(`queryA ENOTFOUND ${hostname}`), { code: "ENOTFOUND" })
    }
    return addresses
  }
}

// =============================================================================
// Filesystem / logging
// =============================================================================

export interface Sandbox {
  root: string
  paths: HostPaths
  cleanup(): Promise<void>
}

export async function createSandbox(): Promise<Sandbox> {
  const root = await mkdtemp(join(tmpdir(), "hostkit-test-"))
  return { root, paths: rootedPaths(root), cleanup: () => rm(root, { recursive: true, force: true }) }
}

export function memoryLogger(): { log: Logger; entries: LogEntry[] } {
  const entries: LogEntry[] = []
  return { log: createLogger({ sinks: [entry => entries.push(entry)], clock: fixedClock() }), entries }
}
