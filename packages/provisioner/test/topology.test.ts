import { describe, expect, it } from "vitest"
import { InvalidIntentError } from "../src/errors.js"
import { mergeIntent } from "../src/intent.js"
import { inCidr, parseCidr } from "../src/topology/cidr.js"
import { isValidDomain, parseIntent, resolveTopology } from "../src/topology/resolve.js"
import { planZones, wanSubjectNames } from "../src/topology/zones.js"

function issuesOf(fn: () => unknown): readonly string[] {
  try {
    fn()
  } catch (err) {
    if (err instanceof InvalidIntentError) return err.issues
    throw err
  }
  throw new Error("expected InvalidIntentError")
}

describe("resolveTopology", () => {
  it("fills LAN defaults", () => {
    expect(resolveTopology({ mode: "LAN" })).toEqual({
      mode: "LAN",
      lanSubnet: "192.168.10.0/24",
      lanServerIp: "192.168.10.1",
      lanInterface: "eth1",
      lanHostname: "webapp.local",
      lanCertStrategy: "LocalCA",
      monitoringLevel: "standard",
      sshAccess: "lan",
    })
  })

  it("fills WAN defaults and lowercases the domain", () => {
    expect(resolveTopology({ mode: "WAN", domain: "Example.COM" })).toEqual({
      mode: "WAN",
      wanInterface: "eth0",
      wanDomain: "example.com",
      wanAcmeEmail: "admin@example.com",
      acmeProvider: "LetsEncrypt",
      acmeClient: "acme.sh",
      monitoringLevel: "standard",
      sshAccess: "any",
    })
  })

  it("combines both sides for HYBRID", () => {
    const topology = resolveTopology({ mode: "HYBRID", domain: "app.example.org", lanSubnet: "10.0.5.0/24" })
    expect(topology.mode).toBe("HYBRID")
    expect(topology).toMatchObject({ lanServerIp: "10.0.5.1", wanDomain: "app.example.org", sshAccess: "lan" })
  })

  it("returns a frozen value", () => {
    expect(Object.isFrozen(resolveTopology({ mode: "LAN" }))).toBe(true)
  })

  it("requires a domain when WAN is present", () => {
    expect(issuesOf(() => resolveTopology({ mode: "HYBRID" }))).toEqual(["domain is required for HYBRID mode"])
  })

  it("rejects WAN fields in LAN mode", () => {
    expect(issuesOf(() => resolveTopology({ mode: "LAN", domain: "example.com", acmeClient: "certbot" }))).toEqual([
      "domain is only valid in WAN or HYBRID mode",
      "acmeClient is only valid in WAN or HYBRID mode",
    ])
  })

  it("rejects LAN fields and lan ssh in WAN mode", () => {
    expect(
      issuesOf(() => resolveTopology({ mode: "WAN", domain: "example.com", lanSubnet: "10.0.0.0/24", sshAccess: "lan" })),
    ).toEqual(["lanSubnet is only valid in LAN or HYBRID mode", "sshAccess lan requires a LAN zone"])
  })

  it("rejects a server address outside the subnet", () => {
    expect(issuesOf(() => resolveTopology({ mode: "LAN", lanServerIp: "10.1.1.1" }))).toEqual([
      "lanServerIp 10.1.1.1 is outside lanSubnet 192.168.10.0/24",
    ])
  })

  it("rejects network and broadcast addresses", () => {
    expect(issuesOf(() => resolveTopology({ mode: "LAN", lanServerIp: "192.168.10.255" }))).toEqual([
      "lanServerIp 192.168.10.255 is the network or broadcast address of 192.168.10.0/24",
    ])
  })

  it("rejects a subnet with host bits set", () => {
    expect(issuesOf(() => resolveTopology({ mode: "LAN", lanSubnet: "192.168.10.7/24" }))).toEqual([
      'lanSubnet "192.168.10.7/24" is not an IPv4 CIDR with zero host bits',
    ])
  })

  it("collects LAN and WAN problems together", () => {
    expect(issuesOf(() => resolveTopology({ mode: "HYBRID", lanSubnet: "nope", domain: "localhost" }))).toEqual([
      'lanSubnet "nope" is not an IPv4 CIDR with zero host bits',
      'domain "localhost" is not a valid DNS name',
    ])
  })
})

describe("parseIntent", () => {
  it("rejects unknown keys and bad enums", () => {
    const issues = issuesOf(() => parseIntent({ mode: "CLOUD", color: "blue" }))
    expect(issues).toHaveLength(2)
    expect(issues.some(issue => issue.startsWith("mode:"))).toBe(true)
  })
})

describe("mergeIntent", () => {
  it("lets flags override file fields", () => {
    expect(mergeIntent({ mode: "LAN", lanSubnet: "10.0.0.0/24" }, { lanIp: "10.0.0.9", monitoring: "full" })).toEqual({
      mode: "LAN",
      lanSubnet: "10.0.0.0/24",
      lanServerIp: "10.0.0.9",
      monitoringLevel: "full",
    })
  })

  it("returns null without a mode", () => {
    expect(mergeIntent(undefined, { domain: "example.com" })).toBeNull()
  })
})

describe("domains and CIDRs", () => {
  it.each([
    ["example.com", true],
    ["a.b.example.co", true],
    ["localhost", false],
    ["example.com.", false],
    ["-bad.example.com", false],
    ["example.123", false],
  ])("isValidDomain(%s) = %s", (domain, expected) => {
    expect(isValidDomain(domain)).toBe(expected)
  })

  it("parses CIDRs", () => {
    expect(parseCidr("10.0.0.0/8")).toEqual({ network: 167772160, prefix: 8 })
    expect(parseCidr("10.0.0.1/8")).toBeNull()
    expect(parseCidr("10.0.0.0/33")).toBeNull()
    expect(inCidr("192.168.10.77", "192.168.10.0/24")).toBe(true)
    expect(inCidr("192.168.11.1", "192.168.10.0/24")).toBe(false)
    expect(inCidr("8.8.8.8", "0.0.0.0/0")).toBe(true)
  })
})

describe("planZones", () => {
  it("plans LAN before WAN with their strategies", () => {
    const topology = resolveTopology({ mode: "HYBRID", domain: "example.com", lanCertStrategy: "SelfSigned" })
    const zones = planZones(topology, { certDir: "/certs" })

    expect(zones.map(z => z.zoneId)).toEqual(["LAN", "WAN"])
    expect(zones[0]).toEqual({
      zoneId: "LAN",
      strategy: { kind: "SelfSigned" },
      subjectNames: ["webapp.local", "192.168.10.1", "example.com", "localhost", "127.0.0.1", "::1"],
      certPath: "/certs/lan/live/cert.pem",
      keyPath: "/certs/lan/live/key.pem",
      renewalPolicy: { schedule: "manual", renewBeforeDays: 30 },
    })
    expect(zones[1]).toEqual({
      zoneId: "WAN",
      strategy: { kind: "ACME", provider: "LetsEncrypt", client: "acme.sh" },
      subjectNames: ["example.com", "www.example.com"],
      certPath: "/certs/wan/live/cert.pem",
      keyPath: "/certs/wan/live/key.pem",
      renewalPolicy: { schedule: "17 3 * * *", renewBeforeDays: 30 },
    })
  })

  it("does not add www to subdomains", () => {
    expect(wanSubjectNames("app.example.com")).toEqual(["app.example.com"])
  })

  it("drops duplicate subject names", () => {
    const topology = resolveTopology({ mode: "LAN", lanHostname: "localhost" })
    expect(planZones(topology, { certDir: "/certs" })[0]?.subjectNames).toEqual([
      "localhost",
      "192.168.10.1",
      "127.0.0.1",
      "::1",
    ])
  })
})
