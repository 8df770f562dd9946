import { describe, expect, it } from "vitest"
import { admitsPort, hasRule, parseUfwRule, splitShellWords } from "../src/executors/firewall.js"
import { ufwRuleArgs } from "../src/render/ufw.js"

// As `ufw show added` prints them
const LISTED = [
  "ufw allow 443/tcp comment 'wan proxy'",
  "ufw limit 22/tcp comment 'ssh rate limited'",
  "ufw allow in on eth1 from 192.168.10.0/24 to any port 8443 proto tcp comment 'lan proxy'",
  "ufw deny in on eth1 from any to any comment 'lan deny rest'",
]

describe("splitShellWords", () => {
  it("unquotes single-quoted and escaped words", () => {
    expect(splitShellWords(`ufw allow 22/tcp comment 'it'\\''s ssh'`)).toEqual([
      "ufw",
      "allow",
      "22/tcp",
      "comment",
      "it's ssh",
    ])
  })
})

describe("parseUfwRule", () => {
  it("reads the short form", () => {
    expect(parseUfwRule("ufw allow 443/tcp comment 'wan proxy'")).toEqual({
      action: "allow",
      direction: "in",
      interface: "",
      from: "any",
      to: "any",
      port: "443",
      proto: "tcp",
      comment: "wan proxy",
    })
  })

  it("reads the long form", () => {
    expect(parseUfwRule(LISTED[2] ?? "")).toEqual({
      action: "allow",
      direction: "in",
      interface: "eth1",
      from: "192.168.10.0/24",
      to: "any",
      port: "8443",
      proto: "tcp",
      comment: "lan proxy",
    })
  })

  it("skips lines that are not rules", () => {
    expect(parseUfwRule("Added user rules (see 'ufw status' for running firewall):")).toBeNull()
    expect(parseUfwRule("ufw default deny incoming")).toBeNull()
  })
})

describe("hasRule", () => {
  it("matches a rule whichever form it was listed in", () => {
    const longForm = "allow in from any to 0.0.0.0/0 port 443 proto tcp comment".split(" ")
    expect(hasRule(LISTED, [...longForm, "wan proxy"])).toBe(true)
    expect(
      hasRule(
        LISTED,
        ufwRuleArgs({
          action: "allow",
          sourceCidr: "0.0.0.0/0",
          port: 22,
          protocol: "tcp",
          comment: "ssh rate limited",
          rateLimited: true,
        }),
      ),
    ).toBe(true)
  })

  it("tells rules on another interface apart", () => {
    expect(
      hasRule(
        LISTED,
        ufwRuleArgs({
          action: "allow",
          sourceCidr: "192.168.10.0/24",
          port: 8443,
          protocol: "tcp",
          comment: "lan proxy",
          interface: "eth0",
        }),
      ),
    ).toBe(false)
  })
})

describe("admitsPort", () => {
  it("only counts rules open to any source on every interface", () => {
    expect(admitsPort(LISTED, 443, "tcp")).toBe(true)
    expect(admitsPort(LISTED, 80, "tcp")).toBe(false)
    expect(admitsPort(LISTED, 8443, "tcp")).toBe(false)
  })
})
