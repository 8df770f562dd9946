import { afterEach, beforeEach, describe, expect, it } from "vitest"
import { StateStore } from "../src/orchestrator/state-store.js"
import { type RenewalDeps, renewDueCertificates, startRenewalScheduler } from "../src/renewal.js"
import { resolveTopology } from "../src/topology/resolve.js"
import { deploy } from "./support/deploy.js"
import {
  createSandbox,
  FakeAcmeClient,
  FakeHost,
  fakeResolver,
  fixedClock,
  memoryLogger,
  NOW,
  type Sandbox,
} from "./support/fake-host.js"

const DAY = 24 * 60 * 60 * 1000
const IN_WINDOW = new Date(NOW.getTime() + 70 * DAY)

describe("certificate renewal", () => {
  let sandbox: Sandbox
  let host: FakeHost

  beforeEach(async () => {
    sandbox = await createSandbox()
    host = new FakeHost()
  })

  afterEach(async () => {
    await sandbox.cleanup()
  })

  function renewalDeps(at: Date, records: Record<string, string[]> = { "example.com": ["203.0.113.10"] }) {
    const { log, entries } = memoryLogger()
    const deps: RenewalDeps = {
      paths: sandbox.paths,
      runner: host,
      resolver: fakeResolver(records),
      store: new StateStore(sandbox.paths.stateDir),
      clock: fixedClock(at),
      log,
      serviceWait: { timeoutMs: 0, pollMs: 0 },
      acmeRetryDelayMs: 0,
      acmeClients: { "acme.sh": new FakeAcmeClient(at) },
    }
    return { deps, entries }
  }

  it("does nothing before the first deploy", async () => {
    const { deps, entries } = renewalDeps(NOW)

    expect(await renewDueCertificates(deps)).toEqual({ renewed: [], unchanged: [], failed: [], reloaded: false })
    expect(entries.map(e => e.message)).toEqual(["No deployed topology in state; run `hostkit deploy` first"])
  })

  it("leaves certificates outside the renewal window alone", async () => {
    await deploy(sandbox, host, resolveTopology({ mode: "HYBRID", domain: "example.com" }))
    host.calls.length = 0

    const result = await renewDueCertificates(renewalDeps(NOW).deps)

    expect(result).toEqual({ renewed: [], unchanged: ["WAN"], failed: [], reloaded: false })
    expect(host.mutatingCalls()).toEqual([])
  })

  it("renews a due WAN certificate and reloads nginx", async () => {
    await deploy(sandbox, host, resolveTopology({ mode: "WAN", domain: "example.com" }))
    host.calls.length = 0

    const result = await renewDueCertificates(renewalDeps(IN_WINDOW).deps)

    expect(result).toEqual({ renewed: ["WAN"], unchanged: [], failed: [], reloaded: true })
    expect(host.mutatingCalls()).toEqual(["systemctl reload nginx"])
    const state = await new StateStore(sandbox.paths.stateDir).load()
    expect(state.zones[0]?.issued?.notAfter).toBe(new Date(IN_WINDOW.getTime() + 90 * DAY).toISOString())
  })

  it("reports a failed renewal and keeps the recorded zone", async () => {
    const { state: before } = await deploy(sandbox, host, resolveTopology({ mode: "WAN", domain: "example.com" }))

    const result = await renewDueCertificates(renewalDeps(IN_WINDOW, {}).deps)

    expect(result.renewed).toEqual([])
    expect(result.reloaded).toBe(false)
    expect(result.failed).toEqual([
      {
        zoneId: "WAN",
        error: {
          code: "VALIDATION_UNREACHABLE",
          message: "Domain example.com does not resolve",
          remediation: "Create an A record for example.com pointing at this host's public address.",
        },
      },
    ])
    expect((await new StateStore(sandbox.paths.stateDir).load()).zones).toEqual(before.zones)
  })

  it("merges into state written while the renewal was in flight", async () => {
    const { store } = await deploy(sandbox, host, resolveTopology({ mode: "HYBRID", domain: "example.com" }))
    const acme = new FakeAcmeClient(IN_WINDOW)
    acme.onIssue = async () => {
      await store.update(state => ({
        ...state,
        zones: state.zones.map(zone =>
          zone.zoneId === "LAN" ? { ...zone, subjectNames: [...zone.subjectNames, "pipeline.local"] } : zone,
        ),
      }))
    }

    const result = await renewDueCertificates({ ...renewalDeps(IN_WINDOW).deps, acmeClients: { "acme.sh": acme } })

    expect(result.renewed).toEqual(["WAN"])
    const state = await store.load()
    expect(state.zones.find(z => z.zoneId === "LAN")?.subjectNames.at(-1)).toBe("pipeline.local")
    expect(state.zones.find(z => z.zoneId === "WAN")?.issued?.notAfter).toBe(
      new Date(IN_WINDOW.getTime() + 90 * DAY).toISOString(),
    )
  })

  it("schedules runs on the renewal cron", () => {
    const { deps, entries } = renewalDeps(NOW)

    const job = startRenewalScheduler("17 3 * * *", deps)
    try {
      const next = job.nextRun()
      expect(next?.getMinutes()).toBe(17)
      expect(next?.getHours()).toBe(3)
      expect(entries.at(-1)?.message).toMatch(/^Renewal scheduled \(17 3 \* \* \*\), next run /)
    } finally {
      job.stop()
    }
  })
})
