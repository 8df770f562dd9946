import { type AppConfig, type HostPaths, PORTS, type RenewalConfig } from "@hostkit/shared"
import type { Logger } from "@hostkit/logger"
import type { CertificateProvisioner } from "../certificates/provisioner.js"
import { CommandError, HostkitError, PhaseExecutionError } from "../errors.js"
import { type CommandRunner, findMissingCommands } from "../executors/command.js"
import { ensureDir, ensureSymlink, readTextIfExists, removeIfPresent, writeIfDifferent } from "../executors/files.js"
import {
  addedRules,
  admitsPort,
  allowPort,
  applyFirewall,
  deletePortAllow,
  firewallStatus,
} from "../executors/firewall.js"
import { interfaceAddresses } from "../executors/network.js"
import { validateNginxConfig } from "../executors/nginx.js"
import { daemonReload, enableUnit, ensureUnitRunning, type WaitOptions } from "../executors/service.js"
import { type Artifact, renderArtifacts } from "../render/index.js"
import { renderChallengeVhost, vhostPaths } from "../render/nginx.js"
import { buildUnits } from "../render/systemd.js"
import { ufwApplyPlan } from "../render/ufw.js"
import { synthesize } from "../synthesis/index.js"
import { hasLan, hasWan } from "../topology/resolve.js"
import { planZones } from "../topology/zones.js"
import type {
  CertificateZone,
  PhaseName,
  ReadinessReport,
  SynthesisResult,
  Topology,
  ZoneId,
  ZoneOutcome,
} from "../types.js"
import type { VerificationEngine } from "../verification/engine.js"
import type { PendingActivation, StateStore } from "./state-store.js"

export interface PhaseContext {
  topology: Topology
  paths: HostPaths
  app: AppConfig
  renewal: RenewalConfig
  runner: CommandRunner
  store: StateStore
  provisioner: CertificateProvisioner
  verifier: VerificationEngine
  log: Logger
  serviceWait: WaitOptions
  /** Filled in by phases as the run progresses */
  results: {
    zoneOutcomes: ZoneOutcome[]
    report?: ReadinessReport
  }
}

export type PhaseHandler = (ctx: PhaseContext) => Promise<void>

const ZONE_IDS: readonly ZoneId[] = ["LAN", "WAN"]

/**
 * Run a step, turning anything it throws into PhaseExecutionError unless
 * it already carries a hostkit code.
 */
async function step<T>(phase: PhaseName, name: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn()
  } catch (err) {
    if (err instanceof HostkitError && !(err instanceof CommandError)) throw err
    const message = err instanceof Error ? err.message : String(err)
    throw new PhaseExecutionError(phase, name, message, { cause: err })
  }
}

// =============================================================================
// Prerequisites
// =============================================================================

export function requiredCommands(topology: Topology): string[] {
  return ["nginx", "ufw", "fail2ban-client", "systemctl", "ip", ...(hasWan(topology) ? [topology.acmeClient] : [])]
}

export const runPrerequisites: PhaseHandler = async ctx => {
  const { topology, runner, paths } = ctx

  const missing = await findMissingCommands(runner, requiredCommands(topology))
  if (missing.length > 0) {
    throw new PhaseExecutionError("Prerequisites", "commands", `Required commands not found: ${missing.join(", ")}`, {
      remediation: `Install ${missing.join(" ")} before deploying.`,
    })
  }

  if (hasLan(topology)) {
    const addresses = await interfaceAddresses(runner, topology.lanInterface)
    if (addresses === null) {
      throw new PhaseExecutionError("Prerequisites", "interfaces", `LAN interface ${topology.lanInterface} not found`, {
        remediation: "Set lanInterface to an existing interface.",
      })
    }
    if (!addresses.includes(topology.lanServerIp)) {
      throw new PhaseExecutionError(
        "Prerequisites",
        "interfaces",
        `${topology.lanInterface} does not carry ${topology.lanServerIp} (has ${addresses.join(", ") || "none"})`,
        { remediation: `Assign ${topology.lanServerIp} to ${topology.lanInterface} or change lanServerIp.` },
      )
    }
  }

  if (hasWan(topology) && (await interfaceAddresses(runner, topology.wanInterface)) === null) {
    throw new PhaseExecutionError("Prerequisites", "interfaces", `WAN interface ${topology.wanInterface} not found`, {
      remediation: "Set wanInterface to the internet-facing interface.",
    })
  }

  await step("Prerequisites", "directories", async () => {
    await ensureDir(paths.stateDir, 0o700)
    await ensureDir(paths.logDir, 0o750)
    await ensureDir(paths.certDir, 0o750)
    if (hasWan(topology)) {
      await ensureDir(paths.acmeWebroot)
    }
  })

  await ctx.store.update(state => ({ ...state, topology }))
  ctx.log.info(`Prerequisites satisfied for ${topology.mode} topology`)
}

// =============================================================================
// Configuration
// =============================================================================

/** What Configuration put in place only to get WAN certificates issued */
interface ChallengeState {
  /** Zones whose challenge-only vhost was written by this run */
  vhosts: ZoneId[]
  /** A temporary `allow 80/tcp` was added to an active firewall */
  portOpened: boolean
}

const CHALLENGE_RULE_COMMENT = "acme challenge"

/**
 * HTTP-01 needs port 80 reachable. An active firewall from an earlier run
 * without WAN rules gets a temporary allow until the rule set is reapplied.
 */
async function admitChallengePort(ctx: PhaseContext, challenge: ChallengeState): Promise<void> {
  if (challenge.portOpened || !(await firewallStatus(ctx.runner)).active) {
    return
  }
  if (admitsPort(await addedRules(ctx.runner), PORTS.HTTP, "tcp")) {
    return
  }
  await allowPort(ctx.runner, PORTS.HTTP, CHALLENGE_RULE_COMMENT)
  challenge.portOpened = true
  ctx.log.info(`Opened ${PORTS.HTTP}/tcp for ACME validation`)
}

/**
 * Serve HTTP-01 challenges before the first WAN certificate exists.
 * A vhost from an earlier run already carries the challenge location.
 */
async function prepareChallenge(ctx: PhaseContext, zone: CertificateZone, challenge: ChallengeState): Promise<void> {
  await admitChallengePort(ctx, challenge)

  const { available, enabled } = vhostPaths(ctx.paths, zone.zoneId)
  if ((await readTextIfExists(available)) !== null) {
    return
  }
  await writeIfDifferent(available, renderChallengeVhost(zone.subjectNames, ctx.paths.acmeWebroot, PORTS.HTTP))
  await ensureSymlink(available, enabled)
  challenge.vhosts.push(zone.zoneId)

  const validation = await validateNginxConfig(ctx.runner)
  if (!validation.isValid) {
    throw new PhaseExecutionError("Configuration", "challenge", `nginx -t failed: ${validation.output}`)
  }
  await ensureUnitRunning(ctx.runner, "nginx", { changed: true, reloadOnChange: true, ...ctx.serviceWait })
  ctx.log.info(`Serving ACME challenges for ${zone.subjectNames.join(", ")}`)
}

/**
 * Every zone failed and the run halts before synthesis: take down the
 * challenge vhosts and the temporary port rule this run added.
 */
async function withdrawChallenge(ctx: PhaseContext, challenge: ChallengeState): Promise<void> {
  for (const zoneId of challenge.vhosts) {
    const { available, enabled } = vhostPaths(ctx.paths, zoneId)
    await removeIfPresent(enabled)
    await removeIfPresent(available)
    ctx.log.info(`Removed ${zoneId} challenge vhost`)
  }
  if (challenge.vhosts.length > 0) {
    await ensureUnitRunning(ctx.runner, "nginx", { changed: true, reloadOnChange: true, ...ctx.serviceWait })
  }
  if (challenge.portOpened) {
    await deletePortAllow(ctx.runner, PORTS.HTTP)
    ctx.log.info(`Closed ${PORTS.HTTP}/tcp`)
  }
}

async function writeArtifacts(artifacts: readonly Artifact[]): Promise<Artifact[]> {
  const changed: Artifact[] = []
  for (const artifact of artifacts) {
    const result = await writeIfDifferent(artifact.path, artifact.content, artifact.mode)
    if (result.changed) {
      changed.push(artifact)
    }
  }
  return changed
}

async function linkVhosts(ctx: PhaseContext, result: SynthesisResult): Promise<boolean> {
  let changed = false
  for (const route of result.routes) {
    const { available, enabled } = vhostPaths(ctx.paths, route.zoneId)
    changed = (await ensureSymlink(available, enabled)) || changed
  }
  return changed
}

async function removeStaleVhosts(ctx: PhaseContext, result: SynthesisResult): Promise<boolean> {
  let removed = false
  for (const zoneId of ZONE_IDS) {
    if (result.routes.some(r => r.zoneId === zoneId)) continue
    const { available, enabled } = vhostPaths(ctx.paths, zoneId)
    const enabledGone = await removeIfPresent(enabled)
    const availableGone = await removeIfPresent(available)
    if (enabledGone || availableGone) {
      ctx.log.info(`Removed ${zoneId} vhost (zone not served)`)
      removed = true
    }
  }
  return removed
}

/**
 * Reapply the whole rule set when `reason` is given or ufw is down.
 * Returns true when ufw was reset.
 */
async function applyFirewallIfNeeded(ctx: PhaseContext, result: SynthesisResult, reason: string | null) {
  const status = await firewallStatus(ctx.runner)
  const why = reason ?? (status.active ? null : "ufw was inactive")
  if (why === null) {
    ctx.log.info("Firewall rules unchanged")
    return false
  }
  await applyFirewall(ctx.runner, ufwApplyPlan(result))
  ctx.log.info(`Firewall applied (${why})`)
  return true
}

function mergePending(previous: PendingActivation | undefined, next: PendingActivation): PendingActivation {
  if (!previous) return next
  return {
    vhostsChanged: previous.vhostsChanged || next.vhostsChanged,
    jailChanged: previous.jailChanged || next.jailChanged,
    unitsChanged: [...new Set([...previous.unitsChanged, ...next.unitsChanged])],
  }
}

export const runConfiguration: PhaseHandler = async ctx => {
  const { topology, paths, log } = ctx

  // 1. certificates
  const planned = planZones(topology, { certDir: paths.certDir, renewalSchedule: ctx.renewal.schedule })
  const challenge: ChallengeState = { vhosts: [], portOpened: false }
  let outcomes: ZoneOutcome[]
  try {
    outcomes = await ctx.provisioner.provisionAll(planned, topology, {
      beforeAcme: zone => prepareChallenge(ctx, zone, challenge),
    })
  } catch (err) {
    try {
      await withdrawChallenge(ctx, challenge)
    } catch (cleanupErr) {
      log.error("Could not withdraw the ACME challenge setup", cleanupErr)
    }
    throw err
  }
  ctx.results.zoneOutcomes = outcomes
  const zones = outcomes.flatMap(o => (o.zone ? [o.zone] : []))

  // 2. synthesis + invariant check (throws before any write)
  const result = synthesize(topology, zones, { acmeWebroot: paths.acmeWebroot })

  // 3. artifacts
  const artifacts = renderArtifacts(topology, result, { paths, app: ctx.app, renewal: ctx.renewal })
  const changed = await step("Configuration", "artifacts", () => writeArtifacts(artifacts))
  for (const artifact of changed) {
    log.info(`Wrote ${artifact.path}`)
  }
  const linksChanged = await step("Configuration", "vhost links", () => linkVhosts(ctx, result))

  // 4. firewall; the reset also drops the temporary challenge rule
  const reason = changed.some(a => a.kind === "firewall")
    ? "rules changed"
    : challenge.portOpened
      ? `closing temporary ${PORTS.HTTP}/tcp`
      : null
  const firewallReset = await step("Configuration", "firewall", () => applyFirewallIfNeeded(ctx, result, reason))

  // 5. stale vhosts, including a challenge vhost for a zone that failed
  const staleRemoved = await step("Configuration", "stale vhosts", () => removeStaleVhosts(ctx, result))

  // 6. persist
  const pending: PendingActivation = {
    vhostsChanged: linksChanged || staleRemoved || changed.some(a => a.kind === "vhost"),
    // ufw reset drops fail2ban's bans; a restart reinstates them
    jailChanged: firewallReset || changed.some(a => a.kind === "jail"),
    unitsChanged: changed.flatMap(a => (a.unit ? [a.unit] : [])),
  }
  await ctx.store.update(state => ({
    ...state,
    zones,
    pendingActivation: mergePending(state.pendingActivation, pending),
  }))

  const failed = outcomes.filter(o => o.status === "failed").map(o => o.zoneId)
  log.info(
    `Configured ${result.routes.map(r => r.zoneId).join(", ")}${failed.length > 0 ? ` (failed: ${failed.join(", ")})` : ""}`,
  )
}

// =============================================================================
// ServiceActivation
// =============================================================================

async function activate(ctx: PhaseContext, unit: string, changed: boolean, reloadOnChange = false): Promise<void> {
  await step("ServiceActivation", unit, async () => {
    await enableUnit(ctx.runner, unit)
    const action = await ensureUnitRunning(ctx.runner, unit, { changed, reloadOnChange, ...ctx.serviceWait })
    if (action !== "unchanged") {
      ctx.log.info(`${unit} ${action}`)
    }
  })
}

export const runServiceActivation: PhaseHandler = async ctx => {
  const state = await ctx.store.load()
  const pending = state.pendingActivation ?? { vhostsChanged: false, jailChanged: false, unitsChanged: [] }

  if (pending.unitsChanged.length > 0) {
    await step("ServiceActivation", "daemon-reload", () => daemonReload(ctx.runner))
  }

  const units = buildUnits(ctx.topology, ctx)
  for (const unit of units) {
    await activate(ctx, unit.name, pending.unitsChanged.includes(unit.name))
  }

  const validation = await validateNginxConfig(ctx.runner)
  if (!validation.isValid) {
    throw new PhaseExecutionError("ServiceActivation", "nginx", `nginx -t failed: ${validation.output}`, {
      remediation: "Fix the reported nginx error, then run `hostkit deploy --phase ServiceActivation`.",
    })
  }
  await activate(ctx, "nginx", pending.vhostsChanged, true)
  await activate(ctx, "fail2ban", pending.jailChanged)

  await ctx.store.update(current => {
    const { pendingActivation: _applied, ...rest } = current
    return rest
  })
}

// =============================================================================
// Verification
// =============================================================================

export const runVerification: PhaseHandler = async ctx => {
  const state = await ctx.store.load()
  const result = synthesize(ctx.topology, state.zones, { acmeWebroot: ctx.paths.acmeWebroot })
  const report = await ctx.verifier.verify({
    topology: ctx.topology,
    zones: state.zones,
    routes: result.routes,
    rules: result.rules,
  })
  ctx.results.report = report
  await ctx.store.update(current => ({ ...current, lastReport: report }))
}

export const PHASE_HANDLERS: Record<PhaseName, PhaseHandler> = {
  Prerequisites: runPrerequisites,
  Configuration: runConfiguration,
  ServiceActivation: runServiceActivation,
  Verification: runVerification,
}
