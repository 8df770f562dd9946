#!/usr/bin/env tsx
/**
 * hostkit CLI
 *
 * deploy  run the phase pipeline
 * plan    print what deploy would write, touching nothing
 * verify  re-check the host against persisted state
 * renew   renew due certificates (once, or on the renewal schedule)
 * status  persisted phases and the last readiness report
 */

import {
  type AppConfig,
  CONFIG_PATH,
  ConfigError,
  formatUncaughtError,
  type HostConfig,
  hostConfigSchema,
  type HostPaths,
  loadHostConfig,
  type RenewalConfig,
  resolvePaths,
} from "@hostkit/shared"
import { createLogger, type Logger } from "@hostkit/logger"
import { Command } from "commander"
import { z } from "zod"
import { HostkitError, InvalidIntentError } from "./errors.js"
import { createSpawnRunner } from "./executors/command.js"
import { systemResolver } from "./executors/dns.js"
import { type IntentFlags, selectTopology } from "./intent.js"
import { type ExitCode, PhaseOrchestrator } from "./orchestrator/orchestrator.js"
import { StateStore } from "./orchestrator/state-store.js"
import { renderArtifacts } from "./render/index.js"
import { renewDueCertificates, startRenewalScheduler } from "./renewal.js"
import { synthesize } from "./synthesis/index.js"
import { planZones } from "./topology/zones.js"
import { PHASES, type ReadinessReport } from "./types.js"
import { VerificationEngine } from "./verification/engine.js"

const flagsSchema = z.object({
  config: z.string().optional(),
  verbose: z.boolean().optional(),
  mode: z.string().optional(),
  domain: z.string().optional(),
  lanSubnet: z.string().optional(),
  lanIp: z.string().optional(),
  lanInterface: z.string().optional(),
  wanInterface: z.string().optional(),
  certStrategy: z.string().optional(),
  acmeProvider: z.string().optional(),
  acmeClient: z.string().optional(),
  acmeEmail: z.string().optional(),
  monitoring: z.string().optional(),
  phase: z.enum(PHASES).optional(),
  from: z.enum(PHASES).optional(),
  daemon: z.boolean().optional(),
})

type CliFlags = z.infer<typeof flagsSchema>

interface CliContext {
  flags: CliFlags
  config: HostConfig | null
  app: AppConfig
  renewal: RenewalConfig
  log: Logger
  store: StateStore
  paths: HostPaths
}

function readFlags(command: Command): CliFlags {
  const result = flagsSchema.safeParse(command.optsWithGlobals())
  if (!result.success) {
    throw new InvalidIntentError(result.error.issues.map(issue => `--${issue.path.join(".")}: ${issue.message}`))
  }
  return result.data
}

async function createContext(command: Command): Promise<CliContext> {
  const flags = readFlags(command)
  const log = createLogger({ component: "hostkit", minLevel: flags.verbose ? "debug" : "info" })
  const config = await loadHostConfig(flags.config ?? CONFIG_PATH)
  if (flags.config && !config) {
    throw new ConfigError("MISSING_CONFIG", `Config file ${flags.config} not found`)
  }
  const paths = resolvePaths(config?.paths)
  return {
    flags,
    config,
    // Section defaults apply when there is no config file at all
    app: config?.app ?? hostConfigSchema.shape.app.parse(undefined),
    renewal: config?.renewal ?? hostConfigSchema.shape.renewal.parse(undefined),
    log,
    store: new StateStore(paths.stateDir),
    paths,
  }
}

function intentFlags(flags: CliFlags): IntentFlags {
  const { config: _config, verbose: _verbose, phase: _phase, from: _from, daemon: _daemon, ...intent } = flags
  return intent
}

function printReport(report: ReadinessReport): void {
  for (const check of report.checks) {
    console.log(`${check.status.toUpperCase().padEnd(4)} ${check.id.padEnd(24)} ${check.message}`)
    if (check.status !== "pass" && check.remediation) {
      console.log(`     ${"".padEnd(24)} → ${check.remediation}`)
    }
  }
  console.log(`\nOverall: ${report.overall} (${report.checkedAt})`)
}

// =============================================================================
// Commands
// =============================================================================

async function deployCommand(command: Command): Promise<ExitCode> {
  const ctx = await createContext(command)
  if (ctx.flags.phase && ctx.flags.from) {
    throw new InvalidIntentError(["--phase and --from are mutually exclusive"])
  }
  const topology = await selectTopology(ctx.config?.intent, intentFlags(ctx.flags), ctx.store)
  const runner = createSpawnRunner(ctx.log.child("Exec"))

  const controller = new AbortController()
  const onSignal = () => {
    ctx.log.warn("Interrupt received, stopping after the current phase")
    controller.abort()
  }
  process.once("SIGINT", onSignal)
  process.once("SIGTERM", onSignal)

  try {
    const orchestrator = new PhaseOrchestrator({
      topology,
      paths: ctx.paths,
      app: ctx.app,
      renewal: ctx.renewal,
      runner,
      resolver: systemResolver,
      minLevel: ctx.flags.verbose ? "debug" : "info",
    })
    const result = await orchestrator.run({ phase: ctx.flags.phase, from: ctx.flags.from, signal: controller.signal })

    for (const outcome of result.zoneOutcomes) {
      if (outcome.status === "failed") {
        console.log(`Zone ${outcome.zoneId}: failed (${outcome.error.message})`)
      }
    }
    if (result.report) {
      printReport(result.report)
    }
    console.log(`Deployment log: ${result.logRef}`)
    return result.exitCode
  } finally {
    process.off("SIGINT", onSignal)
    process.off("SIGTERM", onSignal)
  }
}

async function planCommand(command: Command): Promise<ExitCode> {
  const ctx = await createContext(command)
  const topology = await selectTopology(ctx.config?.intent, intentFlags(ctx.flags), ctx.store)
  const zones = planZones(topology, { certDir: ctx.paths.certDir, renewalSchedule: ctx.renewal.schedule })
  const result = synthesize(topology, zones, { acmeWebroot: ctx.paths.acmeWebroot })

  console.log(JSON.stringify({ topology, routes: result.routes, rules: result.rules }, null, 2))
  for (const artifact of renderArtifacts(topology, result, ctx)) {
    console.log(`\n# ${artifact.path} (${artifact.kind}, ${artifact.mode.toString(8)})`)
    process.stdout.write(artifact.content)
  }
  return 0
}

async function verifyCommand(command: Command): Promise<ExitCode> {
  const ctx = await createContext(command)
  const state = await ctx.store.load()
  if (!state.topology) {
    throw new InvalidIntentError(["nothing deployed yet: run `hostkit deploy` first"])
  }
  const result = synthesize(state.topology, state.zones, { acmeWebroot: ctx.paths.acmeWebroot })
  const engine = new VerificationEngine({
    runner: createSpawnRunner(ctx.log.child("Exec")),
    paths: ctx.paths,
    clock: () => new Date(),
    log: ctx.log,
  })
  const report = await engine.verify({
    topology: state.topology,
    zones: state.zones,
    routes: result.routes,
    rules: result.rules,
  })
  await ctx.store.update(current => ({ ...current, lastReport: report }))
  printReport(report)
  return report.overall === "fail" ? 2 : 0
}

async function renewCommand(command: Command): Promise<ExitCode> {
  const ctx = await createContext(command)
  const deps = {
    paths: ctx.paths,
    runner: createSpawnRunner(ctx.log.child("Exec")),
    resolver: systemResolver,
    store: ctx.store,
    clock: () => new Date(),
    log: ctx.log,
  }

  if (ctx.flags.daemon) {
    const job = startRenewalScheduler(ctx.renewal.schedule, deps)
    const stop = () => {
      ctx.log.info("Stopping renewal scheduler")
      job.stop()
    }
    process.once("SIGINT", stop)
    process.once("SIGTERM", stop)
    return 0
  }

  const result = await renewDueCertificates(deps)
  for (const failure of result.failed) {
    console.log(`Zone ${failure.zoneId}: ${failure.error.message}`)
  }
  return result.failed.length > 0 ? 1 : 0
}

async function statusCommand(command: Command): Promise<ExitCode> {
  const ctx = await createContext(command)
  const state = await ctx.store.load()
  if (!state.topology) {
    console.log("Nothing deployed yet")
    return 0
  }

  console.log(`Topology: ${state.topology.mode}`)
  for (const zone of state.zones) {
    console.log(`Zone ${zone.zoneId}: ${zone.subjectNames.join(", ")}, expires ${zone.issued?.notAfter ?? "unknown"}`)
  }
  for (const phase of PHASES) {
    const record = state.phases[phase]
    const detail = record?.error ? ` (${record.error.message})` : ""
    console.log(`${phase.padEnd(18)} ${record?.status ?? "never run"}${detail}`)
  }
  if (state.pendingActivation) {
    console.log("Pending activation: run `hostkit deploy --from ServiceActivation`")
  }
  if (state.lastReport) {
    console.log("")
    printReport(state.lastReport)
  }
  return 0
}

// =============================================================================
// Program
// =============================================================================

function withIntentFlags(command: Command): Command {
  return command
    .option("--mode <mode>", "LAN | WAN | HYBRID")
    .option("--domain <domain>", "public domain (WAN, HYBRID)")
    .option("--lan-subnet <cidr>", "LAN subnet, e.g. 192.168.10.0/24")
    .option("--lan-ip <ip>", "server address inside the LAN subnet")
    .option("--lan-interface <name>", "LAN-facing interface")
    .option("--wan-interface <name>", "internet-facing interface")
    .option("--cert-strategy <strategy>", "LAN certificates: SelfSigned | LocalCA")
    .option("--acme-provider <provider>", "LetsEncrypt | ZeroSSL")
    .option("--acme-client <client>", "acme.sh | certbot")
    .option("--acme-email <email>", "ACME account email")
    .option("--monitoring <level>", "basic | standard | full")
}

function exitWith(run: (command: Command) => Promise<ExitCode>) {
  return async (_options: unknown, command: Command): Promise<void> => {
    process.exitCode = await run(command)
  }
}

function buildProgram(): Command {
  const program = new Command()
    .name("hostkit")
    .description("Provision a host for LAN, WAN or hybrid serving")
    .option("-c, --config <file>", `host config file (default ${CONFIG_PATH})`)
    .option("-v, --verbose", "log every system command")

  withIntentFlags(
    program
      .command("deploy")
      .description("run the deployment pipeline")
      .option("--phase <name>", `run only this phase (${PHASES.join(", ")})`)
      .option("--from <name>", "run this phase and every later one"),
  ).action(exitWith(deployCommand))

  withIntentFlags(program.command("plan").description("print routes, rules and artifacts without writing")).action(
    exitWith(planCommand),
  )

  program.command("verify").description("check the host against the deployed state").action(exitWith(verifyCommand))

  program
    .command("renew")
    .description("renew certificates that are due")
    .option("--daemon", "keep running and renew on the configured schedule")
    .action(exitWith(renewCommand))

  program.command("status").description("show persisted phase records").action(exitWith(statusCommand))

  return program
}

async function main(): Promise<void> {
  try {
    await buildProgram().parseAsync(process.argv)
  } catch (err) {
    if (err instanceof InvalidIntentError) {
      console.error(err.message)
      for (const issue of err.issues) console.error(`  - ${issue}`)
    } else if (err instanceof ConfigError || err instanceof HostkitError) {
      console.error(err.message)
      if (err instanceof HostkitError && err.remediation) console.error(`→ ${err.remediation}`)
    } else {
      console.error(formatUncaughtError(err))
    }
    process.exitCode = 1
  }
}

void main()
