import { randomUUID } from "node:crypto"
import { join } from "node:path"
import type { AppConfig, HostPaths, RenewalConfig } from "@hostkit/shared"
import { consoleSink, createLogger, jsonLinesSink, type LogLevel, type LogSink } from "@hostkit/logger"
import type { AcmeClient } from "../certificates/acme.js"
import { CertificateProvisioner } from "../certificates/provisioner.js"
import { PhaseExecutionError, summarizeError } from "../errors.js"
import type { CommandRunner } from "../executors/command.js"
import type { DnsResolver } from "../executors/dns.js"
import type { WaitOptions } from "../executors/service.js"
import type { PhaseName, PhaseRecord, ReadinessReport, Topology, ZoneOutcome } from "../types.js"
import { VerificationEngine } from "../verification/engine.js"
import { PHASE_HANDLERS, type PhaseContext, type PhaseHandler } from "./phases.js"
import { pendingRecord, previousPhase, selectPhases, transition } from "./state-machine.js"
import { StateStore } from "./state-store.js"

export interface OrchestratorDeps {
  topology: Topology
  paths: HostPaths
  app: AppConfig
  renewal: RenewalConfig
  runner: CommandRunner
  resolver: DnsResolver
  clock?: () => Date
  /** Console-side sinks; the per-run deployment log is always added */
  sinks?: LogSink[]
  minLevel?: LogLevel
  serviceWait?: WaitOptions
  acmeRetryDelayMs?: number
  acmeClients?: Partial<Record<AcmeClient["name"], AcmeClient>>
  createRunId?: () => string
  /** Replace individual phase implementations (tests) */
  handlers?: Partial<Record<PhaseName, PhaseHandler>>
}

export interface RunOptions {
  /** Run exactly this phase */
  phase?: PhaseName
  /** Run this phase and every later one */
  from?: PhaseName
  /** Checked between phases; a running phase always completes */
  signal?: AbortSignal
}

export type ExitCode = 0 | 1 | 2

export interface RunResult {
  runId: string
  /** Structured deployment log for this run */
  logRef: string
  records: PhaseRecord[]
  zoneOutcomes: ZoneOutcome[]
  report?: ReadinessReport
  exitCode: ExitCode
}

/**
 * Linear phase pipeline: Prerequisites → Configuration → ServiceActivation → Verification.
 *
 * Each phase gets a PhaseRecord (pending → running → success | failed)
 * persisted to state.json. A phase only starts when its predecessor's
 * latest record, from this run or an earlier one, is success. The first
 * failure halts the run; nothing is rolled back, and re-running converges.
 */
export class PhaseOrchestrator {
  private readonly clock: () => Date
  private readonly store: StateStore

  constructor(private readonly deps: OrchestratorDeps) {
    this.clock = deps.clock ?? (() => new Date())
    this.store = new StateStore(deps.paths.stateDir)
  }

  async run(options: RunOptions = {}): Promise<RunResult> {
    const runId = this.deps.createRunId?.() ?? randomUUID()
    const logRef = join(this.deps.paths.logDir, `deploy-${runId}.jsonl`)
    const log = createLogger({
      component: "Deploy",
      sinks: [...(this.deps.sinks ?? [consoleSink]), jsonLinesSink(logRef)],
      minLevel: this.deps.minLevel,
      clock: this.clock,
      context: { runId },
    })

    const ctx: PhaseContext = {
      topology: this.deps.topology,
      paths: this.deps.paths,
      app: this.deps.app,
      renewal: this.deps.renewal,
      runner: this.deps.runner,
      store: this.store,
      provisioner: new CertificateProvisioner({
        paths: this.deps.paths,
        runner: this.deps.runner,
        resolver: this.deps.resolver,
        clock: this.clock,
        log,
        acmeRetryDelayMs: this.deps.acmeRetryDelayMs,
        acmeClients: this.deps.acmeClients,
      }),
      verifier: new VerificationEngine({ runner: this.deps.runner, paths: this.deps.paths, clock: this.clock, log }),
      log,
      serviceWait: this.deps.serviceWait ?? {},
      results: { zoneOutcomes: [] },
    }

    const phases = selectPhases(options)
    const records: PhaseRecord[] = []
    let exitCode: ExitCode = 0

    log.info(`Run ${runId}: ${phases.join(" → ")} (${this.deps.topology.mode})`)

    for (const phase of phases) {
      if (options.signal?.aborted) {
        log.warn(`Cancelled before ${phase}`)
        exitCode = 1
        break
      }

      const record = await this.runPhase(phase, records, ctx, logRef)
      records.push(record)
      if (record.status === "failed") {
        exitCode = 1
        break
      }
    }

    const report = ctx.results.report
    if (exitCode === 0 && report?.overall === "fail") {
      exitCode = 2
    }

    log.info(`Run ${runId} finished with exit code ${exitCode}`, { logRef })
    return { runId, logRef, records, zoneOutcomes: ctx.results.zoneOutcomes, report, exitCode }
  }

  private async predecessorSucceeded(phase: PhaseName, records: readonly PhaseRecord[]): Promise<boolean> {
    const previous = previousPhase(phase)
    if (!previous) return true
    const record = records.find(r => r.phaseName === previous) ?? (await this.store.load()).phases[previous]
    return record?.status === "success"
  }

  private async persist(record: PhaseRecord): Promise<void> {
    await this.store.update(state => ({ ...state, phases: { ...state.phases, [record.phaseName]: record } }))
  }

  private async runPhase(
    phase: PhaseName,
    records: readonly PhaseRecord[],
    ctx: PhaseContext,
    logRef: string,
  ): Promise<PhaseRecord> {
    const { log } = ctx
    let record = transition(pendingRecord(phase, this.clock(), logRef), "running", this.clock())
    await this.persist(record)
    log.info(`${phase} started`, { phase })

    try {
      if (!(await this.predecessorSucceeded(phase, records))) {
        const previous = previousPhase(phase) ?? phase
        throw new PhaseExecutionError(phase, "precondition", `${previous} has not completed successfully`, {
          remediation: `Run \`hostkit deploy --from ${previous}\`.`,
        })
      }
      const handler = this.deps.handlers?.[phase] ?? PHASE_HANDLERS[phase]
      await handler(ctx)
      record = transition(record, "success", this.clock())
      log.info(`${phase} succeeded`, { phase })
    } catch (err) {
      const summary = summarizeError(err)
      record = transition(record, "failed", this.clock(), summary)
      log.error(`${phase} failed`, err, { phase })
      if (summary.remediation) {
        log.info(`Remediation: ${summary.remediation}`, { phase })
      }
    }

    await this.persist(record)
    return record
  }
}
