/**
 * Certificate renewal
 *
 * Runs outside the deploy pipeline: once (`hostkit renew`) or on the
 * renewal cron (`hostkit renew --daemon`). Works from persisted state only.
 */

import type { HostPaths } from "@hostkit/shared"
import type { Logger } from "@hostkit/logger"
import { Cron } from "croner"
import type { AcmeClient } from "./certificates/acme.js"
import { CertificateProvisioner } from "./certificates/provisioner.js"
import { summarizeError, type ErrorSummary } from "./errors.js"
import type { CommandRunner } from "./executors/command.js"
import type { DnsResolver } from "./executors/dns.js"
import { ensureUnitRunning, isUnitActive, type WaitOptions } from "./executors/service.js"
import type { StateStore } from "./orchestrator/state-store.js"
import type { CertificateZone, ZoneId } from "./types.js"

export interface RenewalDeps {
  paths: HostPaths
  runner: CommandRunner
  resolver: DnsResolver
  store: StateStore
  clock: () => Date
  log: Logger
  serviceWait?: WaitOptions
  acmeRetryDelayMs?: number
  acmeClients?: Partial<Record<AcmeClient["name"], AcmeClient>>
}

export interface RenewalResult {
  renewed: ZoneId[]
  unchanged: ZoneId[]
  failed: Array<{ zoneId: ZoneId; error: ErrorSummary }>
  /** nginx was reloaded to pick up new certificates */
  reloaded: boolean
}

function isScheduled(zone: CertificateZone): boolean {
  return zone.renewalPolicy.schedule !== "manual"
}

/**
 * Renew scheduled zones that are inside their renewal window. A zone
 * not yet due is left alone, so running this repeatedly is safe.
 */
export async function renewDueCertificates(deps: RenewalDeps): Promise<RenewalResult> {
  const log = deps.log.child("Renewal")
  const state = await deps.store.load()
  const result: RenewalResult = { renewed: [], unchanged: [], failed: [], reloaded: false }

  if (!state.topology) {
    log.warn("No deployed topology in state; run `hostkit deploy` first")
    return result
  }
  const topology = state.topology

  const provisioner = new CertificateProvisioner({
    paths: deps.paths,
    runner: deps.runner,
    resolver: deps.resolver,
    clock: deps.clock,
    log,
    acmeRetryDelayMs: deps.acmeRetryDelayMs,
    acmeClients: deps.acmeClients,
  })

  const renewed = new Map<ZoneId, CertificateZone>()
  for (const zone of state.zones) {
    if (!isScheduled(zone)) continue
    try {
      const outcome = await provisioner.provision(zone, topology)
      if (outcome.status === "issued") {
        renewed.set(zone.zoneId, outcome.zone)
        result.renewed.push(zone.zoneId)
      } else {
        result.unchanged.push(zone.zoneId)
      }
    } catch (err) {
      log.error(`${zone.zoneId} renewal failed`, err, { zone: zone.zoneId })
      result.failed.push({ zoneId: zone.zoneId, error: summarizeError(err) })
    }
  }

  if (renewed.size > 0) {
    // Issuance can take minutes; merge into whatever the pipeline wrote meanwhile
    await deps.store.update(current => ({
      ...current,
      zones: current.zones.map(zone => renewed.get(zone.zoneId) ?? zone),
    }))
    if (await isUnitActive(deps.runner, "nginx")) {
      await ensureUnitRunning(deps.runner, "nginx", { changed: true, reloadOnChange: true, ...deps.serviceWait })
      result.reloaded = true
    }
    log.info(`Renewed ${result.renewed.join(", ")}`)
  }

  return result
}

/**
 * Run renewal on a cron schedule. `protect` skips a tick while the
 * previous one is still running.
 */
export function startRenewalScheduler(schedule: string, deps: RenewalDeps): Cron {
  const log = deps.log.child("Renewal")
  const job = new Cron(schedule, { protect: true, catch: false }, async () => {
    try {
      const result = await renewDueCertificates(deps)
      if (result.failed.length > 0) {
        log.warn(`Renewal failed for ${result.failed.map(f => f.zoneId).join(", ")}`)
      }
    } catch (err) {
      log.error("Renewal run failed", err)
    }
  })
  const next = job.nextRun()
  log.info(`Renewal scheduled (${schedule})${next ? `, next run ${next.toISOString()}` : ""}`)
  return job
}
