import { sleep, TIMEOUTS } from "@hostkit/shared"
import { type CommandRunner, runChecked } from "./command.js"

export interface WaitOptions {
  timeoutMs?: number
  pollMs?: number
  signal?: AbortSignal
  now?: () => number
}

export type UnitAction = "started" | "restarted" | "reloaded" | "unchanged"

/**
 * Check if a unit is active (`systemctl is-active --quiet`)
 */
export async function isUnitActive(runner: CommandRunner, unit: string): Promise<boolean> {
  const result = await runner.run("systemctl", ["is-active", "--quiet", unit])
  return result.exitCode === 0
}

export async function isUnitEnabled(runner: CommandRunner, unit: string): Promise<boolean> {
  const result = await runner.run("systemctl", ["is-enabled", "--quiet", unit])
  return result.exitCode === 0
}

export async function daemonReload(runner: CommandRunner): Promise<void> {
  await runChecked(runner, "systemctl", ["daemon-reload"])
}

/**
 * Enable at boot unless already enabled.
 *
 * @returns true when `systemctl enable` ran
 */
export async function enableUnit(runner: CommandRunner, unit: string): Promise<boolean> {
  if (await isUnitEnabled(runner, unit)) {
    return false
  }
  await runChecked(runner, "systemctl", ["enable", unit])
  return true
}

/**
 * Block until systemd reports the unit active, or the timeout elapses.
 *
 * @returns false on timeout
 */
export async function waitForActive(runner: CommandRunner, unit: string, options: WaitOptions = {}): Promise<boolean> {
  const timeoutMs = options.timeoutMs ?? TIMEOUTS.SERVICE_START_MS
  const pollMs = options.pollMs ?? TIMEOUTS.SERVICE_POLL_MS
  const now = options.now ?? Date.now
  const deadline = now() + timeoutMs

  for (;;) {
    if (await isUnitActive(runner, unit)) {
      return true
    }
    if (now() >= deadline) {
      return false
    }
    await sleep(pollMs, options.signal)
  }
}

export interface EnsureRunningOptions extends WaitOptions {
  /** Config or unit file changed during this run */
  changed: boolean
  /** Apply changes with `reload` instead of `restart` */
  reloadOnChange?: boolean
}

/**
 * Restart-if-changed, start-if-inactive, otherwise leave alone.
 * Throws when systemd does not report the unit active afterwards.
 */
export async function ensureUnitRunning(
  runner: CommandRunner,
  unit: string,
  options: EnsureRunningOptions,
): Promise<UnitAction> {
  const active = await isUnitActive(runner, unit)

  let action: UnitAction
  if (!active) {
    await runChecked(runner, "systemctl", ["start", unit])
    action = "started"
  } else if (options.changed) {
    const verb = options.reloadOnChange ? "reload" : "restart"
    await runChecked(runner, "systemctl", [verb, unit])
    action = options.reloadOnChange ? "reloaded" : "restarted"
  } else {
    return "unchanged"
  }

  if (!(await waitForActive(runner, unit, options))) {
    throw new Error(`${unit} did not become active within ${options.timeoutMs ?? TIMEOUTS.SERVICE_START_MS}ms`)
  }
  return action
}
