import type { Intent } from "@hostkit/shared"
import { InvalidIntentError } from "./errors.js"
import type { StateStore } from "./orchestrator/state-store.js"
import { parseIntent, resolveTopology } from "./topology/resolve.js"
import type { Topology } from "./types.js"

/**
 * Intent flags as commander hands them over (camelCased, strings only)
 */
export interface IntentFlags {
  mode?: string
  domain?: string
  lanSubnet?: string
  lanIp?: string
  lanInterface?: string
  wanInterface?: string
  certStrategy?: string
  acmeProvider?: string
  acmeClient?: string
  acmeEmail?: string
  monitoring?: string
}

const FLAG_FIELDS: ReadonlyArray<readonly [keyof IntentFlags, keyof Intent]> = [
  ["mode", "mode"],
  ["domain", "domain"],
  ["lanSubnet", "lanSubnet"],
  ["lanIp", "lanServerIp"],
  ["lanInterface", "lanInterface"],
  ["wanInterface", "wanInterface"],
  ["certStrategy", "lanCertStrategy"],
  ["acmeProvider", "acmeProvider"],
  ["acmeClient", "acmeClient"],
  ["acmeEmail", "acmeEmail"],
  ["monitoring", "monitoringLevel"],
]

export function flagsToIntentFields(flags: IntentFlags): Record<string, string> {
  const fields: Record<string, string> = {}
  for (const [flag, field] of FLAG_FIELDS) {
    const value = flags[flag]
    if (value !== undefined) {
      fields[field] = value
    }
  }
  return fields
}

/**
 * Config file intent with flags layered on top.
 *
 * @returns null when neither source names a mode
 */
export function mergeIntent(fileIntent: Intent | undefined, flags: IntentFlags): Intent | null {
  const merged: Record<string, unknown> = { ...fileIntent, ...flagsToIntentFields(flags) }
  if (merged.mode === undefined) {
    return null
  }
  return parseIntent(merged)
}

/**
 * Topology for this invocation: explicit intent wins, otherwise the
 * topology persisted by the last deploy.
 */
export async function selectTopology(
  fileIntent: Intent | undefined,
  flags: IntentFlags,
  store: StateStore,
): Promise<Topology> {
  const intent = mergeIntent(fileIntent, flags)
  if (intent) {
    return resolveTopology(intent)
  }
  const state = await store.load()
  if (state.topology) {
    return state.topology
  }
  throw new InvalidIntentError(["mode is required: pass --mode or set intent.mode in hostkit.json"])
}
