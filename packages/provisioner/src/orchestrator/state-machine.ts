import type { ErrorSummary } from "../errors.js"
import { PHASES, type PhaseName, type PhaseRecord, type PhaseStatus } from "../types.js"

/**
 * Allowed PhaseRecord status changes. success and failed are terminal.
 */
export const VALID_TRANSITIONS: Record<PhaseStatus, readonly PhaseStatus[]> = {
  pending: ["running"],
  running: ["success", "failed"],
  success: [],
  failed: [],
}

export function canTransition(from: PhaseStatus, to: PhaseStatus): boolean {
  return VALID_TRANSITIONS[from].includes(to)
}

export function transition(record: PhaseRecord, to: PhaseStatus, at: Date, error?: ErrorSummary): PhaseRecord {
  if (!canTransition(record.status, to)) {
    throw new Error(`Invalid phase transition for ${record.phaseName}: ${record.status} -> ${to}`)
  }
  const terminal = VALID_TRANSITIONS[to].length === 0
  return {
    ...record,
    status: to,
    ...(terminal ? { completedAt: at.toISOString() } : {}),
    ...(error ? { error } : {}),
  }
}

export function pendingRecord(phaseName: PhaseName, at: Date, logRef: string): PhaseRecord {
  return { phaseName, startedAt: at.toISOString(), status: "pending", logRef }
}

export function phaseIndex(phase: PhaseName): number {
  return PHASES.indexOf(phase)
}

export function previousPhase(phase: PhaseName): PhaseName | undefined {
  const index = phaseIndex(phase)
  return index > 0 ? PHASES[index - 1] : undefined
}

/**
 * Phases a run covers: one phase, everything from a phase on, or all.
 */
export function selectPhases(options: { phase?: PhaseName; from?: PhaseName }): PhaseName[] {
  if (options.phase) {
    return [options.phase]
  }
  return PHASES.slice(options.from ? phaseIndex(options.from) : 0)
}
