import { describeError } from "@hostkit/shared"
import type { PhaseName, ReadinessReport, ZoneId } from "./types.js"

export type HostkitErrorCode =
  | "INVALID_INTENT"
  | "PROVISION_FAILED"
  | "VALIDATION_UNREACHABLE"
  | "SYNTHESIS_INVARIANT"
  | "PHASE_FAILED"
  | "VERIFICATION_FAILED"
  | "COMMAND_FAILED"

export interface ErrorDetails {
  remediation?: string
  cause?: unknown
}

export class HostkitError extends Error {
  readonly code: HostkitErrorCode
  readonly remediation?: string

  constructor(code: HostkitErrorCode, message: string, details: ErrorDetails = {}) {
    super(message, details.cause === undefined ? undefined : { cause: details.cause })
    this.name = "HostkitError"
    this.code = code
    this.remediation = details.remediation
  }
}

/**
 * Fatal, raised before anything is mutated. Lists every problem at once.
 */
export class InvalidIntentError extends HostkitError {
  readonly issues: readonly string[]

  constructor(issues: readonly string[]) {
    super("INVALID_INTENT", `Invalid intent: ${issues.join("; ")}`, {
      remediation: "Fix the listed fields in hostkit.json or the command-line flags and re-run.",
    })
    this.name = "InvalidIntentError"
    this.issues = issues
  }
}

/**
 * Per-zone certificate failure. Fatal only when it is the sole requested zone.
 */
export class ProvisionError extends HostkitError {
  readonly zoneId: ZoneId

  constructor(
    zoneId: ZoneId,
    message: string,
    details: ErrorDetails = {},
    code: "PROVISION_FAILED" | "VALIDATION_UNREACHABLE" = "PROVISION_FAILED",
  ) {
    super(code, message, details)
    this.name = "ProvisionError"
    this.zoneId = zoneId
  }

  static acmeFailed(zoneId: ZoneId, domain: string, cause: unknown): ProvisionError {
    return new ProvisionError(zoneId, `ACME issuance for ${domain} failed: ${describeError(cause)}`, {
      cause,
      remediation: `Make sure ${domain} points at this host and ports 80/443 are reachable from the internet.`,
    })
  }

  static eabRequired(zoneId: ZoneId): ProvisionError {
    return new ProvisionError(zoneId, "ZeroSSL via certbot requires external account binding credentials", {
      remediation: "Set intent.acmeEab {kid, hmacKey} from the ZeroSSL dashboard, or use acmeClient acme.sh.",
    })
  }

  static issuanceFailed(zoneId: ZoneId, strategy: string, cause: unknown): ProvisionError {
    return new ProvisionError(zoneId, `${strategy} certificate for ${zoneId} failed: ${describeError(cause)}`, {
      cause,
    })
  }
}

/**
 * ACME domain validation cannot succeed from this host.
 */
export class ValidationUnreachableError extends ProvisionError {
  constructor(zoneId: ZoneId, message: string, details: ErrorDetails = {}) {
    super(zoneId, message, details, "VALIDATION_UNREACHABLE")
    this.name = "ValidationUnreachableError"
  }

  static lanOnly(zoneId: ZoneId): ValidationUnreachableError {
    return new ValidationUnreachableError(zoneId, "ACME requires a WAN-facing interface; topology is LAN-only", {
      remediation: "Use SelfSigned or LocalCA for LAN-only hosts, or deploy in WAN/HYBRID mode.",
    })
  }

  static unresolvable(zoneId: ZoneId, domain: string, cause?: unknown): ValidationUnreachableError {
    return new ValidationUnreachableError(zoneId, `Domain ${domain} does not resolve`, {
      cause,
      remediation: `Create an A record for ${domain} pointing at this host's public address.`,
    })
  }
}

/**
 * Synthesized artifacts are internally inconsistent. Always a logic defect.
 */
export class SynthesisInvariantViolation extends HostkitError {
  readonly violations: readonly string[]

  constructor(violations: readonly string[]) {
    super("SYNTHESIS_INVARIANT", `Synthesis invariant violated: ${violations.join("; ")}`)
    this.name = "SynthesisInvariantViolation"
    this.violations = violations
  }
}

export class PhaseExecutionError extends HostkitError {
  readonly phase: PhaseName
  readonly step: string

  constructor(phase: PhaseName, step: string, message: string, details: ErrorDetails = {}) {
    super("PHASE_FAILED", `${phase}/${step}: ${message}`, details)
    this.name = "PhaseExecutionError"
    this.phase = phase
    this.step = step
  }
}

export class VerificationFailure extends HostkitError {
  readonly report: ReadinessReport

  constructor(report: ReadinessReport) {
    const failed = report.checks.filter(c => c.status === "fail").map(c => c.id)
    super("VERIFICATION_FAILED", `Verification failed: ${failed.join(", ")}`, {
      remediation: "Run `hostkit verify` for per-check remediation hints.",
    })
    this.name = "VerificationFailure"
    this.report = report
  }
}

/**
 * Error thrown when a system command exits non-zero
 */
export class CommandError extends HostkitError {
  constructor(
    readonly command: string,
    readonly args: readonly string[],
    readonly exitCode: number,
    readonly stderr: string,
    readonly stdout: string,
  ) {
    const detail = stderr.split("\n").find(line => line.trim().length > 0)
    super("COMMAND_FAILED", `${command} ${args.join(" ")} exited with ${exitCode}${detail ? `: ${detail.trim()}` : ""}`)
    this.name = "CommandError"
  }
}

export interface ErrorSummary {
  code: string
  message: string
  remediation?: string
}

/**
 * Flatten any throwable for PhaseRecord / ZoneOutcome storage.
 */
export function summarizeError(err: unknown): ErrorSummary {
  if (err instanceof HostkitError) {
    return { code: err.code, message: err.message, ...(err.remediation ? { remediation: err.remediation } : {}) }
  }
  return { code: "UNKNOWN", message: describeError(err) }
}
