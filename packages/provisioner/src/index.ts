/**
 * @hostkit/provisioner
 *
 * Topology-driven host configuration: resolve intent, provision
 * certificates, synthesize proxy/firewall/intrusion config, run the
 * phase pipeline and verify the result.
 *
 * @example
 * ```typescript
 * import { PhaseOrchestrator, createSpawnRunner, resolveTopology, systemResolver } from "@hostkit/provisioner"
 *
 * const topology = resolveTopology({ mode: "HYBRID", domain: "example.com" })
 * const orchestrator = new PhaseOrchestrator({
 *   topology,
 *   paths,
 *   app,
 *   renewal,
 *   runner: createSpawnRunner(),
 *   resolver: systemResolver,
 * })
 * const result = await orchestrator.run()
 * process.exitCode = result.exitCode
 * ```
 */

export * from "./types.js"
export * from "./errors.js"

// Topology
export {
  broadcastAddress,
  cidrContains,
  firstHost,
  formatIpv4,
  inCidr,
  parseCidr,
  parseIpv4,
} from "./topology/cidr.js"
export { hasLan, hasWan, isValidDomain, parseIntent, resolveTopology } from "./topology/resolve.js"
export { describeStrategy, planZones, wanSubjectNames, zoneCertPaths, zoneDir } from "./topology/zones.js"
export { flagsToIntentFields, type IntentFlags, mergeIntent, selectTopology } from "./intent.js"

// Certificates
export {
  ACME_DIRECTORIES,
  type AcmeClient,
  type AcmeRequest,
  createAcmeShClient,
  createCertbotClient,
} from "./certificates/acme.js"
export {
  CertificateProvisioner,
  type ProvisionerDeps,
  type ProvisionHooks,
  type ProvisionResult,
} from "./certificates/provisioner.js"
export { installCertificatePair, readCertificatePair } from "./certificates/store.js"
export { type CertificatePair, daysUntil, type ParsedCertificate, parseCertificate } from "./certificates/x509.js"

// Synthesis + rendering
export * from "./synthesis/index.js"
export * from "./render/index.js"

// Executors
export {
  type CommandResult,
  type CommandRunner,
  createSpawnRunner,
  findMissingCommands,
  runChecked,
} from "./executors/command.js"
export { type DnsResolver, systemResolver } from "./executors/dns.js"

// Pipeline
export {
  type ExitCode,
  type OrchestratorDeps,
  PhaseOrchestrator,
  type RunOptions,
  type RunResult,
} from "./orchestrator/orchestrator.js"
export { PHASE_HANDLERS, type PhaseContext, type PhaseHandler, requiredCommands } from "./orchestrator/phases.js"
export { canTransition, selectPhases, transition, VALID_TRANSITIONS } from "./orchestrator/state-machine.js"
export { emptyState, type HostState, type PendingActivation, StateStore } from "./orchestrator/state-store.js"

// Verification + renewal
export { aggregateStatus, requiredZones, VerificationEngine } from "./verification/engine.js"
export { type RenewalDeps, type RenewalResult, renewDueCertificates, startRenewalScheduler } from "./renewal.js"
