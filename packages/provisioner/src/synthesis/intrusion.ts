import { readFileSync } from "node:fs"
import { LOOPBACK_CIDR, MONITORING_LEVELS } from "@hostkit/shared"
import { z } from "zod"
import type { IntrusionPreventionPolicy, Jail, MonitoringLevel, SynthesisResult } from "../types.js"

const catalogueSchema = z
  .object({
    jails: z.array(
      z
        .object({
          name: z.string().regex(/^[a-z0-9-]+$/),
          description: z.string().min(1),
          levels: z.array(z.enum(MONITORING_LEVELS)).min(1),
          port: z.string().min(1),
          logpath: z.string().startsWith("/"),
          filter: z.string().min(1).optional(),
          maxretry: z.number().int().positive().optional(),
          bantime: z.number().int().positive().optional(),
        })
        .strict(),
    ),
  })
  .strict()

export type JailCatalogue = z.infer<typeof catalogueSchema>

export const POLICY_DEFAULTS = {
  bantime: 3600,
  findtime: 600,
  maxretry: 5,
} as const

const FIREWALL_LOGGING: Record<MonitoringLevel, SynthesisResult["firewallLogging"]> = {
  basic: "low",
  standard: "medium",
  full: "high",
}

let cached: JailCatalogue | undefined

/**
 * Abuse-pattern catalogue shipped next to this module.
 */
export function loadJailCatalogue(): JailCatalogue {
  if (!cached) {
    const raw: unknown = JSON.parse(readFileSync(new URL("./jail-catalogue.json", import.meta.url), "utf8"))
    cached = catalogueSchema.parse(raw)
  }
  return cached
}

export function firewallLoggingFor(level: MonitoringLevel): SynthesisResult["firewallLogging"] {
  return FIREWALL_LOGGING[level]
}

/**
 * Jails for the monitoring level, in catalogue order. Topology-independent.
 */
export function buildIntrusionPolicy(
  level: MonitoringLevel,
  catalogue: JailCatalogue = loadJailCatalogue(),
): IntrusionPreventionPolicy {
  const jails: Jail[] = catalogue.jails
    .filter(entry => entry.levels.includes(level))
    .map(({ levels: _levels, ...jail }) => jail)

  return {
    ...POLICY_DEFAULTS,
    ignoreCidrs: [LOOPBACK_CIDR],
    jails,
  }
}
