import { dirname } from "node:path"
import { PORTS, type AppConfig, type HostPaths, type RenewalConfig } from "@hostkit/shared"
import { hasWan } from "../topology/resolve.js"
import type { Topology } from "../types.js"

export const UNITS = {
  APP: "hostkit-app.service",
  STREAM: "hostkit-stream.service",
  RENEWAL: "hostkit-renewal.service",
} as const

export type UnitName = (typeof UNITS)[keyof typeof UNITS]

type Entry = readonly [key: string, value: string]

export interface UnitSpec {
  name: UnitName
  unit: readonly Entry[]
  service: readonly Entry[]
  install: readonly Entry[]
}

export interface UnitFile {
  name: UnitName
  content: string
}

const HARDENING: Entry[] = [
  ["NoNewPrivileges", "true"],
  ["PrivateTmp", "true"],
  ["ProtectSystem", "full"],
]

function quoteEnv(key: string, value: string): string {
  return `"${`${key}=${value}`.replace(/\\/g, "\\\\").replace(/"/g, '\\"')}"`
}

function environmentEntries(env: Record<string, string>): Entry[] {
  return Object.entries(env)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([key, value]): Entry => ["Environment", quoteEnv(key, value)])
}

function serviceUnit(options: {
  name: UnitName
  description: string
  user: string
  group: string
  workingDirectory: string
  execStart: string
  environment: Record<string, string>
  extra?: Entry[]
}): UnitSpec {
  return {
    name: options.name,
    unit: [
      ["Description", options.description],
      ["After", "network-online.target"],
      ["Wants", "network-online.target"],
    ],
    service: [
      ["Type", "simple"],
      ["User", options.user],
      ["Group", options.group],
      ["WorkingDirectory", options.workingDirectory],
      ...environmentEntries(options.environment),
      ["ExecStart", options.execStart],
      ["Restart", "on-failure"],
      ["RestartSec", "5"],
      ...HARDENING,
      ...(options.extra ?? []),
    ],
    install: [["WantedBy", "multi-user.target"]],
  }
}

/**
 * Units for the topology: app and stream always, renewal when a WAN
 * zone needs periodic ACME renewal.
 */
export function buildUnits(
  topology: Topology,
  context: { app: AppConfig; renewal: RenewalConfig; paths: HostPaths },
): UnitSpec[] {
  const { app, renewal, paths } = context
  const units: UnitSpec[] = [
    serviceUnit({
      name: UNITS.APP,
      description: "hostkit application server",
      user: app.user,
      group: app.group,
      workingDirectory: app.workingDirectory,
      execStart: app.httpExecStart,
      environment: { ...app.environment, HOST: "127.0.0.1", PORT: String(PORTS.APP) },
    }),
    serviceUnit({
      name: UNITS.STREAM,
      description: "hostkit streaming server",
      user: app.user,
      group: app.group,
      workingDirectory: app.workingDirectory,
      execStart: app.streamExecStart,
      environment: { ...app.environment, HOST: "127.0.0.1", PORT: String(PORTS.STREAM) },
    }),
  ]

  if (hasWan(topology)) {
    const writable = [
      paths.certDir,
      paths.stateDir,
      paths.logDir,
      paths.acmeStaging,
      paths.acmeWebroot,
      dirname(paths.letsencryptLive),
    ]
    units.push(
      serviceUnit({
        name: UNITS.RENEWAL,
        description: "hostkit certificate renewal scheduler",
        user: "root",
        group: "root",
        workingDirectory: paths.stateDir,
        execStart: renewal.command,
        environment: {},
        extra: [["ReadWritePaths", writable.join(" ")]],
      }),
    )
  }

  return units
}

function renderEntries(title: string, entries: readonly Entry[]): string {
  return [`[${title}]`, ...entries.map(([key, value]) => `${key}=${value}`)].join("\n")
}

export function renderUnit(spec: UnitSpec): string {
  const sections = [
    "# managed by hostkit",
    renderEntries("Unit", spec.unit),
    renderEntries("Service", spec.service),
    renderEntries("Install", spec.install),
  ]
  return `${sections.join("\n\n")}\n`
}

export function renderUnits(specs: readonly UnitSpec[]): UnitFile[] {
  return specs.map(spec => ({ name: spec.name, content: renderUnit(spec) }))
}
