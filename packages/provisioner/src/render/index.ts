import { join } from "node:path"
import type { AppConfig, HostPaths, RenewalConfig } from "@hostkit/shared"
import type { SynthesisResult, Topology, ZoneId } from "../types.js"
import { renderJailConfig } from "./fail2ban.js"
import { renderVhost, vhostPaths } from "./nginx.js"
import { buildUnits, renderUnits, type UnitName } from "./systemd.js"
import { renderFirewallRules } from "./ufw.js"

export * from "./fail2ban.js"
export * from "./nginx.js"
export * from "./systemd.js"
export * from "./ufw.js"

export type ArtifactKind = "vhost" | "firewall" | "jail" | "unit"

export interface Artifact {
  kind: ArtifactKind
  path: string
  content: string
  mode: number
  zoneId?: ZoneId
  unit?: UnitName
}

export interface RenderContext {
  paths: HostPaths
  app: AppConfig
  renewal: RenewalConfig
}

/**
 * Every file the Configuration phase writes, in write order.
 * Pure; identical inputs give byte-identical output.
 */
export function renderArtifacts(topology: Topology, result: SynthesisResult, context: RenderContext): Artifact[] {
  const { paths } = context
  const artifacts: Artifact[] = result.routes.map(route => ({
    kind: "vhost",
    path: vhostPaths(paths, route.zoneId).available,
    content: renderVhost(route),
    mode: 0o644,
    zoneId: route.zoneId,
  }))

  artifacts.push(
    { kind: "firewall", path: paths.firewallRules, content: renderFirewallRules(result), mode: 0o600 },
    {
      kind: "jail",
      path: paths.fail2banJail,
      content: renderJailConfig(result.intrusion, topology.monitoringLevel),
      mode: 0o644,
    },
    ...renderUnits(buildUnits(topology, context)).map(
      (file): Artifact => ({
        kind: "unit",
        path: join(paths.systemdDir, file.name),
        content: file.content,
        mode: 0o644,
        unit: file.name,
      }),
    ),
  )

  return artifacts
}
