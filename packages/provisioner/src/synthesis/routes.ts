import { ANY_CIDR, DEFAULTS, LOOPBACK_CIDR, PORTS } from "@hostkit/shared"
import { hasLan, hasWan } from "../topology/resolve.js"
import type { CertificateZone, ProxyRoute, Topology, UpstreamTarget, ZoneId } from "../types.js"

export const UPSTREAMS: readonly UpstreamTarget[] = [
  { pathPrefix: "/", target: `127.0.0.1:${PORTS.APP}`, kind: "http" },
  { pathPrefix: "/ws/", target: `127.0.0.1:${PORTS.STREAM}`, kind: "stream" },
]

function zoneById(zones: readonly CertificateZone[], zoneId: ZoneId): CertificateZone | undefined {
  return zones.find(z => z.zoneId === zoneId)
}

/**
 * One route per zone that is both required by the topology and present
 * in `zones`. A HYBRID host whose WAN certificate failed gets only the
 * LAN route.
 */
export function buildRoutes(
  topology: Topology,
  zones: readonly CertificateZone[],
  options: { acmeWebroot: string },
): ProxyRoute[] {
  const routes: ProxyRoute[] = []

  const lan = zoneById(zones, "LAN")
  if (lan && hasLan(topology)) {
    routes.push({
      zoneId: "LAN",
      serverNames: [topology.lanHostname, topology.lanServerIp],
      listenBindings: [
        { ip: topology.lanServerIp, port: PORTS.LAN_HTTPS, tls: true },
        { ip: "127.0.0.1", port: PORTS.LAN_HTTPS, tls: true },
      ],
      tlsCertRef: { zoneId: "LAN", certPath: lan.certPath, keyPath: lan.keyPath },
      allowedSourceCidrs: [topology.lanSubnet, LOOPBACK_CIDR],
      upstreamTargets: UPSTREAMS,
    })
  }

  const wan = zoneById(zones, "WAN")
  if (wan && hasWan(topology)) {
    routes.push({
      zoneId: "WAN",
      serverNames: wan.subjectNames,
      listenBindings: [
        { ip: "0.0.0.0", port: PORTS.WAN_HTTPS, tls: true },
        { ip: "0.0.0.0", port: PORTS.HTTP, tls: false },
      ],
      tlsCertRef: { zoneId: "WAN", certPath: wan.certPath, keyPath: wan.keyPath },
      allowedSourceCidrs: [ANY_CIDR],
      upstreamTargets: UPSTREAMS,
      rateLimit: { ratePerSecond: DEFAULTS.RATE_LIMIT.RATE_PER_SECOND, burst: DEFAULTS.RATE_LIMIT.BURST },
      acmeWebroot: options.acmeWebroot,
    })
  }

  return routes
}
