import { join } from "node:path"
import { ANY_CIDR, DEFAULTS } from "@hostkit/shared"
import type { ProxyRoute, UpstreamTarget, ZoneId } from "../types.js"

// =============================================================================
// AST
// =============================================================================

export type NginxNode =
  | { readonly kind: "directive"; readonly name: string; readonly args: readonly string[] }
  | {
      readonly kind: "block"
      readonly name: string
      readonly args: readonly string[]
      readonly children: readonly NginxNode[]
    }
  | { readonly kind: "comment"; readonly text: string }
  | { readonly kind: "blank" }

export const directive = (name: string, ...args: string[]): NginxNode => ({ kind: "directive", name, args })
export const block = (name: string, args: string[], children: NginxNode[]): NginxNode => ({
  kind: "block",
  name,
  args,
  children,
})
export const comment = (text: string): NginxNode => ({ kind: "comment", text })
const blank: NginxNode = { kind: "blank" }

const NEEDS_QUOTES = /[\s;{}"'#\\]/

function quoteArg(arg: string): string {
  if (arg.length > 0 && !NEEDS_QUOTES.test(arg)) {
    return arg
  }
  return `"${arg.replace(/\\/g, "\\\\").replace(/"/g, '\\"')}"`
}

function serializeNode(node: NginxNode, depth: number): string[] {
  const pad = "    ".repeat(depth)
  switch (node.kind) {
    case "blank":
      return [""]
    case "comment":
      return [`${pad}# ${node.text}`]
    case "directive":
      return [`${pad}${[node.name, ...node.args.map(quoteArg)].join(" ")};`]
    case "block":
      return [
        `${pad}${[node.name, ...node.args.map(quoteArg)].join(" ")} {`,
        ...node.children.flatMap(child => serializeNode(child, depth + 1)),
        `${pad}}`,
      ]
  }
}

/**
 * Render nodes as nginx config text. Output always ends with a newline.
 */
export function serializeNginx(nodes: readonly NginxNode[]): string {
  return `${nodes.flatMap(node => serializeNode(node, 0)).join("\n")}\n`
}

// =============================================================================
// Vhosts
// =============================================================================

export function vhostFileName(zoneId: ZoneId): string {
  return `hostkit-${zoneId.toLowerCase()}.conf`
}

export function vhostPaths(
  paths: { nginxSitesAvailable: string; nginxSitesEnabled: string },
  zoneId: ZoneId,
): { available: string; enabled: string } {
  const name = vhostFileName(zoneId)
  return { available: join(paths.nginxSitesAvailable, name), enabled: join(paths.nginxSitesEnabled, name) }
}

function rateLimitZone(zoneId: ZoneId): string {
  return `hostkit_${zoneId.toLowerCase()}`
}

const PROXY_HEADERS: NginxNode[] = [
  directive("proxy_set_header", "Host", "$host"),
  directive("proxy_set_header", "X-Real-IP", "$remote_addr"),
  directive("proxy_set_header", "X-Forwarded-For", "$proxy_add_x_forwarded_for"),
  directive("proxy_set_header", "X-Forwarded-Proto", "$scheme"),
]

function upstreamLocation(upstream: UpstreamTarget): NginxNode {
  const pass = directive("proxy_pass", `http://${upstream.target}`)
  switch (upstream.kind) {
    case "http":
      return block("location", [upstream.pathPrefix], [pass, ...PROXY_HEADERS])
    case "stream":
      return block(
        "location",
        [upstream.pathPrefix],
        [
          pass,
          directive("proxy_http_version", "1.1"),
          directive("proxy_set_header", "Upgrade", "$http_upgrade"),
          directive("proxy_set_header", "Connection", "upgrade"),
          ...PROXY_HEADERS,
          directive("proxy_read_timeout", DEFAULTS.STREAM_READ_TIMEOUT),
          directive("proxy_buffering", "off"),
        ],
      )
  }
}

function accessRules(route: ProxyRoute): NginxNode[] {
  if (route.allowedSourceCidrs.includes(ANY_CIDR)) {
    return []
  }
  return [...route.allowedSourceCidrs.map(cidr => directive("allow", cidr)), directive("deny", "all"), blank]
}

function tlsServer(route: ProxyRoute): NginxNode {
  const zone = route.zoneId.toLowerCase()
  const limit = route.rateLimit
  const listens = route.listenBindings
    .filter(b => b.tls)
    .map(b => directive("listen", `${b.ip}:${b.port}`, "ssl"))

  return block("server", [], [
    ...listens,
    directive("server_name", ...route.serverNames),
    blank,
    directive("ssl_certificate", route.tlsCertRef.certPath),
    directive("ssl_certificate_key", route.tlsCertRef.keyPath),
    directive("ssl_protocols", "TLSv1.2", "TLSv1.3"),
    directive("ssl_prefer_server_ciphers", "off"),
    directive("ssl_session_cache", `shared:hostkit_${zone}_tls:10m`),
    directive("ssl_session_timeout", "1d"),
    blank,
    ...(route.zoneId === "WAN"
      ? [directive("add_header", "Strict-Transport-Security", "max-age=31536000; includeSubDomains", "always")]
      : []),
    directive("add_header", "X-Content-Type-Options", "nosniff", "always"),
    directive("add_header", "X-Frame-Options", "SAMEORIGIN", "always"),
    directive("client_max_body_size", DEFAULTS.CLIENT_MAX_BODY_SIZE),
    blank,
    ...accessRules(route),
    ...(limit
      ? [directive("limit_req", `zone=${rateLimitZone(route.zoneId)}`, `burst=${limit.burst}`, "nodelay"), blank]
      : []),
    ...route.upstreamTargets.map(upstreamLocation),
  ])
}

function challengeLocation(webroot: string): NginxNode {
  return block("location", ["/.well-known/acme-challenge/"], [
    directive("root", webroot),
    directive("default_type", "text/plain"),
  ])
}

function plainServer(route: ProxyRoute): NginxNode | null {
  const plain = route.listenBindings.filter(b => !b.tls)
  if (plain.length === 0) {
    return null
  }
  return block("server", [], [
    ...plain.map(b => directive("listen", `${b.ip}:${b.port}`)),
    directive("server_name", ...route.serverNames),
    blank,
    ...(route.acmeWebroot ? [challengeLocation(route.acmeWebroot)] : []),
    block("location", ["/"], [directive("return", "301", "https://$host$request_uri")]),
  ])
}

/**
 * Complete vhost for one route: optional rate-limit zone, the TLS server
 * and, when the route has a plain binding, the redirect/challenge server.
 */
export function buildVhost(route: ProxyRoute): NginxNode[] {
  const nodes: NginxNode[] = [
    comment(`hostkit ${route.zoneId} zone`),
    comment("managed file, local edits are overwritten"),
  ]

  if (route.rateLimit) {
    nodes.push(
      directive(
        "limit_req_zone",
        "$binary_remote_addr",
        `zone=${rateLimitZone(route.zoneId)}:${DEFAULTS.RATE_LIMIT.ZONE_SIZE}`,
        `rate=${route.rateLimit.ratePerSecond}r/s`,
      ),
    )
  }

  nodes.push(blank, tlsServer(route))

  const plain = plainServer(route)
  if (plain) {
    nodes.push(blank, plain)
  }
  return nodes
}

export function renderVhost(route: ProxyRoute): string {
  return serializeNginx(buildVhost(route))
}

/**
 * Challenge-only vhost served while a WAN certificate does not exist yet.
 */
export function renderChallengeVhost(serverNames: readonly string[], webroot: string, port: number): string {
  return serializeNginx([
    comment("hostkit WAN zone (ACME challenge only)"),
    blank,
    block("server", [], [
      directive("listen", `0.0.0.0:${port}`),
      directive("server_name", ...serverNames),
      blank,
      challengeLocation(webroot),
      block("location", ["/"], [directive("return", "404")]),
    ]),
  ])
}
