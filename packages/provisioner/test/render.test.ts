import { hostConfigSchema, type Intent, resolvePaths } from "@hostkit/shared"
import { describe, expect, it } from "vitest"
import {
  buildUnits,
  renderArtifacts,
  renderChallengeVhost,
  renderFirewallRules,
  renderJailConfig,
  renderUnit,
  renderVhost,
  ufwApplyPlan,
  ufwCommandLine,
  ufwRuleArgs,
} from "../src/render/index.js"
import { synthesize } from "../src/synthesis/index.js"
import { resolveTopology } from "../src/topology/resolve.js"
import { planZones } from "../src/topology/zones.js"

const paths = resolvePaths()
const app = hostConfigSchema.shape.app.parse({ environment: { NODE_ENV: "production" } })
const renewal = hostConfigSchema.shape.renewal.parse(undefined)

function build(intent: Intent) {
  const topology = resolveTopology(intent)
  const zones = planZones(topology, { certDir: "/certs" })
  return { topology, result: synthesize(topology, zones, { acmeWebroot: paths.acmeWebroot }) }
}

function routeOf(intent: Intent, zoneId: "LAN" | "WAN") {
  const route = build(intent).result.routes.find(r => r.zoneId === zoneId)
  if (!route) throw new Error(`no ${zoneId} route`)
  return route
}

const PROXY_HEADERS = [
  "        proxy_set_header Host $host;",
  "        proxy_set_header X-Real-IP $remote_addr;",
  "        proxy_set_header X-Forwarded-For $proxy_add_x_forwarded_for;",
  "        proxy_set_header X-Forwarded-Proto $scheme;",
]

describe("nginx vhosts", () => {
  it("renders the LAN vhost", () => {
    const expected = [
      "# hostkit LAN zone",
      "# managed file, local edits are overwritten",
      "",
      "server {",
      "    listen 192.168.10.1:8443 ssl;",
      "    listen 127.0.0.1:8443 ssl;",
      "    server_name webapp.local 192.168.10.1;",
      "",
      "    ssl_certificate /certs/lan/live/cert.pem;",
      "    ssl_certificate_key /certs/lan/live/key.pem;",
      "    ssl_protocols TLSv1.2 TLSv1.3;",
      "    ssl_prefer_server_ciphers off;",
      "    ssl_session_cache shared:hostkit_lan_tls:10m;",
      "    ssl_session_timeout 1d;",
      "",
      "    add_header X-Content-Type-Options nosniff always;",
      "    add_header X-Frame-Options SAMEORIGIN always;",
      "    client_max_body_size 10M;",
      "",
      "    allow 192.168.10.0/24;",
      "    allow 127.0.0.0/8;",
      "    deny all;",
      "",
      "    location / {",
      "        proxy_pass http://127.0.0.1:8000;",
      ...PROXY_HEADERS,
      "    }",
      "    location /ws/ {",
      "        proxy_pass http://127.0.0.1:8001;",
      "        proxy_http_version 1.1;",
      "        proxy_set_header Upgrade $http_upgrade;",
      "        proxy_set_header Connection upgrade;",
      ...PROXY_HEADERS,
      "        proxy_read_timeout 3600s;",
      "        proxy_buffering off;",
      "    }",
      "}",
      "",
    ].join("\n")

    expect(renderVhost(routeOf({ mode: "LAN" }, "LAN"))).toBe(expected)
  })

  it("adds rate limiting, HSTS and the redirect server for WAN", () => {
    const lines = renderVhost(routeOf({ mode: "WAN", domain: "example.com" }, "WAN")).split("\n")

    expect(lines[2]).toBe("limit_req_zone $binary_remote_addr zone=hostkit_wan:10m rate=10r/s;")
    expect(lines).toContain('    add_header Strict-Transport-Security "max-age=31536000; includeSubDomains" always;')
    expect(lines).toContain("    limit_req zone=hostkit_wan burst=20 nodelay;")
    expect(lines).not.toContain("    deny all;")
    expect(lines.slice(-14)).toEqual([
      "",
      "server {",
      "    listen 0.0.0.0:80;",
      "    server_name example.com www.example.com;",
      "",
      "    location /.well-known/acme-challenge/ {",
      "        root /var/www/acme-challenge;",
      "        default_type text/plain;",
      "    }",
      "    location / {",
      "        return 301 https://$host$request_uri;",
      "    }",
      "}",
      "",
    ])
  })

  it("renders deterministically", () => {
    const route = routeOf({ mode: "HYBRID", domain: "example.com" }, "WAN")
    expect(renderVhost(route)).toBe(renderVhost(route))
  })

  it("renders the challenge-only vhost", () => {
    expect(renderChallengeVhost(["example.com"], "/srv/acme", 80)).toBe(
      [
        "# hostkit WAN zone (ACME challenge only)",
        "",
        "server {",
        "    listen 0.0.0.0:80;",
        "    server_name example.com;",
        "",
        "    location /.well-known/acme-challenge/ {",
        "        root /srv/acme;",
        "        default_type text/plain;",
        "    }",
        "    location / {",
        "        return 404;",
        "    }",
        "}",
        "",
      ].join("\n"),
    )
  })
})

describe("ufw", () => {
  it("maps rules to ufw arguments", () => {
    expect(
      ufwRuleArgs({
        action: "allow",
        sourceCidr: "192.168.10.0/24",
        port: 22,
        protocol: "tcp",
        comment: "ssh from lan",
        interface: "eth1",
      }),
    ).toEqual([
      "allow",
      "in",
      "on",
      "eth1",
      "from",
      "192.168.10.0/24",
      "to",
      "any",
      "port",
      "22",
      "proto",
      "tcp",
      "comment",
      "ssh from lan",
    ])
    expect(
      ufwCommandLine(
        ufwRuleArgs({
          action: "allow",
          sourceCidr: "0.0.0.0/0",
          port: 22,
          protocol: "tcp",
          comment: "ssh",
          rateLimited: true,
        }),
      ),
    ).toBe("ufw limit 22/tcp comment ssh")
    expect(
      ufwCommandLine(
        ufwRuleArgs({ action: "allow", sourceCidr: "10.0.0.0/8", port: 22, protocol: "tcp", comment: "ssh" }),
      ),
    ).toBe("ufw allow from 10.0.0.0/8 to any port 22 proto tcp comment ssh")
  })

  it("renders the LAN rules file in evaluation order", () => {
    const { result } = build({ mode: "LAN" })
    expect(renderFirewallRules(result)).toBe(
      [
        "# hostkit firewall rules",
        "# zones: LAN",
        "# applied top to bottom; first match wins, unmatched incoming traffic is denied",
        "ufw --force reset",
        "ufw default deny incoming",
        "ufw default allow outgoing",
        "ufw allow in on lo from 127.0.0.0/8 to any port 8000 proto tcp comment 'loopback application server'",
        "ufw allow in on lo from 127.0.0.0/8 to any port 8001 proto tcp comment 'loopback streaming server'",
        "ufw allow in on lo from 127.0.0.0/8 to any port 6379 proto tcp comment 'loopback cache'",
        "ufw allow in on lo from 127.0.0.0/8 to any port 5432 proto tcp comment 'loopback database'",
        "ufw allow in on eth1 from 192.168.10.0/24 to any port 22 proto tcp comment 'ssh from lan'",
        "ufw allow in on eth1 from 192.168.10.0/24 to any port 8443 proto tcp comment 'lan proxy'",
        "ufw allow in on lo from 127.0.0.0/8 to any port 8443 proto tcp comment 'lan proxy loopback'",
        "ufw deny in on eth1 from any to any comment 'lan deny rest'",
        "ufw logging medium",
        "ufw --force enable",
        "",
      ].join("\n"),
    )
  })

  it("shares loopback and ssh rules between HYBRID zones", () => {
    const { result } = build({ mode: "HYBRID", domain: "example.com", monitoringLevel: "full" })
    const plan = ufwApplyPlan(result).map(ufwCommandLine)

    expect(plan).toHaveLength(15)
    expect(plan.slice(11)).toEqual([
      "ufw allow 443/tcp comment 'wan proxy'",
      "ufw allow 80/tcp comment 'wan proxy'",
      "ufw logging high",
      "ufw --force enable",
    ])
  })
})

describe("fail2ban", () => {
  it("renders the basic jail drop-in", () => {
    const { topology, result } = build({ mode: "LAN", monitoringLevel: "basic" })
    expect(renderJailConfig(result.intrusion, topology.monitoringLevel)).toBe(
      [
        "# hostkit intrusion prevention (basic)",
        "# managed file, local edits are overwritten",
        "",
        "[DEFAULT]",
        "bantime = 3600",
        "findtime = 600",
        "maxretry = 5",
        "ignoreip = 127.0.0.0/8",
        "banaction = ufw",
        "",
        "# Repeated SSH authentication failures",
        "[sshd]",
        "enabled = true",
        "port = ssh",
        "logpath = /var/log/auth.log",
        "maxretry = 3",
        "",
        "# Failed HTTP basic authentication against nginx",
        "[nginx-http-auth]",
        "enabled = true",
        "port = http,https,8443",
        "logpath = /var/log/nginx/error.log",
        "",
      ].join("\n"),
    )
  })
})

describe("systemd", () => {
  it("renders the app unit with sorted environment and hardening", () => {
    const [appUnit] = buildUnits(resolveTopology({ mode: "LAN" }), { app, renewal, paths })
    if (!appUnit) throw new Error("no units")

    expect(renderUnit(appUnit)).toBe(
      [
        "# managed by hostkit",
        "",
        "[Unit]",
        "Description=hostkit application server",
        "After=network-online.target",
        "Wants=network-online.target",
        "",
        "[Service]",
        "Type=simple",
        "User=webapp",
        "Group=webapp",
        "WorkingDirectory=/opt/webapp",
        'Environment="HOST=127.0.0.1"',
        'Environment="NODE_ENV=production"',
        'Environment="PORT=8000"',
        "ExecStart=/opt/webapp/bin/http-server",
        "Restart=on-failure",
        "RestartSec=5",
        "NoNewPrivileges=true",
        "PrivateTmp=true",
        "ProtectSystem=full",
        "",
        "[Install]",
        "WantedBy=multi-user.target",
        "",
      ].join("\n"),
    )
  })

  it("adds the renewal unit only with WAN", () => {
    expect(buildUnits(resolveTopology({ mode: "LAN" }), { app, renewal, paths }).map(u => u.name)).toEqual([
      "hostkit-app.service",
      "hostkit-stream.service",
    ])

    const units = buildUnits(resolveTopology({ mode: "WAN", domain: "example.com" }), { app, renewal, paths })
    const renewalUnit = units.find(u => u.name === "hostkit-renewal.service")
    expect(renewalUnit?.service).toContainEqual(["ExecStart", "/usr/local/bin/hostkit renew --daemon"])
    expect(renewalUnit?.service).toContainEqual([
      "ReadWritePaths",
      "/etc/hostkit/certs /var/lib/hostkit /var/log/hostkit /var/lib/hostkit/acme /var/www/acme-challenge /etc/letsencrypt",
    ])
  })
})

describe("renderArtifacts", () => {
  it("lists every file in write order", () => {
    const { topology, result } = build({ mode: "HYBRID", domain: "example.com" })
    const artifacts = renderArtifacts(topology, result, { paths, app, renewal })

    expect(artifacts.map(a => [a.kind, a.path, a.mode])).toEqual([
      ["vhost", "/etc/nginx/sites-available/hostkit-lan.conf", 0o644],
      ["vhost", "/etc/nginx/sites-available/hostkit-wan.conf", 0o644],
      ["firewall", "/etc/hostkit/firewall.rules", 0o600],
      ["jail", "/etc/fail2ban/jail.d/hostkit.local", 0o644],
      ["unit", "/etc/systemd/system/hostkit-app.service", 0o644],
      ["unit", "/etc/systemd/system/hostkit-stream.service", 0o644],
      ["unit", "/etc/systemd/system/hostkit-renewal.service", 0o644],
    ])
  })
})
