import { mkdtemp, rm, writeFile } from "node:fs/promises"
import { tmpdir } from "node:os"
import { join } from "node:path"
import { fileURLToPath } from "node:url"
import { afterEach, beforeEach, describe, expect, it } from "vitest"
import { loadHostConfig, parseHostConfig, resolvePaths, rootedPaths } from "../config.js"
import { DEFAULT_PATHS, DEFAULTS } from "../constants.js"
import { ConfigError } from "../errors.js"

describe("parseHostConfig", () => {
  it("fills every section with defaults from a minimal file", () => {
    const config = parseHostConfig(JSON.stringify({ intent: { mode: "LAN" } }))

    expect(config.intent).toEqual({ mode: "LAN" })
    expect(config.app).toEqual({
      user: DEFAULTS.APP.USER,
      group: DEFAULTS.APP.GROUP,
      workingDirectory: DEFAULTS.APP.WORKING_DIRECTORY,
      httpExecStart: DEFAULTS.APP.HTTP_EXEC_START,
      streamExecStart: DEFAULTS.APP.STREAM_EXEC_START,
      environment: {},
    })
    expect(config.paths).toEqual({})
    expect(config.renewal).toEqual({ schedule: "17 3 * * *", command: "/usr/local/bin/hostkit renew --daemon" })
  })

  it("strips underscore comment keys at every depth", () => {
    const config = parseHostConfig(
      JSON.stringify({
        _comment: "top",
        intent: { _comment: "nested", mode: "WAN", domain: "example.com" },
      }),
    )
    expect(config.intent).toEqual({ mode: "WAN", domain: "example.com" })
  })

  it("rejects unknown keys", () => {
    expect(() => parseHostConfig(JSON.stringify({ intent: { mode: "LAN" }, extra: true }))).toThrow(ConfigError)
  })

  it("reports each schema issue with its path", () => {
    try {
      parseHostConfig(JSON.stringify({ intent: { mode: "CLOUD", acmeEmail: "nope" } }))
      expect.unreachable()
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError)
      if (err instanceof ConfigError) {
        expect(err.code).toBe("INVALID_CONFIG")
        expect(err.issues.some(issue => issue.startsWith("intent.mode:"))).toBe(true)
        expect(err.issues.some(issue => issue.startsWith("intent.acmeEmail:"))).toBe(true)
      }
    }
  })

  it("rejects malformed JSON", () => {
    expect(() => parseHostConfig("{ not json")).toThrow(/Invalid JSON in hostkit.json/)
  })

  it("rejects relative path overrides", () => {
    expect(() => parseHostConfig(JSON.stringify({ intent: { mode: "LAN" }, paths: { certDir: "certs" } }))).toThrow(
      /paths.certDir: must be an absolute path/,
    )
  })
})

describe("loadHostConfig", () => {
  let dir: string

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "hostkit-config-"))
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it("returns null when the file does not exist", async () => {
    await expect(loadHostConfig(join(dir, "missing.json"))).resolves.toBeNull()
  })

  it("parses an existing file", async () => {
    const file = join(dir, "hostkit.json")
    await writeFile(file, JSON.stringify({ intent: { mode: "HYBRID", domain: "example.org" } }))
    const config = await loadHostConfig(file)
    expect(config?.intent.mode).toBe("HYBRID")
  })

  it("accepts the shipped example file", async () => {
    const example = fileURLToPath(new URL("../../../../hostkit.example.json", import.meta.url))
    const config = await loadHostConfig(example)
    expect(config?.intent).toMatchObject({ mode: "HYBRID", domain: "example.com", acmeClient: "acme.sh" })
    expect(config?.app.environment).toEqual({ NODE_ENV: "production" })
  })
})

describe("resolvePaths", () => {
  it("returns defaults without overrides", () => {
    expect(resolvePaths()).toEqual(DEFAULT_PATHS)
  })

  it("applies overrides key by key", () => {
    const paths = resolvePaths({ certDir: "/srv/certs" })
    expect(paths.certDir).toBe("/srv/certs")
    expect(paths.caDir).toBe(DEFAULT_PATHS.caDir)
  })
})

describe("rootedPaths", () => {
  it("prefixes every default path with the root", () => {
    const paths = rootedPaths("/tmp/root")
    expect(paths.stateDir).toBe("/tmp/root/var/lib/hostkit")
    expect(paths.nginxSitesEnabled).toBe("/tmp/root/etc/nginx/sites-enabled")
    expect(Object.keys(paths).sort()).toEqual(Object.keys(DEFAULT_PATHS).sort())
  })
})
