import { join } from "node:path"
import { TIMEOUTS } from "@hostkit/shared"
import { CommandError, ProvisionError } from "../errors.js"
import { type CommandRunner, runChecked } from "../executors/command.js"
import { ensureDir, readTextIfExists } from "../executors/files.js"
import type { AcmeClientName, AcmeEab, AcmeProvider, ZoneId } from "../types.js"
import type { CertificatePair } from "./x509.js"

export const ACME_DIRECTORIES: Record<AcmeProvider, string> = {
  LetsEncrypt: "https://acme-v02.api.letsencrypt.org/directory",
  ZeroSSL: "https://acme.zerossl.com/v2/DV90",
}

const ACME_SH_SERVERS: Record<AcmeProvider, string> = {
  LetsEncrypt: "letsencrypt",
  ZeroSSL: "zerossl",
}

/** acme.sh exits 2 when the existing certificate is not yet due */
const ACME_SH_SKIPPED = 2

export interface AcmeRequest {
  zoneId: ZoneId
  /** First entry is the primary name / lineage */
  domains: readonly string[]
  email: string
  provider: AcmeProvider
  eab?: AcmeEab
  webroot: string
}

/**
 * One ACME client program. Both implementations validate over HTTP-01
 * using the shared webroot and hand back the PEM pair.
 */
export interface AcmeClient {
  readonly name: AcmeClientName
  issue(request: AcmeRequest): Promise<CertificatePair>
}

function primaryDomain(request: AcmeRequest): string {
  const [primary] = request.domains
  if (!primary) {
    throw new ProvisionError(request.zoneId, "ACME request has no domains")
  }
  return primary
}

async function readPair(zoneId: ZoneId, certPath: string, keyPath: string): Promise<CertificatePair> {
  const [certPem, keyPem] = await Promise.all([readTextIfExists(certPath), readTextIfExists(keyPath)])
  if (certPem === null || keyPem === null) {
    throw new ProvisionError(zoneId, `ACME client finished but ${certPath} or ${keyPath} is missing`)
  }
  return { certPem, keyPem }
}

/**
 * certbot: `certonly --webroot`, then read the lineage under /etc/letsencrypt/live.
 */
export function createCertbotClient(runner: CommandRunner, letsencryptLive: string): AcmeClient {
  return {
    name: "certbot",
    async issue(request) {
      if (request.provider === "ZeroSSL" && !request.eab) {
        throw ProvisionError.eabRequired(request.zoneId)
      }
      const primary = primaryDomain(request)
      const args = [
        "certonly",
        "--webroot",
        "-w",
        request.webroot,
        "--cert-name",
        primary,
        "--email",
        request.email,
        "--agree-tos",
        "--no-eff-email",
        "--non-interactive",
        "--keep-until-expiring",
        "--expand",
        "--server",
        ACME_DIRECTORIES[request.provider],
        ...(request.eab ? ["--eab-kid", request.eab.kid, "--eab-hmac-key", request.eab.hmacKey] : []),
        ...request.domains.flatMap(d => ["-d", d]),
      ]
      await runChecked(runner, "certbot", args, { timeoutMs: TIMEOUTS.ACME_COMMAND_MS })
      const lineage = join(letsencryptLive, primary)
      return readPair(request.zoneId, join(lineage, "fullchain.pem"), join(lineage, "privkey.pem"))
    },
  }
}

/**
 * acme.sh: register the account, `--issue` over the webroot, then
 * `--install-cert` into a per-domain staging directory.
 */
export function createAcmeShClient(runner: CommandRunner, stagingDir: string): AcmeClient {
  return {
    name: "acme.sh",
    async issue(request) {
      const primary = primaryDomain(request)
      const server = ACME_SH_SERVERS[request.provider]

      await runChecked(runner, "acme.sh", [
        "--register-account",
        "--server",
        server,
        "-m",
        request.email,
        ...(request.eab ? ["--eab-kid", request.eab.kid, "--eab-hmac-key", request.eab.hmacKey] : []),
      ])

      const issueArgs = [
        "--issue",
        "--server",
        server,
        "--webroot",
        request.webroot,
        "--keylength",
        "2048",
        ...request.domains.flatMap(d => ["-d", d]),
      ]
      const issued = await runner.run("acme.sh", issueArgs, { timeoutMs: TIMEOUTS.ACME_COMMAND_MS })
      if (issued.exitCode !== 0 && issued.exitCode !== ACME_SH_SKIPPED) {
        throw new CommandError("acme.sh", issueArgs, issued.exitCode, issued.stderr, issued.stdout)
      }

      const target = join(stagingDir, primary)
      const fullchain = join(target, "fullchain.pem")
      const key = join(target, "key.pem")
      await ensureDir(target, 0o700)
      await runChecked(runner, "acme.sh", [
        "--install-cert",
        "-d",
        primary,
        "--fullchain-file",
        fullchain,
        "--key-file",
        key,
      ])
      return readPair(request.zoneId, fullchain, key)
    },
  }
}
