import { mkdir, readdir, rm, stat } from "node:fs/promises"
import { join } from "node:path"
import { DEFAULTS } from "@hostkit/shared"
import { atomicWrite, ensureSymlink, readTextIfExists } from "../executors/files.js"
import type { CertificatePair } from "./x509.js"

export interface InstallResult {
  releaseDir: string
  /** `live` now points at a different release */
  changed: boolean
}

/**
 * Install a cert/key pair without ever exposing a half-written pair.
 *
 * Layout under the zone directory:
 *
 *   archive/<fingerprint-prefix>/cert.pem
 *   archive/<fingerprint-prefix>/key.pem
 *   live -> archive/<fingerprint-prefix>
 *
 * Both files land in a fresh release directory first; `live` is then
 * swapped with a single rename, so readers see the old pair or the new
 * pair and nothing in between.
 */
export async function installCertificatePair(
  zoneDir: string,
  pair: CertificatePair,
  fingerprint: string,
): Promise<InstallResult> {
  const releaseName = fingerprint.slice(0, 16)
  const releaseDir = join(zoneDir, "archive", releaseName)
  await mkdir(releaseDir, { recursive: true, mode: 0o750 })
  await atomicWrite(join(releaseDir, "cert.pem"), pair.certPem, 0o644)
  await atomicWrite(join(releaseDir, "key.pem"), pair.keyPem, 0o600)

  const changed = await ensureSymlink(join("archive", releaseName), join(zoneDir, "live"))
  await pruneReleases(join(zoneDir, "archive"), releaseName, DEFAULTS.RELEASES_KEPT)
  return { releaseDir, changed }
}

/**
 * Keep the live release plus the newest others, up to `keep` in total.
 */
async function pruneReleases(archiveDir: string, liveRelease: string, keep: number): Promise<void> {
  const names = await readdir(archiveDir)
  const others = await Promise.all(
    names
      .filter(name => name !== liveRelease)
      .map(async name => ({ name, mtimeMs: (await stat(join(archiveDir, name))).mtimeMs })),
  )
  others.sort((a, b) => b.mtimeMs - a.mtimeMs)
  for (const stale of others.slice(Math.max(0, keep - 1))) {
    await rm(join(archiveDir, stale.name), { recursive: true, force: true })
  }
}

export async function readCertificatePair(certPath: string, keyPath: string): Promise<CertificatePair | null> {
  const [certPem, keyPem] = await Promise.all([readTextIfExists(certPath), readTextIfExists(keyPath)])
  if (certPem === null || keyPem === null) {
    return null
  }
  return { certPem, keyPem }
}
