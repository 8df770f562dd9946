import { chmod, mkdir, readFile, readlink, rename, rm, symlink, writeFile } from "node:fs/promises"
import { dirname } from "node:path"
import { isNotFoundError } from "@hostkit/shared"

export interface WriteResult {
  path: string
  changed: boolean
}

export async function readTextIfExists(path: string): Promise<string | null> {
  try {
    return await readFile(path, "utf8")
  } catch (err) {
    if (isNotFoundError(err)) return null
    throw err
  }
}

/**
 * Whole-file replacement: write a sibling temp file, then rename over the target.
 */
export async function atomicWrite(path: string, content: string, mode = 0o644): Promise<void> {
  await mkdir(dirname(path), { recursive: true })
  const tmp = `${path}.tmp.${process.pid}`
  await writeFile(tmp, content, { encoding: "utf8", mode })
  await chmod(tmp, mode)
  await rename(tmp, path)
}

/**
 * Write only when content differs. Never touches an identical file.
 */
export async function writeIfDifferent(path: string, content: string, mode = 0o644): Promise<WriteResult> {
  const current = await readTextIfExists(path)
  if (current === content) {
    return { path, changed: false }
  }
  await atomicWrite(path, content, mode)
  return { path, changed: true }
}

export async function removeIfPresent(path: string): Promise<boolean> {
  try {
    await rm(path)
    return true
  } catch (err) {
    if (isNotFoundError(err)) return false
    throw err
  }
}

export async function readLinkIfExists(path: string): Promise<string | null> {
  try {
    return await readlink(path)
  } catch (err) {
    if (isNotFoundError(err)) return null
    throw err
  }
}

/**
 * Point `linkPath` at `target`, swapping atomically when it already exists.
 *
 * @returns true when the link was created or retargeted
 */
export async function ensureSymlink(target: string, linkPath: string): Promise<boolean> {
  if ((await readLinkIfExists(linkPath)) === target) {
    return false
  }
  await mkdir(dirname(linkPath), { recursive: true })
  const tmp = `${linkPath}.tmp.${process.pid}`
  await removeIfPresent(tmp)
  await symlink(target, tmp)
  await rename(tmp, linkPath)
  return true
}

export async function ensureDir(path: string, mode = 0o755): Promise<void> {
  await mkdir(path, { recursive: true, mode })
}
