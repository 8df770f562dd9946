import { spawn } from "node:child_process"
import { TIMEOUTS } from "@hostkit/shared"
import type { Logger } from "@hostkit/logger"
import { CommandError } from "../errors.js"

export interface CommandResult {
  exitCode: number
  stdout: string
  stderr: string
}

export interface RunOptions {
  env?: Record<string, string>
  cwd?: string
  timeoutMs?: number
}

/**
 * Seam for every system command hostkit runs. Tests substitute an
 * in-process fake.
 */
export interface CommandRunner {
  run(command: string, args: readonly string[], options?: RunOptions): Promise<CommandResult>
}

/**
 * Runner backed by child_process.spawn (no shell).
 * A missing binary resolves with exit code 127 instead of rejecting.
 */
export function createSpawnRunner(log?: Logger): CommandRunner {
  return {
    run(command, args, options = {}) {
      log?.debug(`$ ${command} ${args.join(" ")}`)

      return new Promise(resolve => {
        const proc = spawn(command, [...args], {
          stdio: ["ignore", "pipe", "pipe"],
          env: { ...process.env, ...options.env },
          cwd: options.cwd,
          timeout: options.timeoutMs ?? TIMEOUTS.COMMAND_MS,
        })

        let stdout = ""
        let stderr = ""
        let settled = false

        proc.stdout.on("data", (data: Buffer) => {
          stdout += data.toString()
        })

        proc.stderr.on("data", (data: Buffer) => {
          stderr += data.toString()
        })

        proc.on("close", (code, signal) => {
          if (settled) return
          settled = true
          const killed = signal ? `\nterminated by ${signal}` : ""
          resolve({ exitCode: code ?? 1, stdout: stdout.trim(), stderr: `${stderr.trim()}${killed}` })
        })

        proc.on("error", err => {
          if (settled) return
          settled = true
          resolve({ exitCode: 127, stdout: "", stderr: `${command}: ${err.message}` })
        })
      })
    },
  }
}

/**
 * Run and throw CommandError on non-zero exit
 *
 * @returns trimmed stdout
 */
export async function runChecked(
  runner: CommandRunner,
  command: string,
  args: readonly string[],
  options?: RunOptions,
): Promise<string> {
  const result = await runner.run(command, args, options)
  if (result.exitCode !== 0) {
    throw new CommandError(command, args, result.exitCode, result.stderr, result.stdout)
  }
  return result.stdout
}

/**
 * Verify that required system commands are available.
 *
 * @returns the names that are missing
 */
export async function findMissingCommands(runner: CommandRunner, names: readonly string[]): Promise<string[]> {
  const missing: string[] = []
  for (const name of names) {
    const result = await runner.run("which", [name])
    if (result.exitCode !== 0) {
      missing.push(name)
    }
  }
  return missing
}
