import type { CommandRunner } from "./command.js"

/**
 * IPv4 addresses assigned to an interface.
 *
 * @returns null when the interface does not exist
 */
export async function interfaceAddresses(runner: CommandRunner, name: string): Promise<string[] | null> {
  const result = await runner.run("ip", ["-o", "-4", "addr", "show", "dev", name])
  if (result.exitCode !== 0) {
    return null
  }
  return [...result.stdout.matchAll(/\binet (\d{1,3}(?:\.\d{1,3}){3})\//g)].flatMap(m => (m[1] ? [m[1]] : []))
}
