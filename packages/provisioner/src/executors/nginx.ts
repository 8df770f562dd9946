import type { CommandRunner } from "./command.js"

/**
 * Validation result for the nginx configuration tree
 */
export interface NginxValidation {
  isValid: boolean
  output: string
}

/**
 * Validate nginx configuration without applying changes (`nginx -t`).
 * nginx reports on stderr for both outcomes.
 */
export async function validateNginxConfig(runner: CommandRunner): Promise<NginxValidation> {
  const result = await runner.run("nginx", ["-t"])
  return {
    isValid: result.exitCode === 0,
    output: [result.stderr, result.stdout].filter(Boolean).join("\n"),
  }
}
