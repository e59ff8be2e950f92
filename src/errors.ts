/**
 * Fatal configuration problem: missing manifest, unknown backend, absent tool.
 * Aborts the current command; the CLI turns it into a non-zero exit.
 */
export class ConfigError extends Error {
  exitCode: number
  constructor(message: string, exitCode = 1) {
    super(message)
    this.name = 'ConfigError'
    this.exitCode = exitCode
  }
}

export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message
  return String(e)
}
