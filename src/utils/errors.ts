/**
 * Error formatting helpers and the plugin's error kinds.
 *
 * Every `PluginError` maps to a process exit code; anything else exits with 1.
 */

export function formatError(err: unknown): string {
  if (err instanceof Error) {
    const stack = err.stack || String(err)
    return stack
  }
  return String(err)
}

export const EXIT_CODES = {
  failure: 1,
  usage: 2,
  contractViolation: 3,
  notSupported: 4
} as const

export class PluginError extends Error {
  constructor(
    message: string,
    readonly exitCode: number
  ) {
    super(message)
    this.name = new.target.name
  }
}

/** Malformed stdin payload. */
export class InputError extends PluginError {
  constructor(message: string) {
    super(message, EXIT_CODES.failure)
  }
}

/**
 * The host invoked the plugin with something it never declared.
 * Host-integration bug: not recoverable, the process aborts.
 */
export class ContractViolationError extends PluginError {
  constructor(message: string) {
    super(message, EXIT_CODES.contractViolation)
  }
}

export class NotSupportedError extends PluginError {
  constructor(message: string) {
    super(message, EXIT_CODES.notSupported)
  }
}

export function exitCodeOf(err: unknown): number {
  return err instanceof PluginError ? err.exitCode : EXIT_CODES.failure
}

export function isNotFoundError(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT'
}
