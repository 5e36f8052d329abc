/**
 * Directive validation.
 *
 * The host calls this only with directive names the plugin declared, so any
 * other name is a host-integration bug and aborts the process.
 */

import { createPlaceholder, DIRECTIVE_NAME } from '../plugin/spec.js'
import { ContractViolationError } from '../utils/errors.js'
import type { DocumentNode } from '../types.js'

export function directiveCommand(name: string): DocumentNode[] {
  if (name !== DIRECTIVE_NAME) {
    throw new ContractViolationError(
      `[image-gallery] Unsupported directive '${name}' (this plugin only declares '${DIRECTIVE_NAME}')`
    )
  }
  return [createPlaceholder()]
}
