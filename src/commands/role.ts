import { NotSupportedError } from '../utils/errors.js'

export function roleCommand(name: string): never {
  throw new NotSupportedError(`[image-gallery] Roles are not implemented for this plugin (requested '${name}')`)
}
