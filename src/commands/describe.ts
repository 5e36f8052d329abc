import { PLUGIN_SPEC, type PluginSpec } from '../plugin/spec.js'

/**
 * Capability descriptor. Consumes no input.
 */
export function describeCommand(): PluginSpec {
  return PLUGIN_SPEC
}
