/**
 * Minimal CLI argument parser.
 *
 * The host only ever passes one of three selectors (or none), so there is no
 * need for commander/yargs here.
 */

export type PluginCommand =
  | { command: 'describe' }
  | { command: 'directive'; name: string }
  | { command: 'transform'; name: string }
  | { command: 'role'; name: string }
  | { command: 'help' }

type ParsedOk = {
  ok: true
  data: PluginCommand
  helpText: string
}

type ParsedErr = { ok: false; error: string }

type Selector = 'directive' | 'transform' | 'role'

const SELECTORS: readonly Selector[] = ['directive', 'transform', 'role']

function isSelector(key: string): key is Selector {
  return SELECTORS.some((s) => s === key)
}

export function getHelpText(): string {
  return [
    'image-gallery-plugin',
    '',
    'Usage:',
    '  image-gallery-plugin                     print the plugin specification',
    '  image-gallery-plugin --directive <name>  validate a directive (JSON on stdin)',
    '  image-gallery-plugin --transform <name>  transform a document tree (JSON on stdin)',
    '  image-gallery-plugin --role <name>       not supported',
    '',
    'Options:',
    '  -h, --help   show help',
    ''
  ].join('\n')
}

/**
 * Parse process.argv into a single plugin command.
 * `--directive`, `--transform` and `--role` are mutually exclusive.
 */
export function parseCliArgs(argv: string[]): ParsedOk | ParsedErr {
  const helpText = getHelpText()
  const args = argv.slice(2)
  let selected: { key: Selector; value: string } | undefined

  for (let i = 0; i < args.length; i++) {
    const a = args[i]
    if (a === '-h' || a === '--help') {
      return { ok: true, data: { command: 'help' }, helpText }
    }
    if (!a.startsWith('--')) {
      return { ok: false, error: `Unexpected arg: ${a}\n\n${helpText}` }
    }

    const eq = a.indexOf('=')
    const key = eq === -1 ? a.slice(2) : a.slice(2, eq)
    if (!isSelector(key)) {
      return { ok: false, error: `Unknown option: --${key}\n\n${helpText}` }
    }

    let value: string
    if (eq !== -1) {
      value = a.slice(eq + 1)
    } else {
      const next = args[i + 1]
      if (next === undefined || next.startsWith('--')) {
        return { ok: false, error: `Missing value for --${key}\n\n${helpText}` }
      }
      value = next
      i++
    }

    if (selected) {
      return {
        ok: false,
        error: `--${key} not allowed with --${selected.key}\n\n${helpText}`
      }
    }
    selected = { key, value }
  }

  if (!selected) return { ok: true, data: { command: 'describe' }, helpText }
  return { ok: true, data: { command: selected.key, name: selected.value }, helpText }
}
