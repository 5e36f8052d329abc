/**
 * CLI router / top-level composition root.
 *
 * Wires argv -> command handlers. Stdout receives exactly one JSON payload on
 * success and nothing on failure; every diagnostic goes to stderr.
 */

import path from 'node:path'
import type { Readable, Writable } from 'node:stream'
import { fileURLToPath } from 'node:url'
import { describeCommand } from './commands/describe.js'
import { directiveCommand } from './commands/directive.js'
import { roleCommand } from './commands/role.js'
import { transformCommand } from './commands/transform.js'
import { loadPluginConfig, resolveConfig } from './config/config.js'
import { closeRunLog, initRunLog } from './log/run-log.js'
import { parseCliArgs, type PluginCommand } from './utils/cli-args.js'
import { EXIT_CODES, exitCodeOf, formatError } from './utils/errors.js'
import { readJsonInput } from './utils/stdin.js'
import type { CommandContext } from './types.js'

const __filename = fileURLToPath(import.meta.url)
const __dirname = path.dirname(__filename)

function getProjectRoot(): string {
  // src/ or dist/ -> project root
  return path.resolve(__dirname, '..')
}

export interface CliIo {
  stdin: Readable
  stdout: Writable
  stderr: Writable
  /** Overrides the plugin location (tests). */
  projectRoot?: string
}

const processIo: CliIo = {
  stdin: process.stdin,
  stdout: process.stdout,
  stderr: process.stderr
}

type DispatchCommand = Exclude<PluginCommand, { command: 'help' }>

async function dispatch(ctx: CommandContext, command: DispatchCommand, stdin: Readable): Promise<unknown> {
  switch (command.command) {
    case 'describe':
      return describeCommand()
    case 'directive': {
      await readJsonInput(stdin)
      return directiveCommand(command.name)
    }
    case 'transform': {
      const input = await readJsonInput(stdin)
      return transformCommand(ctx, command.name, input)
    }
    case 'role':
      return roleCommand(command.name)
  }
}

/**
 * Entrypoint used by cli.ts. Resolves to the process exit code.
 */
export async function runCli(argv: string[], io: CliIo = processIo): Promise<number> {
  const log = new console.Console({ stdout: io.stderr, stderr: io.stderr })

  const parsed = parseCliArgs(argv)
  if (!parsed.ok) {
    log.error(parsed.error)
    return EXIT_CODES.usage
  }
  const command = parsed.data
  if (command.command === 'help') {
    io.stdout.write(parsed.helpText)
    return 0
  }

  const projectRoot = io.projectRoot ?? getProjectRoot()
  const config = resolveConfig(projectRoot, loadPluginConfig(projectRoot, log))
  const ctx: CommandContext = { projectRoot, now: new Date(), log, config }

  if (config.runLog) {
    initRunLog({ projectRoot, now: ctx.now, command: command.command })
  }

  try {
    const payload = await dispatch(ctx, command, io.stdin)
    io.stdout.write(JSON.stringify(payload))
    return 0
  } catch (err) {
    log.error(formatError(err))
    return exitCodeOf(err)
  } finally {
    closeRunLog()
  }
}
