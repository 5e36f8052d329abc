/**
 * Run log writer.
 *
 * Enabled with `runLog: true` in config. Each invocation gets its own file under
 * `<projectRoot>/logs`. Writes are append-only and synchronous so lines from
 * concurrent render tasks never interleave mid-line.
 */

import fs from 'node:fs'
import path from 'node:path'

let logFilePath: string | undefined

function safeStamp(iso: string): string {
  return iso.replace(/[:.]/g, '-')
}

export function initRunLog(opts: { projectRoot: string; now: Date; command: string }): void {
  const dir = path.join(opts.projectRoot, 'logs')
  const stamp = safeStamp(opts.now.toISOString())
  logFilePath = path.join(dir, `${stamp}-${opts.command}.log`)

  try {
    fs.mkdirSync(dir, { recursive: true })
    fs.appendFileSync(logFilePath, `# image-gallery ${opts.command} ${opts.now.toISOString()}\n`, 'utf8')
  } catch {
    // The plugin must keep working on a read-only checkout.
    logFilePath = undefined
  }
}

export function closeRunLog(): void {
  logFilePath = undefined
}

export function appendRunLog(line: string): void {
  if (!logFilePath) return
  try {
    fs.appendFileSync(logFilePath, `[${new Date().toISOString()}] ${line}\n`, 'utf8')
  } catch {
    // Ignore logging failures.
  }
}

export function logRenderError(opts: { filename: string; error: string }): void {
  appendRunLog(`render-error filename=${opts.filename}\n${opts.error}`)
}

export function logMetadataError(opts: { path: string; error: string }): void {
  appendRunLog(`metadata-error path=${opts.path} error=${opts.error}`)
}
