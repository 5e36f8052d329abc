/**
 * Runtime configuration loader.
 *
 * - config file is optional (`config/config.json`, gitignored)
 * - config.example.json is the committed template
 * - an invalid file is reported and ignored; defaults apply
 */

import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import { z } from 'zod'
import type { Logger, ResolvedConfig } from '../types.js'

const PluginConfigSchema = z
  .object({
    /** Assets directory, relative to the project root. Default: images */
    imagesDir: z.string().min(1).optional(),
    /** Metadata store, relative to imagesDir. Default: images_metadata.yml */
    metadataFile: z.string().min(1).optional(),
    /** Append diagnostics to `<projectRoot>/logs`. Default: false */
    runLog: z.boolean().optional()
  })
  .strict()

export type PluginConfig = z.infer<typeof PluginConfigSchema>

export const DEFAULT_IMAGES_DIR = 'images'
export const DEFAULT_METADATA_FILE = 'images_metadata.yml'

export function loadPluginConfig(projectRoot: string, log: Logger): PluginConfig | null {
  const configPath = path.join(projectRoot, 'config', 'config.json')
  if (!fs.existsSync(configPath)) return null

  let raw: unknown
  try {
    raw = JSON.parse(fs.readFileSync(configPath, 'utf8')) as unknown
  } catch (err) {
    log.warn(
      `[image-gallery] Ignoring unreadable config ${configPath}: ${err instanceof Error ? err.message : String(err)}`
    )
    return null
  }

  const parsed = PluginConfigSchema.safeParse(raw)
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
    log.warn(`[image-gallery] Ignoring invalid config ${configPath}: ${issues.join('; ')}`)
    return null
  }
  return parsed.data
}

/**
 * Apply defaults and turn relative paths into absolute ones.
 */
export function resolveConfig(projectRoot: string, config?: PluginConfig | null): ResolvedConfig {
  const imagesDir = path.resolve(projectRoot, config?.imagesDir ?? DEFAULT_IMAGES_DIR)
  return {
    imagesDir,
    metadataPath: path.resolve(imagesDir, config?.metadataFile ?? DEFAULT_METADATA_FILE),
    // One render lane per available execution unit.
    concurrency: os.availableParallelism(),
    runLog: config?.runLog ?? false
  }
}
