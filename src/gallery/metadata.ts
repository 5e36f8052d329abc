/**
 * Metadata store loader.
 *
 * The store is a YAML file with a top-level `images` sequence. Any problem with
 * the file (missing, unreadable, not YAML, wrong shape) degrades to an empty
 * gallery: the transform must never fail because of it.
 */

import fs from 'node:fs/promises'
import { parse as parseYaml } from 'yaml'
import { logMetadataError } from '../log/run-log.js'
import { isNotFoundError } from '../utils/errors.js'
import type { ImageRecord, Logger } from '../types.js'

export function isImageRecord(value: unknown): value is ImageRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function reportFailure(log: Logger, metadataPath: string, message: string): ImageRecord[] {
  log.error(`[image-gallery] ${message}`)
  logMetadataError({ path: metadataPath, error: message })
  return []
}

export async function loadImageRecords(metadataPath: string, log: Logger): Promise<ImageRecord[]> {
  log.info(`[image-gallery] Loading image data from ${metadataPath}`)

  let raw: string
  try {
    raw = await fs.readFile(metadataPath, 'utf8')
  } catch (err) {
    if (isNotFoundError(err)) {
      return reportFailure(log, metadataPath, `Image data file not found at ${metadataPath}`)
    }
    return reportFailure(
      log,
      metadataPath,
      `Cannot read image data file ${metadataPath}: ${err instanceof Error ? err.message : String(err)}`
    )
  }

  let data: unknown
  try {
    // A repeated key keeps its last value instead of failing the whole store.
    data = parseYaml(raw, { uniqueKeys: false }) as unknown
  } catch (err) {
    return reportFailure(
      log,
      metadataPath,
      `Error parsing YAML file ${metadataPath}: ${err instanceof Error ? err.message : String(err)}`
    )
  }

  if (!isImageRecord(data)) {
    return reportFailure(log, metadataPath, `Image data file ${metadataPath} must contain a mapping`)
  }

  const images = data['images']
  if (images === undefined || images === null) return []
  if (!Array.isArray(images)) {
    return reportFailure(log, metadataPath, `'images' in ${metadataPath} must be a sequence`)
  }

  return images.filter(isImageRecord)
}
