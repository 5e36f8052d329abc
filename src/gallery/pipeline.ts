/**
 * Concurrent render pipeline: load records once, render them on a bounded
 * ordered pool, keep the successes.
 */

import { logRenderError } from '../log/run-log.js'
import { mapPromisePool } from '../utils/promise-pool.js'
import type { CardNode, ImageRecord, Logger, RenderResult } from '../types.js'

export interface GallerySource {
  loadRecords(): Promise<ImageRecord[]>
  renderCard(record: ImageRecord): Promise<RenderResult>
  /** Pool size for the render phase. */
  concurrency: number
  log: Logger
}

export async function renderGallery(source: GallerySource): Promise<CardNode[]> {
  const records = (await source.loadRecords()).filter((r) => 'filename' in r)
  source.log.info(`[image-gallery] Found ${records.length} images to render.`)

  const results = await mapPromisePool(records, source.concurrency, (record) => source.renderCard(record))

  const cards: CardNode[] = []
  for (const result of results) {
    if (result.ok) {
      cards.push(result.card)
      continue
    }
    source.log.error(`[image-gallery] Error rendering image: ${result.filename}\n${result.error}`)
    logRenderError({ filename: result.filename, error: result.error })
  }
  return cards
}
