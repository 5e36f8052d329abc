/**
 * Render one metadata record as a `card` node.
 *
 * Failures are returned, never thrown: one broken record must not take the
 * rest of the gallery down with it.
 */

import path from 'node:path'
import { z } from 'zod'
import { formatError } from '../utils/errors.js'
import { card, cardDescription, div, image, span, text } from './nodes.js'
import { labelStyle } from './style.js'
import type { CardNode, ImageEntry, ImageRecord, RenderResult } from '../types.js'

export interface AssetPaths {
  /** Directory image urls are expressed relative to. */
  baseDir: string
  /** Directory `filename` is resolved against. */
  imagesDir: string
}

const TagSchema = z.union([z.string(), z.number(), z.boolean()]).transform(String)

const ImageEntrySchema = z
  .object({
    filename: z.string().min(1, 'filename must not be empty'),
    'alt-text': z.string().nullish(),
    tags: z.array(TagSchema).nullish()
  })
  .transform(
    (r): ImageEntry => ({
      filename: r.filename,
      altText: r['alt-text'] ?? '',
      tags: r.tags ?? []
    })
  )

export function parseImageEntry(record: ImageRecord): ImageEntry {
  const parsed = ImageEntrySchema.safeParse(record)
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(record)'}: ${i.message}`)
    throw new Error(`Invalid image entry: ${issues.join('; ')}`)
  }
  return parsed.data
}

function toPosix(p: string): string {
  return p.split(path.sep).join('/')
}

/**
 * Express `filename` relative to the base directory with `/` separators.
 *
 * A relative filename is appended to the assets directory segment by segment,
 * without collapsing `..`: `../x.png` becomes `images/../x.png`. Nothing keeps
 * it inside `imagesDir`. An absolute filename must lie under the base directory.
 */
export function resolveImageUrl(paths: AssetPaths, filename: string): string {
  if (path.isAbsolute(filename)) {
    const rel = path.relative(paths.baseDir, filename)
    if (rel === '..' || rel.startsWith(`..${path.sep}`) || path.isAbsolute(rel)) {
      throw new Error(`${filename} is not inside ${paths.baseDir}`)
    }
    return toPosix(rel)
  }

  const assetsDir = toPosix(path.relative(paths.baseDir, paths.imagesDir))
  return [...assetsDir.split('/'), ...toPosix(filename).split('/')]
    .filter((segment) => segment !== '' && segment !== '.')
    .join('/')
}

export function buildCard(entry: ImageEntry, url: string): CardNode {
  const style = labelStyle()
  const tagSpans = entry.tags.map((tag) => span([text(tag)], style))

  const children: CardNode['children'] = [image(url, entry.altText), div(tagSpans)]
  if (entry.altText) {
    children.push(cardDescription([text(entry.altText)]))
  }
  return card(children)
}

function recordLabel(record: ImageRecord): string {
  const filename = record['filename']
  if (typeof filename === 'string' || typeof filename === 'number') return String(filename)
  return 'Unknown'
}

export function renderCard(record: ImageRecord, paths: AssetPaths): RenderResult {
  try {
    const entry = parseImageEntry(record)
    const url = resolveImageUrl(paths, entry.filename)
    return { ok: true, card: buildCard(entry, url) }
  } catch (err) {
    return { ok: false, filename: recordLabel(record), error: formatError(err) }
  }
}
