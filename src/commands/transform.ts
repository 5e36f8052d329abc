/**
 * Document transform: expand every `image-gallery` placeholder into a grid of
 * image cards. The transform name is accepted but not used: the plugin declares
 * a single transform.
 */

import { renderCard } from '../gallery/card.js'
import { loadImageRecords } from '../gallery/metadata.js'
import type { GallerySource } from '../gallery/pipeline.js'
import { applyGalleryTransform, isDocumentNode } from '../gallery/splice.js'
import { InputError } from '../utils/errors.js'
import type { CommandContext, DocumentNode } from '../types.js'

export function createGallerySource(ctx: CommandContext): GallerySource {
  const paths = { baseDir: ctx.projectRoot, imagesDir: ctx.config.imagesDir }
  return {
    loadRecords: () => loadImageRecords(ctx.config.metadataPath, ctx.log),
    renderCard: async (record) => renderCard(record, paths),
    concurrency: ctx.config.concurrency,
    log: ctx.log
  }
}

export async function transformCommand(
  ctx: CommandContext,
  _name: string,
  input: unknown,
  source: GallerySource = createGallerySource(ctx)
): Promise<DocumentNode> {
  if (!isDocumentNode(input)) {
    throw new InputError('[image-gallery] Transform input must be a document node with a string `type`')
  }
  return applyGalleryTransform(input, source)
}
