/**
 * Locate placeholder nodes and rewrite them in place as gallery grids.
 *
 * The caller keeps ownership of the tree: nodes are found first, then each one
 * is rewritten, so no node is mutated while the tree is being walked.
 */

import { GALLERY_COLUMNS, grid } from './nodes.js'
import { renderGallery, type GallerySource } from './pipeline.js'
import { PLACEHOLDER_TYPE } from '../plugin/spec.js'
import type { CardNode, DocumentNode } from '../types.js'

export function isDocumentNode(value: unknown): value is DocumentNode {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    'type' in value &&
    typeof value.type === 'string'
  )
}

/**
 * Depth-first, pre-order search for nodes of `type`.
 */
export function findNodesByType(root: DocumentNode, type: string): DocumentNode[] {
  const found: DocumentNode[] = []
  const visit = (node: DocumentNode): void => {
    if (node.type === type) found.push(node)
    const children: unknown = node.children
    if (!Array.isArray(children)) return
    for (const child of children) {
      if (isDocumentNode(child)) visit(child)
    }
  }
  visit(root)
  return found
}

/**
 * Replace every field of `node` with a grid of `cards`, keeping the object itself.
 */
export function rewriteAsGrid(node: DocumentNode, cards: CardNode[]): void {
  for (const key of Object.keys(node)) {
    delete node[key]
  }
  Object.assign(node, grid(GALLERY_COLUMNS, cards))
}

export async function applyGalleryTransform(tree: DocumentNode, source: GallerySource): Promise<DocumentNode> {
  const galleries = findNodesByType(tree, PLACEHOLDER_TYPE)
  if (galleries.length === 0) {
    source.log.info(`[image-gallery] No '${PLACEHOLDER_TYPE}' directive found in the document.`)
    return tree
  }

  const cards = await renderGallery(source)
  for (const node of galleries) {
    rewriteAsGrid(node, structuredClone(cards))
  }
  return tree
}
