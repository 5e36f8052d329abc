import { describe, expect, it, vi } from 'vitest'

import { card, image } from './nodes.js'
import type { GallerySource } from './pipeline.js'
import { applyGalleryTransform, findNodesByType, rewriteAsGrid } from './splice.js'
import type { DocumentNode, ImageRecord, RenderResult } from '../types.js'

function placeholder(): DocumentNode {
  return { type: 'image-gallery', children: [] }
}

function createSource(records: ImageRecord[]) {
  return {
    loadRecords: vi.fn(async () => records),
    renderCard: vi.fn(
      async (record: ImageRecord): Promise<RenderResult> => ({
        ok: true,
        card: card([image(`images/${String(record['filename'])}`, '')])
      })
    ),
    concurrency: 2,
    log: { info: vi.fn(), warn: vi.fn(), error: vi.fn() }
  } satisfies GallerySource
}

describe('findNodesByType', () => {
  it('finds nested matches depth-first', () => {
    const first = placeholder()
    const nested = placeholder()
    const tree: DocumentNode = {
      type: 'root',
      children: [
        { type: 'paragraph', children: [{ type: 'text', value: 'intro' }] },
        first,
        { type: 'section', children: [{ type: 'block', children: [nested] }] }
      ]
    }

    const found = findNodesByType(tree, 'image-gallery')

    expect(found).toHaveLength(2)
    expect(found[0]).toBe(first)
    expect(found[1]).toBe(nested)
  })

  it('matches the root and skips values that are not nodes', () => {
    const tree: DocumentNode = JSON.parse('{"type":"image-gallery","children":[null,"text",{"kind":"image-gallery"}]}')
    const found = findNodesByType(tree, 'image-gallery')
    expect(found).toHaveLength(1)
    expect(found[0]).toBe(tree)
  })
})

describe('rewriteAsGrid', () => {
  it('replaces every field but keeps the node object', () => {
    const node: DocumentNode = { type: 'image-gallery', children: [], name: 'gallery', position: { start: 1 } }
    const cards = [card([image('images/a.png', '')])]

    rewriteAsGrid(node, cards)

    expect(node).toEqual({ type: 'grid', columns: [1, 1, 1, 2], children: cards })
    expect('position' in node).toBe(false)
  })
})

describe('applyGalleryTransform', () => {
  it('leaves a tree without placeholders untouched and loads nothing', async () => {
    const tree: DocumentNode = {
      type: 'root',
      children: [{ type: 'heading', depth: 1, children: [{ type: 'text', value: 'Photos' }] }]
    }
    const before = structuredClone(tree)
    const source = createSource([{ filename: 'a.png' }])

    const result = await applyGalleryTransform(tree, source)

    expect(result).toBe(tree)
    expect(result).toEqual(before)
    expect(source.loadRecords).not.toHaveBeenCalled()
    expect(source.renderCard).not.toHaveBeenCalled()
    expect(source.log.info).toHaveBeenCalledWith("[image-gallery] No 'image-gallery' directive found in the document.")
  })

  it('renders once and gives every placeholder the same cards', async () => {
    const galleries = [placeholder(), placeholder(), placeholder()]
    const intro = { type: 'paragraph', children: [{ type: 'text', value: 'intro' }] }
    const section: DocumentNode = { type: 'section', children: [galleries[1], galleries[2]] }
    const tree: DocumentNode = { type: 'root', children: [intro, galleries[0], section] }
    const source = createSource([{ filename: 'a.png' }, { filename: 'b.png' }])

    await applyGalleryTransform(tree, source)

    expect(source.loadRecords).toHaveBeenCalledTimes(1)
    expect(source.renderCard).toHaveBeenCalledTimes(2)

    const expected = {
      type: 'grid',
      columns: [1, 1, 1, 2],
      children: [card([image('images/a.png', '')]), card([image('images/b.png', '')])]
    }
    for (const node of galleries) {
      expect(node).toEqual(expected)
    }
    expect(tree.children?.[1]).toBe(galleries[0])
    expect(section.children).toEqual([galleries[1], galleries[2]])
    expect(section.children?.[0]).toBe(galleries[1])
    expect(tree.children?.[0]).toBe(intro)
    expect(intro).toEqual({ type: 'paragraph', children: [{ type: 'text', value: 'intro' }] })
    // Each gallery owns its cards.
    expect(galleries[0].children?.[0]).not.toBe(galleries[1].children?.[0])
  })

  it('turns the placeholders into empty grids when nothing renders', async () => {
    const tree: DocumentNode = { type: 'root', children: [placeholder()] }
    await applyGalleryTransform(tree, createSource([]))
    expect(tree).toEqual({ type: 'root', children: [{ type: 'grid', columns: [1, 1, 1, 2], children: [] }] })
  })
})
