/**
 * Builders for the document nodes the gallery emits.
 */

import type {
  CardDescriptionNode,
  CardNode,
  DivNode,
  GridNode,
  ImageNode,
  SpanNode,
  StyleMap,
  TextNode
} from '../types.js'

/** Four column-span zones: small, medium, large, extra-large screens. */
export const GALLERY_COLUMNS: readonly number[] = [1, 1, 1, 2]

export function text(value: string): TextNode {
  return { type: 'text', value }
}

export function span(children: TextNode[], style: StyleMap): SpanNode {
  return { type: 'span', style, children }
}

export function div(children: SpanNode[]): DivNode {
  return { type: 'div', children }
}

export function image(url: string, alt: string): ImageNode {
  return { type: 'image', url, alt }
}

export function cardDescription(children: TextNode[]): CardDescriptionNode {
  return { type: 'cardDescription', children }
}

export function card(children: CardNode['children']): CardNode {
  return { type: 'card', children }
}

export function grid(columns: readonly number[], children: CardNode[]): GridNode {
  return { type: 'grid', columns: [...columns], children }
}
