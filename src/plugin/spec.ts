/**
 * Static plugin declaration reported to the host.
 */

import type { DocumentNode } from '../types.js'

export const PLACEHOLDER_TYPE = 'image-gallery'
export const DIRECTIVE_NAME = 'image-gallery'

export interface DirectiveSpec {
  name: string
  doc: string
}

export interface TransformSpec {
  stage: 'document' | 'project'
}

export interface PluginSpec {
  name: string
  directives: DirectiveSpec[]
  transforms: TransformSpec[]
}

export const imageGalleryDirective: DirectiveSpec = {
  name: DIRECTIVE_NAME,
  doc: 'A directive for embedding a gallery of images with alt text and tags.'
}

export const imageGalleryTransform: TransformSpec = {
  stage: 'document'
}

export const PLUGIN_SPEC: PluginSpec = {
  name: 'Image Gallery Plugin',
  directives: [imageGalleryDirective],
  transforms: [imageGalleryTransform]
}

/** The node a validated directive expands to, before the transform runs. */
export function createPlaceholder(): DocumentNode {
  return { type: PLACEHOLDER_TYPE, children: [] }
}
