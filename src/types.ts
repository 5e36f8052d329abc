/**
 * Shared types used across the image gallery plugin.
 */

/** Console-like logger. Bound to stderr: stdout carries the protocol payload only. */
export type Logger = Pick<Console, 'info' | 'warn' | 'error'>

export interface CommandContext {
  /** Absolute path of the plugin (base directory for image urls). */
  projectRoot: string
  /** Timestamp for this invocation */
  now: Date
  log: Logger
  config: ResolvedConfig
}

export interface ResolvedConfig {
  /** Absolute assets directory. */
  imagesDir: string
  /** Absolute path of the YAML metadata store. */
  metadataPath: string
  concurrency: number
  runLog: boolean
}

/**
 * Generic document tree node (unist-like): a `type` plus arbitrary fields,
 * with `children` on container nodes.
 */
export interface DocumentNode {
  type: string
  children?: DocumentNode[]
  [key: string]: unknown
}

/** One raw item of the `images` sequence in the metadata store. */
export type ImageRecord = Record<string, unknown>

export interface ImageEntry {
  filename: string
  altText: string
  tags: string[]
}

export type StyleMap = Readonly<Record<string, string | number>>

export interface TextNode {
  type: 'text'
  value: string
}

export interface SpanNode {
  type: 'span'
  style: StyleMap
  children: TextNode[]
}

export interface DivNode {
  type: 'div'
  children: SpanNode[]
}

export interface ImageNode {
  type: 'image'
  url: string
  alt: string
}

export interface CardDescriptionNode {
  type: 'cardDescription'
  children: TextNode[]
}

export interface CardNode {
  type: 'card'
  children: Array<ImageNode | DivNode | CardDescriptionNode>
}

export interface GridNode {
  type: 'grid'
  columns: number[]
  children: CardNode[]
}

export type RenderResult =
  | { ok: true; card: CardNode }
  | { ok: false; filename: string; error: string }
