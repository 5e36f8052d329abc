import type { StyleMap } from '../types.js'

const LAYOUT_STYLE = {
  display: 'inline-block',
  borderRadius: 8,
  color: 'white',
  padding: 5,
  margin: 5
} as const

const LABEL_STYLE: StyleMap = Object.freeze({ background: '#009e9cff', ...LAYOUT_STYLE })

/** Style shared by every tag label. */
export function labelStyle(): StyleMap {
  return LABEL_STYLE
}
