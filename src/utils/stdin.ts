import { text } from 'node:stream/consumers'
import type { Readable } from 'node:stream'
import { InputError } from './errors.js'

/**
 * Read a whole stream and parse it as one JSON document.
 */
export async function readJsonInput(stream: Readable): Promise<unknown> {
  const raw = await text(stream)
  try {
    return JSON.parse(raw) as unknown
  } catch (e) {
    throw new InputError(
      `[image-gallery] Failed to parse JSON from stdin: ${e instanceof Error ? e.message : String(e)}`
    )
  }
}
