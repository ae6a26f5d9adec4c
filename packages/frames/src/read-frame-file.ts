import * as fs from 'fs'
import { debug } from '@pitch-replay/utils'
import { DataFormatError } from './errors'
import { loadFrames, type FrameStore } from './frame-store'

const log = debug('read-frame-file', true)

/**
 * Read and validate a JSON frame file in one synchronous call.
 * File-system errors propagate unchanged; unparseable JSON and malformed
 * frames fail with DataFormatError.
 */
export function readFrameFile(path: string): FrameStore {
  const text = fs.readFileSync(path, 'utf-8')

  let raw: unknown
  try {
    raw = JSON.parse(text)
  } catch (err) {
    throw new DataFormatError(`invalid JSON in ${path}`, { cause: err })
  }

  const store = loadFrames(raw)
  log(`loaded ${store.frameCount()} frames from ${path}`)
  return store
}
