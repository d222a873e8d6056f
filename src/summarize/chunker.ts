import { writeFileSync } from 'node:fs'
import { basename, dirname, extname, join } from 'node:path'
import { ChunkWriteError, InsufficientContentError } from '../errors'
import type { TempFileTracker } from './temp-files'

/** Reserved filename prefix for chunk files written beside the source. */
export const TEMP_FILE_PREFIX = '._temp_'

/**
 * Text plus the path that identifies it. The path names where chunks are
 * written; it need not exist on disk (subtitle text is derived, not read).
 */
export type SourceDocument = {
  path: string
  text: string
}

export type DocumentChunk = SourceDocument & {
  part: 1 | 2
  lineCount: number
}

/**
 * Splits text into lines that keep their terminators, so joining the result
 * gives back the input exactly.
 */
export function splitLines(text: string): string[] {
  return text.match(/[^\n]*\n|[^\n]+$/g) ?? []
}

export function chunkPath(sourcePath: string, part: 1 | 2): string {
  const extension = extname(sourcePath).toLowerCase() === '.md' ? '.md' : '.txt'
  let stem = basename(sourcePath, extname(sourcePath))
  if (stem.startsWith(TEMP_FILE_PREFIX)) {
    stem = stem.slice(TEMP_FILE_PREFIX.length)
  }
  return join(dirname(sourcePath), `${TEMP_FILE_PREFIX}${stem}_part${part}${extension}`)
}

/**
 * Bisects a document by line count (the first half takes the extra line)
 * and writes both halves as chunk files registered with the tracker.
 */
export function splitDocument(
  document: SourceDocument,
  tracker: TempFileTracker,
): [DocumentChunk, DocumentChunk] {
  const lines = splitLines(document.text)
  if (lines.length < 2) {
    throw new InsufficientContentError(lines.length)
  }

  const mid = Math.ceil(lines.length / 2)
  const first = writeChunk(document.path, 1, lines.slice(0, mid), tracker)
  try {
    const second = writeChunk(document.path, 2, lines.slice(mid), tracker)
    return [first, second]
  } catch (error) {
    tracker.release(first.path)
    throw error
  }
}

function writeChunk(
  sourcePath: string,
  part: 1 | 2,
  lines: string[],
  tracker: TempFileTracker,
): DocumentChunk {
  const path = chunkPath(sourcePath, part)
  const text = lines.join('')
  // Registered first so a partially written file is still removed.
  tracker.register(path)
  try {
    writeFileSync(path, text, 'utf-8')
  } catch (error) {
    tracker.release(path)
    throw new ChunkWriteError(path, error)
  }
  return { path, text, part, lineCount: lines.length }
}
