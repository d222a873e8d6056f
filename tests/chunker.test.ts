import { afterEach, beforeEach, describe, expect, test } from 'vitest'
import {
  existsSync,
  mkdirSync,
  mkdtempSync,
  readFileSync,
  rmSync,
} from 'node:fs'
import { join } from 'node:path'
import { tmpdir } from 'node:os'

import {
  chunkPath,
  splitDocument,
  splitLines,
  TEMP_FILE_PREFIX,
} from '../src/summarize/chunker'
import { TempFileTracker } from '../src/summarize/temp-files'
import { ChunkWriteError, InsufficientContentError } from '../src/errors'

let root: string

beforeEach(() => {
  root = mkdtempSync(join(tmpdir(), 'llm-digest-chunker-'))
})

afterEach(() => {
  rmSync(root, { recursive: true, force: true })
})

describe('splitLines', () => {
  test('keeps line terminators', () => {
    expect(splitLines('a\nb\nc')).toEqual(['a\n', 'b\n', 'c'])
    expect(splitLines('a\nb\n')).toEqual(['a\n', 'b\n'])
  })

  test('keeps blank lines', () => {
    expect(splitLines('a\n\nb')).toEqual(['a\n', '\n', 'b'])
  })

  test('returns nothing for empty text', () => {
    expect(splitLines('')).toEqual([])
  })
})

describe('chunkPath', () => {
  test('prefixes the source stem and numbers the part', () => {
    expect(chunkPath(join(root, 'notes.md'), 1)).toBe(
      join(root, '._temp_notes_part1.md'),
    )
    expect(chunkPath(join(root, 'notes.md'), 2)).toBe(
      join(root, '._temp_notes_part2.md'),
    )
  })

  test('nested chunks extend the parent name without repeating the prefix', () => {
    const parent = join(root, '._temp_notes_part1.md')
    expect(chunkPath(parent, 2)).toBe(join(root, '._temp_notes_part1_part2.md'))
  })

  test('non-markdown sources produce text chunks', () => {
    expect(chunkPath(join(root, 'talk.srt'), 1)).toBe(
      join(root, '._temp_talk_part1.txt'),
    )
  })
})

describe('splitDocument', () => {
  test('odd line count gives the first half the extra line', () => {
    const text = 'one\ntwo\nthree\nfour\nfive\n'
    const tracker = new TempFileTracker()
    const [first, second] = splitDocument(
      { path: join(root, 'notes.md'), text },
      tracker,
    )

    expect(first.lineCount).toBe(3)
    expect(second.lineCount).toBe(2)
    expect(first.text).toBe('one\ntwo\nthree\n')
    expect(second.text).toBe('four\nfive\n')
    expect(first.text + second.text).toBe(text)
    expect(first.part).toBe(1)
    expect(second.part).toBe(2)
  })

  test('even line count splits evenly without a trailing newline', () => {
    const text = 'a\nb\nc\nd'
    const tracker = new TempFileTracker()
    const [first, second] = splitDocument(
      { path: join(root, 'notes.md'), text },
      tracker,
    )

    expect(first.text).toBe('a\nb\n')
    expect(second.text).toBe('c\nd')
  })

  test('concatenated halves equal the original for every size', () => {
    for (let n = 2; n <= 9; n += 1) {
      const lines = Array.from({ length: n }, (_, i) => `line ${i}\n`)
      const text = lines.join('')
      const tracker = new TempFileTracker()
      const [first, second] = splitDocument(
        { path: join(root, `doc${n}.md`), text },
        tracker,
      )
      expect(first.text + second.text).toBe(text)
      expect(first.lineCount).toBe(Math.ceil(n / 2))
      expect(first.lineCount + second.lineCount).toBe(n)
      tracker.sweep()
    }
  })

  test('writes both chunks beside the source and registers them', () => {
    const tracker = new TempFileTracker()
    const [first, second] = splitDocument(
      { path: join(root, 'notes.md'), text: 'x\ny\n' },
      tracker,
    )

    expect(first.path).toBe(join(root, `${TEMP_FILE_PREFIX}notes_part1.md`))
    expect(readFileSync(first.path, 'utf-8')).toBe('x\n')
    expect(readFileSync(second.path, 'utf-8')).toBe('y\n')
    expect(tracker.list()).toEqual([first.path, second.path])
  })

  test('rejects documents with fewer than 2 lines', () => {
    const tracker = new TempFileTracker()
    expect(() =>
      splitDocument({ path: join(root, 'notes.md'), text: 'only one line' }, tracker),
    ).toThrow(InsufficientContentError)
    expect(() =>
      splitDocument({ path: join(root, 'notes.md'), text: '' }, tracker),
    ).toThrow('fewer than 2 lines')
    expect(tracker.size).toBe(0)
  })

  test('fails with ChunkWriteError when the directory is missing', () => {
    const tracker = new TempFileTracker()
    const source = join(root, 'missing', 'notes.md')
    expect(() => splitDocument({ path: source, text: 'a\nb\n' }, tracker)).toThrow(
      ChunkWriteError,
    )
    expect(tracker.size).toBe(0)
  })

  test('removes the first chunk when the second cannot be written', () => {
    const tracker = new TempFileTracker()
    const source = join(root, 'notes.md')
    const firstPath = chunkPath(source, 1)
    const secondPath = chunkPath(source, 2)
    // A directory in the way makes the second write fail.
    mkdirSync(secondPath)

    let caught: unknown
    try {
      splitDocument({ path: source, text: 'a\nb\n' }, tracker)
    } catch (error) {
      caught = error
    }

    expect(caught).toBeInstanceOf(ChunkWriteError)
    expect(caught instanceof ChunkWriteError && caught.path).toBe(secondPath)
    expect(existsSync(firstPath)).toBe(false)
    expect(tracker.has(firstPath)).toBe(false)
  })
})
