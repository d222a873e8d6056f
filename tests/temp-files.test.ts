import { afterEach, beforeEach, describe, expect, test } from 'vitest'
import { existsSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs'
import { join } from 'node:path'
import { tmpdir } from 'node:os'

import {
  TempFileTracker,
  withTempFileTracker,
} from '../src/summarize/temp-files'

let root: string

beforeEach(() => {
  root = mkdtempSync(join(tmpdir(), 'llm-digest-temp-files-'))
})

afterEach(() => {
  rmSync(root, { recursive: true, force: true })
})

function touch(name: string): string {
  const path = join(root, name)
  writeFileSync(path, 'chunk', 'utf-8')
  return path
}

describe('TempFileTracker', () => {
  test('release deletes a tracked file once', () => {
    const tracker = new TempFileTracker()
    const path = touch('a.md')
    tracker.register(path)

    expect(tracker.release(path)).toBe(true)
    expect(existsSync(path)).toBe(false)
    expect(tracker.size).toBe(0)
    expect(tracker.release(path)).toBe(false)
  })

  test('release ignores paths it does not track', () => {
    const tracker = new TempFileTracker()
    const path = touch('user-file.md')

    expect(tracker.release(path)).toBe(false)
    expect(existsSync(path)).toBe(true)
  })

  test('release forgets a tracked file that is already gone', () => {
    const tracker = new TempFileTracker()
    const path = join(root, 'never-written.md')
    tracker.register(path)

    expect(tracker.release(path)).toBe(true)
    expect(tracker.has(path)).toBe(false)
  })

  test('failed deletion keeps the path tracked and warns', () => {
    const warnings: string[] = []
    const tracker = new TempFileTracker({
      logger: { info: () => {}, warn: (message) => warnings.push(message) },
    })
    // rmSync without recursive refuses a directory.
    const path = root
    tracker.register(path)

    expect(tracker.release(path)).toBe(false)
    expect(tracker.has(path)).toBe(true)
    expect(warnings).toHaveLength(1)
    expect(warnings[0]).toContain(`Could not delete temporary file ${path}`)
  })

  test('sweep removes everything still tracked', () => {
    const tracker = new TempFileTracker()
    const first = touch('one.md')
    const second = touch('two.md')
    tracker.register(first)
    tracker.register(second)

    expect(tracker.sweep()).toEqual([first, second])
    expect(existsSync(first)).toBe(false)
    expect(existsSync(second)).toBe(false)
    expect(tracker.sweep()).toEqual([])
  })
})

describe('withTempFileTracker', () => {
  test('sweeps after success', async () => {
    const path = touch('ok.md')
    const result = await withTempFileTracker(async (tracker) => {
      tracker.register(path)
      return 'done'
    })

    expect(result).toBe('done')
    expect(existsSync(path)).toBe(false)
  })

  test('sweeps when the callback throws', async () => {
    const path = touch('boom.md')
    const tracker = new TempFileTracker()

    await expect(
      withTempFileTracker(
        async (active) => {
          active.register(path)
          throw new Error('boom')
        },
        { tracker },
      ),
    ).rejects.toThrow('boom')
    expect(existsSync(path)).toBe(false)
    expect(tracker.size).toBe(0)
  })
})
