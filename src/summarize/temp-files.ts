import { rmSync } from 'node:fs'
import { silentLogger, type SummarizeLogger } from '../log'

/**
 * Tracks the chunk files of one top-level summarize call. Every file the
 * chunker writes is registered here, released by the split that created it,
 * and anything left over is removed by sweep() on the way out.
 *
 * Single-threaded use only: the recursion never runs two children at once.
 */
export class TempFileTracker {
  private readonly paths = new Set<string>()
  private readonly logger: SummarizeLogger

  constructor(options: { logger?: SummarizeLogger } = {}) {
    this.logger = options.logger ?? silentLogger
  }

  get size(): number {
    return this.paths.size
  }

  has(path: string): boolean {
    return this.paths.has(path)
  }

  list(): string[] {
    return Array.from(this.paths)
  }

  register(path: string): void {
    this.paths.add(path)
  }

  /**
   * Deletes a tracked file and forgets it. Unknown paths are ignored. A file
   * that cannot be deleted stays tracked so sweep() gets another try.
   */
  release(path: string): boolean {
    if (!this.paths.has(path)) {
      return false
    }
    try {
      rmSync(path, { force: true })
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error)
      this.logger.warn(`Could not delete temporary file ${path}: ${message}`)
      return false
    }
    this.paths.delete(path)
    return true
  }

  /** Releases everything still tracked and returns the paths removed. */
  sweep(): string[] {
    const removed: string[] = []
    for (const path of this.list()) {
      if (this.release(path)) {
        removed.push(path)
      }
    }
    return removed
  }
}

export async function withTempFileTracker<T>(
  run: (tracker: TempFileTracker) => Promise<T>,
  options: { tracker?: TempFileTracker; logger?: SummarizeLogger } = {},
): Promise<T> {
  const tracker =
    options.tracker ?? new TempFileTracker({ logger: options.logger })
  try {
    return await run(tracker)
  } finally {
    tracker.sweep()
  }
}
