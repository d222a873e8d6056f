import {
  CombineError,
  MaxDepthExceededError,
  throwIfInterrupted,
} from '../errors'
import { silentLogger, type SummarizeLogger } from '../log'
import { splitDocument, type SourceDocument } from './chunker'
import type { Summarizer } from './summarizer'
import type { TempFileTracker } from './temp-files'

export const DEFAULT_MAX_DEPTH = 3
export const DEFAULT_MAX_CHARS_SAFE = 8000

export type RecursiveSummarizeOptions = {
  summarizer: Summarizer
  tracker: TempFileTracker
  /** Number of splits allowed along one branch */
  maxDepth?: number
  /** Longer text is split before any model call */
  maxCharsSafe?: number
  logger?: SummarizeLogger
  signal?: AbortSignal
}

type ResolvedOptions = Required<Omit<RecursiveSummarizeOptions, 'signal'>> & {
  signal?: AbortSignal
}

type SplitReason = 'oversized' | 'rejected'

/**
 * Summarizes a document, bisecting it into chunk files whenever it is longer
 * than maxCharsSafe or the model rejects it as too large. Halves are handled
 * depth-first, left before right, and merged in document order. Chunk files
 * created by a split are released before that split returns, on every path.
 */
export async function summarizeRecursive(
  document: SourceDocument,
  options: RecursiveSummarizeOptions,
): Promise<string> {
  const resolved: ResolvedOptions = {
    summarizer: options.summarizer,
    tracker: options.tracker,
    maxDepth: options.maxDepth ?? DEFAULT_MAX_DEPTH,
    maxCharsSafe: options.maxCharsSafe ?? DEFAULT_MAX_CHARS_SAFE,
    logger: options.logger ?? silentLogger,
    signal: options.signal,
  }
  return summarizeNode(document, 0, resolved)
}

async function summarizeNode(
  document: SourceDocument,
  depth: number,
  options: ResolvedOptions,
): Promise<string> {
  throwIfInterrupted(options.signal)
  const length = document.text.length

  if (length > options.maxCharsSafe) {
    if (depth >= options.maxDepth) {
      throw new MaxDepthExceededError(
        options.maxDepth,
        `A segment of ${length} chars is still longer than ${options.maxCharsSafe} after ${options.maxDepth} levels of splitting.`,
      )
    }
    return splitAndMerge(document, depth, 'oversized', options)
  }

  const outcome = await options.summarizer.summarize(
    document.text,
    options.signal,
  )
  throwIfInterrupted(options.signal)

  switch (outcome.kind) {
    case 'ok':
      return outcome.summary
    case 'failed':
      throw outcome.error
    case 'too-large':
      if (depth >= options.maxDepth) {
        throw new MaxDepthExceededError(
          options.maxDepth,
          `The model still rejects a ${length} char segment as too large: ${outcome.detail}`,
        )
      }
      return splitAndMerge(document, depth, 'rejected', options)
  }
}

async function splitAndMerge(
  document: SourceDocument,
  depth: number,
  reason: SplitReason,
  options: ResolvedOptions,
): Promise<string> {
  const { logger, maxDepth, summarizer, tracker } = options
  const level = `depth ${depth + 1}/${maxDepth}`

  if (reason === 'oversized') {
    logger.info(
      `Text too long (${document.text.length} chars), splitting into 2 parts (${level})...`,
    )
  } else {
    logger.info(
      `Model rejected ${document.text.length} chars as too large, forcing split (${level})...`,
    )
  }

  const [first, second] = splitDocument(document, tracker)
  try {
    logger.info(`  Processing part 1/2 (${level})...`)
    const left = await summarizeNode(first, depth + 1, options)
    logger.info(`  Processing part 2/2 (${level})...`)
    const right = await summarizeNode(second, depth + 1, options)

    logger.info(`  Combining summaries (${level})...`)
    const merged = await summarizer.combine(left, right, options.signal)
    throwIfInterrupted(options.signal)
    switch (merged.kind) {
      case 'ok':
        return merged.summary
      case 'too-large':
        throw new CombineError(new Error(merged.detail))
      case 'failed':
        throw new CombineError(merged.error)
    }
  } finally {
    tracker.release(first.path)
    tracker.release(second.path)
  }
}
