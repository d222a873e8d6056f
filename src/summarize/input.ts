import { existsSync, readFileSync, statSync } from 'node:fs'
import { basename, dirname, extname, join } from 'node:path'
import { SummarizeError } from '../errors'
import type { SummaryMode } from './prompts'

export const DEFAULT_MAX_INPUT_CHARS = 16000
export const TRUNCATION_MARKER = '\n\n[TRUNCATED]'
export const SUMMARY_SUFFIX = '.summary.md'

const DOCUMENT_EXTENSIONS = new Set(['.md', '.markdown', '.txt'])
const SUBTITLE_EXTENSIONS = new Set(['.srt'])

export type InputKind = 'document' | 'subtitle'

export type LoadedInput = {
  path: string
  kind: InputKind
  mode: SummaryMode
  text: string
  truncated: boolean
}

export function detectInputKind(path: string): InputKind | null {
  const extension = extname(path).toLowerCase()
  if (DOCUMENT_EXTENSIONS.has(extension)) return 'document'
  if (SUBTITLE_EXTENSIONS.has(extension)) return 'subtitle'
  return null
}

/** notes.md -> notes.summary.md, talk.srt -> talk.summary.md */
export function summaryOutputPath(inputPath: string): string {
  const stem = basename(inputPath, extname(inputPath))
  return join(dirname(inputPath), `${stem}${SUMMARY_SUFFIX}`)
}

/**
 * Reads a document or subtitle file. With maxChars set the text is cut and
 * marked; recursive runs pass null and get everything.
 */
export function loadInput(
  path: string,
  options: { maxChars: number | null },
): LoadedInput {
  const kind = detectInputKind(path)
  if (!kind) {
    throw new SummarizeError(
      'INVALID_INPUT',
      `Unsupported input file: ${path}`,
      ['Use a .md, .markdown, .txt or .srt file.'],
    )
  }
  if (!existsSync(path) || !statSync(path).isFile()) {
    throw new SummarizeError('INVALID_INPUT', `Input file not found: ${path}`)
  }

  const raw = readFileSync(path, 'utf-8')
  const full = kind === 'subtitle' ? extractSubtitleText(raw) : raw
  if (!full.trim()) {
    throw new SummarizeError('EMPTY_INPUT', `No text found in ${path}`)
  }

  const mode: SummaryMode = kind === 'subtitle' ? 'transcript' : 'document'
  const limit = options.maxChars
  if (limit !== null && full.length > limit) {
    return {
      path,
      kind,
      mode,
      text: `${full.slice(0, limit)}${TRUNCATION_MARKER}`,
      truncated: true,
    }
  }
  return { path, kind, mode, text: full, truncated: false }
}

const TIMING_LINE = /^\d{1,2}:\d{2}:\d{2}[,.]\d{1,3}\s*-->\s*\d{1,2}:\d{2}:\d{2}[,.]\d{1,3}/

/**
 * One line per SRT cue: the cue's text lines joined by spaces. Index and
 * timing lines are removed; blocks without a timing line and empty cues
 * are dropped.
 */
export function extractSubtitleText(srt: string): string {
  const cues = srt
    .replace(/^\uFEFF/, '')
    .replace(/\r\n?/g, '\n')
    .split(/\n\s*\n/)

  const lines: string[] = []
  for (const cue of cues) {
    const cueLines = cue.split('\n').map((line) => line.trim())
    const timingIndex = cueLines.findIndex((line) => TIMING_LINE.test(line))
    if (timingIndex === -1) {
      continue
    }
    const text = cueLines
      .slice(timingIndex + 1)
      .filter((line) => line.length > 0)
      .join(' ')
      .trim()
    if (text) {
      lines.push(text)
    }
  }
  return lines.join('\n')
}
