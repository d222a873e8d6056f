import { Command } from 'commander'
import type { DigestConfig } from '../../config'
import type { SummarizeLogger } from '../../log'
import {
  summarizeFile,
  type SummarizeFileResult,
} from '../../summarize/pipeline'
import { TempFileTracker } from '../../summarize/temp-files'
import { formatError, printError, runCommand, type CliErrorPayload } from '../io'
import {
  parseNonNegativeInteger,
  parseOptionalPositiveInteger,
  resolveConfig,
  resolveLogger,
  type ConfigCliOptions,
} from './shared'

type SummarizeCliOptions = ConfigCliOptions & {
  maxDepth?: string
  maxChars?: string
  maxInputChars?: string
  maxTokens?: string
  recursive: boolean
  tags: boolean
}

export type SummarizeRunEntry =
  | ({ ok: true } & SummarizeFileResult)
  | { ok: false; inputPath: string; error: CliErrorPayload }

export type SummarizeRunResult = {
  entries: SummarizeRunEntry[]
  interrupted: boolean
}

export function createSummarizeCommand(): Command {
  return new Command('summarize')
    .description(
      'Summarize markdown, text or subtitle files into <name>.summary.md',
    )
    .argument('<files...>', 'Input files (.md, .markdown, .txt, .srt)')
    .option('-c, --config <path>', 'Config file (default: ./.llm-digest.yml)')
    .option('--base-url <url>', 'OpenAI-compatible API root')
    .option('-m, --model <model>', 'Model identifier')
    .option('--timeout <ms>', 'Timeout for each model call')
    .option('--max-depth <n>', 'Maximum number of nested splits')
    .option('--max-chars <n>', 'Split text longer than this before calling')
    .option(
      '--max-input-chars <n>',
      'Read cap when recursive splitting is off',
    )
    .option('--max-tokens <n>', 'Cap on output tokens per model call')
    .option('--no-recursive', 'Send the (capped) document in a single call')
    .option('--no-tags', 'Skip tag frontmatter for documents')
    .action(
      async (files: string[], options: SummarizeCliOptions, command: Command) => {
        await runCommand(
          command,
          async () =>
            summarizeAll(
              files,
              resolveConfig(options, toOverrides(options)),
              resolveLogger(command),
            ),
          { render: renderSummarizeResult, exitCode: summarizeExitCode },
        )
      },
    )
}

/**
 * Runs files one after another, each with its own tracker. SIGINT aborts
 * the call in flight, sweeps the active tracker and skips remaining files.
 */
export async function summarizeAll(
  files: string[],
  config: DigestConfig,
  logger: SummarizeLogger,
): Promise<SummarizeRunResult> {
  const controller = new AbortController()
  let tracker: TempFileTracker | null = null
  const onInterrupt = () => {
    controller.abort()
    const removed = tracker?.sweep() ?? []
    logger.warn(
      `Interrupted by user; removed ${removed.length} temporary file(s).`,
    )
  }
  process.once('SIGINT', onInterrupt)

  const entries: SummarizeRunEntry[] = []
  try {
    for (const file of files) {
      if (controller.signal.aborted) {
        break
      }
      tracker = new TempFileTracker({ logger })
      try {
        const result = await summarizeFile(file, {
          config,
          logger,
          tracker,
          signal: controller.signal,
        })
        entries.push({ ok: true, ...result })
      } catch (error) {
        entries.push({ ok: false, inputPath: file, error: formatError(error) })
      }
    }
  } finally {
    process.removeListener('SIGINT', onInterrupt)
  }

  return { entries, interrupted: controller.signal.aborted }
}

function toOverrides(options: SummarizeCliOptions): Partial<DigestConfig> {
  return {
    max_depth:
      options.maxDepth === undefined
        ? undefined
        : parseNonNegativeInteger(
            options.maxDepth,
            'Max depth must be a non-negative integer.',
          ),
    max_tokens: parseOptionalPositiveInteger(
      options.maxTokens,
      'Max tokens must be a positive integer.',
    ),
    max_chars_safe: parseOptionalPositiveInteger(
      options.maxChars,
      'Max chars must be a positive integer.',
    ),
    max_input_chars: parseOptionalPositiveInteger(
      options.maxInputChars,
      'Max input chars must be a positive integer.',
    ),
    // Commander defaults negatable flags to true; only an explicit --no-* overrides config.
    recursive: options.recursive === false ? false : undefined,
    tags: options.tags === false ? false : undefined,
  }
}

function summarizeExitCode(result: SummarizeRunResult): number {
  if (result.interrupted) return 130
  return result.entries.some((entry) => !entry.ok) ? 1 : 0
}

function renderSummarizeResult(result: SummarizeRunResult): void {
  const succeeded = result.entries.filter((entry) => entry.ok).length
  for (const entry of result.entries) {
    if (entry.ok) {
      console.log(`${entry.inputPath} -> ${entry.outputPath}`)
      continue
    }
    printError(entry.error, `Error (${entry.inputPath})`)
  }
  if (result.interrupted) {
    console.log('Interrupted; remaining files were skipped.')
  }
  console.log(`Summarized ${succeeded} of ${result.entries.length} file(s).`)
}
