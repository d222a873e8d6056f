import { writeFileSync } from 'node:fs'
import {
  ServiceUnavailableError,
  SummarizeError,
  throwIfInterrupted,
} from '../errors'
import { createLlmClient, type LlmClient, type LlmModelList } from '../llm'
import { silentLogger, type SummarizeLogger } from '../log'
import { DEFAULT_CONFIG, toLlmConfig, type DigestConfig } from '../config'
import { loadInput, summaryOutputPath } from './input'
import { summarizeRecursive } from './recursive'
import { createSummarizer, type Summarizer } from './summarizer'
import { formatSummaryWithTags, generateTags } from './tags'
import { TempFileTracker, withTempFileTracker } from './temp-files'

export type SummarizeFileOptions = {
  config?: DigestConfig
  /** Injected for tests; built from config otherwise */
  client?: LlmClient
  summarizer?: Summarizer
  /** Supply one to sweep it from outside, e.g. on SIGINT */
  tracker?: TempFileTracker
  logger?: SummarizeLogger
  signal?: AbortSignal
}

export type SummarizeFileResult = {
  inputPath: string
  outputPath: string
  inputChars: number
  summaryChars: number
  truncated: boolean
  tags: string[] | null
}

export async function checkService(
  client: LlmClient,
  signal?: AbortSignal,
): Promise<string[]> {
  let probe: LlmModelList
  try {
    probe = await client.listModels(signal)
  } catch (error) {
    throwIfInterrupted(signal)
    throw error
  }
  if (!probe.available) {
    throw new ServiceUnavailableError(
      client.config.baseUrl,
      client.config.model,
      probe.detail,
    )
  }
  return probe.models
}

/**
 * Summarizes one file into `<stem>.summary.md` beside it. Chunk files never
 * outlive the call, whatever the outcome.
 */
export async function summarizeFile(
  inputPath: string,
  options: SummarizeFileOptions = {},
): Promise<SummarizeFileResult> {
  const config = options.config ?? DEFAULT_CONFIG
  const logger = options.logger ?? silentLogger
  const client = options.client ?? createLlmClient(toLlmConfig(config))
  const { signal } = options

  logger.info(`Reading: ${inputPath}`)
  const input = loadInput(inputPath, {
    maxChars: config.recursive ? null : config.max_input_chars,
  })
  if (input.truncated) {
    logger.warn(
      `Input longer than ${config.max_input_chars} chars was truncated.`,
    )
  }

  logger.info(`Checking language model API at ${config.base_url}...`)
  await checkService(client, signal)

  const summarizer =
    options.summarizer ?? createSummarizer(client, { mode: input.mode })

  logger.info(`Summarizing with ${config.model}...`)
  const summary = await withTempFileTracker(
    async (tracker) => {
      if (!config.recursive) {
        return summarizeOnce(summarizer, input.text, signal)
      }
      return summarizeRecursive(
        { path: input.path, text: input.text },
        {
          summarizer,
          tracker,
          maxDepth: config.max_depth,
          maxCharsSafe: config.max_chars_safe,
          logger,
          signal,
        },
      )
    },
    { tracker: options.tracker, logger },
  )

  let tags: string[] | null = null
  let output = summary
  if (config.tags && input.kind === 'document') {
    logger.info('Generating tags...')
    tags = await generateTags(client, summary, { logger, signal })
    logger.info(`  Tags: ${tags.join(', ')}`)
    output = formatSummaryWithTags(summary, tags)
  }

  throwIfInterrupted(signal)
  const outputPath = summaryOutputPath(inputPath)
  writeFileSync(outputPath, output, 'utf-8')
  logger.info(`Summary written to: ${outputPath}`)

  return {
    inputPath,
    outputPath,
    inputChars: input.text.length,
    summaryChars: output.length,
    truncated: input.truncated,
    tags,
  }
}

async function summarizeOnce(
  summarizer: Summarizer,
  text: string,
  signal?: AbortSignal,
): Promise<string> {
  const outcome = await summarizer.summarize(text, signal)
  throwIfInterrupted(signal)
  switch (outcome.kind) {
    case 'ok':
      return outcome.summary
    case 'too-large':
      throw new SummarizeError(
        'INPUT_TOO_LARGE',
        `The model rejected the input as too large: ${outcome.detail}`,
        ['Run again with recursive splitting enabled (drop --no-recursive).'],
      )
    case 'failed':
      throw outcome.error
  }
}
