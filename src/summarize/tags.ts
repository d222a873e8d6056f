import { throwIfInterrupted } from '../errors'
import type { LlmClient } from '../llm'
import { silentLogger, type SummarizeLogger } from '../log'
import { upsertFrontmatterField } from '../utils/frontmatter'
import { buildTagsPrompt, TAGS_SYSTEM_PROMPT } from './prompts'

export const TAG_COUNT = 5
export const TAG_PLACEHOLDER = 'general'
export const DEFAULT_TAGS = [
  'general',
  'summary',
  'document',
  'content',
  'notes',
] as const
export const TAG_FIELD = 'tag'

/** Comma-separated reply to exactly TAG_COUNT lowercase tags. */
export function parseTags(raw: string): string[] {
  const tags = raw
    .split(',')
    .map((tag) => tag.trim().toLowerCase())
    .filter((tag) => tag.length > 0)
    .slice(0, TAG_COUNT)
  while (tags.length < TAG_COUNT) {
    tags.push(TAG_PLACEHOLDER)
  }
  return tags
}

/**
 * Asks the model for tags. Best effort: any failure except an abort yields
 * DEFAULT_TAGS.
 */
export async function generateTags(
  client: LlmClient,
  summary: string,
  options: { logger?: SummarizeLogger; signal?: AbortSignal } = {},
): Promise<string[]> {
  const logger = options.logger ?? silentLogger
  try {
    const response = await client.call({
      messages: [
        { role: 'system', content: TAGS_SYSTEM_PROMPT },
        { role: 'user', content: buildTagsPrompt(summary) },
      ],
      signal: options.signal,
    })
    return parseTags(response.content.trim())
  } catch (error) {
    throwIfInterrupted(options.signal)
    const message = error instanceof Error ? error.message : String(error)
    logger.warn(`Could not generate tags: ${message}`)
    return [...DEFAULT_TAGS]
  }
}

export function formatSummaryWithTags(summary: string, tags: string[]): string {
  return upsertFrontmatterField(summary, TAG_FIELD, tags.join(', '))
}
