import { LlmApiError, type LlmClient } from '../llm'
import {
  buildCombinePrompt,
  buildSummarizePrompt,
  COMBINE_SYSTEM_PROMPT,
  SUMMARIZE_SYSTEM_PROMPT,
  type SummaryMode,
} from './prompts'

/**
 * Result of one summarize/combine call. A context-window rejection is a
 * value, not an exception, so the controller can branch on it.
 */
export type SummaryOutcome =
  | { kind: 'ok'; summary: string }
  | { kind: 'too-large'; detail: string }
  | { kind: 'failed'; error: unknown }

export type Summarizer = {
  summarize(text: string, signal?: AbortSignal): Promise<SummaryOutcome>
  combine(
    first: string,
    second: string,
    signal?: AbortSignal,
  ): Promise<SummaryOutcome>
}

const CONTEXT_OVERFLOW_PATTERN =
  /context[ _-]?(length|window|size)|too many tokens|maximum (context|token)|exceeds? .*tokens?|prompt is too long|n_ctx/i

export function createSummarizer(
  client: LlmClient,
  options: { mode?: SummaryMode } = {},
): Summarizer {
  const mode = options.mode ?? 'document'
  return {
    summarize: (text, signal) =>
      complete(
        client,
        SUMMARIZE_SYSTEM_PROMPT,
        buildSummarizePrompt(text, mode),
        signal,
      ),
    combine: (first, second, signal) =>
      complete(
        client,
        COMBINE_SYSTEM_PROMPT,
        buildCombinePrompt(first, second),
        signal,
      ),
  }
}

/**
 * A 413, any 400 (how local servers report an oversized prompt), or an error
 * body naming the context window counts as too large.
 */
export function isContextOverflow(error: unknown): boolean {
  if (!(error instanceof LlmApiError)) {
    return false
  }
  if (error.status === 400 || error.status === 413) {
    return true
  }
  return CONTEXT_OVERFLOW_PATTERN.test(error.body)
}

async function complete(
  client: LlmClient,
  system: string,
  prompt: string,
  signal?: AbortSignal,
): Promise<SummaryOutcome> {
  try {
    const response = await client.call({
      messages: [
        { role: 'system', content: system },
        { role: 'user', content: prompt },
      ],
      signal,
    })
    return { kind: 'ok', summary: response.content.trim() }
  } catch (error) {
    if (isContextOverflow(error)) {
      const detail = error instanceof Error ? error.message : String(error)
      return { kind: 'too-large', detail }
    }
    return { kind: 'failed', error }
  }
}
