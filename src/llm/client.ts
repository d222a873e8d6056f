import type {
  LlmCallOptions,
  LlmConfig,
  LlmModelList,
  LlmResponse,
} from './types'

/**
 * LlmClient is the single interface consumers use. The HTTP transport is
 * hidden behind it. Node's fetch does not read HTTP(S)_PROXY, so calls to a
 * local server never go through a proxy and no environment is touched.
 */
export type LlmClient = {
  readonly config: Readonly<LlmConfig>
  /** Single chat completion. No retry. */
  call(options: LlmCallOptions): Promise<LlmResponse>
  /**
   * GET /models. Failures come back as available=false; only an abort of
   * the caller's signal rejects.
   */
  listModels(signal?: AbortSignal): Promise<LlmModelList>
}

export class LlmApiError extends Error {
  readonly status: number
  readonly body: string

  constructor(status: number, body: string) {
    super(`LLM API error (${status}): ${body}`)
    this.name = 'LlmApiError'
    this.status = status
    this.body = body
  }
}

export class LlmTimeoutError extends Error {
  readonly timeoutMs: number

  constructor(timeoutMs: number) {
    super(`LLM request timed out after ${timeoutMs}ms.`)
    this.name = 'LlmTimeoutError'
    this.timeoutMs = timeoutMs
  }
}

export function createLlmClient(config: LlmConfig): LlmClient {
  const frozen = Object.freeze({ ...config })
  return {
    config: frozen,
    call: (options) => callOnce(frozen, options),
    listModels: (signal) => listModels(frozen, signal),
  }
}

export function chatCompletionsUrl(baseUrl: string): string {
  return `${trimTrailingSlash(baseUrl)}/chat/completions`
}

export function modelsUrl(baseUrl: string): string {
  return `${trimTrailingSlash(baseUrl)}/models`
}

// ---------------------------------------------------------------------------
// Internal implementation
// ---------------------------------------------------------------------------

async function callOnce(
  config: LlmConfig,
  options: LlmCallOptions,
): Promise<LlmResponse> {
  const response = await fetchWithTimeout(
    chatCompletionsUrl(config.baseUrl),
    {
      method: 'POST',
      headers: {
        Authorization: `Bearer ${config.apiKey}`,
        'Content-Type': 'application/json',
      },
      body: JSON.stringify({
        model: config.model,
        messages: options.messages,
        temperature: config.temperature,
        ...(config.maxTokens !== undefined
          ? { max_tokens: config.maxTokens }
          : {}),
      }),
    },
    config.timeoutMs,
    options.signal,
  )

  if (!response.ok) {
    const body = await response.text()
    throw new LlmApiError(response.status, body)
  }

  const data = (await response.json()) as {
    choices?: { message?: { content?: string }; finish_reason?: string }[]
  }

  const choice = data.choices?.[0]
  const content = choice?.message?.content
  if (!content) {
    throw new Error('LLM response missing content.')
  }

  return {
    content,
    finishReason: choice?.finish_reason ?? null,
  }
}

async function listModels(
  config: LlmConfig,
  signal?: AbortSignal,
): Promise<LlmModelList> {
  let response: Response
  try {
    response = await fetchWithTimeout(
      modelsUrl(config.baseUrl),
      {
        method: 'GET',
        headers: { Authorization: `Bearer ${config.apiKey}` },
      },
      config.probeTimeoutMs,
      signal,
    )
  } catch (error) {
    if (signal?.aborted) {
      throw error
    }
    const detail = error instanceof Error ? error.message : String(error)
    return { available: false, models: [], detail }
  }

  if (response.status !== 200) {
    return {
      available: false,
      models: [],
      detail: `GET /models returned ${response.status}`,
    }
  }

  let data: { data?: { id?: unknown }[] }
  try {
    data = (await response.json()) as { data?: { id?: unknown }[] }
  } catch {
    // Some servers answer 200 with a non-JSON body; reachable is enough.
    return { available: true, models: [] }
  }
  const models = (data.data ?? [])
    .map((entry) => entry.id)
    .filter((id): id is string => typeof id === 'string')
  return { available: true, models }
}

async function fetchWithTimeout(
  url: string,
  init: RequestInit,
  timeoutMs: number,
  signal?: AbortSignal,
): Promise<Response> {
  const controller = new AbortController()
  const timer = setTimeout(() => controller.abort(), timeoutMs)
  const onAbort = () => controller.abort()
  signal?.addEventListener('abort', onAbort, { once: true })
  if (signal?.aborted) {
    controller.abort()
  }

  try {
    return await fetch(url, { ...init, signal: controller.signal })
  } catch (error) {
    if (signal?.aborted) {
      throw error
    }
    if (error instanceof Error && error.name === 'AbortError') {
      throw new LlmTimeoutError(timeoutMs)
    }
    throw error
  } finally {
    clearTimeout(timer)
    signal?.removeEventListener('abort', onAbort)
  }
}

function trimTrailingSlash(value: string): string {
  return value.replace(/\/+$/, '')
}
