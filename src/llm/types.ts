export type LlmRole = 'system' | 'user' | 'assistant'

export type LlmMessage = {
  role: LlmRole
  content: string
}

/**
 * Configuration for an LLM client. Any OpenAI-compatible server works
 * (LM Studio, llama.cpp server, vLLM, a hosted endpoint).
 */
export type LlmConfig = {
  /** API root, e.g. http://127.0.0.1:1234/v1 */
  baseUrl: string
  apiKey: string
  model: string
  temperature: number
  /** Timeout for chat completion calls */
  timeoutMs: number
  /** Timeout for the GET /models availability probe */
  probeTimeoutMs: number
  /** Optional cap on output tokens; omitted from the request when unset */
  maxTokens?: number
}

export type LlmResponse = {
  content: string
  /** finish_reason as sent by the server; null when it sends none */
  finishReason: string | null
}

export type LlmCallOptions = {
  messages: LlmMessage[]
  signal?: AbortSignal
}

export type LlmModelList = {
  available: boolean
  models: string[]
  /** Why the probe failed; unset when available */
  detail?: string
}
