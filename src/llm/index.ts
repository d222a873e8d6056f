export type {
  LlmConfig,
  LlmMessage,
  LlmModelList,
  LlmResponse,
  LlmCallOptions,
  LlmRole,
} from './types'

export type { LlmClient } from './client'
export {
  createLlmClient,
  chatCompletionsUrl,
  modelsUrl,
  LlmApiError,
  LlmTimeoutError,
} from './client'
