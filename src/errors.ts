export type SummarizeErrorCode =
  | 'INSUFFICIENT_CONTENT'
  | 'CHUNK_WRITE_FAILED'
  | 'MAX_DEPTH_EXCEEDED'
  | 'COMBINE_FAILED'
  | 'SERVICE_UNAVAILABLE'
  | 'INVALID_INPUT'
  | 'EMPTY_INPUT'
  | 'INPUT_TOO_LARGE'
  | 'INTERRUPTED'
  | 'INVALID_CONFIG'

export class SummarizeError extends Error {
  readonly code: SummarizeErrorCode
  readonly suggestions?: string[]

  constructor(
    code: SummarizeErrorCode,
    message: string,
    suggestions?: string[],
    options?: { cause?: unknown },
  ) {
    super(message, options)
    this.name = 'SummarizeError'
    this.code = code
    this.suggestions = suggestions
  }
}

export class InsufficientContentError extends SummarizeError {
  constructor(lineCount: number) {
    super(
      'INSUFFICIENT_CONTENT',
      `Cannot split a document with fewer than 2 lines (got ${lineCount}).`,
    )
    this.name = 'InsufficientContentError'
  }
}

export class ChunkWriteError extends SummarizeError {
  readonly path: string

  constructor(path: string, cause: unknown) {
    super(
      'CHUNK_WRITE_FAILED',
      `Failed to write temporary chunk ${path}: ${describeError(cause)}`,
      undefined,
      { cause },
    )
    this.name = 'ChunkWriteError'
    this.path = path
  }
}

export class MaxDepthExceededError extends SummarizeError {
  readonly maxDepth: number

  constructor(maxDepth: number, detail: string) {
    super(
      'MAX_DEPTH_EXCEEDED',
      `Maximum recursion depth (${maxDepth}) reached. ${detail}`,
      [
        'Split the document manually into smaller files.',
        'Raise max_depth (--max-depth or LLM_DIGEST_MAX_DEPTH) if the model can handle more calls.',
        'Use a model with a larger context window.',
      ],
    )
    this.name = 'MaxDepthExceededError'
    this.maxDepth = maxDepth
  }
}

export class CombineError extends SummarizeError {
  constructor(cause: unknown) {
    super(
      'COMBINE_FAILED',
      `Failed to combine summaries: ${describeError(cause)}`,
      undefined,
      { cause },
    )
    this.name = 'CombineError'
  }
}

export class ServiceUnavailableError extends SummarizeError {
  readonly baseUrl: string

  constructor(baseUrl: string, model: string, detail?: string) {
    super(
      'SERVICE_UNAVAILABLE',
      `Language model API is not available at ${baseUrl}${detail ? ` (${detail})` : ''}.`,
      [
        'Start the local model server.',
        `Load the model: ${model}`,
        `Check that the server listens at ${baseUrl}`,
        'Run the command again.',
      ],
    )
    this.name = 'ServiceUnavailableError'
    this.baseUrl = baseUrl
  }
}

export function isSummarizeError(error: unknown): error is SummarizeError {
  return error instanceof SummarizeError
}

/** Turns an aborted run into the INTERRUPTED failure; no-op otherwise. */
export function throwIfInterrupted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new SummarizeError('INTERRUPTED', 'Summarization was interrupted.')
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
