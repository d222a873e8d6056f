export {
  SummarizeError,
  InsufficientContentError,
  ChunkWriteError,
  MaxDepthExceededError,
  CombineError,
  ServiceUnavailableError,
  isSummarizeError,
  throwIfInterrupted,
  type SummarizeErrorCode,
} from './errors'
export {
  loadDigestConfig,
  toLlmConfig,
  DEFAULT_CONFIG,
  type DigestConfig,
} from './config'
export { createConsoleLogger, silentLogger, type SummarizeLogger } from './log'
export * from './llm'
export {
  splitDocument,
  splitLines,
  chunkPath,
  TEMP_FILE_PREFIX,
  type SourceDocument,
  type DocumentChunk,
} from './summarize/chunker'
export { TempFileTracker, withTempFileTracker } from './summarize/temp-files'
export {
  createSummarizer,
  isContextOverflow,
  type Summarizer,
  type SummaryOutcome,
} from './summarize/summarizer'
export {
  summarizeRecursive,
  DEFAULT_MAX_DEPTH,
  DEFAULT_MAX_CHARS_SAFE,
  type RecursiveSummarizeOptions,
} from './summarize/recursive'
export {
  generateTags,
  parseTags,
  formatSummaryWithTags,
  DEFAULT_TAGS,
} from './summarize/tags'
export {
  loadInput,
  extractSubtitleText,
  summaryOutputPath,
} from './summarize/input'
export {
  summarizeFile,
  checkService,
  type SummarizeFileOptions,
  type SummarizeFileResult,
} from './summarize/pipeline'
export { upsertFrontmatterField } from './utils/frontmatter'
