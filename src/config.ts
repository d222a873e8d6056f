import { existsSync, readFileSync } from 'node:fs'
import { join } from 'node:path'
import { parse } from 'yaml'
import { z } from 'zod'
import { SummarizeError } from './errors'
import type { LlmConfig } from './llm'

export const CONFIG_FILE_NAME = '.llm-digest.yml'

export const digestConfigSchema = z.object({
  base_url: z.string().url(),
  api_key: z.string().min(1),
  model: z.string().min(1),
  temperature: z.number().min(0).max(2),
  timeout_ms: z.number().int().positive(),
  probe_timeout_ms: z.number().int().positive(),
  max_chars_safe: z.number().int().positive(),
  max_depth: z.number().int().min(0),
  max_input_chars: z.number().int().positive(),
  max_tokens: z.number().int().positive().optional(),
  recursive: z.boolean(),
  tags: z.boolean(),
})

export type DigestConfig = z.infer<typeof digestConfigSchema>

export const DEFAULT_CONFIG: DigestConfig = {
  base_url: 'http://127.0.0.1:1234/v1',
  api_key: 'lm-studio',
  model: 'openai/gpt-oss-20b',
  temperature: 0.3,
  timeout_ms: 30_000,
  probe_timeout_ms: 5_000,
  max_chars_safe: 8000,
  max_depth: 3,
  max_input_chars: 16000,
  recursive: true,
  tags: true,
}

export type LoadConfigOptions = {
  cwd?: string
  /** Explicit file; must exist. Without it CONFIG_FILE_NAME in cwd is optional. */
  configPath?: string
  env?: NodeJS.ProcessEnv
  overrides?: Partial<DigestConfig>
}

export function loadDigestConfig(options: LoadConfigOptions = {}): DigestConfig {
  const cwd = options.cwd ?? process.cwd()
  const fileValues = readConfigFile(options.configPath, cwd)
  const envValues = readEnvOverrides(options.env ?? process.env)

  const merged = {
    ...DEFAULT_CONFIG,
    ...fileValues,
    ...envValues,
    ...dropUndefined(options.overrides ?? {}),
  }

  const result = digestConfigSchema.safeParse(merged)
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`,
    )
    throw new SummarizeError(
      'INVALID_CONFIG',
      `Invalid configuration: ${issues.join('; ')}`,
    )
  }
  return result.data
}

export function toLlmConfig(config: DigestConfig): LlmConfig {
  return {
    baseUrl: config.base_url,
    apiKey: config.api_key,
    model: config.model,
    temperature: config.temperature,
    timeoutMs: config.timeout_ms,
    probeTimeoutMs: config.probe_timeout_ms,
    ...(config.max_tokens !== undefined
      ? { maxTokens: config.max_tokens }
      : {}),
  }
}

function readConfigFile(
  configPath: string | undefined,
  cwd: string,
): Record<string, unknown> {
  const path = configPath ?? join(cwd, CONFIG_FILE_NAME)
  if (!existsSync(path)) {
    if (configPath) {
      throw new SummarizeError(
        'INVALID_CONFIG',
        `Config file not found: ${configPath}`,
      )
    }
    return {}
  }

  let raw: unknown
  try {
    raw = parse(readFileSync(path, 'utf-8'))
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    throw new SummarizeError(
      'INVALID_CONFIG',
      `Failed to parse ${path}: ${message}`,
    )
  }
  if (raw === null || raw === undefined) {
    return {}
  }
  if (typeof raw !== 'object' || Array.isArray(raw)) {
    throw new SummarizeError(
      'INVALID_CONFIG',
      `${path} must contain a mapping of settings.`,
    )
  }
  return { ...raw }
}

function readEnvOverrides(env: NodeJS.ProcessEnv): Partial<DigestConfig> {
  const values: Partial<DigestConfig> = {}
  if (env.LLM_DIGEST_BASE_URL) values.base_url = env.LLM_DIGEST_BASE_URL
  if (env.LLM_DIGEST_API_KEY) values.api_key = env.LLM_DIGEST_API_KEY
  if (env.LLM_DIGEST_MODEL) values.model = env.LLM_DIGEST_MODEL
  if (env.LLM_DIGEST_MAX_DEPTH) {
    values.max_depth = Number(env.LLM_DIGEST_MAX_DEPTH)
  }
  return values
}

function dropUndefined(
  values: Record<string, unknown>,
): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(values).filter(([, value]) => value !== undefined),
  )
}
