import type { Command } from 'commander'
import { loadDigestConfig, type DigestConfig } from '../../config'
import { createConsoleLogger, type SummarizeLogger } from '../../log'
import { getGlobalOptions } from '../io'

export type ConfigCliOptions = {
  config?: string
  baseUrl?: string
  model?: string
  timeout?: string
}

export function parsePositiveInteger(
  value: string,
  errorMessage: string,
): number {
  const parsed = Number(value)
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(errorMessage)
  }
  return parsed
}

export function parseNonNegativeInteger(
  value: string,
  errorMessage: string,
): number {
  const parsed = Number(value)
  if (value.trim() === '' || !Number.isInteger(parsed) || parsed < 0) {
    throw new Error(errorMessage)
  }
  return parsed
}

export function parseOptionalPositiveInteger(
  value: string | undefined,
  errorMessage: string,
): number | undefined {
  if (!value) return undefined
  return parsePositiveInteger(value, errorMessage)
}

export function resolveConfig(
  options: ConfigCliOptions,
  overrides: Partial<DigestConfig> = {},
): DigestConfig {
  return loadDigestConfig({
    configPath: options.config,
    overrides: {
      base_url: options.baseUrl,
      model: options.model,
      timeout_ms: parseOptionalPositiveInteger(
        options.timeout,
        'Timeout must be a positive integer (milliseconds).',
      ),
      ...overrides,
    },
  })
}

/** Progress goes to the console unless --quiet or --json is set. */
export function resolveLogger(command: Command): SummarizeLogger {
  const global = getGlobalOptions(command)
  return createConsoleLogger({ quiet: global.quiet || global.json })
}
