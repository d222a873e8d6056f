import type { Command } from 'commander'
import { isSummarizeError } from '../errors'

export type GlobalCliOptions = {
  json: boolean
  quiet: boolean
}

export type CliErrorPayload = {
  code: string
  message: string
  suggestions?: string[]
}

export function getGlobalOptions(command: Command): GlobalCliOptions {
  let root: Command = command
  while (root.parent) {
    root = root.parent
  }
  const options = root.opts<{ json?: boolean; quiet?: boolean }>()
  return {
    json: Boolean(options.json),
    quiet: Boolean(options.quiet),
  }
}

type EnvelopeMeta = { cwd: string; durationMs: number }

/** Shape printed to stdout under --json. */
export type CliEnvelope<T> =
  | { ok: true; data: T; meta: EnvelopeMeta }
  | { ok: false; error: CliErrorPayload; meta: EnvelopeMeta }

export type CommandOutput<T> = {
  render: (data: T) => void
  /** Non-zero marks a finished run as failed, e.g. one file of a batch */
  exitCode?: (data: T) => number
}

/**
 * Runs a command body. In --json mode every outcome becomes one envelope on
 * stdout; otherwise errors propagate to main() and data goes to render.
 */
export async function runCommand<T>(
  command: Command,
  executor: () => Promise<T>,
  output: CommandOutput<T>,
): Promise<void> {
  const { json, quiet } = getGlobalOptions(command)
  const startedAt = Date.now()
  const meta = (): EnvelopeMeta => ({
    cwd: process.cwd(),
    durationMs: Date.now() - startedAt,
  })

  let data: T
  try {
    data = await executor()
  } catch (error) {
    if (!json) {
      throw error
    }
    printEnvelope({ ok: false, error: formatError(error), meta: meta() })
    process.exitCode = 1
    return
  }

  const exitCode = output.exitCode?.(data) ?? 0
  if (exitCode !== 0) {
    process.exitCode = exitCode
  }
  if (json) {
    printEnvelope({ ok: true, data, meta: meta() })
  } else if (!quiet) {
    output.render(data)
  }
}

function printEnvelope<T>(envelope: CliEnvelope<T>): void {
  console.log(JSON.stringify(envelope, null, 2))
}

export function formatError(error: unknown): CliErrorPayload {
  if (isSummarizeError(error)) {
    return {
      code: error.code,
      message: error.message,
      suggestions: error.suggestions,
    }
  }
  const message = error instanceof Error ? error.message : String(error)
  return { code: 'UNKNOWN_ERROR', message }
}

export function printError(error: CliErrorPayload, label = 'Error'): void {
  console.error(`${label}: ${error.message}`)
  if (error.suggestions && error.suggestions.length > 0) {
    console.error('')
    console.error('Suggestions:')
    for (const suggestion of error.suggestions) {
      console.error(`  - ${suggestion}`)
    }
  }
}
