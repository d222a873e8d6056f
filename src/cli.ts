import { Command } from 'commander'
import { createCheckCommand } from './cli/commands/check'
import { createSummarizeCommand } from './cli/commands/summarize'
import { formatError, printError } from './cli/io'

export const VERSION = '0.1.0'

export function createProgram(): Command {
  const program = new Command('llm-digest')
    .description(
      'Summarize long documents and transcripts with a local OpenAI-compatible model',
    )
    .version(VERSION)
    .option('--json', 'Print machine-readable JSON')
    .option('-q, --quiet', 'Suppress progress output')

  program.action(() => {
    program.outputHelp()
  })

  program.addCommand(createSummarizeCommand())
  program.addCommand(createCheckCommand())
  return program
}

export async function main(argv: string[] = process.argv): Promise<void> {
  try {
    await createProgram().parseAsync(argv)
  } catch (error) {
    printError(formatError(error))
    process.exitCode = 1
  }
}
