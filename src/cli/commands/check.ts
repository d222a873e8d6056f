import { Command } from 'commander'
import { createLlmClient } from '../../llm'
import { toLlmConfig } from '../../config'
import { checkService } from '../../summarize/pipeline'
import { runCommand } from '../io'
import { resolveConfig, type ConfigCliOptions } from './shared'

export function createCheckCommand(): Command {
  return new Command('check')
    .description('Check that the language model API is reachable')
    .option('-c, --config <path>', 'Config file (default: ./.llm-digest.yml)')
    .option('--base-url <url>', 'OpenAI-compatible API root')
    .option('-m, --model <model>', 'Model identifier')
    .action(async (options: ConfigCliOptions, command: Command) => {
      await runCommand(
        command,
        async (): Promise<CheckResult> => {
          const config = resolveConfig(options)
          const models = await checkService(
            createLlmClient(toLlmConfig(config)),
          )
          return { baseUrl: config.base_url, model: config.model, models }
        },
        { render: renderCheckResult },
      )
    })
}

type CheckResult = { baseUrl: string; model: string; models: string[] }

function renderCheckResult({ baseUrl, model, models }: CheckResult): void {
  console.log(`API available at ${baseUrl}`)
  console.log(`Configured model: ${model}`)
  if (models.length === 0) {
    console.log('Served models: (none reported)')
    return
  }
  console.log('Served models:')
  for (const id of models) {
    console.log(`  ${id}${id === model ? ' (configured)' : ''}`)
  }
}
