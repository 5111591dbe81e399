#!/usr/bin/env node
import { Command } from '../L1-infra/cli/cli.js'
import { initConfig, validateRequiredKeys, getConfig } from '../L1-infra/config/environment.js'
import type { CLIOptions } from '../L1-infra/config/environment.js'
import logger, { setVerbose } from '../L1-infra/logger/configLogger.js'
import { readTextFileSync } from '../L1-infra/fileSystem/fileSystem.js'
import { projectRoot, join } from '../L1-infra/paths/paths.js'
import { runAnalyze } from './commands/analyze.js'

const pkg: { version: string } = JSON.parse(readTextFileSync(join(projectRoot(), 'package.json')))

const program = new Command()

program
  .name('uidetect')
  .description('Detect UI elements in screenshots with a vision model and draw labeled bounding boxes')
  .version(pkg.version, '-V, --version')
  .argument('[path]', 'Screenshot file or directory of screenshots (prompted for when omitted)')
  .option('--output-dir <path>', 'Directory for annotated images (default: ./output)')
  .option('--api-key <key>', 'Anthropic API key (default: env ANTHROPIC_API_KEY)')
  .option('--model <id>', 'Model id (default: env LLM_MODEL or claude-sonnet-4-5)')
  .option('--max-tokens <n>', 'Output token cap for the model reply (default: 8000)')
  .option('--json', 'Also write the drawn detections as JSON next to each image')
  .option('-v, --verbose', 'Verbose logging')
  .action(async (inputPath: string | undefined) => {
    const opts = program.opts()

    const cliOptions: CLIOptions = {
      outputDir: opts.outputDir,
      apiKey: opts.apiKey,
      model: opts.model,
      maxTokens: opts.maxTokens,
      json: opts.json,
      verbose: opts.verbose,
    }

    initConfig(cliOptions)
    if (opts.verbose) setVerbose()

    try {
      validateRequiredKeys()
    } catch (err) {
      logger.error(err instanceof Error ? err.message : String(err))
      process.exit(1)
    }

    logger.info(`Output dir: ${getConfig().OUTPUT_DIR}`)
    process.exitCode = await runAnalyze(inputPath)
  })

await program.parseAsync(process.argv)
