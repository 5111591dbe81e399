import { createPromptInterface, askQuestion } from '../../L1-infra/readline/readline.js'
import type { PromptInterfaceOptions } from '../../L1-infra/readline/readline.js'
import { resolve } from '../../L1-infra/paths/paths.js'
import logger, { sanitizeForLog } from '../../L1-infra/logger/configLogger.js'
import { analyzeScreenshots } from '../../L6-pipeline/analyzeScreenshots.js'
import type { AnalyzeOptions } from '../../L6-pipeline/analyzeScreenshots.js'

export interface RunAnalyzeOptions extends PromptInterfaceOptions {
  /** Pipeline override, for tests */
  analyze?: typeof analyzeScreenshots
  pipeline?: AnalyzeOptions
}

/** Ask for the screenshot path on the terminal, the way the tool is run without arguments. */
export async function promptForPath(options: PromptInterfaceOptions = {}): Promise<string> {
  const output = options.output ?? process.stdout
  output.write('\n=== UI Screenshot Analysis ===\n')
  output.write('Enter the path to a UI screenshot or a directory containing screenshots.\n')

  const rl = createPromptInterface(options)
  try {
    return await askQuestion(rl, '\nPath: ')
  } finally {
    rl.close()
  }
}

/**
 * Run one analysis and return the process exit code:
 * 0 when the batch was analyzed (even if some images failed to render), 1 otherwise.
 */
export async function runAnalyze(inputPath: string | undefined, options: RunAnalyzeOptions = {}): Promise<number> {
  const rawPath = inputPath?.trim() || await promptForPath(options)
  if (!rawPath) {
    logger.error('Error: no path given')
    return 1
  }

  const analyze = options.analyze ?? analyzeScreenshots
  try {
    const summary = await analyze(resolve(rawPath), options.pipeline)
    logger.info(
      `Done. Annotated ${summary.rendered.length} of ${summary.imageCount} image(s)` +
        (summary.failures.length > 0 ? `, ${summary.failures.length} failed` : ''),
    )
    return 0
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    logger.error(`Error: ${sanitizeForLog(message)}`)
    return 1
  }
}
