import { createInterface, type Interface } from 'node:readline'

export interface PromptInterfaceOptions {
  input?: NodeJS.ReadableStream
  output?: NodeJS.WritableStream
}

/**
 * Creates a readline interface for one-off interactive prompts.
 * Uses `terminal: false` to prevent double-echo on Windows.
 */
export function createPromptInterface(options?: PromptInterfaceOptions): Interface {
  return createInterface({
    input: options?.input ?? process.stdin,
    output: options?.output ?? process.stdout,
    terminal: false,
  })
}

/**
 * Ask a single question and resolve with the trimmed answer.
 * Resolves with an empty string if input ends before a line arrives.
 */
export function askQuestion(rl: Interface, query: string): Promise<string> {
  return new Promise((resolve) => {
    const onClose = (): void => resolve('')
    rl.once('close', onClose)
    rl.question(query, (answer) => {
      rl.off('close', onClose)
      resolve(answer.trim())
    })
  })
}
