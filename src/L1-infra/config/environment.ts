import { join } from '../paths/paths.js'
import { fileExistsSync } from '../fileSystem/fileSystem.js'
import { loadEnvFile } from './env.js'
import { DEFAULT_FONT_FAMILY } from '../../L0-pure/annotation/svgOverlay.js'

// Load .env file from the working directory
const envPath = join(process.cwd(), '.env')
if (fileExistsSync(envPath)) {
  loadEnvFile(envPath)
}

export const DEFAULT_MODEL = 'claude-sonnet-4-5'
export const DEFAULT_MAX_TOKENS = 8000
export { DEFAULT_FONT_FAMILY }

export interface AppEnvironment {
  ANTHROPIC_API_KEY: string
  LLM_MODEL: string
  MAX_TOKENS: number
  OUTPUT_DIR: string
  /** 0 disables the timeout */
  REQUEST_TIMEOUT_MS: number
  FONT_FAMILY: string
  WRITE_JSON: boolean
  VERBOSE: boolean
}

export interface CLIOptions {
  outputDir?: string
  apiKey?: string
  model?: string
  maxTokens?: string
  json?: boolean
  verbose?: boolean
}

let config: AppEnvironment | null = null

/** Parse a positive integer, falling back when the value is missing or malformed. */
function parsePositiveInt(raw: string | undefined, fallback: number): number {
  if (!raw) return fallback
  const parsed = Number.parseInt(raw, 10)
  return Number.isNaN(parsed) || parsed <= 0 ? fallback : parsed
}

export function validateRequiredKeys(): void {
  if (!config?.ANTHROPIC_API_KEY && !process.env.ANTHROPIC_API_KEY) {
    throw new Error('Missing required: ANTHROPIC_API_KEY (set via --api-key, env var, or .env file)')
  }
}

/** Merge CLI options → env vars → defaults. Call before getConfig(). */
export function initConfig(cli: CLIOptions = {}): AppEnvironment {
  config = {
    ANTHROPIC_API_KEY: cli.apiKey || process.env.ANTHROPIC_API_KEY || '',
    LLM_MODEL: cli.model || process.env.LLM_MODEL || DEFAULT_MODEL,
    MAX_TOKENS: parsePositiveInt(cli.maxTokens || process.env.MAX_TOKENS, DEFAULT_MAX_TOKENS),
    OUTPUT_DIR: cli.outputDir || process.env.OUTPUT_DIR || join(process.cwd(), 'output'),
    REQUEST_TIMEOUT_MS: parsePositiveInt(process.env.REQUEST_TIMEOUT_MS, 0),
    FONT_FAMILY: process.env.FONT_FAMILY || DEFAULT_FONT_FAMILY,
    WRITE_JSON: cli.json ?? false,
    VERBOSE: cli.verbose ?? false,
  }

  return config
}

export function getConfig(): AppEnvironment {
  if (config) {
    return config
  }

  // Fallback: init with no CLI options (pure env-var mode)
  return initConfig()
}
