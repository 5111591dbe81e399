import { promises as fsp, existsSync, readFileSync } from 'fs'
import type { Stats } from 'fs'
import { dirname } from '../paths/paths.js'

export type { Stats }

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT'
}

// ── Reads ──────────────────────────────────────────────────────

/** List directory contents. Throws "Directory not found: <path>" on ENOENT. */
export async function listDirectory(dirPath: string): Promise<string[]> {
  try {
    return await fsp.readdir(dirPath)
  } catch (err: unknown) {
    if (isNotFound(err)) {
      throw new Error(`Directory not found: ${dirPath}`)
    }
    throw err
  }
}

/** Check if file/dir exists (async, using stat). */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fsp.stat(filePath)
    return true
  } catch {
    return false
  }
}

/** Check if file/dir exists (sync). */
export function fileExistsSync(filePath: string): boolean {
  return existsSync(filePath)
}

/** Get file stats. Throws "File not found: <path>" on ENOENT. */
export async function getFileStats(filePath: string): Promise<Stats> {
  try {
    return await fsp.stat(filePath)
  } catch (err: unknown) {
    if (isNotFound(err)) {
      throw new Error(`File not found: ${filePath}`)
    }
    throw err
  }
}

/** Read a file as UTF-8 text (sync). Throws "File not found: <path>" on ENOENT. */
export function readTextFileSync(filePath: string): string {
  try {
    return readFileSync(filePath, 'utf-8')
  } catch (err: unknown) {
    if (isNotFound(err)) {
      throw new Error(`File not found: ${filePath}`)
    }
    throw err
  }
}

// ── Writes ─────────────────────────────────────────────────────

/** Write data as JSON. Creates parent dirs. */
export async function writeJsonFile(filePath: string, data: unknown): Promise<void> {
  await fsp.mkdir(dirname(filePath), { recursive: true })
  await fsp.writeFile(filePath, JSON.stringify(data, null, 2), { encoding: 'utf-8' })
}

/** Ensure directory exists (recursive). */
export async function ensureDirectory(dirPath: string): Promise<void> {
  await fsp.mkdir(dirPath, { recursive: true })
}

// ── Binary I/O ─────────────────────────────────────────────────

/** Read a file as a raw Buffer (no encoding). Throws "File not found: <path>" on ENOENT. */
export async function readFileBuffer(filePath: string): Promise<Buffer> {
  try {
    return await fsp.readFile(filePath)
  } catch (err: unknown) {
    if (isNotFound(err)) {
      throw new Error(`File not found: ${filePath}`)
    }
    throw err
  }
}
