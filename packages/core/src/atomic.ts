/**
 * Atomic file writes.
 *
 * Content goes to a sibling temp file which is synced and then renamed over
 * the target, so a reader sees either the old file or the whole new one.
 */

import { randomUUID } from 'node:crypto'
import { mkdir, open, rename, rm } from 'node:fs/promises'
import { basename, dirname, join } from 'node:path'

export interface AtomicWriteOptions {
  /** File mode (default: 0o644) */
  mode?: number | undefined
}

/**
 * Write a file atomically, creating missing parent directories.
 */
export async function atomicWrite(
  filePath: string,
  content: string | Uint8Array,
  options: AtomicWriteOptions = {}
): Promise<void> {
  const dir = dirname(filePath)
  await mkdir(dir, { recursive: true })

  const tmpPath = join(dir, `.${basename(filePath)}.${randomUUID().slice(0, 8)}.tmp`)
  try {
    const handle = await open(tmpPath, 'w', options.mode ?? 0o644)
    try {
      await handle.writeFile(content)
      await handle.sync()
    } finally {
      await handle.close()
    }
    await rename(tmpPath, filePath)
  } catch (err) {
    await rm(tmpPath, { force: true })
    throw err
  }
}

/** Write pretty-printed JSON with a trailing newline */
export async function atomicWriteJson(filePath: string, data: unknown, options: AtomicWriteOptions = {}): Promise<void> {
  await atomicWrite(filePath, `${JSON.stringify(data, null, 2)}\n`, options)
}
