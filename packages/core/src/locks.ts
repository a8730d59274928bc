/**
 * Artifacts directory locking.
 *
 * A run holds the lock of its artifacts directory while it writes the plan,
 * walkthrough and summary, so two runs sharing a directory never mix their
 * files. The lock is a proper-lockfile lock on `.wsk.lock` inside the
 * directory.
 */

import { mkdir, open, stat } from 'node:fs/promises'
import { join } from 'node:path'
import lockfile from 'proper-lockfile'

import { LockError, LockTimeoutError } from './errors.js'

export interface LockOptions {
  /** Age in milliseconds after which a held lock counts as abandoned (default: 10000) */
  stale?: number | undefined
  /** Attempts to take a busy lock, 100ms apart (default: 300) */
  retries?: number | undefined
}

/** Name of the lock file kept in an artifacts directory */
export const ARTIFACTS_LOCK_FILE = '.wsk.lock'

const RETRY_INTERVAL_MS = 100

function lockPathOf(artifactsDir: string): string {
  return join(artifactsDir, ARTIFACTS_LOCK_FILE)
}

async function lockArtifacts(artifactsDir: string, options: LockOptions): Promise<() => Promise<void>> {
  const lockPath = lockPathOf(artifactsDir)
  const retries = options.retries ?? 300

  try {
    await mkdir(artifactsDir, { recursive: true })
    // proper-lockfile needs the target to exist
    await (await open(lockPath, 'a')).close()
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    throw new LockError(`Artifacts directory unusable: ${message}`, lockPath)
  }

  try {
    return await lockfile.lock(lockPath, {
      stale: options.stale ?? 10_000,
      retries: { retries, factor: 1, minTimeout: RETRY_INTERVAL_MS, maxTimeout: RETRY_INTERVAL_MS * 2 },
    })
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    if (message.includes('ELOCKED') || message.includes('already being held')) {
      throw new LockTimeoutError(lockPath, retries * RETRY_INTERVAL_MS)
    }
    throw new LockError(message, lockPath)
  }
}

/**
 * Run `fn` while holding the lock of an artifacts directory, creating the
 * directory when needed.
 *
 * @throws LockTimeoutError if another process keeps the lock past all retries
 * @throws LockError if the directory cannot be created, or for other lock failures
 */
export async function withArtifactsLock<T>(
  artifactsDir: string,
  fn: () => Promise<T>,
  options: LockOptions = {}
): Promise<T> {
  const release = await lockArtifacts(artifactsDir, options)
  try {
    return await fn()
  } finally {
    await release()
  }
}

/**
 * Whether some process currently holds the lock of an artifacts directory.
 */
export async function isArtifactsLocked(artifactsDir: string): Promise<boolean> {
  const lockPath = lockPathOf(artifactsDir)
  try {
    await stat(lockPath)
  } catch {
    return false
  }
  return lockfile.check(lockPath)
}
