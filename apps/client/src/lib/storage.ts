import { mkdir, readFile, rm, writeFile } from 'node:fs/promises'
import path from 'node:path'
import { StorageError, createMemoryStorage, type KeyValueStorage } from '@substore/api-client'

export { createMemoryStorage }
export type { KeyValueStorage }

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}

/**
 * Storage that keeps one file per key under `dir`.
 *
 * Keys are URI-encoded into file names, so any key is safe.
 */
export function createFileStorage(dir: string): KeyValueStorage {
  const fileFor = (key: string) => path.join(dir, `${encodeURIComponent(key)}.json`)

  return {
    getItem: async (key) => {
      try {
        return await readFile(fileFor(key), 'utf8')
      } catch (error) {
        if (isMissingFile(error)) {
          return null
        }
        throw new StorageError(`Failed to read ${key}`, { cause: error })
      }
    },
    setItem: async (key, value) => {
      try {
        await mkdir(dir, { recursive: true })
        await writeFile(fileFor(key), value, 'utf8')
      } catch (error) {
        throw new StorageError(`Failed to write ${key}`, { cause: error })
      }
    },
    removeItem: async (key) => {
      try {
        await rm(fileFor(key), { force: true })
      } catch (error) {
        throw new StorageError(`Failed to remove ${key}`, { cause: error })
      }
    },
  }
}
