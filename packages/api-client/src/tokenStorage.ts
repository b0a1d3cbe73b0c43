/**
 * Backend auth token storage.
 *
 * Tokens live in a KeyValueStorage so the host decides where they end up:
 * process memory by default, or a file-backed store in a long-running
 * client.
 */

const ACCESS_TOKEN_KEY = 'substore.access_token'

/**
 * Minimal string key/value storage. Shaped like zustand's StateStorage so
 * the same implementation can back persisted stores.
 */
export interface KeyValueStorage {
  getItem: (key: string) => string | null | Promise<string | null>
  setItem: (key: string, value: string) => unknown | Promise<unknown>
  removeItem: (key: string) => unknown | Promise<unknown>
}

/**
 * Storage that keeps everything in a Map for the lifetime of the process.
 */
export function createMemoryStorage(initial: Record<string, string> = {}): KeyValueStorage {
  const entries = new Map(Object.entries(initial))
  return {
    getItem: (key) => entries.get(key) ?? null,
    setItem: (key, value) => {
      entries.set(key, value)
    },
    removeItem: (key) => {
      entries.delete(key)
    },
  }
}

export class TokenStorage {
  constructor(private readonly storage: KeyValueStorage = createMemoryStorage()) {}

  async getAccessToken(): Promise<string | null> {
    const token = await this.storage.getItem(ACCESS_TOKEN_KEY)
    return token && token.trim() ? token : null
  }

  async setAccessToken(token: string | null): Promise<void> {
    const next = token?.trim()
    if (next) {
      await this.storage.setItem(ACCESS_TOKEN_KEY, next)
    } else {
      await this.storage.removeItem(ACCESS_TOKEN_KEY)
    }
  }

  async clearTokens(): Promise<void> {
    await this.storage.removeItem(ACCESS_TOKEN_KEY)
  }
}

export const tokenStorage = new TokenStorage()
