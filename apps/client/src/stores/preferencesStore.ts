import { randomUUID } from 'node:crypto'
import { createStore } from 'zustand/vanilla'
import { createJSONStorage, persist } from 'zustand/middleware'
import { z } from 'zod'
import type { SyncConfig, SyncPlatform, ThemeMode } from '@substore/types'
import { DEFAULT_BASE_URL, ValidationError } from '@substore/api-client'
import { DEFAULT_SYNC_INTERVAL_SECONDS } from '@/lib/config'
import type { KeyValueStorage } from '@/lib/storage'

export const PREFERENCES_KEY = 'substore-preferences'

/** Entity families that can be mirrored to a sync provider */
export type SyncFamily = 'subs' | 'artifacts' | 'files'

export interface SyncCredentials {
  platform: SyncPlatform
  token: string
  user: string
}

export type SyncConfigInput = Omit<SyncConfig, 'id' | 'lastSync' | 'syncInterval'> & {
  syncInterval?: number
}

interface PreferencesData {
  baseURL: string
  theme: ThemeMode
  syncCredentials: SyncCredentials
  syncConfigs: Record<SyncFamily, SyncConfig[]>
}

export interface PreferencesState extends PreferencesData {
  /** http(s) URLs only; trailing slashes are dropped */
  setBaseURL: (baseURL: string) => void
  setTheme: (theme: ThemeMode) => void
  setSyncCredentials: (credentials: Partial<SyncCredentials>) => void
  addSyncConfig: (family: SyncFamily, input: SyncConfigInput) => SyncConfig
  updateSyncConfig: (family: SyncFamily, id: string, changes: Partial<Omit<SyncConfig, 'id'>>) => void
  removeSyncConfig: (family: SyncFamily, id: string) => void
  markSynced: (family: SyncFamily, id: string, at: string) => void
}

const baseURLSchema = z
  .string()
  .trim()
  .url('Base URL must be a valid URL')
  .refine((value) => /^https?:\/\//i.test(value), 'Base URL must use http or https')

function emptySyncConfigs(): Record<SyncFamily, SyncConfig[]> {
  return { subs: [], artifacts: [], files: [] }
}

export interface PreferencesStoreOptions {
  storage: KeyValueStorage
  defaultBaseURL?: string
}

/**
 * Device-local user preferences, persisted under one storage key.
 *
 * Hydration is explicit: call `store.persist.rehydrate()` before reading.
 */
export function createPreferencesStore(options: PreferencesStoreOptions) {
  const initial: PreferencesData = {
    baseURL: options.defaultBaseURL ?? DEFAULT_BASE_URL,
    theme: 'system',
    syncCredentials: { platform: 'none', token: '', user: '' },
    syncConfigs: emptySyncConfigs(),
  }

  return createStore<PreferencesState>()(
    persist(
      (set, get) => {
        const mapConfigs = (
          family: SyncFamily,
          update: (configs: SyncConfig[]) => SyncConfig[]
        ) => {
          const syncConfigs = get().syncConfigs
          set({ syncConfigs: { ...syncConfigs, [family]: update(syncConfigs[family]) } })
        }

        return {
          ...initial,

          setBaseURL: (baseURL) => {
            const parsed = baseURLSchema.safeParse(baseURL)
            if (!parsed.success) {
              throw new ValidationError(
                'Invalid base URL',
                parsed.error.issues.map((issue) => ({ path: 'baseURL', message: issue.message }))
              )
            }
            set({ baseURL: parsed.data.replace(/\/+$/, '') })
          },

          setTheme: (theme) => set({ theme }),

          setSyncCredentials: (credentials) =>
            set({ syncCredentials: { ...get().syncCredentials, ...credentials } }),

          addSyncConfig: (family, input) => {
            const config: SyncConfig = {
              ...input,
              id: randomUUID(),
              lastSync: null,
              syncInterval: input.syncInterval ?? DEFAULT_SYNC_INTERVAL_SECONDS,
            }
            mapConfigs(family, (configs) => [...configs, config])
            return config
          },

          updateSyncConfig: (family, id, changes) =>
            mapConfigs(family, (configs) =>
              configs.map((config) => (config.id === id ? { ...config, ...changes } : config))
            ),

          removeSyncConfig: (family, id) =>
            mapConfigs(family, (configs) => configs.filter((config) => config.id !== id)),

          markSynced: (family, id, at) =>
            mapConfigs(family, (configs) =>
              configs.map((config) => (config.id === id ? { ...config, lastSync: at } : config))
            ),
        }
      },
      {
        name: PREFERENCES_KEY,
        storage: createJSONStorage(() => options.storage),
        skipHydration: true,
        partialize: (state): PreferencesData => ({
          baseURL: state.baseURL,
          theme: state.theme,
          syncCredentials: state.syncCredentials,
          syncConfigs: state.syncConfigs,
        }),
      }
    )
  )
}

export type PreferencesStore = ReturnType<typeof createPreferencesStore>
