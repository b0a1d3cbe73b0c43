import { createStore, type StoreApi } from 'zustand/vanilla'
import type { Identifiable } from '@substore/types'
import { Debouncer } from '@/lib/debounce'
import {
  applyFilters,
  collectTags,
  emptyFilters,
  type EntityFilters,
  type FilterAccessors,
} from '@/lib/filters'
import { DEBOUNCE_MS } from '@/lib/config'

export interface CollectionState<T extends Identifiable, K extends string> {
  entities: T[]
  /** Derived from entities, filters and searchText; lags them by the debounce window */
  filteredEntities: T[]
  searchText: string
  filters: EntityFilters<K>
  selectedIds: ReadonlySet<string>
  availableTags: string[]
  isLoading: boolean
  /** Entities were served from the cache after a network failure */
  isStale: boolean
  error: string | null
  lastLoadedAt: string | null

  setEntities: (entities: T[]) => void
  /** Replace by id, or append when the id is new */
  upsertEntity: (entity: T) => void
  /** Replace by id; unknown ids are ignored */
  replaceEntity: (entity: T) => void
  removeEntity: (id: string) => void
  setSearchText: (searchText: string) => void
  setFilters: (filters: Partial<EntityFilters<K>>) => void
  resetFilters: () => void
  toggleSelection: (id: string) => void
  /** Clear when every filtered entity is selected, else select exactly the filtered ones */
  selectAll: () => void
  clearSelection: () => void
  /** Recompute filteredEntities now, dropping any pending recompute */
  recompute: () => void
  /** Cancel the pending recompute */
  teardown: () => void
}

export type CollectionStore<T extends Identifiable, K extends string> = StoreApi<
  CollectionState<T, K>
>

export interface CollectionStoreOptions<T, K extends string> {
  accessors: FilterAccessors<T, K>
  debounceMs?: number
}

/**
 * Shared, observable collection for one entity family.
 *
 * Every consumer of a family subscribes to the same store, so they all
 * see the same entities, filters and selection.
 */
export function createCollectionStore<T extends Identifiable, K extends string>(
  options: CollectionStoreOptions<T, K>
): CollectionStore<T, K> {
  const { accessors } = options
  const debouncer = new Debouncer(options.debounceMs ?? DEBOUNCE_MS)

  return createStore<CollectionState<T, K>>()((set, get) => {
    const compute = () => {
      const { entities, filters, searchText } = get()
      set({ filteredEntities: applyFilters(entities, filters, searchText, accessors) })
    }
    const scheduleRecompute = () => debouncer.schedule(compute)

    const updateEntities = (entities: T[]) => {
      set({ entities, availableTags: collectTags(entities, accessors.tagsOf) })
      scheduleRecompute()
    }

    return {
      entities: [],
      filteredEntities: [],
      searchText: '',
      filters: emptyFilters<K>(),
      selectedIds: new Set<string>(),
      availableTags: [],
      isLoading: false,
      isStale: false,
      error: null,
      lastLoadedAt: null,

      setEntities: (entities) => updateEntities([...entities]),

      upsertEntity: (entity) => {
        const entities = get().entities
        const index = entities.findIndex((item) => item.id === entity.id)
        updateEntities(
          index === -1
            ? [...entities, entity]
            : entities.map((item, i) => (i === index ? entity : item))
        )
      },

      replaceEntity: (entity) => {
        const entities = get().entities
        if (!entities.some((item) => item.id === entity.id)) return
        updateEntities(entities.map((item) => (item.id === entity.id ? entity : item)))
      },

      removeEntity: (id) => {
        const { entities, selectedIds } = get()
        if (selectedIds.has(id)) {
          const next = new Set(selectedIds)
          next.delete(id)
          set({ selectedIds: next })
        }
        updateEntities(entities.filter((item) => item.id !== id))
      },

      setSearchText: (searchText) => {
        set({ searchText })
        scheduleRecompute()
      },

      setFilters: (filters) => {
        set({ filters: { ...get().filters, ...filters } })
        scheduleRecompute()
      },

      resetFilters: () => {
        set({ filters: emptyFilters<K>(), searchText: '' })
        scheduleRecompute()
      },

      toggleSelection: (id) => {
        const next = new Set(get().selectedIds)
        if (next.has(id)) {
          next.delete(id)
        } else {
          next.add(id)
        }
        set({ selectedIds: next })
      },

      selectAll: () => {
        // Apply a pending recompute before reading the filtered view
        if (debouncer.isPending) {
          debouncer.flush()
        }
        const { filteredEntities, selectedIds } = get()
        const allSelected = filteredEntities.every((entity) => selectedIds.has(entity.id))
        set({
          selectedIds: allSelected
            ? new Set<string>()
            : new Set(filteredEntities.map((entity) => entity.id)),
        })
      },

      clearSelection: () => set({ selectedIds: new Set<string>() }),

      recompute: () => {
        debouncer.cancel()
        compute()
      },

      teardown: () => debouncer.cancel(),
    }
  })
}
