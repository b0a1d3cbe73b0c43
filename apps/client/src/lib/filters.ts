/**
 * Filter and search pipeline shared by every entity family.
 */

export interface EntityFilters<K extends string> {
  /** Keep entities of these types; empty keeps all */
  types: K[]
  /** Keep entities carrying every one of these tags */
  tags: string[]
  enabledOnly: boolean
  hasFlowInfo: boolean
}

/** How the pipeline reads one family's entities */
export interface FilterAccessors<T, K extends string> {
  typeOf: (entity: T) => K
  tagsOf: (entity: T) => readonly string[]
  isEnabled: (entity: T) => boolean
  /** Families without flow data leave this out and never match the flag */
  hasFlowInfo?: (entity: T) => boolean
  /** Fields the free-text search looks at; nulls are skipped */
  searchFields: (entity: T) => ReadonlyArray<string | null>
}

export function emptyFilters<K extends string>(): EntityFilters<K> {
  return { types: [], tags: [], enabledOnly: false, hasFlowInfo: false }
}

/** Tags concatenated the way the search field sees them */
export function joinedTags(tags: readonly string[]): string {
  return tags.join('')
}

/**
 * Narrow `entities` by type, then tags, then boolean flags, then search text.
 * Input order is preserved.
 */
export function applyFilters<T, K extends string>(
  entities: readonly T[],
  filters: EntityFilters<K>,
  searchText: string,
  accessors: FilterAccessors<T, K>
): T[] {
  let result = [...entities]

  if (filters.types.length > 0) {
    const types = new Set<string>(filters.types)
    result = result.filter((entity) => types.has(accessors.typeOf(entity)))
  }

  if (filters.tags.length > 0) {
    result = result.filter((entity) => {
      const tags = new Set(accessors.tagsOf(entity))
      return filters.tags.every((tag) => tags.has(tag))
    })
  }

  if (filters.enabledOnly) {
    result = result.filter((entity) => accessors.isEnabled(entity))
  }
  if (filters.hasFlowInfo) {
    const hasFlowInfo = accessors.hasFlowInfo
    result = hasFlowInfo ? result.filter((entity) => hasFlowInfo(entity)) : []
  }

  const query = searchText.toLowerCase()
  if (query) {
    result = result.filter((entity) =>
      accessors
        .searchFields(entity)
        .some((field) => field !== null && field.toLowerCase().includes(query))
    )
  }

  return result
}

/**
 * Sorted union of every tag in the collection.
 */
export function collectTags<T>(entities: readonly T[], tagsOf: (entity: T) => readonly string[]): string[] {
  const tags = new Set<string>()
  for (const entity of entities) {
    for (const tag of tagsOf(entity)) {
      tags.add(tag)
    }
  }
  return [...tags].sort((a, b) => a.localeCompare(b))
}
