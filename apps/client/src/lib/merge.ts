import { isAfter, parseISO } from 'date-fns'
import { ConflictType, type SyncConflict, type Timestamped } from '@substore/types'
import { contentDigest } from '@substore/api-client'

export interface MergeResult<T> {
  entities: T[]
  conflicts: SyncConflict[]
  /** Ids that were new locally */
  appended: string[]
  /** Ids whose local copy the fetched one replaced */
  replaced: string[]
}

/**
 * `updatedAt@<digest prefix>`: identifies one concrete version of an entity.
 */
export function versionMarker(entity: Timestamped): string {
  return `${entity.updatedAt}@${contentDigest(JSON.stringify(entity)).slice(0, 12)}`
}

/**
 * Last-writer-wins merge of entities fetched from a sync target.
 *
 * A fetched entity is appended when its id is unknown. When the local copy
 * was updated strictly later, the local copy stays and a conflict is
 * recorded; otherwise the fetched copy replaces it in place. Never blends
 * two versions.
 */
export function mergeFetched<T extends Timestamped>(
  local: readonly T[],
  fetched: readonly T[]
): MergeResult<T> {
  const entities = [...local]
  const indexById = new Map(entities.map((entity, index) => [entity.id, index]))
  const result: MergeResult<T> = { entities, conflicts: [], appended: [], replaced: [] }

  for (const remote of fetched) {
    const index = indexById.get(remote.id)
    if (index === undefined) {
      indexById.set(remote.id, entities.length)
      entities.push(remote)
      result.appended.push(remote.id)
      continue
    }

    const current = entities[index]
    if (isAfter(parseISO(current.updatedAt), parseISO(remote.updatedAt))) {
      result.conflicts.push({
        id: `conflict:${remote.id}:${remote.updatedAt}`,
        entityId: remote.id,
        conflictType: ConflictType.CONTENT_DIFFERENCE,
        localVersion: versionMarker(current),
        remoteVersion: versionMarker(remote),
        description: `Kept local ${remote.id}: updated ${current.updatedAt}, synced copy ${remote.updatedAt}`,
      })
      continue
    }

    entities[index] = remote
    result.replaced.push(remote.id)
  }

  return result
}
