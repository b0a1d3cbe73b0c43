import type { Identifiable, SyncProvider } from '@substore/types'
import { createNamedLogger } from '@substore/logger'

const log = createNamedLogger({ name: 'batch' })

export type BatchOperation =
  | { type: 'enable' }
  | { type: 'disable' }
  | { type: 'delete' }
  | { type: 'test' }
  | { type: 'sync'; provider: SyncProvider }
  | { type: 'export' }
  | { type: 'updateFlow' }
  | { type: 'addTag'; tag: string }
  | { type: 'removeTag'; tag: string }

export type BatchOperationType = BatchOperation['type']

export interface BatchFailure {
  id: string
  error: unknown
}

export interface BatchReport {
  operation: BatchOperationType
  succeeded: string[]
  failed: BatchFailure[]
  /** Ids not present in the collection */
  skipped: string[]
  /** Written file, for export */
  exportPath: string | null
}

export interface DispatchOptions<T extends Identifiable> {
  operation: BatchOperationType
  ids: Iterable<string>
  entities: readonly T[]
  perform: (entity: T) => Promise<void>
  onFailure: (entity: T, error: unknown) => void
}

/**
 * Split ids into entities present in the collection and unknown ids.
 */
export function resolveIds<T extends Identifiable>(
  ids: Iterable<string>,
  entities: readonly T[]
): { found: T[]; skipped: string[] } {
  const byId = new Map(entities.map((entity) => [entity.id, entity]))
  const found: T[] = []
  const skipped: string[] = []
  for (const id of new Set(ids)) {
    const entity = byId.get(id)
    if (entity) {
      found.push(entity)
    } else {
      skipped.push(id)
    }
  }
  return { found, skipped }
}

/**
 * Run `perform` for every resolved entity concurrently.
 *
 * Each outcome is recorded on its own; a failure never stops the others.
 * Reported ids keep submission order whatever order the calls settle in.
 */
export async function dispatchBatch<T extends Identifiable>(
  options: DispatchOptions<T>
): Promise<BatchReport> {
  const { found, skipped } = resolveIds(options.ids, options.entities)
  if (skipped.length > 0) {
    log.warn(`${options.operation}: skipping unknown ids ${skipped.join(', ')}`)
  }

  const outcomes = await Promise.allSettled(found.map((entity) => options.perform(entity)))

  const report: BatchReport = {
    operation: options.operation,
    succeeded: [],
    failed: [],
    skipped,
    exportPath: null,
  }
  outcomes.forEach((outcome, index) => {
    const entity = found[index]
    if (outcome.status === 'fulfilled') {
      report.succeeded.push(entity.id)
    } else {
      report.failed.push({ id: entity.id, error: outcome.reason })
      options.onFailure(entity, outcome.reason)
    }
  })

  log.info(
    `${options.operation}: ${report.succeeded.length} succeeded, ${report.failed.length} failed`
  )
  return report
}
