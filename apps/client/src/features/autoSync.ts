import { differenceInSeconds, isValid, parseISO } from 'date-fns'
import type { SyncConfig } from '@substore/types'
import { createNamedLogger } from '@substore/logger'
import { AUTO_SYNC_INTERVAL_SECONDS } from '@/lib/config'
import { PeriodicTask } from '@/lib/periodic'
import type { PreferencesStore, SyncFamily } from '@/stores/preferencesStore'

const log = createNamedLogger({ name: 'auto-sync' })

/** What the scheduler needs from a syncable family's controller */
export interface AutoSyncTarget {
  readonly syncFamily: SyncFamily
  syncWithConfig(config: SyncConfig): Promise<boolean>
}

export interface AutoSyncOptions {
  targets: AutoSyncTarget[]
  preferences: PreferencesStore
  intervalSeconds?: number
  now?: () => Date
}

export interface AutoSyncRound {
  family: SyncFamily
  configId: string
  succeeded: boolean
}

export function isSyncDue(config: SyncConfig, now: Date): boolean {
  if (!config.isEnabled) return false
  if (config.lastSync === null) return true
  const lastSync = parseISO(config.lastSync)
  // An unreadable timestamp counts as never synced
  if (!isValid(lastSync)) return true
  return differenceInSeconds(now, lastSync) >= config.syncInterval
}

/**
 * Periodically pushes every syncable family to its due sync configs.
 *
 * A config's lastSync moves only when every call of its round succeeded.
 */
export class AutoSyncScheduler {
  private readonly targets: AutoSyncTarget[]
  private readonly preferences: PreferencesStore
  private readonly now: () => Date
  private readonly task: PeriodicTask

  constructor(options: AutoSyncOptions) {
    this.targets = options.targets
    this.preferences = options.preferences
    this.now = options.now ?? (() => new Date())
    const seconds = options.intervalSeconds ?? AUTO_SYNC_INTERVAL_SECONDS
    this.task = new PeriodicTask('auto-sync', seconds * 1000, () => this.tick())
  }

  get isRunning(): boolean {
    return this.task.isRunning
  }

  start(): void {
    this.task.start()
  }

  stop(): void {
    this.task.stop()
  }

  async tick(): Promise<AutoSyncRound[]> {
    const rounds: AutoSyncRound[] = []
    for (const target of this.targets) {
      const startedAt = this.now()
      const due = this.preferences
        .getState()
        .syncConfigs[target.syncFamily].filter((config) => isSyncDue(config, startedAt))

      for (const config of due) {
        let succeeded = false
        try {
          succeeded = await target.syncWithConfig(config)
        } catch (error) {
          log.error(`Auto-sync of ${target.syncFamily} to ${config.provider} failed`, error)
        }
        if (succeeded) {
          this.preferences
            .getState()
            .markSynced(target.syncFamily, config.id, this.now().toISOString())
        } else {
          log.warn(`Auto-sync of ${target.syncFamily} to ${config.provider} incomplete`)
        }
        rounds.push({ family: target.syncFamily, configId: config.id, succeeded })
      }
    }
    return rounds
  }
}
