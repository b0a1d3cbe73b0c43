import { isBefore, parseISO } from 'date-fns'
import type { CreateShareRequest, Share, ShareType } from '@substore/types'
import { generateShareToken } from '@substore/api-client'
import type { FilterAccessors } from '@/lib/filters'
import { validateShare } from '@/lib/validation'
import type { ShareRepository } from '@/repositories'
import type { BatchOperationType } from './batch'
import { CollectionController, type ControllerDeps } from './collectionController'

export const SHARE_TOKEN_LENGTH = 32

export const shareAccessors: FilterAccessors<Share, ShareType> = {
  typeOf: (share) => share.type,
  tagsOf: () => [],
  isEnabled: (share) => share.isEnabled,
  searchFields: (share) => [share.name, share.targetName],
}

export function isShareExpired(share: Share, now: Date = new Date()): boolean {
  return share.expirationDate !== null && isBefore(parseISO(share.expirationDate), now)
}

export function shareUrl(baseURL: string, share: Share): string {
  return `${baseURL.replace(/\/+$/, '')}/api/share/${encodeURIComponent(share.token)}`
}

export interface ShareControllerDeps extends ControllerDeps<Share, ShareType, ShareRepository> {
  /** Current backend base URL */
  baseURL: () => string
}

export class ShareController extends CollectionController<
  Share,
  CreateShareRequest,
  ShareType,
  ShareRepository
> {
  protected readonly batchOperations: readonly BatchOperationType[] = [
    'enable',
    'disable',
    'delete',
    'export',
  ]

  private readonly baseURL: () => string

  constructor(deps: ShareControllerDeps) {
    super(deps, { family: 'shares', noun: 'share' })
    this.baseURL = deps.baseURL
  }

  protected validate(value: CreateShareRequest | Share): void {
    validateShare(value)
  }

  protected withEnabled(share: Share, enabled: boolean): Share {
    return { ...share, isEnabled: enabled }
  }

  async toggleEnabled(id: string): Promise<Share | null> {
    return this.setEnabled(id, !(this.find(id)?.isEnabled ?? false))
  }

  /**
   * Replace the token, invalidating the old link, and reset the access count.
   */
  async regenerateToken(id: string): Promise<Share | null> {
    const share = this.find(id)
    if (!share) {
      return null
    }
    return this.update({ ...share, token: generateShareToken(SHARE_TOKEN_LENGTH), accessCount: 0 })
  }

  shareUrl(share: Share): string {
    return shareUrl(this.baseURL(), share)
  }

  isExpired(share: Share, now?: Date): boolean {
    return isShareExpired(share, now)
  }

  /** Shares past their expiration date */
  expiredShares(now: Date = new Date()): Share[] {
    return this.store.getState().entities.filter((share) => isShareExpired(share, now))
  }
}
