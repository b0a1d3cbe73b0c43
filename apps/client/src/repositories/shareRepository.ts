import type { CreateShareRequest, Share } from '@substore/types'
import type { ShareService } from '@substore/api-client'
import type { LocalCache } from '@/lib/cache'
import { EntityRepository } from './entityRepository'

export class ShareRepository extends EntityRepository<Share, CreateShareRequest> {
  constructor(
    private readonly service: ShareService,
    cache: LocalCache<Share>
  ) {
    super(service, cache, 'Share')
  }

  async getSharedContent(token: string): Promise<string> {
    return this.service.getSharedContent(token)
  }

  async validateToken(token: string): Promise<boolean> {
    return this.service.validateToken(token)
  }
}
