import type { CreateShareRequest, Share } from '@substore/types'
import { z } from 'zod'
import { ApiClient } from '../client'
import { NetworkError } from '../errors'
import { shareSchema, unwrapEnvelope } from '../schemas'
import { ResourceService } from './resource'

/**
 * Share links API service.
 */
export class ShareService extends ResourceService<Share, CreateShareRequest> {
  constructor(client: ApiClient) {
    super(client, '/api/share', shareSchema, 'share')
  }

  /**
   * Resolve a share token to the content it exposes.
   */
  async getSharedContent(token: string): Promise<string> {
    const payload = await this.client.get<unknown>(`${this.basePath}/${encodeURIComponent(token)}`)
    return unwrapEnvelope(z.string(), payload, 'shared content')
  }

  /**
   * Whether the backend still serves a token.
   */
  async validateToken(token: string): Promise<boolean> {
    try {
      await this.getSharedContent(token)
      return true
    } catch (error) {
      if (error instanceof NetworkError && (error.status === 404 || error.reason === 'rejected')) {
        return false
      }
      throw error
    }
  }
}
