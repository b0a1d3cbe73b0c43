import type { AppSettings, SyncPlatform } from '@substore/types'
import { ApiClient } from '../client'
import { appSettingsSchema, readSuccess, unwrapEnvelope } from '../schemas'

/**
 * Server-side settings API service.
 */
export class SettingsService {
  constructor(private client: ApiClient) {}

  async get(): Promise<AppSettings> {
    const payload = await this.client.get<unknown>('/api/settings')
    return unwrapEnvelope(appSettingsSchema, payload, 'settings')
  }

  async update(settings: AppSettings): Promise<AppSettings> {
    const payload = await this.client.put<unknown>('/api/settings', settings)
    return unwrapEnvelope(appSettingsSchema, payload, 'settings')
  }

  /**
   * Upload the backend's data to a sync platform.
   */
  async sync(platform: SyncPlatform): Promise<boolean> {
    const payload = await this.client.post<unknown>('/api/settings/sync', { platform })
    return readSuccess(payload, 'settings sync')
  }

  /**
   * Restore the backend's data from a sync platform.
   */
  async download(platform: SyncPlatform): Promise<boolean> {
    const payload = await this.client.get<unknown>('/api/settings/download', {
      params: { platform },
    })
    return readSuccess(payload, 'settings download')
  }
}
