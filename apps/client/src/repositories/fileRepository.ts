import type { CreateFileRequest, SubStoreFile } from '@substore/types'
import type { FileService } from '@substore/api-client'
import type { LocalCache } from '@/lib/cache'
import { SyncableRepository } from './entityRepository'

export class FileRepository extends SyncableRepository<SubStoreFile, CreateFileRequest> {
  constructor(
    private readonly service: FileService,
    cache: LocalCache<SubStoreFile>
  ) {
    super(service, cache, 'File')
  }

  async getContent(id: string): Promise<string> {
    return this.service.getContent(id)
  }

  async updateContent(id: string, content: string): Promise<SubStoreFile> {
    const updated = await this.service.updateContent(id, content)
    await this.writeCache(() => this.cache.put(updated))
    return updated
  }
}
