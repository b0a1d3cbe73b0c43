import type { CreateFileRequest, SubStoreFile, UpdateFileContentRequest } from '@substore/types'
import { z } from 'zod'
import { ApiClient } from '../client'
import { fileSchema, unwrapEnvelope } from '../schemas'
import { SyncableResourceService } from './resource'

/**
 * Files API service.
 */
export class FileService extends SyncableResourceService<SubStoreFile, CreateFileRequest> {
  protected readonly syncGroup = 'files'

  constructor(client: ApiClient) {
    super(client, '/api/files', fileSchema, 'file')
  }

  /**
   * Get the raw content of a file.
   */
  async getContent(id: string): Promise<string> {
    const payload = await this.client.get<unknown>(
      `${this.basePath}/${encodeURIComponent(id)}/content`
    )
    return unwrapEnvelope(z.string(), payload, 'file content')
  }

  /**
   * Replace a file's content only.
   */
  async updateContent(id: string, content: string): Promise<SubStoreFile> {
    const body: UpdateFileContentRequest = { content }
    const payload = await this.client.put<unknown>(
      `${this.basePath}/${encodeURIComponent(id)}/content`,
      body
    )
    return unwrapEnvelope(fileSchema, payload, this.what)
  }
}
