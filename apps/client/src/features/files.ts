import type { CreateFileRequest, FileType, SubStoreFile } from '@substore/types'
import { ValidationError } from '@substore/api-client'
import { joinedTags, type FilterAccessors } from '@/lib/filters'
import { validateFile } from '@/lib/validation'
import type { FileRepository } from '@/repositories'
import type { BatchOperationType } from './batch'
import { SyncableController, type SyncableControllerDeps } from './syncableController'

export const fileAccessors: FilterAccessors<SubStoreFile, FileType> = {
  typeOf: (file) => file.type,
  tagsOf: (file) => file.tags,
  // Files have no enabled flag
  isEnabled: () => true,
  searchFields: (file) => [file.name, file.content, joinedTags(file.tags)],
}

/** UTF-8 byte length */
export function contentSize(content: string): number {
  return Buffer.byteLength(content, 'utf8')
}

export type FileControllerDeps = SyncableControllerDeps<SubStoreFile, FileType, FileRepository>

export class FileController extends SyncableController<
  SubStoreFile,
  CreateFileRequest,
  FileType,
  FileRepository
> {
  protected readonly batchOperations: readonly BatchOperationType[] = ['delete', 'sync', 'export']

  constructor(deps: FileControllerDeps) {
    super(deps, { family: 'files', noun: 'file', syncFamily: 'files' })
  }

  protected validate(value: CreateFileRequest | SubStoreFile): void {
    validateFile(value)
  }

  protected prepare(file: SubStoreFile): SubStoreFile {
    return { ...file, size: contentSize(file.content) }
  }

  /**
   * Fetch a file's content and store it on the file.
   */
  async loadContent(id: string): Promise<string | null> {
    try {
      const content = await this.repository.getContent(id)
      this.apply((state) => {
        const current = state.entities.find((file) => file.id === id)
        if (current) {
          state.replaceEntity({ ...current, content, size: contentSize(content) })
        }
      })
      return content
    } catch (error) {
      this.fail('Failed to load file content', error)
      return null
    }
  }

  /**
   * Save new content; read-only files are refused before any request.
   */
  async saveContent(id: string, content: string): Promise<SubStoreFile | null> {
    const file = this.find(id)
    try {
      if (file?.isReadOnly) {
        throw new ValidationError(`${file.name} is read-only`)
      }
      const updated = await this.repository.updateContent(id, content)
      this.apply((state) => state.replaceEntity(updated))
      return updated
    } catch (error) {
      this.fail(`Failed to save ${file?.name ?? id}`, error)
      return null
    }
  }
}
