import { mkdir, readFile, writeFile } from 'node:fs/promises'
import path from 'node:path'
import { format } from 'date-fns'
import { DataParsingError, StorageError } from '@substore/api-client'

/**
 * Writes entity collections to JSON documents and reads them back.
 */
export interface EntityExporter {
  /** Resolves to the written file's path */
  write(prefix: string, entities: readonly unknown[]): Promise<string>
  read(filePath: string): Promise<unknown>
}

export class FileExporter implements EntityExporter {
  constructor(
    private readonly dir: string,
    private readonly now: () => Date = () => new Date()
  ) {}

  fileName(prefix: string): string {
    return `${prefix}_export_${format(this.now(), 'yyyyMMdd-HHmmss-SSS')}.json`
  }

  async write(prefix: string, entities: readonly unknown[]): Promise<string> {
    const target = path.join(this.dir, this.fileName(prefix))
    try {
      await mkdir(this.dir, { recursive: true })
      await writeFile(target, `${JSON.stringify(entities, null, 2)}\n`, 'utf8')
    } catch (error) {
      throw new StorageError(`Failed to write ${target}`, { cause: error })
    }
    return target
  }

  async read(filePath: string): Promise<unknown> {
    let raw: string
    try {
      raw = await readFile(filePath, 'utf8')
    } catch (error) {
      throw new StorageError(`Failed to read ${filePath}`, { cause: error })
    }
    try {
      return JSON.parse(raw)
    } catch (error) {
      throw new DataParsingError(`${filePath} is not valid JSON`, { cause: error })
    }
  }
}
