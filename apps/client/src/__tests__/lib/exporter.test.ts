import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises'
import os from 'node:os'
import path from 'node:path'
import { DataParsingError, StorageError } from '@substore/api-client'
import { FileExporter } from '@/lib/exporter'

describe('FileExporter', () => {
  let dir: string
  const now = () => new Date(2024, 4, 2, 13, 4, 5, 6)

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'substore-export-'))
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it('should name files by family and timestamp', () => {
    expect(new FileExporter(dir, now).fileName('subscriptions')).toBe(
      'subscriptions_export_20240502-130405-006.json'
    )
  })

  it('should write a JSON array and read it back', async () => {
    const exporter = new FileExporter(path.join(dir, 'out'), now)
    const entities = [{ id: 'sub-1', name: 'HK' }]

    const written = await exporter.write('subscriptions', entities)

    expect(written).toBe(path.join(dir, 'out', 'subscriptions_export_20240502-130405-006.json'))
    expect(await readFile(written, 'utf8')).toBe(
      '[\n  {\n    "id": "sub-1",\n    "name": "HK"\n  }\n]\n'
    )
    expect(await exporter.read(written)).toEqual(entities)
  })

  it('should raise StorageError when the directory cannot be created', async () => {
    const blocker = path.join(dir, 'blocker')
    await writeFile(blocker, 'x')

    await expect(new FileExporter(blocker, now).write('files', [])).rejects.toBeInstanceOf(
      StorageError
    )
  })

  it('should reject documents that are not JSON', async () => {
    const target = path.join(dir, 'import.json')
    await writeFile(target, 'not json')
    const exporter = new FileExporter(dir, now)

    await expect(exporter.read(target)).rejects.toBeInstanceOf(DataParsingError)
    await expect(exporter.read(path.join(dir, 'missing.json'))).rejects.toBeInstanceOf(StorageError)
  })
})
