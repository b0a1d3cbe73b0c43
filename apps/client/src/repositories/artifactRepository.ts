import type {
  Artifact,
  ArtifactTestResult,
  ArtifactType,
  CreateArtifactRequest,
  ValidationResult,
} from '@substore/types'
import type { ArtifactService } from '@substore/api-client'
import type { LocalCache } from '@/lib/cache'
import { SyncableRepository } from './entityRepository'

export class ArtifactRepository extends SyncableRepository<Artifact, CreateArtifactRequest> {
  constructor(
    private readonly service: ArtifactService,
    cache: LocalCache<Artifact>
  ) {
    super(service, cache, 'Artifact')
  }

  async testArtifact(artifact: Artifact): Promise<ArtifactTestResult> {
    return this.service.test(artifact)
  }

  async validateContent(content: string, type: ArtifactType): Promise<ValidationResult> {
    return this.service.validate(content, type)
  }
}
