import type {
  Artifact,
  ArtifactTestResult,
  ArtifactType,
  CreateArtifactRequest,
  ValidateContentRequest,
  ValidationResult,
} from '@substore/types'
import { ApiClient } from '../client'
import {
  artifactSchema,
  artifactTestResultSchema,
  unwrapEnvelope,
  validationResultSchema,
} from '../schemas'
import { SyncableResourceService } from './resource'

/**
 * Artifacts API service.
 *
 * Rule and config payloads; the backend tests and validates them.
 */
export class ArtifactService extends SyncableResourceService<Artifact, CreateArtifactRequest> {
  protected readonly syncGroup = 'artifacts'

  constructor(client: ApiClient) {
    super(client, '/api/artifacts', artifactSchema, 'artifact')
  }

  /**
   * Run an artifact against the backend's test harness.
   */
  async test(artifact: Artifact): Promise<ArtifactTestResult> {
    const payload = await this.client.post<unknown>(
      `${this.basePath}/${encodeURIComponent(artifact.id)}/test`,
      artifact
    )
    return unwrapEnvelope(artifactTestResultSchema, payload, 'artifact test')
  }

  /**
   * Validate content for an artifact type without saving it.
   */
  async validate(content: string, type: ArtifactType): Promise<ValidationResult> {
    const body: ValidateContentRequest = { content, type }
    const payload = await this.client.post<unknown>(`${this.basePath}/validate`, body)
    return unwrapEnvelope(validationResultSchema, payload, 'validation')
  }
}
