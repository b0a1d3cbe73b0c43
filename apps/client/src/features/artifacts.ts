import { createStore, type StoreApi } from 'zustand/vanilla'
import type {
  Artifact,
  ArtifactTestResult,
  ArtifactType,
  CreateArtifactRequest,
  ValidationResult,
} from '@substore/types'
import { joinedTags, type FilterAccessors } from '@/lib/filters'
import { validateArtifact } from '@/lib/validation'
import type { ArtifactRepository } from '@/repositories'
import type { BatchOperation, BatchOperationType } from './batch'
import { SyncableController, type SyncableControllerDeps } from './syncableController'

export const artifactAccessors: FilterAccessors<Artifact, ArtifactType> = {
  typeOf: (artifact) => artifact.type,
  tagsOf: (artifact) => artifact.tags,
  isEnabled: (artifact) => artifact.isEnabled,
  searchFields: (artifact) => [artifact.name, artifact.content, joinedTags(artifact.tags)],
}

export interface ArtifactResultsState {
  testResults: Record<string, ArtifactTestResult>
  validationResults: Record<string, ValidationResult>
}

export type ArtifactControllerDeps = SyncableControllerDeps<
  Artifact,
  ArtifactType,
  ArtifactRepository
>

export class ArtifactController extends SyncableController<
  Artifact,
  CreateArtifactRequest,
  ArtifactType,
  ArtifactRepository
> {
  protected readonly batchOperations: readonly BatchOperationType[] = [
    'enable',
    'disable',
    'delete',
    'test',
    'sync',
    'export',
  ]

  readonly resultsStore: StoreApi<ArtifactResultsState> = createStore<ArtifactResultsState>()(
    () => ({ testResults: {}, validationResults: {} })
  )

  constructor(deps: ArtifactControllerDeps) {
    super(deps, { family: 'artifacts', noun: 'artifact', syncFamily: 'artifacts' })
  }

  protected validate(value: CreateArtifactRequest | Artifact): void {
    validateArtifact(value)
  }

  protected withEnabled(artifact: Artifact, enabled: boolean): Artifact {
    return { ...artifact, isEnabled: enabled }
  }

  async toggleEnabled(id: string): Promise<Artifact | null> {
    return this.setEnabled(id, !(this.find(id)?.isEnabled ?? false))
  }

  /**
   * Run the backend's test harness; the result is kept per artifact.
   */
  async test(artifact: Artifact): Promise<ArtifactTestResult | null> {
    try {
      return await this.runTest(artifact)
    } catch (error) {
      this.fail(`Failed to test ${artifact.name}`, error)
      return null
    }
  }

  private async runTest(artifact: Artifact): Promise<ArtifactTestResult> {
    const result = await this.repository.testArtifact(artifact)
    if (!this.disposed) {
      this.resultsStore.setState((state) => ({
        testResults: { ...state.testResults, [artifact.id]: result },
      }))
    }
    return result
  }

  /**
   * Validate edited content of an artifact without saving it.
   */
  async validateContent(
    id: string,
    content: string,
    type: ArtifactType
  ): Promise<ValidationResult | null> {
    try {
      const result = await this.repository.validateContent(content, type)
      if (!this.disposed) {
        this.resultsStore.setState((state) => ({
          validationResults: { ...state.validationResults, [id]: result },
        }))
      }
      return result
    } catch (error) {
      this.fail('Failed to validate content', error)
      return null
    }
  }

  protected async performBatch(operation: BatchOperation, artifact: Artifact): Promise<void> {
    if (operation.type === 'test') {
      await this.runTest(artifact)
      return
    }
    await super.performBatch(operation, artifact)
  }
}
