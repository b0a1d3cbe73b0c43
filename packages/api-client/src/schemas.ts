/**
 * Response schemas.
 *
 * Every backend payload is checked against these before it reaches the
 * data layer. Optional fields the backend omits get their defaults here.
 */

import { z } from 'zod'
import {
  ArtifactType,
  ConflictType,
  FileType,
  ShareType,
  type ApiEnvelope,
  type AppSettings,
  type Artifact,
  type ArtifactTestResult,
  type ContentIssue,
  type CreateSubscriptionRequest,
  type FlowInfo,
  type Share,
  type SubStoreFile,
  type Subscription,
  type SyncConflict,
  type SyncResult,
  type ValidationResult,
} from '@substore/types'
import { DataParsingError, NetworkError } from './errors'

/** Output type is the domain model; input is whatever the wire carried */
export type ResponseSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>

const optionalString = z.string().nullable().default(null)
const optionalNumber = z.number().nullable().default(null)
const tags = z.array(z.string()).default([])

export const flowInfoSchema: ResponseSchema<FlowInfo> = z.object({
  total: optionalNumber,
  used: optionalNumber,
  remaining: optionalNumber,
  percentage: optionalNumber,
  resetDate: optionalString,
  isUnlimited: z.boolean().default(false),
})

const subscriptionFields = {
  name: z.string(),
  displayName: optionalString,
  kind: z.enum(['single', 'collection']).default('single'),
  source: z.enum(['remote', 'local']).default('remote'),
  url: optionalString,
  content: optionalString,
  icon: optionalString,
  tags,
  mergeSources: z.enum(['', 'localFirst', 'remoteFirst']).default(''),
  userAgent: optionalString,
  proxy: optionalString,
  remark: optionalString,
  priority: z.number().int().default(0),
  isEnabled: z.boolean().default(true),
  ignoreFailed: z.boolean().default(false),
  members: z.array(z.string()).default([]),
}

export const subscriptionSchema: ResponseSchema<Subscription> = z.object({
  id: z.string(),
  ...subscriptionFields,
  flow: flowInfoSchema.nullable().default(null),
  createdAt: z.string(),
  updatedAt: z.string(),
})

/** Subscription as found in an import document; server fields are dropped */
export const subscriptionDraftSchema: ResponseSchema<CreateSubscriptionRequest> =
  z.object(subscriptionFields)

export const artifactSchema: ResponseSchema<Artifact> = z.object({
  id: z.string(),
  name: z.string(),
  type: z.nativeEnum(ArtifactType),
  content: z.string().default(''),
  platform: optionalString,
  source: optionalString,
  syncUrl: optionalString,
  tags,
  isEnabled: z.boolean().default(true),
  createdAt: z.string(),
  updatedAt: z.string(),
  lastSync: optionalString,
})

export const fileSchema: ResponseSchema<SubStoreFile> = z.object({
  id: z.string(),
  name: z.string(),
  type: z.nativeEnum(FileType).default(FileType.GENERAL),
  content: z.string().default(''),
  size: z.number().int().nonnegative().default(0),
  language: optionalString,
  tags,
  createdAt: z.string(),
  updatedAt: z.string(),
  isReadOnly: z.boolean().default(false),
})

export const shareSchema: ResponseSchema<Share> = z.object({
  id: z.string(),
  name: z.string(),
  token: z.string().min(1),
  type: z.nativeEnum(ShareType),
  targetId: z.string(),
  targetName: z.string().default(''),
  expirationDate: optionalString,
  isEnabled: z.boolean().default(true),
  accessCount: z.number().int().nonnegative().default(0),
  createdAt: z.string(),
  updatedAt: z.string(),
})

const syncConflictSchema: ResponseSchema<SyncConflict> = z.object({
  id: z.string(),
  entityId: z.string(),
  conflictType: z.nativeEnum(ConflictType),
  localVersion: z.string(),
  remoteVersion: z.string(),
  description: z.string().default(''),
})

export const syncResultSchema: ResponseSchema<SyncResult> = z.object({
  success: z.boolean(),
  syncedIds: z.array(z.string()).default([]),
  conflicts: z.array(syncConflictSchema).default([]),
  message: optionalString,
  syncTime: z.string(),
})

export const artifactTestResultSchema: ResponseSchema<ArtifactTestResult> = z.object({
  success: z.boolean(),
  message: z.string().default(''),
  errors: z.array(z.string()).default([]),
  warnings: z.array(z.string()).default([]),
  performance: z
    .object({
      executionTime: z.number(),
      memoryUsage: z.number(),
      ruleCount: z.number().int(),
      complexity: z.enum(['low', 'medium', 'high', 'extreme']),
    })
    .nullable()
    .default(null),
  testTime: z.string(),
})

const contentIssueSchema: ResponseSchema<ContentIssue> = z.object({
  line: optionalNumber,
  column: optionalNumber,
  message: z.string(),
  severity: z.enum(['error', 'warning', 'info']).default('error'),
  suggestion: optionalString,
})

export const validationResultSchema: ResponseSchema<ValidationResult> = z.object({
  isValid: z.boolean(),
  errors: z.array(contentIssueSchema).default([]),
  warnings: z.array(contentIssueSchema).default([]),
  suggestions: z.array(z.string()).default([]),
})

export const appSettingsSchema: ResponseSchema<AppSettings> = z.object({
  theme: z.object({
    mode: z.enum(['light', 'dark', 'system']).default('system'),
    accentColor: z.string().default('blue'),
    useSystemAccentColor: z.boolean().default(true),
  }),
  sync: z.object({
    platform: z.enum(['none', 'gist', 'gitlab']).default('none'),
    gistToken: z.string().default(''),
    githubUser: z.string().default(''),
    autoSync: z.boolean().default(false),
    syncInterval: z.number().int().positive().default(60),
  }),
  network: z.object({
    baseURL: z.string(),
    timeout: z.number().positive().default(30),
    retryCount: z.number().int().nonnegative().default(3),
    userAgent: z.string().default(''),
  }),
  appearance: z.object({
    showFlowInfo: z.boolean().default(true),
    showSubscriptionIcons: z.boolean().default(true),
    compactMode: z.boolean().default(false),
    animationsEnabled: z.boolean().default(true),
  }),
})

const envelopeSchema: z.ZodType<ApiEnvelope<unknown>> = z.object({
  success: z.boolean(),
  data: z.unknown().optional(),
  message: z.string().optional(),
  code: z.union([z.number(), z.string()]).optional(),
})

function parseEnvelope(payload: unknown, what: string): ApiEnvelope<unknown> {
  const parsed = envelopeSchema.safeParse(payload)
  if (!parsed.success) {
    throw new DataParsingError(`Malformed ${what} response`, { cause: parsed.error })
  }
  return parsed.data
}

/**
 * Validate a backend envelope and return its payload.
 *
 * @throws NetworkError when the backend reports `success: false`
 * @throws DataParsingError when the envelope or its data is malformed or missing
 */
export function unwrapEnvelope<T>(schema: ResponseSchema<T>, payload: unknown, what: string): T {
  const envelope = parseEnvelope(payload, what)

  if (!envelope.success) {
    throw new NetworkError(envelope.message ?? `The server rejected the ${what} request`, {
      reason: 'rejected',
      status: typeof envelope.code === 'number' ? envelope.code : null,
    })
  }
  if (envelope.data === undefined || envelope.data === null) {
    throw new DataParsingError(`No ${what} data in response`)
  }

  const result = schema.safeParse(envelope.data)
  if (!result.success) {
    const paths = result.error.issues.map((issue) => issue.path.join('.'))
    throw new DataParsingError(`Invalid ${what} data in response`, {
      paths,
      cause: result.error,
    })
  }
  return result.data
}

/**
 * Read only the success flag of an envelope whose data is irrelevant.
 */
export function readSuccess(payload: unknown, what: string): boolean {
  return parseEnvelope(payload, what).success
}
