/**
 * Client-side checks run before anything is sent to the backend.
 */

import { z } from 'zod'
import { ArtifactType, FileType, ShareType } from '@substore/types'
import type {
  CreateArtifactRequest,
  CreateFileRequest,
  CreateShareRequest,
  CreateSubscriptionRequest,
} from '@substore/types'
import { ValidationError } from '@substore/api-client'

export const MAX_SUBSCRIPTION_NAME_LENGTH = 50
export const RESERVED_FILE_NAMES: readonly string[] = ['UNTITLED', 'UNTITLED-mihomoProfile']

const HTTP_URL = /^https?:\/\/\S+$/i

const requiredName = z.string().trim().min(1, 'Name is required')

const subscriptionDraftSchema = z
  .object({
    name: requiredName.max(
      MAX_SUBSCRIPTION_NAME_LENGTH,
      `Name must be at most ${MAX_SUBSCRIPTION_NAME_LENGTH} characters`
    ),
    kind: z.enum(['single', 'collection']),
    source: z.enum(['remote', 'local']),
    url: z.string().nullable(),
    content: z.string().nullable(),
    priority: z.number().int('Priority must be an integer'),
  })
  .superRefine((draft, ctx) => {
    if (draft.kind === 'collection') return

    if (draft.source === 'remote') {
      if (!draft.url) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['url'], message: 'URL is required' })
      } else if (!HTTP_URL.test(draft.url)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['url'],
          message: 'URL must start with http:// or https://',
        })
      }
      if (draft.content) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['content'],
          message: 'Remote subscriptions carry no inline content',
        })
      }
    } else {
      if (!draft.content) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['content'], message: 'Content is required' })
      }
      if (draft.url) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['url'],
          message: 'Local subscriptions carry no URL',
        })
      }
    }
  })

const artifactDraftSchema = z.object({
  name: requiredName,
  type: z.nativeEnum(ArtifactType),
  content: z.string(),
  syncUrl: z
    .string()
    .regex(HTTP_URL, 'Sync URL must start with http:// or https://')
    .nullable(),
})

const fileDraftSchema = z.object({
  name: requiredName
    .refine((name) => !RESERVED_FILE_NAMES.includes(name), 'Name is reserved')
    .refine((name) => !name.includes('/'), 'Name must not contain "/"'),
  type: z.nativeEnum(FileType),
  content: z.string(),
})

const shareDraftSchema = z.object({
  name: requiredName,
  type: z.nativeEnum(ShareType),
  targetId: z.string().min(1, 'Target is required'),
  expirationDate: z.string().datetime({ offset: true, message: 'Invalid expiration date' }).nullable(),
})

function check(schema: z.ZodTypeAny, value: unknown, what: string): void {
  const result = schema.safeParse(value)
  if (!result.success) {
    throw new ValidationError(
      `Invalid ${what}`,
      result.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message }))
    )
  }
}

export function validateSubscription(draft: CreateSubscriptionRequest): void {
  check(subscriptionDraftSchema, draft, 'subscription')
}

export function validateArtifact(draft: CreateArtifactRequest): void {
  check(artifactDraftSchema, draft, 'artifact')
}

export function validateFile(draft: CreateFileRequest): void {
  check(fileDraftSchema, draft, 'file')
}

export function validateShare(draft: CreateShareRequest): void {
  check(shareDraftSchema, draft, 'share')
}
