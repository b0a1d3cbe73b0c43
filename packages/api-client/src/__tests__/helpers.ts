import { vi } from 'vitest'
import type { ApiClient } from '../client'

/**
 * Create a mock ApiClient with all HTTP methods mocked.
 */
export function createMockClient(): ApiClient {
  return {
    get: vi.fn(),
    post: vi.fn(),
    put: vi.fn(),
    patch: vi.fn(),
    delete: vi.fn(),
    getBaseURL: vi.fn().mockReturnValue('http://localhost:3000'),
    setBaseURL: vi.fn(),
  } as unknown as ApiClient
}

/** Wrap a payload in the backend envelope */
export function ok<T>(data: T): { success: true; data: T } {
  return { success: true, data }
}

export const timestamps = {
  createdAt: '2024-05-01T08:00:00.000Z',
  updatedAt: '2024-05-02T08:00:00.000Z',
}
