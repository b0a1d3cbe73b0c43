import { describe, it, expect } from 'vitest'
import { AxiosError, AxiosHeaders } from 'axios'
import {
  DataParsingError,
  NetworkError,
  NotFoundError,
  StorageError,
  ValidationError,
  getErrorMessage,
  isSubStoreError,
  toNetworkError,
} from '../errors'

function responseError(status: number, data: unknown): AxiosError {
  return new AxiosError(
    `Request failed with status code ${status}`,
    'ERR_BAD_RESPONSE',
    undefined,
    undefined,
    {
      status,
      statusText: '',
      data,
      headers: {},
      config: { headers: new AxiosHeaders() },
    }
  )
}

describe('errors', () => {
  it('should name errors after their class', () => {
    const error = new StorageError('disk full')

    expect(error.name).toBe('StorageError')
    expect(error.kind).toBe('storage')
    expect(error).toBeInstanceOf(Error)
    expect(isSubStoreError(error)).toBe(true)
    expect(isSubStoreError(new Error('plain'))).toBe(false)
  })

  it('should describe missing entities', () => {
    const error = new NotFoundError('sub-1', 'Subscription')

    expect(error.message).toBe('Subscription sub-1 not found')
    expect(error.entityId).toBe('sub-1')
  })

  describe('toNetworkError', () => {
    it('should pass typed errors through', () => {
      const error = new DataParsingError('No subscription data in response')

      expect(toNetworkError(error)).toBe(error)
    })

    it('should map timeouts', () => {
      const result = toNetworkError(new AxiosError('timeout of 30000ms exceeded', 'ECONNABORTED'))

      expect(result).toBeInstanceOf(NetworkError)
      expect(result.message).toBe('Request timed out')
      expect(result).toMatchObject({ reason: 'timeout', status: null })
    })

    it('should prefer the nested error message of a response body', () => {
      const result = toNetworkError(
        responseError(400, { error: { code: 'BAD', message: 'Invalid URL' }, message: 'outer' })
      )

      expect(result.message).toBe('Server error (400): Invalid URL')
      expect(result).toMatchObject({ reason: 'http', status: 400 })
    })

    it('should fall back to the axios message for empty bodies', () => {
      const result = toNetworkError(responseError(502, ''))

      expect(result.message).toBe('Server error (502): Request failed with status code 502')
    })

    it('should treat missing responses as offline', () => {
      const result = toNetworkError(new AxiosError('connect ECONNREFUSED 127.0.0.1:3000', 'ECONNREFUSED'))

      expect(result.message).toBe('Network error: connect ECONNREFUSED 127.0.0.1:3000')
      expect(result).toMatchObject({ reason: 'offline' })
    })

    it('should wrap anything else as unknown', () => {
      const result = toNetworkError('socket hang up')

      expect(result.message).toBe('Unknown error: socket hang up')
      expect(result).toMatchObject({ reason: 'unknown' })
    })
  })

  describe('getErrorMessage', () => {
    it('should list validation issues', () => {
      const error = new ValidationError('Invalid subscription', [
        { path: 'name', message: 'Name is required' },
        { path: '', message: 'Remote subscriptions need a URL' },
      ])

      expect(getErrorMessage(error)).toBe(
        'Invalid subscription (name: Name is required; Remote subscriptions need a URL)'
      )
    })

    it('should use the fallback for non-errors', () => {
      expect(getErrorMessage(42)).toBe('Unknown error')
      expect(getErrorMessage(undefined, 'Failed to load')).toBe('Failed to load')
    })

    it('should use the error message otherwise', () => {
      expect(getErrorMessage(new Error('boom'))).toBe('boom')
    })
  })
})
