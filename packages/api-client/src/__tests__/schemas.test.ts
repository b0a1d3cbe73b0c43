import { describe, it, expect } from 'vitest'
import { DataParsingError, NetworkError } from '../errors'
import { flowInfoSchema, readSuccess, unwrapEnvelope } from '../schemas'

function thrownBy(run: () => unknown): unknown {
  try {
    run()
  } catch (error) {
    return error
  }
  return undefined
}

describe('unwrapEnvelope', () => {
  it('should return the data with defaults applied', () => {
    const flow = unwrapEnvelope(flowInfoSchema, { success: true, data: { total: 10, used: 4 } }, 'flow')

    expect(flow).toEqual({
      total: 10,
      used: 4,
      remaining: null,
      percentage: null,
      resetDate: null,
      isUnlimited: false,
    })
  })

  it('should turn a refusal into a rejected NetworkError with its numeric code', () => {
    const caught = thrownBy(() =>
      unwrapEnvelope(flowInfoSchema, { success: false, message: 'No such sub', code: 404 }, 'flow')
    )

    expect(caught).toBeInstanceOf(NetworkError)
    expect(caught).toMatchObject({ message: 'No such sub', reason: 'rejected', status: 404 })
  })

  it('should accept string codes without a status', () => {
    const caught = thrownBy(() =>
      unwrapEnvelope(flowInfoSchema, { success: false, code: 'E_LOCKED' }, 'flow')
    )

    expect(caught).toBeInstanceOf(NetworkError)
    expect(caught).toMatchObject({ message: 'The server rejected the flow request', status: null })
  })

  it('should reject malformed envelopes and missing data', () => {
    expect(() => unwrapEnvelope(flowInfoSchema, 'oops', 'flow')).toThrow(DataParsingError)
    expect(() => unwrapEnvelope(flowInfoSchema, 'oops', 'flow')).toThrow('Malformed flow response')
    expect(() => unwrapEnvelope(flowInfoSchema, { success: true }, 'flow')).toThrow(
      'No flow data in response'
    )
    expect(() =>
      unwrapEnvelope(flowInfoSchema, { success: true, data: { total: 'lots' } }, 'flow')
    ).toThrow('Invalid flow data in response')
  })
})

describe('readSuccess', () => {
  it('should read only the flag', () => {
    expect(readSuccess({ success: true }, 'delete')).toBe(true)
    expect(readSuccess({ success: false, code: 'E_GONE' }, 'delete')).toBe(false)
  })
})
