import { describe, it, expect } from 'vitest'
import { resolveRequestId } from './requestId'

describe('resolveRequestId', () => {
  it('mints an id when the header is missing', () => {
    const id = resolveRequestId({})
    expect(typeof id).toBe('string')
    expect(id.length).toBeGreaterThan(10)
  })

  it('respects an existing x-request-id header', () => {
    expect(resolveRequestId({ 'x-request-id': 'abc-123' })).toBe('abc-123')
  })

  it('takes the first value of a repeated header', () => {
    expect(resolveRequestId({ 'x-request-id': ['first', 'second'] })).toBe('first')
  })

  it('ignores a blank header', () => {
    expect(resolveRequestId({ 'x-request-id': '  ' })).not.toBe('  ')
  })
})
