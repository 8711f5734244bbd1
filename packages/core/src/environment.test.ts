import { describe, it, expect } from 'vitest'
import { parseEnvironment } from './environment'

describe('parseEnvironment', () => {
  it('applies defaults for unset variables', () => {
    expect(parseEnvironment({})).toEqual({ NODE_ENV: 'production', MULTIMATCH_LOG_LEVEL: 'silent' })
  })

  it('accepts log levels in any case', () => {
    expect(parseEnvironment({ MULTIMATCH_LOG_LEVEL: 'DEBUG' }).MULTIMATCH_LOG_LEVEL).toBe('debug')
  })

  it('rejects unknown log levels', () => {
    expect(() => parseEnvironment({ MULTIMATCH_LOG_LEVEL: 'loud' })).toThrow(/MULTIMATCH_LOG_LEVEL/)
  })

  it('accepts any deployment label', () => {
    expect(parseEnvironment({ NODE_ENV: 'staging' }).NODE_ENV).toBe('staging')
    expect(parseEnvironment({ NODE_ENV: 'ci' }).NODE_ENV).toBe('ci')
  })
})
