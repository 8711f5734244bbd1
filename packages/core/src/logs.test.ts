import { describe, it, expect } from 'vitest'
import pino from 'pino'
import { getLogger, namespacedLogger } from './logs'

describe('getLogger', () => {
  it('returns one shared logger', () => {
    expect(getLogger()).toBe(getLogger())
  })
})

describe('namespacedLogger', () => {
  it('tags records with the namespace', () => {
    const lines: string[] = []
    const parent = pino({ level: 'info' }, { write: (line: string) => lines.push(line) })

    namespacedLogger('reporter', parent).info({ spans: 2 }, 'done')

    const record = JSON.parse(lines[0])
    expect(record.namespace).toBe('reporter')
    expect(record.spans).toBe(2)
    expect(record.msg).toBe('done')
  })
})
