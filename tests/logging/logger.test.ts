// tests/logging/logger.test.ts
import { describe, it, expect } from 'vitest'
import chalk from 'chalk'
import { createConsoleLogger, formatTimestamp, isLogLevel } from '../../src/logging/logger.js'

describe('logger', () => {
  const now = () => new Date(2024, 2, 5, 9, 4, 7)

  function capture(level?: 'debug' | 'info' | 'warn' | 'error') {
    const lines: string[] = []
    const logger = createConsoleLogger({ level, now, stream: { write: chunk => lines.push(chunk) } })
    return { logger, lines }
  }

  it('should format timestamps in local time', () => {
    expect(formatTimestamp(now())).toBe('2024-03-05 09:04:07')
  })

  it('should write one line per message with its level', () => {
    const { logger, lines } = capture()
    logger.info('Completed repo "src:a"')
    expect(lines).toEqual([`2024-03-05 09:04:07 - ${chalk.cyan('INFO')}: Completed repo "src:a"\n`])
  })

  it('should drop messages below the configured level', () => {
    const { logger, lines } = capture('warn')
    logger.debug('d')
    logger.info('i')
    logger.warn('w')
    logger.error('e')
    expect(lines).toHaveLength(2)
    expect(lines[0]).toContain(': w\n')
    expect(lines[1]).toContain(': e\n')
  })

  it('should recognise log level names', () => {
    expect(isLogLevel('debug')).toBe(true)
    expect(isLogLevel('verbose')).toBe(false)
  })
})
