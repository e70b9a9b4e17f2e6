import { Logger } from './logger.js'

function createLogger() {
  const lines: string[] = []
  const stream = {
    write: (chunk: string) => lines.push(chunk),
  }
  return { logger: new Logger(stream), lines }
}

describe('Logger', () => {
  it('should log info and above by default', () => {
    const { logger, lines } = createLogger()

    logger.debug('debug')
    logger.info('info')
    logger.warn('warn')
    logger.error('error')

    expect(lines).toEqual(['info\n', 'warn\n', 'error\n'])
  })

  it('should log debug when verbose', () => {
    const { logger, lines } = createLogger()

    logger.setVerbose()
    logger.debug('details')

    expect(logger.isVerbose()).toBe(true)
    expect(lines).toEqual(['details\n'])
  })

  it('should log nothing when quiet', () => {
    const { logger, lines } = createLogger()

    logger.setQuiet()
    logger.error('error')
    logger.info('info')

    expect(lines).toEqual([])
  })

  it('should respect an explicit level', () => {
    const { logger, lines } = createLogger()

    logger.setLevel('warn')
    logger.info('info')
    logger.warn('warn')

    expect(lines).toEqual(['warn\n'])
  })

  it('should write fatal messages even when quiet', () => {
    const { logger, lines } = createLogger()

    logger.setQuiet()
    logger.fatal("ERROR: File 'plan.txt' is not a JSON file")

    expect(lines).toEqual(["ERROR: File 'plan.txt' is not a JSON file\n"])
  })
})
