import pino from 'pino'

/**
 * Log levels:
 * - fatal (60): Unrecoverable failure (e.g. checkpoint storage lost)
 * - error (50): Error messages
 * - warn (40): Warning messages
 * - info (30): General informational messages (default)
 * - debug (20): Debug messages
 * - trace (10): Very detailed trace messages
 */

const LEVELS: readonly pino.LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']

function resolveLevel(value: string | undefined): pino.LevelWithSilent {
  const normalized = value?.trim().toLowerCase()
  return LEVELS.find(level => level === normalized) ?? 'info'
}

const logLevel = resolveLevel(process.env.LOG_LEVEL)

// Optional plain-JSON copy of every line, for multi-hour crawls
const logFile = process.env.LOG_FILE?.trim()

const prettyTarget: pino.TransportTargetOptions = {
  target: 'pino-pretty',
  level: logLevel,
  options: {
    colorize: true,
    translateTime: 'SYS:HH:MM:ss',
    ignore: 'pid,hostname',
    messageFormat: '{msg}',
    customColors: 'fatal:bgRed,error:red,warn:yellow,info:cyan,debug:green,trace:gray',
    customLevels: 'fatal:60,error:50,warn:40,info:30,debug:20,trace:10'
  }
}

function buildTransport(): pino.LoggerOptions['transport'] {
  // A silent logger never spawns the transport worker (tests run this way)
  if (logLevel === 'silent') {
    return undefined
  }

  const targets: pino.TransportTargetOptions[] = [prettyTarget]
  if (logFile) {
    targets.push({ target: 'pino/file', level: logLevel, options: { destination: logFile, mkdir: true } })
  }

  return { targets }
}

const baseLogger = pino({
  level: logLevel,
  transport: buildTransport()
})

/**
 * Wrapper to make logger more flexible with arguments
 */
const createLoggerWrapper = (logger: pino.Logger) => {
  const wrap = (level: pino.Level) => {
    return (msgOrObj: unknown, ...args: unknown[]) => {
      if (!logger.isLevelEnabled(level)) {
        return
      }

      if (args.length === 0) {
        logger[level](String(msgOrObj))
      } else if (args.length === 1) {
        const [detail] = args
        if (detail instanceof Error) {
          logger[level](`${msgOrObj} ${detail.message}`)
        } else if (typeof detail === 'object') {
          logger[level](`${msgOrObj} ${JSON.stringify(detail)}`)
        } else {
          logger[level](`${msgOrObj} ${String(detail)}`)
        }
      } else {
        const message = [msgOrObj, ...args]
          .map(arg => (typeof arg === 'object' ? JSON.stringify(arg) : String(arg)))
          .join(' ')
        logger[level](message)
      }
    }
  }

  return {
    fatal: wrap('fatal'),
    error: wrap('error'),
    warn: wrap('warn'),
    info: wrap('info'),
    debug: wrap('debug'),
    trace: wrap('trace'),
    child: (bindings: pino.Bindings): Logger => createLoggerWrapper(logger.child(bindings))
  }
}

/**
 * Shape every component accepts through its `log` option
 */
export type Logger = {
  fatal: (msgOrObj: unknown, ...args: unknown[]) => void
  error: (msgOrObj: unknown, ...args: unknown[]) => void
  warn: (msgOrObj: unknown, ...args: unknown[]) => void
  info: (msgOrObj: unknown, ...args: unknown[]) => void
  debug: (msgOrObj: unknown, ...args: unknown[]) => void
  trace: (msgOrObj: unknown, ...args: unknown[]) => void
  child: (bindings: pino.Bindings) => Logger
}

/**
 * Logger instance for the application
 *
 * Usage:
 * ```typescript
 * import { log } from '@workspace/logger';
 *
 * log.info('Starting crawl...');
 * log.debug('Frontier seeded:', { size: 46 });
 * log.error('Checkpoint write failed:', error);
 * ```
 *
 * Set log level via environment variable:
 * ```bash
 * LOG_LEVEL=debug npm run crawl -- --baseUrl=http://localhost:8000
 * LOG_FILE=./tmp/crawl.log npm run crawl -- --baseUrl=http://localhost:8000
 * ```
 */
export const log: Logger = createLoggerWrapper(baseLogger)

/**
 * Create a child logger with a specific context
 *
 * @example
 * ```typescript
 * const fetcherLog = createLogger('Fetcher');
 * fetcherLog.warn('Rate limited, backing off');
 * ```
 */
export function createLogger(context: string): Logger {
  return createLoggerWrapper(baseLogger.child({ context }))
}

/**
 * Set the log level dynamically
 */
export function setLogLevel(level: pino.LevelWithSilent) {
  baseLogger.level = level
}
