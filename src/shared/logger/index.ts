/**
 * Structured logging system
 * Pino-based logger writing to stderr so a stdio MCP transport keeps stdout for protocol frames.
 */

import pino, { type DestinationStream, type Logger as PinoLogger } from 'pino'
import { existsSync, mkdirSync } from 'fs'
import { join } from 'path'
import { ErrorCode, StructuredError, ErrorUtils } from '@/shared/errors/index.js'

export interface LogContext {
  component?: string
  operation?: string
  documentId?: string
  filePath?: string
  query?: string
  duration?: number
  [key: string]: unknown
}

export enum LogLevel {
  TRACE = 'trace',
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error',
  FATAL = 'fatal',
  SILENT = 'silent',
}

const SERVICE_NAME = 'docs-rag-server'

function resolveLevel(nodeEnv: string): string {
  if (process.env['LOG_LEVEL']) return process.env['LOG_LEVEL']
  if (nodeEnv === 'test') return LogLevel.SILENT
  return nodeEnv === 'production' ? LogLevel.INFO : LogLevel.DEBUG
}

function createPino(): PinoLogger {
  const nodeEnv = process.env['NODE_ENV'] || 'development'
  const level = resolveLevel(nodeEnv)
  const base = {
    service: SERVICE_NAME,
    version: process.env['npm_package_version'] || '1.0.0',
  }

  const logDir = process.env['LOG_DIR']
  if (logDir) {
    if (!existsSync(logDir)) {
      mkdirSync(logDir, { recursive: true })
    }

    const streams: pino.StreamEntry[] = [
      { level: 'trace', stream: pino.destination(2) },
      { level: 'trace', stream: pino.destination({ dest: join(logDir, `${SERVICE_NAME}.log`), sync: false }) },
      { level: 'error', stream: pino.destination({ dest: join(logDir, `${SERVICE_NAME}-error.log`), sync: false }) },
    ]
    const multistream: DestinationStream = pino.multistream(streams)
    return pino({ level, base, timestamp: pino.stdTimeFunctions.isoTime }, multistream)
  }

  if (nodeEnv === 'development') {
    return pino({
      level,
      base,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss Z',
          ignore: 'pid,hostname',
          destination: 2,
        },
      },
    })
  }

  return pino({ level, base, timestamp: pino.stdTimeFunctions.isoTime }, pino.destination(2))
}

export interface ErrorMetric {
  code: ErrorCode
  count: number
  lastOccurred: Date
}

/**
 * Centralized logger class
 */
export class Logger {
  private static instance: Logger | undefined
  private readonly pino: PinoLogger
  private readonly errorMetrics = new Map<ErrorCode, ErrorMetric>()

  private constructor(instance: PinoLogger) {
    this.pino = instance
  }

  static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger(createPino())
    }
    return Logger.instance
  }

  info(message: string, context: LogContext = {}): void {
    this.pino.info({ ...context }, message)
  }

  debug(message: string, context: LogContext = {}): void {
    this.pino.debug({ ...context }, message)
  }

  warn(message: string, context: LogContext = {}): void {
    this.pino.warn({ ...context }, message)
  }

  /**
   * Error log (supports structured errors)
   */
  error(message: string, error?: unknown, context: LogContext = {}): void {
    this.pino.error(this.errorPayload(error, context), message)
  }

  fatal(message: string, error?: unknown, context: LogContext = {}): void {
    this.pino.fatal(this.errorPayload(error, context), message)
  }

  /**
   * Start performance measurement; the returned function logs completion and yields the duration
   */
  startTiming(operation: string, context: LogContext = {}): () => number {
    const startTime = Date.now()
    this.debug(`Starting operation: ${operation}`, { ...context, operation })

    return () => {
      const duration = Date.now() - startTime
      this.debug(`Completed operation: ${operation}`, { ...context, operation, duration })
      return duration
    }
  }

  /**
   * Business event log
   */
  event(event: string, context: LogContext = {}): void {
    this.pino.info({ ...context, type: 'business_event', event }, `Business event: ${event}`)
  }

  setLevel(level: LogLevel): void {
    this.pino.level = level
  }

  getLevel(): string {
    return this.pino.level
  }

  getErrorMetrics(): ErrorMetric[] {
    return Array.from(this.errorMetrics.values()).sort((a, b) => b.count - a.count)
  }

  resetMetrics(): void {
    this.errorMetrics.clear()
  }

  private errorPayload(error: unknown, context: LogContext): Record<string, unknown> {
    const payload: Record<string, unknown> = { ...context }
    if (error === undefined) return payload

    if (error instanceof StructuredError) {
      payload['error'] = ErrorUtils.sanitize(error)
      payload['errorCode'] = error.code
    } else {
      const err = ErrorUtils.toError(error)
      payload['error'] = { name: err.name, message: err.message, stack: err.stack }
      payload['errorCode'] = ErrorCode.UNKNOWN_ERROR
    }

    this.recordError(ErrorUtils.codeOf(error))
    return payload
  }

  private recordError(code: ErrorCode): void {
    const current = this.errorMetrics.get(code)
    this.errorMetrics.set(code, { code, count: (current?.count ?? 0) + 1, lastOccurred: new Date() })
  }
}

// Global logger instance
export const logger = Logger.getInstance()

export const startTiming = (operation: string, context?: LogContext) => logger.startTiming(operation, context)
