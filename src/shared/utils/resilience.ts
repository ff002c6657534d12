/**
 * Resilience utilities: timeout, retry with backoff and circuit breakers
 */

import pTimeout from 'p-timeout'
import pRetry from 'p-retry'
import CircuitBreaker from 'opossum'
import { CancellationError, ErrorUtils, TimeoutError } from '@/shared/errors/index.js'
import { logger } from '@/shared/logger/index.js'

export interface TimeoutOptions {
  timeoutMs?: number
  operation?: string
  abortSignal?: AbortSignal
}

export interface RetryOptions {
  retries?: number
  minTimeout?: number
  factor?: number
  signal?: AbortSignal
}

export interface BreakerOptions {
  volumeThreshold: number
  resetTimeout: number
  errorThresholdPercentage?: number
  /** Errors for which this returns true do not count as breaker failures */
  errorFilter?: (error: Error) => boolean
}

export function throwIfAborted(signal: AbortSignal | undefined, operation: string): void {
  if (signal?.aborted) {
    throw new CancellationError(operation)
  }
}

/**
 * Rejects with CancellationError as soon as the signal fires
 */
export function abortable<T>(promise: Promise<T>, signal: AbortSignal | undefined, operation: string): Promise<T> {
  if (!signal) return promise
  if (signal.aborted) return Promise.reject(new CancellationError(operation))

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new CancellationError(operation))
    signal.addEventListener('abort', onAbort, { once: true })
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort)
        resolve(value)
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort)
        reject(error)
      }
    )
  })
}

/**
 * Timeout wrapper for promises
 */
export class TimeoutWrapper {
  static async withTimeout<T>(promise: Promise<T>, options: TimeoutOptions = {}): Promise<T> {
    const { timeoutMs = 30000, operation = 'operation', abortSignal } = options

    try {
      return await abortable(
        pTimeout(promise, timeoutMs, `Operation '${operation}' timed out after ${timeoutMs}ms`),
        abortSignal,
        operation
      )
    } catch (error) {
      if (error instanceof pTimeout.TimeoutError) {
        logger.warn(`⏰ Timeout: ${operation} exceeded ${timeoutMs}ms`)
        throw new TimeoutError(operation, timeoutMs, { originalError: error.message })
      }
      throw error
    }
  }
}

export const withTimeout = TimeoutWrapper.withTimeout

/**
 * Retries retryable failures with exponential backoff.
 * Non-retryable errors and cancellation stop immediately.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  operation: string,
  options: RetryOptions = {}
): Promise<T> {
  const { retries = 3, minTimeout = 1000, factor = 2, signal } = options

  return pRetry(
    async (attempt: number) => {
      try {
        throwIfAborted(signal, operation)
        return await fn(attempt)
      } catch (error) {
        if (signal?.aborted || !ErrorUtils.isRetryable(error)) {
          throw new pRetry.AbortError(ErrorUtils.toError(error))
        }
        throw error
      }
    },
    {
      retries,
      minTimeout,
      factor,
      randomize: false,
      onFailedAttempt: (error) => {
        logger.warn(`🔁 Retrying ${operation}`, {
          operation,
          attempt: error.attemptNumber,
          retriesLeft: error.retriesLeft,
          error: error.message,
        })
      },
    }
  )
}

export function isCircuitOpenError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'EOPENBREAKER'
}

/**
 * Builds an opossum breaker with state-change logging
 */
export function createCircuitBreaker<TI extends unknown[], TR>(
  name: string,
  action: (...args: TI) => Promise<TR>,
  options: BreakerOptions
): CircuitBreaker<TI, TR> {
  const breaker = new CircuitBreaker(action, {
    name,
    timeout: false,
    volumeThreshold: options.volumeThreshold,
    errorThresholdPercentage: options.errorThresholdPercentage ?? 50,
    resetTimeout: options.resetTimeout,
    errorFilter: options.errorFilter,
  })

  breaker.on('open', () => logger.warn(`🔌 Circuit breaker opened: ${name}`, { component: 'CircuitBreaker', name }))
  breaker.on('halfOpen', () => logger.info(`Circuit breaker half-open: ${name}`, { component: 'CircuitBreaker', name }))
  breaker.on('close', () => logger.info(`Circuit breaker closed: ${name}`, { component: 'CircuitBreaker', name }))

  return breaker
}
