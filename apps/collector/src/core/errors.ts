/**
 * Retry/skip classification.
 *
 * Every handler resolves to a TaskResult. The dispatch layer reads the tag:
 * `retryable` goes back to the queue for its own backoff, `permanent` is
 * recorded as failed and never rescheduled.
 */

import { ZodError } from 'zod'

export type TaskResult =
  | { kind: 'ok' }
  | { kind: 'retryable'; cause: Error }
  | { kind: 'permanent'; cause: Error }

export const ok = (): TaskResult => ({ kind: 'ok' })
export const retryable = (cause: Error): TaskResult => ({ kind: 'retryable', cause })
export const permanent = (cause: Error): TaskResult => ({ kind: 'permanent', cause })

/** Not Found is permanent for every provider. */
export const DEFAULT_PERMANENT_STATUS_CODES: readonly number[] = [404]

/**
 * An error reported by a provider API together with its HTTP status code.
 * Provider adapters throw (or wrap their SDK errors in) this class.
 */
export class ProviderApiError extends Error {
  constructor(
    readonly provider: string,
    readonly statusCode: number,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options)
    this.name = 'ProviderApiError'
  }
}

/**
 * Base class for errors that can never succeed on retry: bad payloads and
 * missing registrations.
 */
export class PermanentError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'PermanentError'
  }
}

export class PayloadValidationError extends PermanentError {
  constructor(
    readonly taskType: string,
    readonly issues: string[],
    options?: { cause?: unknown }
  ) {
    super(`Invalid payload for ${taskType}: ${issues.join('; ')}`, options)
    this.name = 'PayloadValidationError'
  }

  static fromZod(taskType: string, error: ZodError): PayloadValidationError {
    const issues = error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    )
    return new PayloadValidationError(taskType, issues, { cause: error })
  }
}

export class ClientNotFoundError extends PermanentError {
  constructor(
    readonly directory: string,
    readonly key: string
  ) {
    super(`Client not found in ${directory}: ${key}`)
    this.name = 'ClientNotFoundError'
  }
}

export class ModelNotFoundError extends PermanentError {
  constructor(readonly modelName: string) {
    super(`Model not found in registry: ${modelName}`)
    this.name = 'ModelNotFoundError'
  }
}

export class HandlerNotFoundError extends PermanentError {
  constructor(readonly taskType: string) {
    super(`No handler registered for task type: ${taskType}`)
    this.name = 'HandlerNotFoundError'
  }
}

export class TaskCancelledError extends Error {
  constructor(message = 'Task cancelled') {
    super(message)
    this.name = 'TaskCancelledError'
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value))
}

/**
 * Depth-first search through `cause` chains and aggregated errors.
 */
function findError<T extends Error>(
  error: unknown,
  match: (candidate: Error) => candidate is T,
  depth = 0
): T | undefined {
  if (depth > 16 || !(error instanceof Error)) return undefined
  if (match(error)) return error
  if (error instanceof AggregateError) {
    for (const inner of error.errors) {
      const found = findError(inner, match, depth + 1)
      if (found) return found
    }
  }
  return findError(error.cause, match, depth + 1)
}

export function findProviderApiError(error: unknown): ProviderApiError | undefined {
  return findError(error, (candidate): candidate is ProviderApiError => candidate instanceof ProviderApiError)
}

function isPermanent(error: unknown, permanentStatusCodes: readonly number[]): boolean {
  if (error instanceof ZodError) return true
  if (findError(error, (candidate): candidate is PermanentError => candidate instanceof PermanentError)) {
    return true
  }
  const apiError = findProviderApiError(error)
  return apiError !== undefined && permanentStatusCodes.includes(apiError.statusCode)
}

/**
 * Classify a thrown value. Validation and registration errors are permanent,
 * provider errors are permanent when their status is allow-listed, anything
 * else (storage, network, unknown) is retryable.
 */
export function classifyError(
  error: unknown,
  permanentStatusCodes: readonly number[] = DEFAULT_PERMANENT_STATUS_CODES
): TaskResult {
  const cause = toError(error)
  return isPermanent(cause, permanentStatusCodes) ? permanent(cause) : retryable(cause)
}

/**
 * Classify several errors collected by one run. The joined result is permanent
 * only when every error is.
 */
export function classifyErrors(
  errors: readonly unknown[],
  message: string,
  permanentStatusCodes: readonly number[] = DEFAULT_PERMANENT_STATUS_CODES
): TaskResult {
  if (errors.length === 0) return ok()
  if (errors.length === 1) return classifyError(errors[0], permanentStatusCodes)

  const joined = new AggregateError(errors.map(toError), `${message} (${errors.length} errors)`)
  return errors.every((error) => isPermanent(error, permanentStatusCodes))
    ? permanent(joined)
    : retryable(joined)
}
