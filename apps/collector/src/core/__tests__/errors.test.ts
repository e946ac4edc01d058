import { describe, expect, it } from 'vitest'
import { z } from 'zod'
import {
  ClientNotFoundError,
  ModelNotFoundError,
  PayloadValidationError,
  ProviderApiError,
  TaskCancelledError,
  classifyError,
  classifyErrors,
  findProviderApiError,
} from '../errors'

describe('classifyError', () => {
  it('skips a provider Not Found error', () => {
    const result = classifyError(new ProviderApiError('gcp', 404, 'project not found'))

    expect(result.kind).toBe('permanent')
  })

  it('retries a provider Forbidden error', () => {
    const result = classifyError(new ProviderApiError('gcp', 403, 'permission denied'))

    expect(result.kind).toBe('retryable')
  })

  it('finds a provider error wrapped in a cause chain', () => {
    const apiError = new ProviderApiError('azure', 404, 'container not found')
    const wrapped = new Error('list failed', { cause: new Error('page 2', { cause: apiError }) })

    expect(findProviderApiError(wrapped)).toBe(apiError)
    expect(classifyError(wrapped).kind).toBe('permanent')
  })

  it('honours a provider specific allow-list', () => {
    const badRequest = new ProviderApiError('azure', 400, 'parent resource missing')

    expect(classifyError(badRequest).kind).toBe('retryable')
    expect(classifyError(badRequest, [404, 400]).kind).toBe('permanent')
  })

  it('treats validation and registration errors as permanent', () => {
    expect(classifyError(new PayloadValidationError('t', ['scope: Required'])).kind).toBe('permanent')
    expect(classifyError(new ClientNotFoundError('gcp clients', 'k')).kind).toBe('permanent')
    expect(classifyError(new ModelNotFoundError('gcp:model:nope')).kind).toBe('permanent')
  })

  it('treats a raw ZodError as permanent', () => {
    const parsed = z.object({ name: z.string() }).safeParse({})
    expect(parsed.success).toBe(false)
    if (!parsed.success) {
      expect(classifyError(parsed.error).kind).toBe('permanent')
    }
  })

  it('retries storage errors, cancellation and thrown non-errors', () => {
    expect(classifyError(new Error('connection terminated')).kind).toBe('retryable')
    expect(classifyError(new TaskCancelledError()).kind).toBe('retryable')

    const result = classifyError('plain string')
    expect(result).toEqual({ kind: 'retryable', cause: new Error('plain string') })
  })
})

describe('PayloadValidationError.fromZod', () => {
  it('lists every issue with its path', () => {
    const schema = z.object({ scope: z.object({ project: z.string().min(1) }), vpc_name: z.string() })
    const parsed = schema.safeParse({ scope: { project: '' } })
    expect(parsed.success).toBe(false)
    if (parsed.success) return

    const error = PayloadValidationError.fromZod('gcp:task:collect-subnets', parsed.error)

    expect(error.issues).toEqual(['scope.project: String must contain at least 1 character(s)', 'vpc_name: Required'])
    expect(error.message).toBe(
      'Invalid payload for gcp:task:collect-subnets: scope.project: String must contain at least 1 character(s); vpc_name: Required'
    )
  })
})

describe('classifyErrors', () => {
  it('is ok when nothing failed', () => {
    expect(classifyErrors([], 'run failed')).toEqual({ kind: 'ok' })
  })

  it('passes a single error through unchanged', () => {
    const error = new ModelNotFoundError('gcp:model:nope')

    expect(classifyErrors([error], 'run failed')).toEqual({ kind: 'permanent', cause: error })
  })

  it('is permanent only when every joined error is permanent', () => {
    const notFound = new ModelNotFoundError('a')
    const transient = new Error('deadlock detected')

    const allPermanent = classifyErrors([notFound, new ModelNotFoundError('b')], 'run failed')
    const mixed = classifyErrors([notFound, transient], 'run failed')

    expect(allPermanent.kind).toBe('permanent')
    expect(mixed.kind).toBe('retryable')
    if (mixed.kind === 'retryable') {
      expect(mixed.cause).toBeInstanceOf(AggregateError)
      expect(mixed.cause.message).toBe('run failed (2 errors)')
    }
  })
})
