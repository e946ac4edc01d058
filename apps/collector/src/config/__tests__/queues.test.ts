import { describe, expect, it, vi } from 'vitest'
import { BullTaskSubmitter, DEFAULT_JOB_OPTIONS, toEnvelope, type TaskEnvelope } from '../queues'

function fakeQueues(jobId: string | undefined) {
  const add = vi.fn(async (_taskType: string, _data: TaskEnvelope) => ({ id: jobId }))
  const get = vi.fn((_name: string) => ({ add }))
  return { get, add }
}

describe('toEnvelope', () => {
  it('omits the payload for fan-out submissions', () => {
    expect(toEnvelope(undefined)).toEqual({})
    expect(toEnvelope({ scope: { credentials: 'c1', project: 'p1' } })).toEqual({
      payload: { scope: { credentials: 'c1', project: 'p1' } },
    })
  })
})

describe('BullTaskSubmitter', () => {
  it('adds the job under the task type on the named queue', async () => {
    const queues = fakeQueues('17')
    const submitter = new BullTaskSubmitter(queues)

    const id = await submitter.submit('gcp:task:collect-vpcs', { scope: { credentials: 'c1', project: 'p1' } }, 'bulk')

    expect(id).toBe('17')
    expect(queues.get).toHaveBeenCalledWith('bulk')
    expect(queues.add).toHaveBeenCalledWith('gcp:task:collect-vpcs', {
      payload: { scope: { credentials: 'c1', project: 'p1' } },
    })
  })

  it('submits an empty envelope for fan-out', async () => {
    const queues = fakeQueues('18')

    await new BullTaskSubmitter(queues).submit('gcp:task:collect-vpcs', undefined, 'inventory')

    expect(queues.add).toHaveBeenCalledWith('gcp:task:collect-vpcs', {})
  })

  it('fails when the queue assigns no id', async () => {
    const submitter = new BullTaskSubmitter(fakeQueues(undefined))

    await expect(submitter.submit('aux:task:housekeeper', undefined, 'inventory')).rejects.toThrow(
      'Queue inventory returned no id for aux:task:housekeeper'
    )
  })
})

describe('DEFAULT_JOB_OPTIONS', () => {
  it('retries with exponential backoff', () => {
    expect(DEFAULT_JOB_OPTIONS.attempts).toBe(5)
    expect(DEFAULT_JOB_OPTIONS.backoff).toEqual({ type: 'exponential', delay: 2000 })
  })
})
