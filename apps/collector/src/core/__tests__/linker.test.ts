import { beforeEach, describe, expect, it, vi } from 'vitest'
import { createTaskContext, createTestServices, type TestServices } from '../../__tests__/helpers/fakes'
import { GCP_LINK_SUBNET_TO_VPC_MODEL, createGcpLinkAllTask, linkSubnetToVpc } from '../../providers/gcp'
import { defineLink, linkObjects } from '../linker'
import type { TaskHandler } from '../task'

function seedNetwork(services: TestServices): void {
  services.storage.seed('gcp_vpc', [{ id: 1, project_id: 'p1', vpc_id: 'v-100', name: 'default' }])
  services.storage.seed('gcp_subnet', [
    { id: 10, project_id: 'p1', subnet_id: 's-1', name: 'a', region: 'r1', vpc_name: 'default' },
    { id: 11, project_id: 'p1', subnet_id: 's-2', name: 'b', region: 'r2', vpc_name: 'default' },
    { id: 12, project_id: 'p1', subnet_id: 's-3', name: 'c', region: 'r1', vpc_name: 'deleted-vpc' },
    { id: 13, project_id: 'p2', subnet_id: 's-4', name: 'd', region: 'r1', vpc_name: 'default' },
  ])
  services.storage.seed('gcp_instance', [
    { id: 20, project_id: 'p1', instance_id: 'i-1', subnet_project: 'p1', subnet_region: 'r1', subnet_name: 'a' },
    { id: 21, project_id: 'p1', instance_id: 'i-2', subnet_project: null, subnet_region: null, subnet_name: null },
  ])
}

function linkPairs(services: TestServices, table: string, childColumn: string, parentColumn: string) {
  return services.storage.rows(table).map((row) => [row[childColumn], row[parentColumn]])
}

describe('link-all', () => {
  let services: TestServices
  let handler: TaskHandler

  beforeEach(() => {
    services = createTestServices()
    const factory = createGcpLinkAllTask()
    services.metrics.registerDescriptor(factory.taskType, factory.metric)
    handler = factory.create(services)
    seedNetwork(services)
  })

  it('links only children whose parent exists', async () => {
    const result = await handler.handle(createTaskContext(), undefined)

    expect(result).toEqual({ kind: 'ok' })
    expect(linkPairs(services, 'gcp_link_subnet_to_vpc', 'subnet_id', 'vpc_id')).toEqual([
      [10, 1],
      [11, 1],
    ])
    expect(linkPairs(services, 'gcp_link_instance_to_subnet', 'instance_id', 'subnet_id')).toEqual([[20, 10]])
    expect(services.metrics.snapshot()).toEqual({
      '["gcp:task:link-all","subnet_to_vpc"]': 2,
      '["gcp:task:link-all","instance_to_subnet"]': 1,
    })
  })

  it('converges on repeated runs', async () => {
    await handler.handle(createTaskContext(), undefined)
    await handler.handle(createTaskContext(), undefined)

    expect(services.storage.rows('gcp_link_subnet_to_vpc')).toHaveLength(2)
    expect(services.storage.rows('gcp_link_instance_to_subnet')).toHaveLength(1)
  })

  it('runs every link and reports a single failure as is', async () => {
    vi.spyOn(services.storage, 'join').mockRejectedValueOnce(new Error('relation "gcp_subnet" does not exist'))
    const ctx = createTaskContext()

    const result = await handler.handle(ctx, undefined)

    expect(result).toEqual({ kind: 'retryable', cause: new Error('relation "gcp_subnet" does not exist') })
    expect(services.storage.rows('gcp_link_instance_to_subnet')).toHaveLength(1)
    expect(ctx.log.error).toHaveBeenCalledWith(
      'Link failed',
      { event_name: 'LINK_FAILED', link: 'subnet_to_vpc' },
      new Error('relation "gcp_subnet" does not exist')
    )
    expect(services.metrics.get('["gcp:task:link-all","subnet_to_vpc"]')?.value).toBe(0)
  })

  it('joins the errors of several failed links', async () => {
    vi.spyOn(services.storage, 'join').mockRejectedValue(new Error('connection terminated'))

    const result = await handler.handle(createTaskContext(), undefined)

    expect(result.kind).toBe('retryable')
    if (result.kind === 'retryable') {
      expect(result.cause).toBeInstanceOf(AggregateError)
      expect(result.cause.message).toBe('link-all failed (2 errors)')
    }
  })
})

describe('linkObjects', () => {
  it('reports one outcome per link in order', async () => {
    const services = createTestServices()
    seedNetwork(services)

    const outcomes = await linkObjects(services.storage, [linkSubnetToVpc], createTaskContext().log)

    expect(outcomes).toEqual([{ name: 'subnet_to_vpc', count: 2 }])
  })
})

describe('defineLink', () => {
  it('rejects a link model with update columns', () => {
    expect(() =>
      defineLink({
        ...linkSubnetToVpc,
        model: { ...GCP_LINK_SUBNET_TO_VPC_MODEL, updateColumns: ['vpc_id'] },
      })
    ).toThrow("Link model 'gcp:model:link_subnet_to_vpc' must not declare update columns")
  })

  it('rejects a link model whose conflict columns differ from the link columns', () => {
    expect(() => defineLink({ ...linkSubnetToVpc, parentColumn: 'network_id' })).toThrow(
      "Link model 'gcp:model:link_subnet_to_vpc' must conflict on (network_id,subnet_id), got (subnet_id,vpc_id)"
    )
  })
})
