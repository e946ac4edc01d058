import { z } from 'zod'
import {
  defineCollector,
  parentsFromStorage,
  scopesFromDirectory,
  type CollectorFactory,
} from '../../core/collector'
import { scopeKey, scopeLabelValues, type ClientDirectory, type ClientScope } from '../../core/scope'
import { toTimestamp } from '../convert'
import { GCP_PERMANENT_STATUS_CODES, parseSubnetworkLink, regionFromZone, type GcpClient } from './adapter'
import { GCP_INSTANCE_MODEL, GCP_SUBNET_MODEL, GCP_VPC_MODEL } from './models'

export const GCP_TASKS = {
  COLLECT_INSTANCES: 'gcp:task:collect-instances',
  COLLECT_VPCS: 'gcp:task:collect-vpcs',
  COLLECT_SUBNETS: 'gcp:task:collect-subnets',
  COLLECT_ALL: 'gcp:task:collect-all',
  LINK_ALL: 'gcp:task:link-all',
} as const

export type GcpDirectory = ClientDirectory<GcpClient, ClientScope>

export const clientScopeSchema = z.object({
  credentials: z.string().min(1),
  project: z.string().min(1),
  domain: z.string().optional(),
  region: z.string().optional(),
})

const scopePayloadSchema = z.object({ scope: clientScopeSchema })

type ScopePayload = z.infer<typeof scopePayloadSchema>

const subnetPayloadSchema = z.object({
  scope: clientScopeSchema,
  vpc_name: z.string().min(1),
})

type SubnetPayload = z.infer<typeof subnetPayloadSchema>

const describeScope = (scope: ClientScope): string => scopeKey(scope)

const SCOPE_LABELS = ['credentials', 'project', 'region'] as const

export function createInstanceCollector(directory: GcpDirectory): CollectorFactory {
  return defineCollector({
    taskType: GCP_TASKS.COLLECT_INSTANCES,
    model: GCP_INSTANCE_MODEL,
    metric: {
      name: 'inventory_gcp_instance_rows',
      help: 'Instances upserted by the last run per scope',
      labelNames: SCOPE_LABELS,
    },
    payloadSchema: scopePayloadSchema,
    directory,
    scopeOf: (payload) => payload.scope,
    describeScope,
    targets: (): Promise<ScopePayload[]> => scopesFromDirectory(directory, (scope) => ({ scope })),
    list: (client, payload) => client.listInstances(payload.scope.region),
    toRecord: (instance, payload) => {
      const subnet = parseSubnetworkLink(instance.subnetwork)
      return {
        project_id: payload.scope.project,
        region: regionFromZone(instance.zone),
        zone: instance.zone,
        instance_id: instance.id,
        name: instance.name,
        machine_type: instance.machineType,
        status: instance.status,
        network_ip: instance.networkIP ?? null,
        subnet_project: subnet?.project ?? null,
        subnet_region: subnet?.region ?? null,
        subnet_name: subnet?.name ?? null,
        creation_timestamp: toTimestamp(instance.creationTimestamp),
      }
    },
    labelValues: (payload) => scopeLabelValues(payload.scope),
    permanentStatusCodes: GCP_PERMANENT_STATUS_CODES,
  })
}

/**
 * VPC networks are global, so the fan-out yields one task per
 * (credentials, project) whatever the number of regional scopes.
 */
export function createVpcCollector(directory: GcpDirectory): CollectorFactory {
  return defineCollector({
    taskType: GCP_TASKS.COLLECT_VPCS,
    model: GCP_VPC_MODEL,
    metric: {
      name: 'inventory_gcp_vpc_rows',
      help: 'VPC networks upserted by the last run per project',
      labelNames: ['credentials', 'project'],
    },
    payloadSchema: scopePayloadSchema,
    directory,
    scopeOf: (payload) => payload.scope,
    describeScope,
    targets: (): Promise<ScopePayload[]> =>
      scopesFromDirectory(
        directory,
        (scope) => ({ scope }),
        (payload) => JSON.stringify([payload.scope.credentials, payload.scope.project])
      ),
    list: (client) => client.listNetworks(),
    toRecord: (network, payload) => ({
      project_id: payload.scope.project,
      vpc_id: network.id,
      name: network.name,
      auto_create_subnetworks: network.autoCreateSubnetworks,
      mtu: network.mtu ?? null,
      routing_mode: network.routingMode ?? null,
      creation_timestamp: toTimestamp(network.creationTimestamp),
    }),
    labelValues: (payload) => [payload.scope.credentials, payload.scope.project],
    permanentStatusCodes: GCP_PERMANENT_STATUS_CODES,
  })
}

const persistedVpcSchema = z.object({
  project_id: z.string(),
  name: z.string(),
})

/**
 * Subnets are enumerated per persisted VPC, once for every configured scope
 * of the VPC's project.
 */
export function createSubnetCollector(directory: GcpDirectory): CollectorFactory {
  return defineCollector({
    taskType: GCP_TASKS.COLLECT_SUBNETS,
    model: GCP_SUBNET_MODEL,
    metric: {
      name: 'inventory_gcp_subnet_rows',
      help: 'Subnetworks upserted by the last run per scope and VPC',
      labelNames: [...SCOPE_LABELS, 'vpc'],
    },
    payloadSchema: subnetPayloadSchema,
    directory,
    scopeOf: (payload) => payload.scope,
    describeScope,
    targets: async (services): Promise<SubnetPayload[]> => {
      const scopes = directory.keys()
      return parentsFromStorage(services.storage, GCP_VPC_MODEL.table, persistedVpcSchema, (vpc) =>
        scopes
          .filter((scope) => scope.project === vpc.project_id)
          .map((scope): SubnetPayload => ({ scope, vpc_name: vpc.name }))
      )
    },
    list: (client, payload) => client.listSubnetworks(payload.vpc_name, payload.scope.region),
    toRecord: (subnet, payload) => ({
      project_id: payload.scope.project,
      subnet_id: subnet.id,
      name: subnet.name,
      region: subnet.region,
      vpc_name: payload.vpc_name,
      ip_cidr_range: subnet.ipCidrRange,
      gateway_address: subnet.gatewayAddress ?? null,
      private_ip_google_access: subnet.privateIpGoogleAccess ?? false,
      creation_timestamp: toTimestamp(subnet.creationTimestamp),
    }),
    labelValues: (payload) => [...scopeLabelValues(payload.scope), payload.vpc_name],
    permanentStatusCodes: GCP_PERMANENT_STATUS_CODES,
  })
}

export function createGcpCollectors(directory: GcpDirectory): CollectorFactory[] {
  return [createInstanceCollector(directory), createVpcCollector(directory), createSubnetCollector(directory)]
}
