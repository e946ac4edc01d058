import { createClientDirectory, createNamedClientDirectory, type ClientScope } from '../../core/scope'
import type { AzureBlobContainer, AzureClient, AzureStorageAccount } from '../../providers/azure/adapter'
import type { AzureDirectory } from '../../providers/azure/collectors'
import type { GcpClient, GcpInstance, GcpNetwork, GcpSubnetwork } from '../../providers/gcp/adapter'
import type { GcpDirectory } from '../../providers/gcp/collectors'
import { pagesOf } from './fakes'

export interface GcpListings {
  instances?: GcpInstance[][]
  networks?: GcpNetwork[][]
  subnetworks?: Record<string, GcpSubnetwork[][]>
}

/** Client serving fixed pages; every call starts a fresh iteration. */
export function fakeGcpClient(listings: GcpListings = {}): GcpClient {
  return {
    listInstances: () => pagesOf(...(listings.instances ?? [])),
    listNetworks: () => pagesOf(...(listings.networks ?? [])),
    listSubnetworks: (network) => pagesOf(...(listings.subnetworks?.[network] ?? [])),
  }
}

export function gcpDirectoryWith(entries: readonly [ClientScope, GcpClient][]): GcpDirectory {
  const directory = createClientDirectory<GcpClient>('gcp clients')
  for (const [scope, client] of entries) {
    directory.mustRegister(scope, {
      client,
      credentials: scope.credentials,
      key: scope,
      labels: { credentials: scope.credentials, project: scope.project, region: scope.region ?? '' },
    })
  }
  return directory
}

export function instance(id: string, overrides: Partial<GcpInstance> = {}): GcpInstance {
  return {
    id,
    name: `vm-${id}`,
    zone: 'r1-a',
    machineType: 'e2-small',
    status: 'RUNNING',
    ...overrides,
  }
}

export interface AzureListings {
  accounts?: AzureStorageAccount[][]
  /** Keyed by `${resourceGroup}/${account}` */
  containers?: Record<string, AzureBlobContainer[][]>
}

export function fakeAzureClient(listings: AzureListings = {}): AzureClient {
  return {
    listStorageAccounts: () => pagesOf(...(listings.accounts ?? [])),
    listBlobContainers: (resourceGroup, account) =>
      pagesOf(...(listings.containers?.[`${resourceGroup}/${account}`] ?? [])),
  }
}

export function azureDirectoryWith(entries: readonly [string, string, AzureClient][]): AzureDirectory {
  const directory = createNamedClientDirectory<AzureClient>('azure clients')
  for (const [credentials, subscriptionId, client] of entries) {
    directory.mustRegister(subscriptionId, {
      client,
      credentials,
      key: subscriptionId,
      labels: { credentials, subscription_id: subscriptionId },
    })
  }
  return directory
}
