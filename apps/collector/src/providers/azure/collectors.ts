import { z } from 'zod'
import {
  defineCollector,
  parentsFromStorage,
  scopesFromDirectory,
  type CollectorFactory,
} from '../../core/collector'
import type { ClientDirectory } from '../../core/scope'
import { toTimestamp } from '../convert'
import { AZURE_PERMANENT_STATUS_CODES, type AzureClient } from './adapter'
import { AZ_BLOB_CONTAINER_MODEL, AZ_STORAGE_ACCOUNT_MODEL } from './models'

export const AZURE_TASKS = {
  COLLECT_STORAGE_ACCOUNTS: 'az:task:collect-storage-accounts',
  COLLECT_BLOB_CONTAINERS: 'az:task:collect-blob-containers',
  COLLECT_ALL: 'az:task:collect-all',
  LINK_ALL: 'az:task:link-all',
} as const

/** Keyed by subscription id */
export type AzureDirectory = ClientDirectory<AzureClient, string>

const describeSubscription = (subscriptionId: string): string => subscriptionId

const subscriptionPayloadSchema = z.object({
  subscription_id: z.string().min(1),
})

type SubscriptionPayload = z.infer<typeof subscriptionPayloadSchema>

const blobContainerPayloadSchema = z.object({
  subscription_id: z.string().min(1),
  resource_group: z.string().min(1),
  storage_account: z.string().min(1),
})

type BlobContainerPayload = z.infer<typeof blobContainerPayloadSchema>

export function createStorageAccountCollector(directory: AzureDirectory): CollectorFactory {
  return defineCollector({
    taskType: AZURE_TASKS.COLLECT_STORAGE_ACCOUNTS,
    model: AZ_STORAGE_ACCOUNT_MODEL,
    metric: {
      name: 'inventory_az_storage_account_rows',
      help: 'Storage accounts upserted by the last run per subscription',
      labelNames: ['subscription_id'],
    },
    payloadSchema: subscriptionPayloadSchema,
    directory,
    scopeOf: (payload) => payload.subscription_id,
    describeScope: describeSubscription,
    targets: (): Promise<SubscriptionPayload[]> =>
      scopesFromDirectory(directory, (subscriptionId) => ({ subscription_id: subscriptionId })),
    list: (client) => client.listStorageAccounts(),
    toRecord: (account, payload) => ({
      subscription_id: payload.subscription_id,
      resource_group: account.resourceGroup,
      name: account.name,
      resource_id: account.id,
      location: account.location,
      kind: account.kind,
      sku_name: account.skuName,
      access_tier: account.accessTier ?? null,
      https_only: account.httpsOnly ?? null,
      creation_time: toTimestamp(account.creationTime),
    }),
    labelValues: (payload) => [payload.subscription_id],
    permanentStatusCodes: AZURE_PERMANENT_STATUS_CODES,
  })
}

const persistedStorageAccountSchema = z.object({
  subscription_id: z.string(),
  resource_group: z.string(),
  name: z.string(),
})

/**
 * Blob containers are enumerated per persisted storage account. Accounts of
 * subscriptions without a configured client are skipped with a warning.
 */
export function createBlobContainerCollector(directory: AzureDirectory): CollectorFactory {
  return defineCollector({
    taskType: AZURE_TASKS.COLLECT_BLOB_CONTAINERS,
    model: AZ_BLOB_CONTAINER_MODEL,
    metric: {
      name: 'inventory_az_blob_container_rows',
      help: 'Blob containers upserted by the last run per storage account',
      labelNames: ['subscription_id', 'resource_group', 'storage_account'],
    },
    payloadSchema: blobContainerPayloadSchema,
    directory,
    scopeOf: (payload) => payload.subscription_id,
    describeScope: describeSubscription,
    targets: (services, log): Promise<BlobContainerPayload[]> =>
      parentsFromStorage(services.storage, AZ_STORAGE_ACCOUNT_MODEL.table, persistedStorageAccountSchema, (account) => {
        if (!directory.has(account.subscription_id)) {
          log.warn('No client for storage account subscription, skipping', {
            event_name: 'AZURE_SUBSCRIPTION_NOT_CONFIGURED',
            subscription_id: account.subscription_id,
            storage_account: account.name,
          })
          return []
        }
        return [
          {
            subscription_id: account.subscription_id,
            resource_group: account.resource_group,
            storage_account: account.name,
          },
        ]
      }),
    list: (client, payload) => client.listBlobContainers(payload.resource_group, payload.storage_account),
    toRecord: (container, payload) => ({
      subscription_id: payload.subscription_id,
      resource_group: payload.resource_group,
      storage_account: payload.storage_account,
      name: container.name,
      resource_id: container.id,
      public_access: container.publicAccess ?? null,
      lease_state: container.leaseState ?? null,
      last_modified_time: toTimestamp(container.lastModifiedTime),
    }),
    labelValues: (payload) => [payload.subscription_id, payload.resource_group, payload.storage_account],
    permanentStatusCodes: AZURE_PERMANENT_STATUS_CODES,
  })
}

export function createAzureCollectors(directory: AzureDirectory): CollectorFactory[] {
  return [createStorageAccountCollector(directory), createBlobContainerCollector(directory)]
}
