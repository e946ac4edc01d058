/**
 * Azure adapter contract.
 *
 * Clients are keyed by subscription id. API failures carrying an HTTP status
 * must be thrown as (or wrap) ProviderApiError with provider 'azure'.
 */

export interface AzureSubscription {
  credentials: string
  subscriptionId: string
}

export interface AzureStorageAccount {
  id: string
  name: string
  resourceGroup: string
  location: string
  kind: string
  skuName: string
  accessTier?: string
  httpsOnly?: boolean
  creationTime?: string
}

export interface AzureBlobContainer {
  id: string
  name: string
  publicAccess?: string
  leaseState?: string
  lastModifiedTime?: string
}

export interface AzureClient {
  listStorageAccounts(): AsyncIterable<readonly AzureStorageAccount[]>
  listBlobContainers(resourceGroup: string, storageAccount: string): AsyncIterable<readonly AzureBlobContainer[]>
}

export interface AzureAdapter {
  authenticate(subscription: AzureSubscription): Promise<AzureClient>
}

export function isAzureAdapter(value: unknown): value is AzureAdapter {
  return (
    typeof value === 'object' &&
    value !== null &&
    'authenticate' in value &&
    typeof value.authenticate === 'function'
  )
}

/** Azure also reports missing parents of nested resources as 400. */
export const AZURE_PERMANENT_STATUS_CODES: readonly number[] = [404, 400]
