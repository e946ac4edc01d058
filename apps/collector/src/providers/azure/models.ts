import type { ModelDescriptor } from '@cloudledger/db'

export type AzStorageAccountRow = {
  subscription_id: string
  resource_group: string
  name: string
  resource_id: string
  location: string
  kind: string
  sku_name: string
  access_tier: string | null
  https_only: boolean | null
  creation_time: Date | null
}

export type AzBlobContainerRow = {
  subscription_id: string
  resource_group: string
  storage_account: string
  name: string
  resource_id: string
  public_access: string | null
  lease_state: string | null
  last_modified_time: Date | null
}

export const AZ_STORAGE_ACCOUNT_MODEL: ModelDescriptor<AzStorageAccountRow> = {
  name: 'az:model:storage_account',
  table: 'az_storage_account',
  conflictColumns: ['subscription_id', 'resource_group', 'name'],
  updateColumns: ['resource_id', 'location', 'kind', 'sku_name', 'access_tier', 'https_only', 'creation_time'],
}

export const AZ_BLOB_CONTAINER_MODEL: ModelDescriptor<AzBlobContainerRow> = {
  name: 'az:model:blob_container',
  table: 'az_blob_container',
  conflictColumns: ['subscription_id', 'resource_group', 'storage_account', 'name'],
  updateColumns: ['resource_id', 'public_access', 'lease_state', 'last_modified_time'],
}

export const AZ_LINK_BLOB_CONTAINER_TO_STORAGE_ACCOUNT_MODEL: ModelDescriptor = {
  name: 'az:model:link_blob_container_to_storage_account',
  table: 'az_link_blob_container_to_storage_account',
  conflictColumns: ['blob_container_id', 'storage_account_id'],
  updateColumns: [],
}

export const AZURE_MODELS: readonly ModelDescriptor[] = [
  AZ_STORAGE_ACCOUNT_MODEL,
  AZ_BLOB_CONTAINER_MODEL,
  AZ_LINK_BLOB_CONTAINER_TO_STORAGE_ACCOUNT_MODEL,
]
