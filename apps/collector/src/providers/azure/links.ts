import { createLinkAllTask, defineLink, linkMetric, type LinkAllFactory } from '../../core/linker'
import { AZURE_PERMANENT_STATUS_CODES } from './adapter'
import { AZURE_TASKS } from './collectors'
import {
  AZ_BLOB_CONTAINER_MODEL,
  AZ_LINK_BLOB_CONTAINER_TO_STORAGE_ACCOUNT_MODEL,
  AZ_STORAGE_ACCOUNT_MODEL,
} from './models'

export const linkBlobContainerToStorageAccount = defineLink({
  name: 'blob_container_to_storage_account',
  model: AZ_LINK_BLOB_CONTAINER_TO_STORAGE_ACCOUNT_MODEL,
  join: {
    child: AZ_BLOB_CONTAINER_MODEL.table,
    parent: AZ_STORAGE_ACCOUNT_MODEL.table,
    on: [
      ['subscription_id', 'subscription_id'],
      ['resource_group', 'resource_group'],
      ['storage_account', 'name'],
    ],
  },
  childColumn: 'blob_container_id',
  parentColumn: 'storage_account_id',
})

export const AZURE_LINKS = [linkBlobContainerToStorageAccount]

export function createAzureLinkAllTask(): LinkAllFactory {
  return createLinkAllTask(AZURE_TASKS.LINK_ALL, AZURE_LINKS, linkMetric('az'), AZURE_PERMANENT_STATUS_CODES)
}
