import type { ILogger } from '@cloudledger/logger'
import { createCollectAllTask } from '../../core/collector'
import { RegistryConflictError } from '../../core/registry'
import { createNamedClientDirectory } from '../../core/scope'
import type { ProviderTasks } from '../types'
import type { AzureAdapter, AzureClient, AzureSubscription } from './adapter'
import { AZURE_TASKS, createAzureCollectors, type AzureDirectory } from './collectors'
import { createAzureLinkAllTask } from './links'
import { AZURE_MODELS } from './models'

export * from './adapter'
export * from './collectors'
export * from './links'
export * from './models'

/**
 * Authenticate every configured subscription. Failures are logged and the
 * subscription left out; a subscription listed twice throws.
 */
export async function buildAzureDirectory(
  adapter: AzureAdapter,
  subscriptions: readonly AzureSubscription[],
  log: ILogger
): Promise<AzureDirectory> {
  const directory = createNamedClientDirectory<AzureClient>('azure clients')
  const seen = new Set<string>()

  for (const subscription of subscriptions) {
    const key = subscription.subscriptionId
    if (seen.has(key)) {
      throw new RegistryConflictError(directory.name, key)
    }
    seen.add(key)

    let client: AzureClient
    try {
      client = await adapter.authenticate(subscription)
    } catch (error) {
      log.error('Authentication failed', { event_name: 'AZURE_AUTH_FAILED', subscription_id: key }, error)
      continue
    }

    directory.mustRegister(key, {
      client,
      credentials: subscription.credentials,
      key,
      labels: { credentials: subscription.credentials, subscription_id: key },
    })
  }

  log.info('Clients ready', {
    event_name: 'AZURE_CLIENTS_READY',
    configured: subscriptions.length,
    ready: directory.size(),
  })
  return directory
}

export function createAzureProvider(directory: AzureDirectory): ProviderTasks {
  const collectors = createAzureCollectors(directory)
  return {
    provider: 'azure',
    collectors,
    collectAll: createCollectAllTask(
      AZURE_TASKS.COLLECT_ALL,
      collectors.map((collector) => collector.taskType)
    ),
    linkAll: createAzureLinkAllTask(),
    models: AZURE_MODELS,
  }
}
