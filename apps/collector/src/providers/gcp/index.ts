import type { ILogger } from '@cloudledger/logger'
import { createCollectAllTask } from '../../core/collector'
import { RegistryConflictError } from '../../core/registry'
import { createClientDirectory, scopeKey, type ClientScope } from '../../core/scope'
import type { ProviderTasks } from '../types'
import type { GcpAdapter, GcpClient } from './adapter'
import { GCP_TASKS, createGcpCollectors, type GcpDirectory } from './collectors'
import { createGcpLinkAllTask } from './links'
import { GCP_MODELS } from './models'

export * from './adapter'
export * from './collectors'
export * from './links'
export * from './models'

/**
 * Authenticate every configured scope. A scope that fails to authenticate is
 * logged and left out; its tasks then fail permanently with a missing client.
 * A duplicate scope throws.
 */
export async function buildGcpDirectory(
  adapter: GcpAdapter,
  scopes: readonly ClientScope[],
  log: ILogger
): Promise<GcpDirectory> {
  const directory = createClientDirectory<GcpClient>('gcp clients')
  const seen = new Set<string>()
  for (const scope of scopes) {
    const key = scopeKey(scope)
    if (seen.has(key)) {
      throw new RegistryConflictError(directory.name, key)
    }
    seen.add(key)

    let client: GcpClient
    try {
      client = await adapter.authenticate(scope)
    } catch (error) {
      log.error('Authentication failed', { event_name: 'GCP_AUTH_FAILED', project: scope.project, region: scope.region }, error)
      continue
    }

    directory.mustRegister(scope, {
      client,
      credentials: scope.credentials,
      key: scope,
      labels: { credentials: scope.credentials, project: scope.project, region: scope.region ?? '' },
    })
  }

  log.info('Clients ready', { event_name: 'GCP_CLIENTS_READY', configured: scopes.length, ready: directory.size() })
  return directory
}

export function createGcpProvider(directory: GcpDirectory): ProviderTasks {
  const collectors = createGcpCollectors(directory)
  return {
    provider: 'gcp',
    collectors,
    collectAll: createCollectAllTask(
      GCP_TASKS.COLLECT_ALL,
      collectors.map((collector) => collector.taskType)
    ),
    linkAll: createGcpLinkAllTask(),
    models: GCP_MODELS,
  }
}
