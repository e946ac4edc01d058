/**
 * Registration table.
 *
 * Every task handler, model descriptor and metric descriptor is registered
 * here, in one place, during start-up. Any duplicate throws and the process
 * must not start.
 */

import type { ModelDescriptor } from '@cloudledger/db'
import type { ILogger } from '@cloudledger/logger'
import {
  HOUSEKEEPER_METRIC,
  HOUSEKEEPER_RUN_MODEL,
  createHousekeeperTask,
  type RetentionEntry,
} from './auxiliary/housekeeper'
import type { InventoryConfig } from './config/config'
import { Registry } from './core/registry'
import type { Services, TaskHandler } from './core/task'
import {
  buildAzureDirectory,
  createAzureProvider,
  isAzureAdapter,
  type AzureAdapter,
} from './providers/azure'
import { buildGcpDirectory, createGcpProvider, isGcpAdapter, type GcpAdapter } from './providers/gcp'
import { loadAdapter, type ModuleImporter } from './providers/loader'
import type { ProviderTasks } from './providers/types'

export function createModelRegistry(): Registry<string, ModelDescriptor> {
  return Registry.named<ModelDescriptor>('models')
}

export function registerProvider(
  handlers: Registry<string, TaskHandler>,
  services: Services,
  provider: ProviderTasks
): void {
  for (const model of provider.models) {
    services.models.mustRegister(model.name, model)
  }

  for (const collector of provider.collectors) {
    services.metrics.registerDescriptor(collector.taskType, collector.metric)
    handlers.mustRegister(collector.taskType, collector.create(services))
  }

  handlers.mustRegister(provider.collectAll.taskType, provider.collectAll.create(services))

  services.metrics.registerDescriptor(provider.linkAll.taskType, provider.linkAll.metric)
  handlers.mustRegister(provider.linkAll.taskType, provider.linkAll.create(services))
}

export function registerHousekeeper(
  handlers: Registry<string, TaskHandler>,
  services: Services,
  defaultRetention: readonly RetentionEntry[]
): void {
  services.models.mustRegister(HOUSEKEEPER_RUN_MODEL.name, HOUSEKEEPER_RUN_MODEL)
  const housekeeper = createHousekeeperTask(defaultRetention)
  services.metrics.registerDescriptor(housekeeper.taskType, HOUSEKEEPER_METRIC)
  handlers.mustRegister(housekeeper.taskType, housekeeper.create(services))
}

/**
 * Assemble the handler registry from the providers and the housekeeper.
 */
export function buildHandlerRegistry(
  services: Services,
  providers: readonly ProviderTasks[],
  defaultRetention: readonly RetentionEntry[]
): Registry<string, TaskHandler> {
  const handlers = Registry.named<TaskHandler>('task handlers')
  for (const provider of providers) {
    registerProvider(handlers, services, provider)
  }
  registerHousekeeper(handlers, services, defaultRetention)
  return handlers
}

export interface ProviderAdapters {
  gcp?: GcpAdapter
  azure?: AzureAdapter
}

export async function loadProviderAdapters(
  inventory: InventoryConfig,
  importer?: ModuleImporter
): Promise<ProviderAdapters> {
  const adapters: ProviderAdapters = {}
  if (inventory.adapters.gcp) {
    adapters.gcp = await loadAdapter(inventory.adapters.gcp, isGcpAdapter, importer)
  }
  if (inventory.adapters.azure) {
    adapters.azure = await loadAdapter(inventory.adapters.azure, isAzureAdapter, importer)
  }
  return adapters
}

/**
 * Authenticate the configured scopes and build the provider task sets.
 * Providers without an adapter are left out.
 */
export async function buildProviders(
  inventory: InventoryConfig,
  adapters: ProviderAdapters,
  log: ILogger
): Promise<ProviderTasks[]> {
  const providers: ProviderTasks[] = []
  if (adapters.gcp) {
    const directory = await buildGcpDirectory(adapters.gcp, inventory.gcp.scopes, log.child('gcp'))
    providers.push(createGcpProvider(directory))
  }
  if (adapters.azure) {
    const directory = await buildAzureDirectory(adapters.azure, inventory.azure.subscriptions, log.child('azure'))
    providers.push(createAzureProvider(directory))
  }
  return providers
}
