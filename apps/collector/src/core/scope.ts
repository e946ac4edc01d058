/**
 * Scoped client directories.
 *
 * A directory maps a credential scope to one authenticated provider client.
 * It is built once during bootstrap from configuration and read by collectors.
 */

import { Registry } from './registry'
import { ClientNotFoundError } from './errors'

export interface ClientScope {
  credentials: string
  project: string
  domain?: string
  region?: string
}

/** Structurally equal scopes produce the same key. */
export function scopeKey(scope: ClientScope): string {
  return JSON.stringify([scope.credentials, scope.project, scope.domain ?? '', scope.region ?? ''])
}

/** Label values in metric order: credentials, project, region. */
export function scopeLabelValues(scope: ClientScope): string[] {
  return [scope.credentials, scope.project, scope.region ?? '']
}

export interface ScopedClient<C, K> {
  client: C
  credentials: string
  key: K
  /** Descriptive fields for logs and metrics */
  labels: Record<string, string>
}

export type ClientDirectory<C, K> = Registry<K, ScopedClient<C, K>>

export function createClientDirectory<C>(name: string): ClientDirectory<C, ClientScope> {
  return new Registry<ClientScope, ScopedClient<C, ClientScope>>(name, scopeKey)
}

/** Directory for providers whose scope is a single identifier. */
export function createNamedClientDirectory<C>(name: string): ClientDirectory<C, string> {
  return Registry.named<ScopedClient<C, string>>(name)
}

export type ClientLookup<C, K> = { ok: true; entry: ScopedClient<C, K> } | { ok: false; error: ClientNotFoundError }

/**
 * Look up a client. A missing entry is a ClientNotFoundError, which the
 * retry policy treats as permanent.
 */
export function requireClient<C, K>(
  directory: ClientDirectory<C, K>,
  key: K,
  describe: (key: K) => string
): ClientLookup<C, K> {
  const entry = directory.get(key)
  if (!entry) {
    return { ok: false, error: new ClientNotFoundError(directory.name, describe(key)) }
  }
  return { ok: true, entry }
}
