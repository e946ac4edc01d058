/**
 * Adapter plug-in loading.
 *
 * An adapter module is named in the inventory config by package name or by
 * a path relative to the working directory. It must export the adapter as
 * `adapter` or as its default export.
 */

import { resolve } from 'path'

export type ModuleImporter = (specifier: string) => Promise<unknown>

const defaultImporter: ModuleImporter = (specifier) => import(specifier)

export function resolveModuleSpecifier(specifier: string, cwd: string = process.cwd()): string {
  return specifier.startsWith('.') ? resolve(cwd, specifier) : specifier
}

function exportedAdapter(loaded: unknown): unknown {
  if (typeof loaded !== 'object' || loaded === null) return undefined
  if ('adapter' in loaded) return loaded.adapter
  if ('default' in loaded) {
    const fallback = loaded.default
    if (typeof fallback === 'object' && fallback !== null && 'adapter' in fallback) {
      return fallback.adapter
    }
    return fallback
  }
  return undefined
}

export async function loadAdapter<A>(
  specifier: string,
  guard: (value: unknown) => value is A,
  importer: ModuleImporter = defaultImporter
): Promise<A> {
  const loaded = await importer(resolveModuleSpecifier(specifier))
  const adapter = exportedAdapter(loaded)
  if (!guard(adapter)) {
    throw new Error(`Module '${specifier}' does not export a valid adapter`)
  }
  return adapter
}
