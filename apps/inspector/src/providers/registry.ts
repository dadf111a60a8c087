/**
 * Adapter Registry
 *
 * Adapters must be explicitly registered; no auto-discovery.
 */

import type { AdapterRegistry, ProviderAdapter } from './types.js'

/**
 * In-memory adapter registry.
 * Adapters are registered at startup and remain immutable during the run.
 */
export class InMemoryAdapterRegistry implements AdapterRegistry {
  private readonly adapters = new Map<string, ProviderAdapter>()

  /**
   * @throws Error if an adapter with the same ID is already registered
   */
  register(adapter: ProviderAdapter): void {
    if (this.adapters.has(adapter.id)) {
      throw new Error(`Adapter with ID '${adapter.id}' is already registered`)
    }
    this.adapters.set(adapter.id, adapter)
  }

  get(adapterId: string): ProviderAdapter | undefined {
    return this.adapters.get(adapterId)
  }

  list(): string[] {
    return Array.from(this.adapters.keys())
  }
}
