/**
 * Adapter Registration
 *
 * Registers all built-in adapters with a registry.
 * Adapters are explicitly registered here - no auto-discovery.
 */

import type { LoginFlowResolver } from '../../session/manager.js'
import { InMemoryAdapterRegistry } from '../registry.js'
import type { AdapterRegistry } from '../types.js'

import { anthropicAdapter } from './anthropic/adapter.js'
import { birdeyeAdapter } from './birdeye/adapter.js'
import { coingeckoAdapter } from './coingecko/adapter.js'
import { coinmarketcapAdapter } from './coinmarketcap/adapter.js'
import { genericAdapter } from './generic/adapter.js'
import { openaiAdapter } from './openai/adapter.js'
import { quicknodeAdapter } from './quicknode/adapter.js'
import { twitterapiAdapter } from './twitterapi/adapter.js'
import { twitterapiConsoleAdapter } from './twitterapi-console/adapter.js'

export function registerAllAdapters(registry: AdapterRegistry): void {
  registry.register(genericAdapter)
  registry.register(quicknodeAdapter)
  registry.register(coingeckoAdapter)
  registry.register(twitterapiAdapter)
  registry.register(twitterapiConsoleAdapter)
  registry.register(birdeyeAdapter)
  registry.register(coinmarketcapAdapter)
  registry.register(openaiAdapter)
  registry.register(anthropicAdapter)
}

export function createAdapterRegistry(): InMemoryAdapterRegistry {
  const registry = new InMemoryAdapterRegistry()
  registerAllAdapters(registry)
  return registry
}

/**
 * Login flows come from the adapter a provider is configured with.
 */
export function loginFlowsFrom(registry: AdapterRegistry): LoginFlowResolver {
  return config => registry.get(config.adapter)?.login
}

// Re-export adapters for direct access (e.g., in tests)
export { anthropicAdapter } from './anthropic/adapter.js'
export { birdeyeAdapter, birdeyeLogin } from './birdeye/adapter.js'
export { coingeckoAdapter } from './coingecko/adapter.js'
export { coinmarketcapAdapter, coinmarketcapLogin } from './coinmarketcap/adapter.js'
export { genericAdapter } from './generic/adapter.js'
export { openaiAdapter } from './openai/adapter.js'
export { quicknodeAdapter } from './quicknode/adapter.js'
export { twitterapiAdapter } from './twitterapi/adapter.js'
export { twitterapiConsoleAdapter } from './twitterapi-console/adapter.js'
