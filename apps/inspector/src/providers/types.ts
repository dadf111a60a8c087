/**
 * Provider adapter contract
 *
 * An adapter is the only place that knows a provider's endpoints and payload
 * shapes. Everything it returns is a ProviderResult; nothing it throws
 * escapes inspect().
 */

import type { ILogger } from '@quotawatch/logger'
import type { NetworkAccess } from '../network/types.js'
import type { LoginFlow } from '../session/manager.js'
import type { ActiveProviderConfig, AuthMode, Labels, ProviderResult, Session } from '../types.js'
import type { MetricCollector } from './kit/metrics.js'

export interface InspectionContext {
  config: ActiveProviderConfig
  network: NetworkAccess
  /** Labels added to every metric, `provider` is always set by the adapter boundary */
  labels?: Labels
  /** Run deadline */
  signal?: AbortSignal
  now: () => Date
  log: ILogger
}

export interface AdapterDefinition {
  /** Adapter ID referenced by provider configuration */
  id: string
  /** Human-readable name */
  name: string
  /** Auth modes the adapter can work with */
  authModes: readonly AuthMode[]
  /** Poll once per configured API key, each key its own identity */
  perKey?: boolean
  /** Login request sequence for email_password / captcha_login */
  login?: LoginFlow
  /**
   * Fetch usage and record metrics. Throw to fail; metrics recorded before
   * the throw are kept.
   */
  collect(session: Session, ctx: InspectionContext, metrics: MetricCollector): Promise<void>
}

export interface ProviderAdapter {
  readonly id: string
  readonly name: string
  readonly authModes: readonly AuthMode[]
  readonly perKey: boolean
  readonly login?: LoginFlow
  inspect(session: Session, ctx: InspectionContext): Promise<ProviderResult>
}

export interface AdapterRegistry {
  register(adapter: ProviderAdapter): void
  get(adapterId: string): ProviderAdapter | undefined
  list(): string[]
}
