import { ConfigInvalidError } from '../../lib/errors.js'
import type { ActiveProviderConfig, Session } from '../../types.js'

/** The session's API key; per-key sessions carry exactly one */
export function requireApiKey(session: Session): string {
  const key = session.transport.apiKeys[0]
  if (key === undefined) {
    throw new ConfigInvalidError(session.provider, ['an API key is required'])
  }
  return key
}

export function requireAdminKey(session: Session): string {
  const key = session.transport.adminKey
  if (key === undefined) {
    throw new ConfigInvalidError(session.provider, ['an admin API key is required'])
  }
  return key
}

export function requireOption(config: ActiveProviderConfig, option: string): string {
  const value = config.options[option]
  if (value === undefined || value === '') {
    throw new ConfigInvalidError(config.name, [`option '${option}' is required`])
  }
  return value
}
