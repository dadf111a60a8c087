/**
 * Hostname override lookup
 *
 * Used as the socket lookup of the HTTP dispatcher. Only the address the
 * socket connects to changes; the URL, Host header and TLS servername keep
 * the original hostname.
 */

import { lookup as systemLookup } from 'node:dns'
import type { LookupAddress, LookupOptions } from 'node:dns'
import { isIP } from 'node:net'

type LookupCallback = (
  err: NodeJS.ErrnoException | null,
  address: string | LookupAddress[],
  family?: number
) => void

export type LookupFn = (hostname: string, options: LookupOptions, callback: LookupCallback) => void

export function createOverrideLookup(
  overrides: Readonly<Record<string, string>>,
  fallback: LookupFn = systemLookup
): LookupFn {
  const table = new Map(
    Object.entries(overrides).map(([host, address]) => [host.toLowerCase(), address] as const)
  )

  return (hostname, options, callback) => {
    const address = table.get(hostname.toLowerCase())
    if (address === undefined) {
      fallback(hostname, options, callback)
      return
    }

    const family = isIP(address)
    // autoSelectFamily asks for every address
    if (options.all) {
      callback(null, [{ address, family }])
    } else {
      callback(null, address, family)
    }
  }
}
