/**
 * Generic JSON Adapter
 *
 * For providers that expose usage as a JSON document with a "used" and a
 * "limit" number somewhere in it. Configured entirely through options:
 * - usageUrl (required)
 * - usedField / limitField: dotted paths, default "used" / "limit"
 * - keyHeader: header carrying the API key, default "x-api-key"
 * - keyPrefix: prepended to the key, e.g. "Bearer "
 */

import { expectJson } from '../../../network/response.js'
import { readNumber } from '../../../lib/json.js'
import { defineAdapter } from '../../define-adapter.js'
import { requireApiKey, requireOption } from '../../kit/credentials.js'

const ADAPTER_ID = 'generic'

export const genericAdapter = defineAdapter({
  id: ADAPTER_ID,
  name: 'Generic JSON usage endpoint',
  authModes: ['static_key'],

  async collect(session, ctx, metrics) {
    const url = requireOption(ctx.config, 'usageUrl')
    const usedField = ctx.config.options.usedField ?? 'used'
    const limitField = ctx.config.options.limitField ?? 'limit'
    const keyHeader = ctx.config.options.keyHeader ?? 'x-api-key'
    const keyPrefix = ctx.config.options.keyPrefix ?? ''

    const response = await ctx.network.request('GET', url, session, {
      headers: { [keyHeader]: `${keyPrefix}${requireApiKey(session)}` },
      signal: ctx.signal,
    })
    const body = expectJson(response, 'Usage endpoint')

    metrics.add('usage_used', readNumber(body, usedField))
    metrics.add('usage_limit', readNumber(body, limitField))
  },
})
