#!/usr/bin/env node

/**
 * Usage Inspector
 *
 * One scheduled invocation: inspect every configured provider once, push the
 * batch to the Pushgateway once, print a summary and exit. The exit code is
 * non-zero only when settings are unusable or the push failed; provider
 * failures are reported, not fatal.
 */

// Load environment variables first, before any other imports
import './env.js'

import { loggers } from './config/logger.js'
import { loadSettings } from './config/settings.js'
import type { InspectorSettings } from './config/settings.js'
import { CredentialStore } from './credentials/store.js'
import { PushGatewayEmitter } from './emitter/pushgateway.js'
import { classifyError, formatErrorForLog } from './lib/errors.js'
import { HttpClient } from './network/http-client.js'
import { Orchestrator } from './orchestrator/orchestrator.js'
import { createAdapterRegistry } from './providers/adapters/index.js'
import { inspectOnce } from './run.js'
import { HttpCaptchaSolver } from './session/captcha.js'

const log = loggers.run

async function main(): Promise<number> {
  let settings: InspectorSettings
  try {
    settings = loadSettings()
  } catch (error) {
    log.fatal('Settings are invalid, nothing was inspected', formatErrorForLog(classifyError(error)))
    return 1
  }

  const network = new HttpClient({
    dnsMap: settings.network.dnsMap,
    relay: settings.network.relay,
    proxyUrl: settings.network.proxyUrl,
    timeoutMs: settings.network.timeoutMs,
    logBodies: settings.debug,
  })

  try {
    const store = CredentialStore.load(settings.providers)
    for (const problem of store.problems()) {
      log.warn('Provider configuration rejected', { provider: problem.provider, issues: problem.issues })
    }

    const orchestrator = new Orchestrator({
      store,
      registry: createAdapterRegistry(),
      network,
      captchaSolver: settings.captchaSolver ? new HttpCaptchaSolver(network, settings.captchaSolver) : undefined,
      concurrency: settings.concurrency,
      runDeadlineMs: settings.runDeadlineMs,
    })
    const emitter = new PushGatewayEmitter(network, settings.pushGateway)
    const run = await inspectOnce(orchestrator, emitter)

    console.log(run.summary)
    return run.exitCode
  } finally {
    await network.close()
  }
}

main().then(
  exitCode => {
    process.exitCode = exitCode
  },
  (error: unknown) => {
    log.fatal('Inspection run crashed', formatErrorForLog(classifyError(error)), error)
    process.exitCode = 1
  }
)
