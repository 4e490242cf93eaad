import type {AccessTokenStore} from '@token-gate/db'
import {createStructuredLogger, type StructuredLogger} from '@token-gate/logging'

import {loadConfig} from './config'
import {runAsEntrypoint, serviceName} from './entrypoint'
import {openTokenStoreBackend} from './infrastructure'

/**
 * Deletes every token that has expired or used up its allowance. Revoked
 * tokens stay for the audit trail.
 */
export const runTokenCleanup = async ({
  store,
  now,
  write,
  logger
}: {
  store: Pick<AccessTokenStore, 'deleteExpiredOrExhausted'>
  now: Date
  write: (line: string) => void
  logger?: StructuredLogger
}) => {
  const deleted = await store.deleteExpiredOrExhausted({now})
  logger?.info({
    event: 'tokens.cleanup.completed',
    component: 'tokens.cleanup',
    message: 'Expired and exhausted access tokens deleted',
    metadata: {deleted_count: deleted}
  })
  write(`Deleted ${deleted} expired/exhausted token(s).\n`)
  return deleted
}

const cleanup = async () => {
  const config = loadConfig(process.env)
  const logger = createStructuredLogger({
    service: serviceName,
    env: config.nodeEnv,
    level: config.logging.level,
    extraSensitiveKeys: config.logging.redactExtraKeys
  })
  const backend = await openTokenStoreBackend({config})

  try {
    await runTokenCleanup({
      store: backend.tokenStore,
      now: new Date(),
      write: line => {
        process.stdout.write(line)
      },
      logger
    })
  } finally {
    await backend.close()
  }
}

runAsEntrypoint(import.meta.url, cleanup, {
  event: 'tokens.cleanup.failed',
  component: 'tokens.cleanup',
  message: 'Token cleanup failed',
  reason_code: 'cleanup_failed'
})
