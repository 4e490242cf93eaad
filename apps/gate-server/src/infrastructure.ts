import {
  createInMemoryAccessTokenStore,
  createRedisAccessTokenStore,
  type AccessTokenStore,
  type RedisEvalClient
} from '@token-gate/db'
import {createClient} from 'redis'

import type {ServiceConfig} from './config'

type GateRedisClient = ReturnType<typeof createClient>

export type TokenStoreBackend = {
  kind: 'memory' | 'redis'
  tokenStore: AccessTokenStore
  close: () => Promise<void>
}

// node-redis v4 takes keys and arguments as one options object, all strings.
export const toRedisEvalClient = (redis: GateRedisClient): RedisEvalClient => ({
  get: key => redis.get(key),
  eval: (script, keys, args) => redis.eval(script, {keys, arguments: args.map(String)})
})

export const memoryBackend = (tokenStore: AccessTokenStore): TokenStoreBackend => ({
  kind: 'memory',
  tokenStore,
  close: async () => undefined
})

const connectRedis = async ({url, connectTimeoutMs}: {url: string; connectTimeoutMs: number}) => {
  const redis = createClient({url, socket: {connectTimeout: connectTimeoutMs}})
  try {
    await redis.connect()
    return redis
  } catch (error) {
    await Promise.allSettled([redis.quit()])
    throw error
  }
}

/**
 * Opens the token store the configuration asks for. Redis when enabled,
 * otherwise a process-local store that forgets everything on restart.
 */
export const openTokenStoreBackend = async ({
  config,
  now
}: {
  config: ServiceConfig
  now?: () => Date
}): Promise<TokenStoreBackend> => {
  const {enabled, redisUrl, redisConnectTimeoutMs, redisKeyPrefix} = config.infrastructure
  const clock = now ? {now} : {}

  if (!enabled) {
    return memoryBackend(createInMemoryAccessTokenStore(clock))
  }
  if (!redisUrl) {
    throw new Error('Infrastructure is enabled but GATE_REDIS_URL is missing')
  }

  const redis = await connectRedis({url: redisUrl, connectTimeoutMs: redisConnectTimeoutMs})
  return {
    kind: 'redis',
    tokenStore: createRedisAccessTokenStore({redis: toRedisEvalClient(redis), keyPrefix: redisKeyPrefix, ...clock}),
    close: async () => {
      await Promise.allSettled([redis.quit()])
    }
  }
}
