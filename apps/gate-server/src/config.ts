import {CookieSameSiteSchema, type AccessGateSettings} from '@token-gate/access-gate'
import {LogLevelSchema, type LogLevel} from '@token-gate/logging'
import {z} from 'zod'

const envText = (value: unknown) => (typeof value === 'string' ? value.trim() : value)

const ENV_FLAGS = new Map<string, boolean>([
  ['true', true],
  ['1', true],
  ['false', false],
  ['0', false]
])

const DECIMAL_INTEGER = /^-?\d+$/u

const integerFromEnv = z.preprocess(value => {
  const text = envText(value)
  return typeof text === 'string' && DECIMAL_INTEGER.test(text) ? Number(text) : text
}, z.number().int())

const numberFromEnv = integerFromEnv.pipe(z.number().int().positive())
const nonNegativeNumberFromEnv = integerFromEnv.pipe(z.number().int().min(0))

const booleanFromEnv = z.preprocess(value => {
  const text = envText(value)
  return typeof text === 'string' ? (ENV_FLAGS.get(text.toLowerCase()) ?? text) : text
}, z.boolean())

// Blank counts as unset.
const optionalString = z.preprocess(value => {
  const text = envText(value)
  return typeof text === 'string' && text !== '' ? text : undefined
}, z.string().optional())

const parseKeyList = (raw: string | undefined) =>
  (raw ?? '').split(',').flatMap(part => {
    const key = part.trim()
    return key ? [key] : []
  })

const envSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
    GATE_HOST: z.string().default('0.0.0.0'),
    GATE_PORT: numberFromEnv.default(8080),
    GATE_DEBUG: booleanFromEnv.default(false),
    GATE_MAX_BODY_BYTES: numberFromEnv.default(64 * 1024),
    GATE_LOG_LEVEL: LogLevelSchema.default('info'),
    GATE_LOG_REDACT_EXTRA_KEYS: optionalString,
    GATE_COOKIE_SECURE: booleanFromEnv.optional(),
    GATE_COOKIE_MAX_AGE: nonNegativeNumberFromEnv.default(60 * 60 * 24 * 365),
    GATE_COOKIE_SAMESITE: z.preprocess(
      value => (typeof value === 'string' ? value.trim().toLowerCase() : value),
      CookieSameSiteSchema.default('lax')
    ),
    GATE_COOKIE_HTTPONLY: booleanFromEnv.default(true),
    GATE_COOKIE_PREFIX: z.string().trim().min(1).default('token_gate_'),
    GATE_TOKEN_PARAM: z.string().trim().min(1).default('token'),
    GATE_FORBIDDEN_TEMPLATE: optionalString,
    GATE_ADMIN_API_TOKEN: optionalString,
    GATE_REDIS_URL: optionalString,
    GATE_REDIS_KEY_PREFIX: z.string().trim().min(1).default('token-gate'),
    GATE_REDIS_CONNECT_TIMEOUT_MS: numberFromEnv.default(2_000)
  })
  .strict()

export type ServiceConfig = {
  nodeEnv: 'development' | 'test' | 'production'
  host: string
  port: number
  debug: boolean
  maxBodyBytes: number
  logging: {
    level: LogLevel
    redactExtraKeys: string[]
  }
  gate: AccessGateSettings
  forbiddenTemplatePath?: string
  adminApiToken?: string
  infrastructure: {
    enabled: boolean
    redisUrl?: string
    redisConnectTimeoutMs: number
    redisKeyPrefix: string
  }
}

const MIN_ADMIN_API_TOKEN_LENGTH = 16

const toEnvInput = (env: NodeJS.ProcessEnv) => ({
  NODE_ENV: env.NODE_ENV,
  GATE_HOST: env.GATE_HOST,
  GATE_PORT: env.GATE_PORT,
  GATE_DEBUG: env.GATE_DEBUG,
  GATE_MAX_BODY_BYTES: env.GATE_MAX_BODY_BYTES,
  GATE_LOG_LEVEL: env.GATE_LOG_LEVEL,
  GATE_LOG_REDACT_EXTRA_KEYS: env.GATE_LOG_REDACT_EXTRA_KEYS,
  GATE_COOKIE_SECURE: env.GATE_COOKIE_SECURE,
  GATE_COOKIE_MAX_AGE: env.GATE_COOKIE_MAX_AGE,
  GATE_COOKIE_SAMESITE: env.GATE_COOKIE_SAMESITE,
  GATE_COOKIE_HTTPONLY: env.GATE_COOKIE_HTTPONLY,
  GATE_COOKIE_PREFIX: env.GATE_COOKIE_PREFIX,
  GATE_TOKEN_PARAM: env.GATE_TOKEN_PARAM,
  GATE_FORBIDDEN_TEMPLATE: env.GATE_FORBIDDEN_TEMPLATE,
  GATE_ADMIN_API_TOKEN: env.GATE_ADMIN_API_TOKEN,
  GATE_REDIS_URL: env.GATE_REDIS_URL,
  GATE_REDIS_KEY_PREFIX: env.GATE_REDIS_KEY_PREFIX,
  GATE_REDIS_CONNECT_TIMEOUT_MS: env.GATE_REDIS_CONNECT_TIMEOUT_MS
})

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): ServiceConfig => {
  const parsed = envSchema.parse(toEnvInput(env))

  if (parsed.NODE_ENV === 'production' && !parsed.GATE_REDIS_URL) {
    throw new Error('GATE_REDIS_URL is required in production; the in-memory token store is for development only')
  }

  if (parsed.GATE_ADMIN_API_TOKEN && parsed.GATE_ADMIN_API_TOKEN.length < MIN_ADMIN_API_TOKEN_LENGTH) {
    throw new Error(`GATE_ADMIN_API_TOKEN must be at least ${MIN_ADMIN_API_TOKEN_LENGTH} characters`)
  }

  return {
    nodeEnv: parsed.NODE_ENV,
    host: parsed.GATE_HOST,
    port: parsed.GATE_PORT,
    debug: parsed.GATE_DEBUG,
    maxBodyBytes: parsed.GATE_MAX_BODY_BYTES,
    logging: {
      level: parsed.GATE_LOG_LEVEL,
      redactExtraKeys: parseKeyList(parsed.GATE_LOG_REDACT_EXTRA_KEYS)
    },
    gate: {
      tokenParam: parsed.GATE_TOKEN_PARAM,
      cookiePrefix: parsed.GATE_COOKIE_PREFIX,
      cookie: {
        maxAgeSeconds: parsed.GATE_COOKIE_MAX_AGE,
        httpOnly: parsed.GATE_COOKIE_HTTPONLY,
        secure: parsed.GATE_COOKIE_SECURE ?? !parsed.GATE_DEBUG,
        sameSite: parsed.GATE_COOKIE_SAMESITE
      }
    },
    ...(parsed.GATE_FORBIDDEN_TEMPLATE ? {forbiddenTemplatePath: parsed.GATE_FORBIDDEN_TEMPLATE} : {}),
    ...(parsed.GATE_ADMIN_API_TOKEN ? {adminApiToken: parsed.GATE_ADMIN_API_TOKEN} : {}),
    infrastructure: {
      enabled: Boolean(parsed.GATE_REDIS_URL),
      ...(parsed.GATE_REDIS_URL ? {redisUrl: parsed.GATE_REDIS_URL} : {}),
      redisConnectTimeoutMs: parsed.GATE_REDIS_CONNECT_TIMEOUT_MS,
      redisKeyPrefix: parsed.GATE_REDIS_KEY_PREFIX
    }
  }
}
