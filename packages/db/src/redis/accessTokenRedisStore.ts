import {z} from 'zod';

import {
  AccessTokenIdSchema,
  AccessTokenRecordSchema,
  ConsumeAccessTokenInputSchema,
  type AccessTokenRecord
} from '../contracts';
import {DbRepositoryError, mapStoreError} from '../errors';
import type {AccessTokenStore, AccessTokenStoreOptions} from '../store';
import {buildAccessTokenRecord, sortNewestFirst} from '../utils';
import type {RedisEvalClient} from './types';

// Records carry the expiry as epoch milliseconds so the Lua scripts can compare
// it with the request time without parsing ISO strings.
const StoredAccessTokenSchema = AccessTokenRecordSchema.extend({
  expires_at_epoch_ms: z.number().int().optional()
}).strict();

const StoredPayloadListSchema = z.array(z.string());

type RedisAccessTokenStoreOptions = AccessTokenStoreOptions & {
  redis: RedisEvalClient;
  keyPrefix?: string;
};

const ISSUE_SCRIPT = [
  '-- access_token_issue',
  'if not redis.call("SET", KEYS[2], ARGV[1], "NX") then return 0 end',
  'redis.call("SET", KEYS[1], ARGV[2])',
  'redis.call("SADD", KEYS[3], ARGV[1])',
  'return 1'
].join('\n');

const LIST_SCRIPT = [
  '-- access_token_list',
  'local payloads = {}',
  'for _, id in ipairs(redis.call("SMEMBERS", KEYS[1])) do',
  '  local payload = redis.call("GET", ARGV[1] .. id)',
  '  if payload then table.insert(payloads, payload) end',
  'end',
  'return payloads'
].join('\n');

const REVOKE_SCRIPT = [
  '-- access_token_revoke',
  'local payload = redis.call("GET", KEYS[1])',
  'if not payload then return false end',
  'local data = cjson.decode(payload)',
  'data["is_valid"] = false',
  'local updated = cjson.encode(data)',
  'redis.call("SET", KEYS[1], updated)',
  'return updated'
].join('\n');

const CONSUME_SCRIPT = [
  '-- access_token_consume',
  'local id = redis.call("GET", KEYS[1])',
  'if not id then return false end',
  'local recordKey = ARGV[1] .. id',
  'local payload = redis.call("GET", recordKey)',
  'if not payload then return false end',
  'local data = cjson.decode(payload)',
  'if data["is_valid"] ~= true then return false end',
  'if data["path"] ~= ARGV[2] then return false end',
  'if data["expires_at_epoch_ms"] and tonumber(data["expires_at_epoch_ms"]) <= tonumber(ARGV[3]) then return false end',
  'if data["max_uses"] and tonumber(data["times_accessed"]) >= tonumber(data["max_uses"]) then return false end',
  'data["times_accessed"] = tonumber(data["times_accessed"]) + 1',
  'data["last_accessed"] = ARGV[4]',
  'local updated = cjson.encode(data)',
  'redis.call("SET", recordKey, updated)',
  'return updated'
].join('\n');

const CLEANUP_SCRIPT = [
  '-- access_token_cleanup',
  'local deleted = 0',
  'for _, id in ipairs(redis.call("SMEMBERS", KEYS[1])) do',
  '  local recordKey = ARGV[1] .. id',
  '  local payload = redis.call("GET", recordKey)',
  '  if not payload then',
  '    redis.call("SREM", KEYS[1], id)',
  '  else',
  '    local data = cjson.decode(payload)',
  '    local expired = data["expires_at_epoch_ms"] and tonumber(data["expires_at_epoch_ms"]) <= tonumber(ARGV[3])',
  '    local exhausted = data["max_uses"] and tonumber(data["times_accessed"]) >= tonumber(data["max_uses"])',
  '    if expired or exhausted then',
  '      redis.call("DEL", recordKey, ARGV[2] .. data["token"])',
  '      redis.call("SREM", KEYS[1], id)',
  '      deleted = deleted + 1',
  '    end',
  '  end',
  'end',
  'return deleted'
].join('\n');

const normalizeKeyPrefix = (prefix?: string): string => {
  const trimmed = prefix?.trim();
  if (!trimmed) {
    return 'token_gate:';
  }

  return trimmed.endsWith(':') ? trimmed : `${trimmed}:`;
};

const toStoredPayload = (record: AccessTokenRecord): string =>
  JSON.stringify(
    StoredAccessTokenSchema.parse({
      ...record,
      ...(record.expires_at !== undefined ? {expires_at_epoch_ms: new Date(record.expires_at).getTime()} : {})
    })
  );

const parseStoredPayload = (payload: string): AccessTokenRecord => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(payload);
  } catch {
    throw new DbRepositoryError('validation_error', 'Invalid access token record payload');
  }

  const {expires_at_epoch_ms: _expiresAtEpochMs, ...record} = StoredAccessTokenSchema.parse(parsed);
  return record;
};

const parseOptionalPayload = (result: unknown): AccessTokenRecord | null =>
  typeof result === 'string' ? parseStoredPayload(result) : null;

/**
 * Access token store on Redis. Each mutation is one Lua script, so the validity
 * check and the usage increment happen atomically on the server.
 */
export const createRedisAccessTokenStore = (options: RedisAccessTokenStoreOptions): AccessTokenStore => {
  const {redis} = options;
  const prefix = normalizeKeyPrefix(options.keyPrefix);
  const nowProvider = options.now ?? (() => new Date());

  const recordKeyPrefix = `${prefix}access_token:`;
  const valueKeyPrefix = `${prefix}access_token_value:`;
  const indexKey = `${prefix}access_tokens`;

  return {
    issueToken: async rawInput => {
      try {
        const record = buildAccessTokenRecord({rawInput, now: nowProvider()});
        const result = await redis.eval(
          ISSUE_SCRIPT,
          [`${recordKeyPrefix}${record.id}`, `${valueKeyPrefix}${record.token}`, indexKey],
          [record.id, toStoredPayload(record)]
        );
        if (Number(result) === 0) {
          throw new DbRepositoryError('unique_violation', 'Access token value already exists');
        }

        return record;
      } catch (error) {
        return mapStoreError(error);
      }
    },
    getTokenById: async ({id}) => {
      try {
        const payload = await redis.get(`${recordKeyPrefix}${AccessTokenIdSchema.parse(id)}`);
        return payload === null ? null : parseStoredPayload(payload);
      } catch (error) {
        return mapStoreError(error);
      }
    },
    listTokens: async () => {
      try {
        const result = await redis.eval(LIST_SCRIPT, [indexKey], [recordKeyPrefix]);
        return sortNewestFirst(StoredPayloadListSchema.parse(result).map(parseStoredPayload));
      } catch (error) {
        return mapStoreError(error);
      }
    },
    revokeToken: async ({id}) => {
      try {
        const key = `${recordKeyPrefix}${AccessTokenIdSchema.parse(id)}`;
        const revoked = parseOptionalPayload(await redis.eval(REVOKE_SCRIPT, [key], []));
        if (!revoked) {
          throw new DbRepositoryError('not_found', 'Access token does not exist');
        }

        return revoked;
      } catch (error) {
        return mapStoreError(error);
      }
    },
    consumeToken: async rawInput => {
      try {
        const input = ConsumeAccessTokenInputSchema.parse(rawInput);
        const result = await redis.eval(
          CONSUME_SCRIPT,
          [`${valueKeyPrefix}${input.token}`],
          [recordKeyPrefix, input.path, input.now.getTime(), input.now.toISOString()]
        );
        return parseOptionalPayload(result);
      } catch (error) {
        return mapStoreError(error);
      }
    },
    deleteExpiredOrExhausted: async ({now}) => {
      try {
        const result = await redis.eval(CLEANUP_SCRIPT, [indexKey], [recordKeyPrefix, valueKeyPrefix, now.getTime()]);
        return z.number().int().min(0).parse(Number(result));
      } catch (error) {
        return mapStoreError(error);
      }
    }
  };
};
