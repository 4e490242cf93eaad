import {
  AccessTokenIdSchema,
  AccessTokenRecordSchema,
  ConsumeAccessTokenInputSchema,
  type AccessTokenRecord
} from './contracts';
import {DbRepositoryError, mapStoreError} from './errors';
import type {AccessTokenStore, AccessTokenStoreOptions} from './store';
import {isAccessTokenConsumable, isAccessTokenExhausted, isAccessTokenExpired} from './tokenRules';
import {buildAccessTokenRecord, sortNewestFirst} from './utils';

/**
 * Process-local store for development and tests. No method awaits between
 * reading and writing a record, so the check-and-increment in `consumeToken`
 * cannot interleave with another request.
 */
export const createInMemoryAccessTokenStore = (options: AccessTokenStoreOptions = {}): AccessTokenStore => {
  const nowProvider = options.now ?? (() => new Date());
  const recordsById = new Map<string, AccessTokenRecord>();
  const idsByToken = new Map<string, string>();

  const copy = (record: AccessTokenRecord) => AccessTokenRecordSchema.parse(record);

  return {
    issueToken: async rawInput => {
      try {
        const record = buildAccessTokenRecord({rawInput, now: nowProvider()});
        if (idsByToken.has(record.token)) {
          throw new DbRepositoryError('unique_violation', 'Access token value already exists');
        }

        recordsById.set(record.id, record);
        idsByToken.set(record.token, record.id);
        return copy(record);
      } catch (error) {
        return mapStoreError(error);
      }
    },
    getTokenById: async ({id}) => {
      const record = recordsById.get(id);
      return record ? copy(record) : null;
    },
    listTokens: async () => sortNewestFirst([...recordsById.values()].map(copy)),
    revokeToken: async ({id}) => {
      try {
        const record = recordsById.get(AccessTokenIdSchema.parse(id));
        if (!record) {
          throw new DbRepositoryError('not_found', 'Access token does not exist');
        }

        const revoked = {...record, is_valid: false};
        recordsById.set(revoked.id, revoked);
        return copy(revoked);
      } catch (error) {
        return mapStoreError(error);
      }
    },
    consumeToken: async rawInput => {
      try {
        const input = ConsumeAccessTokenInputSchema.parse(rawInput);
        const id = idsByToken.get(input.token);
        const record = id === undefined ? undefined : recordsById.get(id);
        if (!record || !isAccessTokenConsumable({record, path: input.path, now: input.now})) {
          return null;
        }

        const consumed = {
          ...record,
          times_accessed: record.times_accessed + 1,
          last_accessed: input.now.toISOString()
        };
        recordsById.set(consumed.id, consumed);
        return copy(consumed);
      } catch (error) {
        return mapStoreError(error);
      }
    },
    deleteExpiredOrExhausted: async ({now}) => {
      let deleted = 0;
      for (const record of [...recordsById.values()]) {
        if (isAccessTokenExpired({record, now}) || isAccessTokenExhausted(record)) {
          recordsById.delete(record.id);
          idsByToken.delete(record.token);
          deleted += 1;
        }
      }

      return deleted;
    }
  };
};
