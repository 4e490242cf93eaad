export {
  AccessTokenRecordSchema,
  AccessTokenValueSchema,
  ConsumeAccessTokenInputSchema,
  IssueAccessTokenInputSchema,
  type AccessTokenRecord,
  type ConsumeAccessTokenInput,
  type IssueAccessTokenInput
} from './contracts';
export {DbRepositoryError, isDbRepositoryError, mapStoreError, type DbErrorCode} from './errors';
export {createInMemoryAccessTokenStore} from './memoryStore';
export {createRedisAccessTokenStore} from './redis/accessTokenRedisStore';
export type {RedisClient, RedisEvalClient} from './redis/types';
export type {AccessTokenStore, AccessTokenStoreOptions} from './store';
export {isAccessTokenConsumable, isAccessTokenExhausted, isAccessTokenExpired} from './tokenRules';
export {generateAccessTokenValue} from './utils';
