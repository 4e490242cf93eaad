import type {AccessTokenRecord} from './contracts';

const expiresAtMs = (record: AccessTokenRecord) =>
  record.expires_at === undefined ? null : new Date(record.expires_at).getTime();

export const isAccessTokenExpired = ({record, now}: {record: AccessTokenRecord; now: Date}) => {
  const expiresAt = expiresAtMs(record);
  return expiresAt !== null && expiresAt <= now.getTime();
};

export const isAccessTokenExhausted = (record: AccessTokenRecord) =>
  record.max_uses !== undefined && record.times_accessed >= record.max_uses;

/**
 * A token opens `path` when it is still valid, was issued for exactly that
 * canonical path, has not expired and has uses left.
 */
export const isAccessTokenConsumable = ({
  record,
  path,
  now
}: {
  record: AccessTokenRecord;
  path: string;
  now: Date;
}) => record.is_valid && record.path === path && !isAccessTokenExpired({record, now}) && !isAccessTokenExhausted(record);
