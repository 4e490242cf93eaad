import {randomBytes, randomUUID} from 'node:crypto';

import {AccessTokenRecordSchema, IssueAccessTokenInputSchema, type AccessTokenRecord, type IssueAccessTokenInput} from './contracts';

export const createDomainId = (prefix: string): string => `${prefix}${randomUUID().replace(/-/gu, '')}`;

/**
 * 32 bytes from the CSPRNG, base64url encoded (43 characters).
 */
export const generateAccessTokenValue = (): string => randomBytes(32).toString('base64url');

export const buildAccessTokenRecord = ({
  rawInput,
  now
}: {
  rawInput: IssueAccessTokenInput;
  now: Date;
}): AccessTokenRecord => {
  const input = IssueAccessTokenInputSchema.parse(rawInput);

  return AccessTokenRecordSchema.parse({
    id: createDomainId('tok_'),
    description: input.description,
    path: input.path,
    token: input.token ?? generateAccessTokenValue(),
    is_valid: true,
    ...(input.expires_at !== undefined ? {expires_at: new Date(input.expires_at).toISOString()} : {}),
    ...(input.max_uses !== undefined ? {max_uses: input.max_uses} : {}),
    created_at: now.toISOString(),
    times_accessed: 0
  });
};

const compareStrings = (left: string, right: string) => (left < right ? -1 : left > right ? 1 : 0);

export const sortNewestFirst = (records: AccessTokenRecord[]): AccessTokenRecord[] =>
  [...records].sort(
    (left, right) => compareStrings(right.created_at, left.created_at) || compareStrings(left.id, right.id)
  );
