import type {AccessTokenRecord, AccessTokenStore} from '@token-gate/db';

export type AccessDenialReason = 'no_token' | 'invalid_token';

export type AccessTokenValidation = {ok: true; token: AccessTokenRecord} | {ok: false; reason: AccessDenialReason};

/**
 * Checks a candidate token against the protected pattern it was presented for
 * and spends one use when it passes. A present but failing token always comes
 * back as `invalid_token`, whatever clause rejected it.
 */
export const validateAccessToken = async ({
  store,
  tokenValue,
  protectedPath,
  now
}: {
  store: Pick<AccessTokenStore, 'consumeToken'>;
  tokenValue: string | null | undefined;
  protectedPath: string;
  now: Date;
}): Promise<AccessTokenValidation> => {
  if (tokenValue === null || tokenValue === undefined) {
    return {ok: false, reason: 'no_token'};
  }

  if (tokenValue.length === 0) {
    return {ok: false, reason: 'invalid_token'};
  }

  const token = await store.consumeToken({token: tokenValue, path: protectedPath, now});
  if (!token) {
    return {ok: false, reason: 'invalid_token'};
  }

  return {ok: true, token};
};
