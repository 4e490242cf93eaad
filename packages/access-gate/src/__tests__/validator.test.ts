import {createInMemoryAccessTokenStore} from '@token-gate/db';
import {describe, expect, it, vi} from 'vitest';

import {validateAccessToken} from '../index';

describe('validateAccessToken', () => {
  const now = new Date('2026-03-01T10:00:00.000Z');

  it('reports a missing candidate as no_token without touching the store', async () => {
    const store = {consumeToken: vi.fn()};

    await expect(validateAccessToken({store, tokenValue: undefined, protectedPath: 'protected/', now})).resolves.toEqual({
      ok: false,
      reason: 'no_token'
    });
    await expect(validateAccessToken({store, tokenValue: null, protectedPath: 'protected/', now})).resolves.toEqual({
      ok: false,
      reason: 'no_token'
    });
    expect(store.consumeToken).not.toHaveBeenCalled();
  });

  it('treats an empty candidate as invalid', async () => {
    const store = {consumeToken: vi.fn()};

    await expect(validateAccessToken({store, tokenValue: '', protectedPath: 'protected/', now})).resolves.toEqual({
      ok: false,
      reason: 'invalid_token'
    });
    expect(store.consumeToken).not.toHaveBeenCalled();
  });

  it('returns the consumed record for a valid token', async () => {
    const store = createInMemoryAccessTokenStore({now: () => now});
    const issued = await store.issueToken({description: 'Link', path: 'protected/'});

    const result = await validateAccessToken({store, tokenValue: issued.token, protectedPath: 'protected/', now});

    expect(result).toEqual({
      ok: true,
      token: {...issued, times_accessed: 1, last_accessed: '2026-03-01T10:00:00.000Z'}
    });
  });

  it('hides which clause rejected the token', async () => {
    const store = createInMemoryAccessTokenStore({now: () => now});
    const wrongPath = await store.issueToken({description: 'Other', path: 'other/'});
    const revoked = await store.issueToken({description: 'Revoked', path: 'protected/'});
    await store.revokeToken({id: revoked.id});

    for (const tokenValue of [wrongPath.token, revoked.token, 'unknown-value']) {
      await expect(validateAccessToken({store, tokenValue, protectedPath: 'protected/', now})).resolves.toEqual({
        ok: false,
        reason: 'invalid_token'
      });
    }
  });
});
