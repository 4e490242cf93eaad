import {z} from 'zod';

import {beforeEach, describe, expect, it} from 'vitest';

import {createRedisAccessTokenStore} from '../redis/accessTokenRedisStore';
import type {RedisEvalClient} from '../redis/types';
import type {AccessTokenStore} from '../store';

const StoredPayloadSchema = z
  .object({
    id: z.string(),
    token: z.string(),
    path: z.string(),
    is_valid: z.boolean(),
    times_accessed: z.number(),
    max_uses: z.number().optional(),
    expires_at_epoch_ms: z.number().optional()
  })
  .passthrough();

class FakeRedisEval implements RedisEvalClient {
  public readonly strings = new Map<string, string>();
  public readonly sets = new Map<string, Set<string>>();

  public get(key: string): string | null {
    return this.strings.get(key) ?? null;
  }

  public eval(script: string, keys: string[], args: Array<string | number>): Promise<unknown> {
    const [firstKey = '', secondKey = '', thirdKey = ''] = keys;
    const members = (key: string) => [...(this.sets.get(key) ?? new Set<string>())];

    if (script.includes('access_token_issue')) {
      if (this.strings.has(secondKey)) {
        return Promise.resolve(0);
      }

      this.strings.set(secondKey, String(args[0]));
      this.strings.set(firstKey, String(args[1]));
      this.sets.set(thirdKey, new Set([...members(thirdKey), String(args[0])]));
      return Promise.resolve(1);
    }

    if (script.includes('access_token_list')) {
      return Promise.resolve(
        members(firstKey).flatMap(id => {
          const payload = this.strings.get(`${String(args[0])}${id}`);
          return payload === undefined ? [] : [payload];
        })
      );
    }

    if (script.includes('access_token_revoke')) {
      const payload = this.strings.get(firstKey);
      if (payload === undefined) {
        return Promise.resolve(null);
      }

      const updated = JSON.stringify({...StoredPayloadSchema.parse(JSON.parse(payload)), is_valid: false});
      this.strings.set(firstKey, updated);
      return Promise.resolve(updated);
    }

    if (script.includes('access_token_consume')) {
      const id = this.strings.get(firstKey);
      const recordKey = `${String(args[0])}${id ?? ''}`;
      const payload = id === undefined ? undefined : this.strings.get(recordKey);
      if (payload === undefined) {
        return Promise.resolve(null);
      }

      const data = StoredPayloadSchema.parse(JSON.parse(payload));
      const nowMs = Number(args[2]);
      if (
        !data.is_valid ||
        data.path !== String(args[1]) ||
        (data.expires_at_epoch_ms !== undefined && data.expires_at_epoch_ms <= nowMs) ||
        (data.max_uses !== undefined && data.times_accessed >= data.max_uses)
      ) {
        return Promise.resolve(null);
      }

      const updated = JSON.stringify({...data, times_accessed: data.times_accessed + 1, last_accessed: String(args[3])});
      this.strings.set(recordKey, updated);
      return Promise.resolve(updated);
    }

    if (script.includes('access_token_cleanup')) {
      let deleted = 0;
      for (const id of members(firstKey)) {
        const recordKey = `${String(args[0])}${id}`;
        const payload = this.strings.get(recordKey);
        if (payload === undefined) {
          this.sets.get(firstKey)?.delete(id);
          continue;
        }

        const data = StoredPayloadSchema.parse(JSON.parse(payload));
        const expired = data.expires_at_epoch_ms !== undefined && data.expires_at_epoch_ms <= Number(args[2]);
        const exhausted = data.max_uses !== undefined && data.times_accessed >= data.max_uses;
        if (expired || exhausted) {
          this.strings.delete(recordKey);
          this.strings.delete(`${String(args[1])}${data.token}`);
          this.sets.get(firstKey)?.delete(id);
          deleted += 1;
        }
      }

      return Promise.resolve(deleted);
    }

    return Promise.reject(new Error('Unknown script'));
  }
}

describe('redis access token store', () => {
  const now = new Date('2026-03-01T10:00:00.000Z');
  let redis: FakeRedisEval;
  let store: AccessTokenStore;

  beforeEach(() => {
    redis = new FakeRedisEval();
    store = createRedisAccessTokenStore({redis, keyPrefix: 'test:gate', now: () => now});
  });

  it('stores records with an epoch expiry for the scripts', async () => {
    const record = await store.issueToken({
      description: 'Reviewer link',
      path: 'protected/',
      expires_at: '2026-03-02T10:00:00.000Z'
    });

    expect(redis.get(`test:gate:access_token_value:${record.token}`)).toBe(record.id);
    expect(redis.sets.get('test:gate:access_tokens')).toEqual(new Set([record.id]));
    expect(JSON.parse(redis.get(`test:gate:access_token:${record.id}`) ?? '{}')).toEqual({
      ...record,
      expires_at_epoch_ms: Date.parse('2026-03-02T10:00:00.000Z')
    });
    await expect(store.getTokenById({id: record.id})).resolves.toEqual(record);
  });

  it('uses the default key prefix when none is configured', async () => {
    const defaultStore = createRedisAccessTokenStore({redis, now: () => now});
    const record = await defaultStore.issueToken({description: 'Default prefix', path: 'protected/'});

    expect(redis.get(`token_gate:access_token:${record.id}`)).not.toBeNull();
  });

  it('refuses duplicate token values', async () => {
    const token = 'reviewer-placeholder-token-value-0002';
    await store.issueToken({description: 'First', path: 'protected/', token});

    await expect(store.issueToken({description: 'Second', path: 'protected/', token})).rejects.toMatchObject({
      code: 'unique_violation'
    });
  });

  it('consumes through the script and returns the updated record', async () => {
    const record = await store.issueToken({description: 'Single use', path: 'protected/', max_uses: 1});
    const accessedAt = new Date('2026-03-01T10:30:00.000Z');

    const consumed = await store.consumeToken({token: record.token, path: 'protected/', now: accessedAt});

    expect(consumed).toEqual({...record, times_accessed: 1, last_accessed: '2026-03-01T10:30:00.000Z'});
    await expect(store.consumeToken({token: record.token, path: 'protected/', now: accessedAt})).resolves.toBeNull();
  });

  it('returns null for unknown tokens, other paths and expired tokens', async () => {
    const record = await store.issueToken({
      description: 'Expiring',
      path: 'protected/',
      expires_at: '2026-03-01T11:00:00.000Z'
    });

    await expect(store.consumeToken({token: 'unknown', path: 'protected/', now})).resolves.toBeNull();
    await expect(store.consumeToken({token: record.token, path: 'other/', now})).resolves.toBeNull();
    await expect(
      store.consumeToken({token: record.token, path: 'protected/', now: new Date('2026-03-01T11:00:00.000Z')})
    ).resolves.toBeNull();
  });

  it('revokes tokens and reports missing ones', async () => {
    const record = await store.issueToken({description: 'Revocable', path: 'protected/'});

    await expect(store.revokeToken({id: record.id})).resolves.toEqual({...record, is_valid: false});
    await expect(store.consumeToken({token: record.token, path: 'protected/', now})).resolves.toBeNull();
    await expect(store.revokeToken({id: 'tok_missing'})).rejects.toMatchObject({code: 'not_found'});
  });

  it('lists stored tokens newest first', async () => {
    let current = new Date('2026-03-01T10:00:00.000Z');
    const clockedStore = createRedisAccessTokenStore({redis, keyPrefix: 'test:gate', now: () => current});
    const older = await clockedStore.issueToken({description: 'Older', path: 'protected/'});
    current = new Date('2026-03-01T10:05:00.000Z');
    const newer = await clockedStore.issueToken({description: 'Newer', path: 'protected/'});

    await expect(clockedStore.listTokens()).resolves.toEqual([newer, older]);
  });

  it('deletes expired and exhausted tokens with their value index', async () => {
    const expired = await store.issueToken({
      description: 'Expired',
      path: 'protected/',
      expires_at: '2026-03-01T09:00:00.000Z'
    });
    const exhausted = await store.issueToken({description: 'Never usable', path: 'protected/', max_uses: 0});
    const active = await store.issueToken({description: 'Active', path: 'protected/'});

    await expect(store.deleteExpiredOrExhausted({now})).resolves.toBe(2);

    expect(redis.get(`test:gate:access_token_value:${expired.token}`)).toBeNull();
    expect(redis.get(`test:gate:access_token:${exhausted.id}`)).toBeNull();
    await expect(store.listTokens()).resolves.toEqual([active]);
  });

  it('rejects corrupt payloads as validation errors', async () => {
    redis.strings.set('test:gate:access_token:tok_corrupt', 'not-json');

    await expect(store.getTokenById({id: 'tok_corrupt'})).rejects.toMatchObject({code: 'validation_error'});
  });
});
