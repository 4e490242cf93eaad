import type {AccessTokenRecord, AccessTokenStore} from '@token-gate/db';
import type {StructuredLogger} from '@token-gate/logging';
import {matchProtectedRoute, type ProtectedRouteRegistry} from '@token-gate/router';

import {accessCookieName, accessCookiePath, type AccessCookie} from './cookies';
import {createAccessEventEmitter, type AccessEventSink} from './events';
import {AccessGateSettingsSchema, type AccessGateSettings, type AccessGateSettingsInput} from './settings';
import {validateAccessToken, type AccessDenialReason} from './validator';

export type AccessRequest<TRequest> = {
  request: TRequest;
  path: string;
  query: URLSearchParams;
  cookies: Readonly<Record<string, string>>;
};

export type AccessDecision =
  | {kind: 'unprotected'}
  | {kind: 'denied'; protectedPath: string; reason: AccessDenialReason}
  | {
      kind: 'granted';
      protectedPath: string;
      token: AccessTokenRecord;
      cookie: AccessCookie;
      redirectTo: string | null;
    };

export type AccessGate<TRequest> = {
  readonly settings: AccessGateSettings;
  evaluate: (input: AccessRequest<TRequest>) => Promise<AccessDecision>;
};

export type AccessGateOptions<TRequest> = {
  registry: ProtectedRouteRegistry;
  store: Pick<AccessTokenStore, 'consumeToken'>;
  settings?: AccessGateSettingsInput;
  sinks?: ReadonlyArray<AccessEventSink<TRequest>>;
  logger?: StructuredLogger;
  now?: () => Date;
};

// Repeated parameters follow the last occurrence, like most form decoders.
const readQueryToken = ({query, tokenParam}: {query: URLSearchParams; tokenParam: string}) => {
  const values = query.getAll(tokenParam);
  const value = values[values.length - 1];
  return value ? value : null;
};

const LEADING_SLASHES = /^\/+/u;

// Collapsed to one leading slash: `//host/x/` must not become a protocol-relative Location.
const buildRedirectTarget = ({path, query, tokenParam}: {path: string; query: URLSearchParams; tokenParam: string}) => {
  const target = `/${path.replace(LEADING_SLASHES, '')}`;
  const remaining = new URLSearchParams(query);
  remaining.delete(tokenParam);
  const search = remaining.toString();
  return search ? `${target}?${search}` : target;
};

/**
 * Decides a single request without touching the HTTP layer. The caller turns
 * the decision into a pass-through, redirect or 403.
 */
export const createAccessGate = <TRequest>(options: AccessGateOptions<TRequest>): AccessGate<TRequest> => {
  const settings = AccessGateSettingsSchema.parse(options.settings ?? {});
  const nowProvider = options.now ?? (() => new Date());
  const {registry, store, logger} = options;
  const events = createAccessEventEmitter<TRequest>({sinks: options.sinks, logger});

  const deny = ({
    input,
    protectedPath,
    reason
  }: {
    input: AccessRequest<TRequest>;
    protectedPath: string;
    reason: AccessDenialReason;
  }): AccessDecision => {
    logger?.info({
      event: 'access.denied',
      component: 'access_gate',
      message: `Access denied to ${input.path}: ${reason === 'no_token' ? 'no token provided' : 'invalid token provided'}`,
      reason_code: reason,
      protected_path: protectedPath
    });
    events.emitDenied({request: input.request, path: input.path, reason});
    return {kind: 'denied', protectedPath, reason};
  };

  const evaluate = async (input: AccessRequest<TRequest>): Promise<AccessDecision> => {
    const matched = matchProtectedRoute({registry, requestPath: input.path, logger});
    if (!matched) {
      logger?.debug({
        event: 'access.path.unprotected',
        component: 'access_gate',
        message: `Access granted to ${input.path}: not a protected path`
      });
      return {kind: 'unprotected'};
    }

    const {protectedPath} = matched;
    const cookieName = accessCookieName({cookiePrefix: settings.cookiePrefix, protectedPath});
    const queryToken = readQueryToken({query: input.query, tokenParam: settings.tokenParam});
    const tokenValue = queryToken ?? input.cookies[cookieName];

    const validation = await validateAccessToken({store, tokenValue, protectedPath, now: nowProvider()});
    if (!validation.ok) {
      return deny({input, protectedPath, reason: validation.reason});
    }

    events.emitGranted({request: input.request, token: validation.token, protectedPath});
    logger?.debug({
      event: 'access.granted',
      component: 'access_gate',
      message: `Access granted to ${protectedPath}`,
      protected_path: protectedPath,
      metadata: {record_id: validation.token.id, source: queryToken ? 'query' : 'cookie'}
    });

    return {
      kind: 'granted',
      protectedPath,
      token: validation.token,
      cookie: {
        name: cookieName,
        value: validation.token.token,
        path: accessCookiePath(protectedPath),
        maxAgeSeconds: settings.cookie.maxAgeSeconds,
        httpOnly: settings.cookie.httpOnly,
        secure: settings.cookie.secure,
        sameSite: settings.cookie.sameSite
      },
      redirectTo: queryToken ? buildRedirectTarget({path: input.path, query: input.query, tokenParam: settings.tokenParam}) : null
    };
  };

  return {settings, evaluate};
};
