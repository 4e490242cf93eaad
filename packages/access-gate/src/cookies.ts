import {staticPrefixOf} from '@token-gate/route-patterns';

import type {CookieSameSite} from './settings';

export type AccessCookie = {
  name: string;
  value: string;
  path: string;
  maxAgeSeconds: number;
  httpOnly: boolean;
  secure: boolean;
  sameSite: CookieSameSite;
};

/**
 * One cookie per protected pattern: the canonical path is percent-encoded so
 * placeholders such as `<int:year>` survive as a cookie name.
 */
export const accessCookieName = ({cookiePrefix, protectedPath}: {cookiePrefix: string; protectedPath: string}) =>
  `${cookiePrefix}${encodeURIComponent(protectedPath)}`;

// Scoped to the literal part of the pattern so every concrete URL it covers
// receives the cookie.
export const accessCookiePath = (protectedPath: string) => `/${staticPrefixOf(protectedPath)}`;
