export {accessCookieName, accessCookiePath, type AccessCookie} from './cookies';
export {
  createAccessEventEmitter,
  type AccessDeniedEvent,
  type AccessEventEmitter,
  type AccessEventSink,
  type AccessGrantedEvent
} from './events';
export {
  createAccessGateMiddleware,
  type AccessGateMiddlewareOptions,
  type ForbiddenHandler
} from './expressMiddleware';
export {DEFAULT_DENIAL_MESSAGES, escapeHtml, renderForbiddenTemplate} from './forbidden';
export {
  createAccessGate,
  type AccessDecision,
  type AccessGate,
  type AccessGateOptions,
  type AccessRequest
} from './gate';
export {
  AccessGateSettingsSchema,
  CookieSameSiteSchema,
  type AccessGateSettings,
  type AccessGateSettingsInput,
  type CookieSameSite
} from './settings';
export {validateAccessToken, type AccessDenialReason, type AccessTokenValidation} from './validator';
