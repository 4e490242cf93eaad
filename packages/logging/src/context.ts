import {AsyncLocalStorage} from 'node:async_hooks';

/**
 * Identifiers of the HTTP request being served. Log lines written while the
 * request is in flight inherit them.
 */
export type RequestLogScope = {
  correlation_id: string;
  request_id: string;
  route: string;
  method: string;
};

const requestScopes = new AsyncLocalStorage<RequestLogScope>();

export const runInRequestScope = <T>(scope: RequestLogScope, handler: () => T): T =>
  requestScopes.run({...scope}, handler);

export const activeRequestScope = (): RequestLogScope | undefined => requestScopes.getStore();
