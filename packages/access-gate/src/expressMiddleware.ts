import type {NextFunction, Request, RequestHandler, Response} from 'express';

import type {AccessCookie} from './cookies';
import {DEFAULT_DENIAL_MESSAGES, renderForbiddenTemplate} from './forbidden';
import type {AccessGate} from './gate';
import type {AccessDenialReason} from './validator';

export type ForbiddenHandler = (input: {
  req: Request;
  res: Response;
  path: string;
  reason: AccessDenialReason;
}) => void | Promise<void>;

export type AccessGateMiddlewareOptions = {
  gate: AccessGate<Request>;
  forbiddenHandler?: ForbiddenHandler;
  forbiddenTemplate?: string;
};

const readCookies = (req: Request): Record<string, string> => {
  const cookies: Record<string, string> = {};
  const parsed: unknown = req.cookies;
  if (typeof parsed !== 'object' || parsed === null) {
    return cookies;
  }

  for (const [name, value] of Object.entries(parsed)) {
    if (typeof value === 'string') {
      cookies[name] = value;
    }
  }

  return cookies;
};

// Parsed from the raw target: request paths such as `//[/x/` are not valid URLs.
const readQuery = (req: Request) => {
  const queryStart = req.originalUrl.indexOf('?');
  return new URLSearchParams(queryStart === -1 ? '' : req.originalUrl.slice(queryStart + 1));
};

const setAccessCookie = (res: Response, cookie: AccessCookie) => {
  res.cookie(cookie.name, cookie.value, {
    path: cookie.path,
    maxAge: cookie.maxAgeSeconds * 1000,
    httpOnly: cookie.httpOnly,
    secure: cookie.secure,
    sameSite: cookie.sameSite
  });
};

/**
 * Express binding for the access gate. Mount it after cookie-parser and
 * before the routes it protects.
 */
export const createAccessGateMiddleware = ({
  gate,
  forbiddenHandler,
  forbiddenTemplate
}: AccessGateMiddlewareOptions): RequestHandler => {
  const sendForbidden = async ({req, res, reason}: {req: Request; res: Response; reason: AccessDenialReason}) => {
    if (forbiddenHandler) {
      await forbiddenHandler({req, res, path: req.path, reason});
      return;
    }

    if (forbiddenTemplate !== undefined) {
      res.status(403).type('html').send(renderForbiddenTemplate({template: forbiddenTemplate, path: req.path}));
      return;
    }

    res.status(403).type('text/plain').send(DEFAULT_DENIAL_MESSAGES[reason]);
  };

  const handle = async (req: Request, res: Response, next: NextFunction) => {
    const decision = await gate.evaluate({
      request: req,
      path: req.path,
      query: readQuery(req),
      cookies: readCookies(req)
    });

    switch (decision.kind) {
      case 'unprotected':
        next();
        return;
      case 'denied':
        await sendForbidden({req, res, reason: decision.reason});
        return;
      case 'granted':
        setAccessCookie(res, decision.cookie);
        if (decision.redirectTo !== null) {
          res.redirect(302, decision.redirectTo);
          return;
        }

        next();
        return;
    }
  };

  return (req, res, next) => {
    handle(req, res, next).catch(next);
  };
};
