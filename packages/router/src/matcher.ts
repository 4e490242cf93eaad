import type {StructuredLogger} from '@token-gate/logging';
import type {RouteParams} from '@token-gate/route-patterns';

import {toCanonicalPath, type ProtectedRoute, type ProtectedRouteRegistry} from './registry';

export type ProtectedRouteMatch = {
  protectedPath: string;
  params: RouteParams;
  route: ProtectedRoute;
};

const LEADING_SLASHES = /^\/+/u;

// A template without a trailing slash only covers the exact path or its
// slash-separated sub-paths: `admin` must not cover `/admin-panel/`.
const violatesSegmentBoundary = (template: string, remainder: string) =>
  !template.endsWith('/') && remainder.length > 0 && !remainder.startsWith('/');

const evaluatePredicate = ({
  route,
  params,
  requestPath,
  logger
}: {
  route: ProtectedRoute;
  params: RouteParams;
  requestPath: string;
  logger?: StructuredLogger;
}) => {
  if (!route.predicate) {
    return true;
  }

  try {
    return Boolean(route.predicate(params));
  } catch (error) {
    logger?.error({
      event: 'access.predicate.failed',
      component: 'router.matcher',
      message: `Error evaluating protect predicate for path ${requestPath}`,
      reason_code: 'predicate_error',
      protected_path: toCanonicalPath(route),
      metadata: {error}
    });
    return true;
  }
};

/**
 * Finds the first registered route covering `requestPath`. Returns null when the
 * path is not protected.
 */
export const matchProtectedRoute = ({
  registry,
  requestPath,
  logger
}: {
  registry: ProtectedRouteRegistry;
  requestPath: string;
  logger?: StructuredLogger;
}): ProtectedRouteMatch | null => {
  const path = requestPath.replace(LEADING_SLASHES, '');

  for (const route of registry.routes()) {
    const scoped = route.scope ? route.scope.match(path) : {remainder: path, params: {}};
    if (!scoped) {
      continue;
    }

    const matched = route.pattern.match(scoped.remainder);
    if (!matched) {
      continue;
    }

    if (violatesSegmentBoundary(route.pattern.toString(), matched.remainder)) {
      continue;
    }

    const params = {...scoped.params, ...matched.params};
    if (!evaluatePredicate({route, params, requestPath, logger})) {
      continue;
    }

    return {
      protectedPath: toCanonicalPath(route),
      params,
      route
    };
  }

  return null;
};
