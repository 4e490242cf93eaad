export {RouterError, type RouterErrorCode} from './errors';
export {matchProtectedRoute, type ProtectedRouteMatch} from './matcher';
export {ProtectedRouteRegistry, toCanonicalPath, type ProtectedRoute} from './registry';
export {
  include,
  protectedInclude,
  protectedRoute,
  route,
  type RouteGroup,
  type RouteLeaf,
  type RouteNode,
  type RoutePredicate,
  type RouteProtection
} from './routeTree';
export {resolveRoute, type ResolvedRoute} from './resolver';
