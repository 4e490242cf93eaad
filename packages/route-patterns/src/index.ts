export {PATH_CONVERTERS, resolveConverter, type PathConverter, type RouteParamValue} from './converters';
export {
  err,
  ok,
  RoutePatternError,
  routePatternErrorCodes,
  type RoutePatternErrorCode,
  type RoutePatternFailure,
  type RoutePatternFailureDetail,
  type RoutePatternResult,
  type RoutePatternSuccess
} from './errors';
export {
  compileRoutePattern,
  routePattern,
  staticPrefixOf,
  type RouteMatch,
  type RouteParams,
  type RoutePattern
} from './pattern';
