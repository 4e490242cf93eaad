import {routePattern, type RouteParams, type RoutePattern} from '@token-gate/route-patterns';

/**
 * Decides from the captured route parameters whether one concrete URL of a
 * pattern needs a token. Returning false leaves that variant public.
 */
export type RoutePredicate = (params: RouteParams) => boolean;

export type RouteProtection = {
  predicate?: RoutePredicate;
};

export type RouteLeaf<THandler = unknown> = {
  kind: 'leaf';
  pattern: RoutePattern;
  handler?: THandler;
  protection?: RouteProtection;
};

export type RouteGroup<THandler = unknown> = {
  kind: 'group';
  pattern: RoutePattern;
  children: ReadonlyArray<RouteNode<THandler>>;
  protection?: RouteProtection;
};

export type RouteNode<THandler = unknown> = RouteLeaf<THandler> | RouteGroup<THandler>;

type ProtectedRouteOptions = {
  predicate?: RoutePredicate;
};

const toProtection = (predicate?: RoutePredicate): RouteProtection => (predicate ? {predicate} : {});

export const route = <THandler>(template: string, handler?: THandler): RouteLeaf<THandler> => ({
  kind: 'leaf',
  pattern: routePattern(template),
  ...(handler !== undefined ? {handler} : {})
});

/**
 * Declares a leaf route that requires a valid access token. With a predicate,
 * only the parameter combinations it accepts are protected.
 */
export const protectedRoute = <THandler>(
  template: string,
  handler?: THandler,
  options: ProtectedRouteOptions = {}
): RouteLeaf<THandler> => ({
  ...route(template, handler),
  protection: toProtection(options.predicate)
});

export const include = <THandler>(template: string, children: ReadonlyArray<RouteNode<THandler>>): RouteGroup<THandler> => ({
  kind: 'group',
  pattern: routePattern(template),
  children
});

/**
 * Protects everything below a group. The walker registers the group itself and
 * never looks at its children.
 */
export const protectedInclude = <THandler>(
  template: string,
  children: ReadonlyArray<RouteNode<THandler>>,
  options: {predicate?: RoutePredicate} = {}
): RouteGroup<THandler> => ({
  ...include(template, children),
  protection: toProtection(options.predicate)
});
