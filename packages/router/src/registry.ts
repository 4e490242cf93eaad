import type {StructuredLogger} from '@token-gate/logging';
import {routePattern, type RoutePattern} from '@token-gate/route-patterns';

import {RouterError} from './errors';
import type {RouteNode, RoutePredicate} from './routeTree';

export type ProtectedRoute = {
  readonly prefix: string;
  // Compiled prefix; group templates may capture parameters too.
  readonly scope: RoutePattern | null;
  readonly pattern: RoutePattern;
  readonly predicate?: RoutePredicate;
};

export const toCanonicalPath = (route: Pick<ProtectedRoute, 'prefix' | 'pattern'>) =>
  `${route.prefix}${route.pattern.toString()}`;

const isSameRoute = (left: ProtectedRoute, right: ProtectedRoute) =>
  left.prefix === right.prefix && left.pattern === right.pattern && left.predicate === right.predicate;

const isRoutePattern = (value: unknown): value is RoutePattern =>
  typeof value === 'object' && value !== null && 'match' in value && typeof value.match === 'function';

/**
 * Table of protected routes. The host builds it once at startup from its route
 * tree, freezes it, and hands the same instance to the matcher and middleware.
 */
export class ProtectedRouteRegistry {
  private readonly entries: ProtectedRoute[] = [];
  private frozen = false;

  public constructor(private readonly options: {logger?: StructuredLogger} = {}) {}

  public register(prefix: string, pattern: RoutePattern, predicate?: RoutePredicate): void {
    if (this.frozen) {
      throw new RouterError('registry_frozen', 'Protected routes cannot be registered after the registry is frozen');
    }

    const scope = prefix.length > 0 ? routePattern(prefix) : null;
    const candidate: ProtectedRoute = predicate ? {prefix, scope, pattern, predicate} : {prefix, scope, pattern};
    if (this.entries.some(entry => isSameRoute(entry, candidate))) {
      return;
    }

    this.entries.push(candidate);
  }

  public walkRouteTree(nodes: ReadonlyArray<RouteNode>, prefix = ''): void {
    this.walk(nodes, prefix);
    this.options.logger?.debug({
      event: 'router.registry.built',
      component: 'router.registry',
      message: 'Parsed protected paths',
      metadata: {protected_paths: this.getProtectedPaths()}
    });
  }

  public getProtectedPaths(): string[] {
    return this.entries.map(toCanonicalPath);
  }

  public isProtectedPath(canonicalPath: string): boolean {
    return this.entries.some(entry => toCanonicalPath(entry) === canonicalPath);
  }

  public routes(): ReadonlyArray<ProtectedRoute> {
    return this.entries;
  }

  public get size(): number {
    return this.entries.length;
  }

  public freeze(): this {
    this.frozen = true;
    return this;
  }

  public isFrozen(): boolean {
    return this.frozen;
  }

  /**
   * Clears every entry and lifts the freeze. Intended for test isolation.
   */
  public reset(): void {
    this.entries.length = 0;
    this.frozen = false;
  }

  private walk(nodes: ReadonlyArray<RouteNode>, prefix: string): void {
    if (!Array.isArray(nodes)) {
      throw new RouterError('route_tree_invalid', `Route tree children under "${prefix}" must be an array`);
    }

    const routeNodes: ReadonlyArray<RouteNode> = nodes;
    for (const node of routeNodes) {
      if (!isRoutePattern(node.pattern)) {
        throw new RouterError('route_tree_invalid', `Route tree node under "${prefix}" has no compiled pattern`);
      }

      switch (node.kind) {
        case 'group':
          if (node.protection) {
            this.register(prefix, node.pattern, node.protection.predicate);
            break;
          }

          this.walk(node.children, `${prefix}${node.pattern.toString()}`);
          break;
        case 'leaf':
          if (node.protection) {
            this.register(prefix, node.pattern, node.protection.predicate);
          }
          break;
        default: {
          const unknownNode: never = node;
          throw new RouterError('route_tree_invalid', `Unknown route tree node: ${JSON.stringify(unknownNode)}`);
        }
      }
    }
  }
}
