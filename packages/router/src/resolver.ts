import type {RouteParams} from '@token-gate/route-patterns';

import type {RouteLeaf, RouteNode} from './routeTree';

export type ResolvedRoute<THandler> = {
  route: RouteLeaf<THandler>;
  params: RouteParams;
};

const LEADING_SLASHES = /^\/+/u;

const search = <THandler>(
  nodes: ReadonlyArray<RouteNode<THandler>>,
  remaining: string,
  params: RouteParams
): ResolvedRoute<THandler> | null => {
  for (const node of nodes) {
    const matched = node.pattern.match(remaining);
    if (!matched) {
      continue;
    }

    const merged = {...params, ...matched.params};
    if (node.kind === 'group') {
      const found = search(node.children, matched.remainder, merged);
      if (found) {
        return found;
      }
      continue;
    }

    if (matched.remainder === '') {
      return {route: node, params: merged};
    }
  }

  return null;
};

/**
 * Finds the leaf whose full template (group prefixes included) consumes the
 * whole path. Declaration order decides between overlapping routes.
 */
export const resolveRoute = <THandler>({
  nodes,
  path
}: {
  nodes: ReadonlyArray<RouteNode<THandler>>;
  path: string;
}): ResolvedRoute<THandler> | null => search(nodes, path.replace(LEADING_SLASHES, ''), {});
