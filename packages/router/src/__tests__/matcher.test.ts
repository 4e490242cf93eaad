import {routePattern} from '@token-gate/route-patterns';
import {beforeEach, describe, expect, it, vi} from 'vitest';

import {matchProtectedRoute, ProtectedRouteRegistry, type RoutePredicate} from '../index';

describe('matchProtectedRoute', () => {
  let registry: ProtectedRouteRegistry;

  const protectedPathFor = (requestPath: string) => matchProtectedRoute({registry, requestPath})?.protectedPath ?? null;

  beforeEach(() => {
    registry = new ProtectedRouteRegistry();
  });

  it('leaves unregistered paths unprotected', () => {
    registry.register('', routePattern('protected/'));

    expect(protectedPathFor('/public/')).toBeNull();
    expect(protectedPathFor('/protected/')).toBe('protected/');
  });

  it('applies the segment boundary to templates without a trailing slash', () => {
    registry.register('', routePattern('admin'));

    expect(protectedPathFor('/admin')).toBe('admin');
    expect(protectedPathFor('/admin/users/')).toBe('admin');
    expect(protectedPathFor('/admin-panel/')).toBeNull();
  });

  it('covers every sub-path of templates with a trailing slash', () => {
    registry.register('', routePattern('admin/'));

    expect(protectedPathFor('/admin/')).toBe('admin/');
    expect(protectedPathFor('/admin/panel/')).toBe('admin/');
  });

  it('matches dynamic templates and returns the unsubstituted canonical path', () => {
    registry.register('', routePattern('blog/<int:year>/<str:slug>/'));

    expect(matchProtectedRoute({registry, requestPath: '/blog/2024/my-post/'})).toMatchObject({
      protectedPath: 'blog/<int:year>/<str:slug>/',
      params: {year: 2024, slug: 'my-post'}
    });
    expect(protectedPathFor('/blog-archive/2024/my-post/')).toBeNull();
    expect(protectedPathFor('/blog/latest/my-post/')).toBeNull();
  });

  it('handles dynamic templates without a trailing slash', () => {
    registry.register('', routePattern('api/posts/<int:id>'));

    expect(protectedPathFor('/api/posts/123')).toBe('api/posts/<int:id>');
    expect(protectedPathFor('/api/posts/123/comments')).toBe('api/posts/<int:id>');
    expect(protectedPathFor('/api/posts/123extra')).toBeNull();
  });

  it('requires the literal registry prefix', () => {
    registry.register('api/v1/', routePattern('secret/'));
    registry.register('blog/', routePattern('<int:year>/<str:slug>/'));

    expect(protectedPathFor('/api/v1/secret/')).toBe('api/v1/secret/');
    expect(protectedPathFor('/api/v2/secret/')).toBeNull();
    expect(protectedPathFor('/secret/')).toBeNull();
    expect(protectedPathFor('/blog/2024/my-post/')).toBe('blog/<int:year>/<str:slug>/');
  });

  it('matches parameters captured by a dynamic prefix', () => {
    registry.register('u/<str:user>/', routePattern('secret/'));

    expect(matchProtectedRoute({registry, requestPath: '/u/bob/secret/'})).toMatchObject({
      protectedPath: 'u/<str:user>/secret/',
      params: {user: 'bob'}
    });
    expect(protectedPathFor('/u/bob/public/')).toBeNull();
    expect(protectedPathFor('/u//secret/')).toBeNull();
  });

  it('hands prefix parameters to the predicate', () => {
    registry.register('team/<str:team>/', routePattern('<str:doc>/'), params => params.team === 'ops');

    expect(protectedPathFor('/team/ops/runbook/')).toBe('team/<str:team>/<str:doc>/');
    expect(protectedPathFor('/team/sales/runbook/')).toBeNull();
  });

  it('strips repeated leading slashes', () => {
    registry.register('', routePattern('protected/'));

    expect(protectedPathFor('//protected/')).toBe('protected/');
  });

  it('protects only the parameter combinations a predicate accepts', () => {
    const predicate: RoutePredicate = params => params.visibility === 'private' || params.category === 'confidential';
    registry.register('', routePattern('<str:visibility>/<str:category>/<str:post>/'), predicate);

    expect(protectedPathFor('/public/general/my-post/')).toBeNull();
    expect(protectedPathFor('/private/general/my-post/')).toBe('<str:visibility>/<str:category>/<str:post>/');
    expect(protectedPathFor('/public/confidential/my-post/')).toBe('<str:visibility>/<str:category>/<str:post>/');
  });

  it('treats the path as protected when the predicate throws', () => {
    const logger = {
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
      fatal: vi.fn()
    };
    const failure = new Error('visibility missing');
    registry.register('', routePattern('<str:post>/'), () => {
      throw failure;
    });

    const matched = matchProtectedRoute({registry, requestPath: '/my-post/', logger});

    expect(matched?.protectedPath).toBe('<str:post>/');
    expect(logger.error).toHaveBeenCalledWith({
      event: 'access.predicate.failed',
      component: 'router.matcher',
      message: 'Error evaluating protect predicate for path /my-post/',
      reason_code: 'predicate_error',
      protected_path: '<str:post>/',
      metadata: {error: failure}
    });
  });

  it('falls through to later routes when an earlier one is skipped', () => {
    registry.register('', routePattern('<str:visibility>/<str:post>/'), params => params.visibility === 'private');
    registry.register('', routePattern('public/'));

    expect(protectedPathFor('/public/x/')).toBe('public/');
  });
});
