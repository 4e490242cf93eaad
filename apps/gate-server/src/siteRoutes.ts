import {escapeHtml} from '@token-gate/access-gate'
import type {RouteParams} from '@token-gate/route-patterns'
import {include, protectedInclude, protectedRoute, resolveRoute, route, type RouteNode} from '@token-gate/router'
import type {Request, RequestHandler, Response} from 'express'

export type SiteHandler = (input: {req: Request; res: Response; params: RouteParams}) => void

const page =
  (title: string): SiteHandler =>
  ({res, params}) => {
    const details = Object.entries(params)
      .map(([name, value]) => `<li>${escapeHtml(name)}: ${escapeHtml(String(value))}</li>`)
      .join('')
    res
      .status(200)
      .type('html')
      .send(`<h1>${escapeHtml(title)}</h1>${details ? `<ul>${details}</ul>` : ''}`)
  }

/**
 * Sample site served behind the gate. Hosts embedding the gate pass their own
 * tree to `createGateServerApp`.
 */
export const createDemoSiteRoutes = (): RouteNode<SiteHandler>[] => [
  route('', page('Home')),
  route('public/', page('Public page')),
  protectedRoute('protected/', page('Protected page')),
  protectedRoute('blog/<int:year>/<str:slug>/', page('Blog post')),
  protectedRoute('posts/<str:visibility>/<slug:post>/', page('Post'), {
    predicate: params => params.visibility === 'private'
  }),
  include('api/v1/', [
    route('status/', page('API status')),
    protectedRoute('secret/', page('API secret'))
  ]),
  protectedInclude('docs/', [
    route('', page('Documentation')),
    route('<slug:page>/', page('Documentation page'))
  ])
]

export const createSiteRouter = (nodes: ReadonlyArray<RouteNode<SiteHandler>>): RequestHandler => {
  return (req, res, next) => {
    if (req.method !== 'GET' && req.method !== 'HEAD') {
      next()
      return
    }

    const resolved = resolveRoute({nodes, path: req.path})
    if (!resolved?.route.handler) {
      next()
      return
    }

    resolved.route.handler({req, res, params: resolved.params})
  }
}
