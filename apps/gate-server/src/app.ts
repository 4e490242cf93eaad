import {randomUUID} from 'node:crypto'
import {createServer} from 'node:http'
import {promises as fs} from 'node:fs'

import {
  createAccessGate,
  createAccessGateMiddleware,
  type AccessEventSink,
  type ForbiddenHandler
} from '@token-gate/access-gate'
import type {AccessTokenStore} from '@token-gate/db'
import {createStructuredLogger, runInRequestScope, type StructuredLogger} from '@token-gate/logging'
import {ProtectedRouteRegistry, type RouteNode} from '@token-gate/router'
import cookieParser from 'cookie-parser'
import express, {type ErrorRequestHandler, type Request, type RequestHandler, type Response} from 'express'
import helmet from 'helmet'

import {createAdminRouter} from './adminRoutes'
import type {ServiceConfig} from './config'
import {toAppError} from './errors'
import {extractCorrelationId, sendError, sendJson} from './http'
import {memoryBackend, openTokenStoreBackend} from './infrastructure'
import {createGateRuntime} from './runtime'
import {createDemoSiteRoutes, createSiteRouter, type SiteHandler} from './siteRoutes'

const loadForbiddenTemplate = async (templatePath: string | undefined) => {
  if (!templatePath) {
    return undefined
  }

  try {
    return await fs.readFile(templatePath, 'utf8')
  } catch (error) {
    const reason = error instanceof Error ? error.message : 'unknown error'
    throw new Error(`Unable to load forbidden template: ${reason}`)
  }
}

const createRequestContextMiddleware =
  ({logger, now}: {logger: StructuredLogger; now: () => Date}): RequestHandler =>
  (req, res, next) => {
    const correlationId = extractCorrelationId(req)
    const requestId = randomUUID()
    const startedAtMs = now().getTime()
    res.setHeader('x-correlation-id', correlationId)

    res.on('finish', () => {
      logger.info({
        event: 'request.completed',
        component: 'http.server',
        message: 'Request completed',
        correlation_id: correlationId,
        request_id: requestId,
        route: req.path,
        method: req.method,
        status_code: res.statusCode,
        duration_ms: Math.max(0, now().getTime() - startedAtMs)
      })
    })

    runInRequestScope(
      {
        correlation_id: correlationId,
        request_id: requestId,
        route: req.path,
        method: req.method
      },
      () => next()
    )
  }

const createErrorHandler =
  ({logger}: {logger: StructuredLogger}): ErrorRequestHandler =>
  (error, _req, res, next) => {
    if (res.headersSent) {
      next(error)
      return
    }

    const appError = toAppError(error)
    if (appError.status >= 500) {
      logger.error({
        event: 'request.failed',
        component: 'http.server',
        message: 'Request failed with an unexpected error',
        reason_code: appError.code,
        metadata: {error}
      })
    }

    sendError(res, {status: appError.status, error: appError.code, message: appError.message})
  }

const notFoundHandler = (_req: Request, res: Response) => {
  sendError(res, {status: 404, error: 'not_found', message: 'Route not found'})
}

export const createGateServerApp = async ({
  config,
  logger = createStructuredLogger({
    service: 'gate-server',
    env: config.nodeEnv,
    level: config.logging.level,
    extraSensitiveKeys: config.logging.redactExtraKeys
  }),
  routes = createDemoSiteRoutes(),
  tokenStore,
  forbiddenHandler,
  sinks,
  now = () => new Date()
}: {
  config: ServiceConfig
  logger?: StructuredLogger
  routes?: ReadonlyArray<RouteNode<SiteHandler>>
  tokenStore?: AccessTokenStore
  forbiddenHandler?: ForbiddenHandler
  sinks?: ReadonlyArray<AccessEventSink<Request>>
  now?: () => Date
}) => {
  const registry = new ProtectedRouteRegistry({logger})
  registry.walkRouteTree(routes)
  registry.freeze()

  const forbiddenTemplate = await loadForbiddenTemplate(config.forbiddenTemplatePath)

  const backend = tokenStore ? memoryBackend(tokenStore) : await openTokenStoreBackend({config, now})

  try {
    const gate = createAccessGate<Request>({
      registry,
      store: backend.tokenStore,
      settings: config.gate,
      logger,
      now,
      ...(sinks ? {sinks} : {})
    })

    const app = express()
    app.disable('x-powered-by')
    app.use(
      helmet({
        contentSecurityPolicy: false
      })
    )
    app.use(createRequestContextMiddleware({logger, now}))

    app.get('/healthz', (_req, res) => {
      sendJson(res, 200, {status: 'ok'})
    })

    if (config.adminApiToken) {
      app.use(
        '/admin',
        createAdminRouter({
          adminApiToken: config.adminApiToken,
          registry,
          tokenStore: backend.tokenStore,
          tokenParam: config.gate.tokenParam,
          maxBodyBytes: config.maxBodyBytes,
          logger
        })
      )
    }

    app.use(cookieParser())
    app.use(
      createAccessGateMiddleware({
        gate,
        ...(forbiddenHandler ? {forbiddenHandler} : {}),
        ...(forbiddenTemplate !== undefined ? {forbiddenTemplate} : {})
      })
    )
    app.use(createSiteRouter(routes))
    app.use(notFoundHandler)
    app.use(createErrorHandler({logger}))

    const runtime = createGateRuntime({server: createServer(app), host: config.host, port: config.port})

    const start = async () => {
      await runtime.start()
      logger.info({
        event: 'process.started',
        component: 'process.entrypoint',
        message: `Gate server listening on ${config.host}:${String(config.port)}`,
        metadata: {protected_paths: registry.getProtectedPaths(), store: backend.kind}
      })
    }

    const stop = async () => {
      await Promise.allSettled([runtime.stop(), backend.close()])
    }

    return {
      app,
      server: runtime.server,
      start,
      stop,
      registry,
      tokenStore: backend.tokenStore,
      backend
    }
  } catch (error) {
    await backend.close()
    throw error
  }
}

export type GateServerApp = Awaited<ReturnType<typeof createGateServerApp>>
