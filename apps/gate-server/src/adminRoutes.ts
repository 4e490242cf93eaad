import {createHash, timingSafeEqual} from 'node:crypto'

import type {AccessTokenRecord, AccessTokenStore} from '@token-gate/db'
import type {StructuredLogger} from '@token-gate/logging'
import type {ProtectedRouteRegistry} from '@token-gate/router'
import express, {type Request, type RequestHandler, type Response} from 'express'
import {z} from 'zod'

import {badRequest, notFound, payloadTooLarge, unauthorized, unsupportedMediaType} from './errors'
import {sendJson} from './http'

export const AdminIssueTokenRequestSchema = z
  .object({
    description: z.string().trim().min(1).max(255),
    path: z.string().min(1).max(255),
    expires_at: z.iso.datetime({offset: true}).optional(),
    max_uses: z.number().int().min(0).optional()
  })
  .strict()

export type AdminTokenView = AccessTokenRecord & {
  path_registered: boolean
  access_link: string
}

type AdminRouterOptions = {
  adminApiToken: string
  registry: ProtectedRouteRegistry
  tokenStore: AccessTokenStore
  tokenParam: string
  maxBodyBytes: number
  logger: StructuredLogger
}

const digest = (value: string) => createHash('sha256').update(value, 'utf8').digest()

const readBearerToken = (req: Request) => {
  const header = req.headers.authorization
  if (!header?.startsWith('Bearer ')) {
    return null
  }

  const token = header.slice('Bearer '.length).trim()
  return token.length > 0 ? token : null
}

export const buildAccessLink = ({path, tokenParam, token}: {path: string; tokenParam: string; token: string}) =>
  `/${path}?${new URLSearchParams({[tokenParam]: token}).toString()}`

// body-parser tags its failures with a `type` such as `entity.too.large`.
const bodyParserFailureType = (error: unknown) =>
  typeof error === 'object' && error !== null && 'type' in error && typeof error.type === 'string' ? error.type : null

const createJsonBodyReader = (maxBodyBytes: number): RequestHandler => {
  const parseJson = express.json({limit: maxBodyBytes})

  return (req, res, next) => {
    if (!req.is('application/json')) {
      next(unsupportedMediaType('content_type_invalid', 'Content-Type must be application/json'))
      return
    }

    parseJson(req, res, (error?: unknown) => {
      const failure = bodyParserFailureType(error)
      if (failure === 'entity.too.large') {
        next(payloadTooLarge('request_body_too_large', `Request body exceeds ${maxBodyBytes} bytes`))
        return
      }
      if (failure === 'entity.parse.failed') {
        next(badRequest('request_body_invalid_json', 'Request body contains invalid JSON'))
        return
      }

      next(error)
    })
  }
}

/**
 * Administrative API over the token store. Every route requires
 * `Authorization: Bearer <GATE_ADMIN_API_TOKEN>`.
 */
export const createAdminRouter = ({
  adminApiToken,
  registry,
  tokenStore,
  tokenParam,
  maxBodyBytes,
  logger
}: AdminRouterOptions) => {
  const router = express.Router()
  const expectedDigest = digest(adminApiToken)

  const toView = (record: AccessTokenRecord): AdminTokenView => ({
    ...record,
    path_registered: registry.isProtectedPath(record.path),
    access_link: buildAccessLink({path: record.path, tokenParam, token: record.token})
  })

  const requireAdmin: RequestHandler = (req, _res, next) => {
    const presented = readBearerToken(req)
    if (!presented || !timingSafeEqual(digest(presented), expectedDigest)) {
      next(unauthorized('admin_unauthorized', 'A valid admin API token is required'))
      return
    }

    next()
  }

  const asyncRoute =
    (handler: (req: Request, res: Response) => Promise<void>): RequestHandler =>
    (req, res, next) => {
      handler(req, res).catch(next)
    }

  router.use(requireAdmin)

  router.get('/protected-paths', (_req, res) => {
    sendJson(res, 200, {paths: registry.getProtectedPaths()})
  })

  router.get(
    '/tokens',
    asyncRoute(async (_req, res) => {
      const tokens = await tokenStore.listTokens()
      sendJson(res, 200, {tokens: tokens.map(toView)})
    })
  )

  router.post(
    '/tokens',
    createJsonBodyReader(maxBodyBytes),
    asyncRoute(async (req, res) => {
      const parsed = AdminIssueTokenRequestSchema.safeParse(req.body)
      if (!parsed.success) {
        throw badRequest('request_body_schema_invalid', parsed.error.issues.map(issue => issue.message).join('; '))
      }

      const body = parsed.data
      if (!registry.isProtectedPath(body.path)) {
        throw badRequest('path_not_protected', `Path is not a registered protected path: ${body.path}`)
      }

      const record = await tokenStore.issueToken(body)
      logger.info({
        event: 'admin.token.issued',
        component: 'admin.api',
        message: 'Access token issued',
        protected_path: record.path,
        metadata: {record_id: record.id}
      })
      sendJson(res, 201, toView(record))
    })
  )

  router.get(
    '/tokens/:id',
    asyncRoute(async (req, res) => {
      const record = await tokenStore.getTokenById({id: req.params.id ?? ''})
      if (!record) {
        throw notFound('not_found', 'Access token does not exist')
      }

      sendJson(res, 200, toView(record))
    })
  )

  router.post(
    '/tokens/:id/revoke',
    asyncRoute(async (req, res) => {
      const record = await tokenStore.revokeToken({id: req.params.id ?? ''})
      logger.info({
        event: 'admin.token.revoked',
        component: 'admin.api',
        message: 'Access token revoked',
        protected_path: record.path,
        metadata: {record_id: record.id}
      })
      sendJson(res, 200, toView(record))
    })
  )

  return router
}
