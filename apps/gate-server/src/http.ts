import {randomUUID} from 'node:crypto'

import type {Request, Response} from 'express'

export type ErrorEnvelope = {
  error: string
  message: string
  correlation_id: string
}

const MAX_CORRELATION_ID_LENGTH = 128

export const extractCorrelationId = (req: Request) => {
  const presented = req.get('x-correlation-id')?.trim()
  return presented && presented.length <= MAX_CORRELATION_ID_LENGTH ? presented : randomUUID()
}

export const correlationIdOf = (res: Response) => {
  const value = res.getHeader('x-correlation-id')
  return typeof value === 'string' ? value : 'n/a'
}

// Admin responses list live token values; nothing may cache them.
export const sendJson = (res: Response, status: number, payload: unknown) => {
  res.status(status).set('cache-control', 'no-store').json(payload)
}

export const sendError = (res: Response, {status, error, message}: {status: number; error: string; message: string}) => {
  const envelope: ErrorEnvelope = {error, message, correlation_id: correlationIdOf(res)}
  sendJson(res, status, envelope)
}
