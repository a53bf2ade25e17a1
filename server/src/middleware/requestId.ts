/**
 * Request ID middleware: read x-request-id from the edge or generate a UUID.
 * The id is echoed in the response and stored on submitted jobs, so worker logs
 * for a job can be joined with the API request that created it.
 */
import { Request, Response, NextFunction } from 'express'
import { v4 as uuidv4 } from 'uuid'

export const REQUEST_ID_HEADER = 'x-request-id'
const MAX_ID_LENGTH = 128

declare global {
  namespace Express {
    interface Request {
      requestId?: string
    }
  }
}

export function requestIdMiddleware(req: Request, res: Response, next: NextFunction): void {
  const incoming = req.headers[REQUEST_ID_HEADER]
  const trimmed = typeof incoming === 'string' ? incoming.trim() : ''
  const id = trimmed && trimmed.length <= MAX_ID_LENGTH ? trimmed : uuidv4()
  req.requestId = id
  res.setHeader(REQUEST_ID_HEADER, id)
  next()
}
