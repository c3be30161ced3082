import type { NextFunction, Request, Response } from 'express'
import type { Logger } from 'pino'
import { TenantOwnershipError } from '../sql/errors'

export function createErrorHandler(logger: Logger) {
  return function errorHandler(error: unknown, req: Request, res: Response, next: NextFunction): void {
    if (res.headersSent) {
      next(error)
      return
    }

    if (error instanceof TenantOwnershipError) {
      logger.warn({ userId: req.tenant?.userId, code: error.code }, error.message)
      res.status(error.status).json({ error: error.message })
      return
    }

    logger.error({ error, method: req.method, path: req.originalUrl }, 'unhandled request error')
    res.status(500).json({ error: 'internal server error' })
  }
}
