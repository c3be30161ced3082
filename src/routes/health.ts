import { Router, type Request, type Response } from 'express'
import type { Logger } from 'pino'
import type { SessionFactory } from '../db/types'

type HealthRouterOptions = {
  sessions: SessionFactory
  logger: Logger
}

export function createHealthRouter(options: HealthRouterOptions): Router {
  const router = Router()

  router.get('/health', async (_req: Request, res: Response) => {
    try {
      await options.sessions.withSession((session) => session.query('SELECT 1', []))
      res.json({ ok: true })
    } catch (error) {
      options.logger.error({ error }, 'health check failed')
      res.status(503).json({ ok: false })
    }
  })

  router.get('/ping', (_req: Request, res: Response) => {
    res.json({ pong: true })
  })

  return router
}
