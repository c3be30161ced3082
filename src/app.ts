import express, { type Express } from 'express'
import pinoHttp from 'pino-http'
import type { Logger } from 'pino'
import { v4 as uuidv4 } from 'uuid'
import type { SessionFactory } from './db/types'
import { createErrorHandler } from './middleware/error-handler'
import { createAuthPipeline, type IdentityStage, type TenantStage } from './middleware/stages'
import { createContextRouter } from './routes/context'
import { createHealthRouter } from './routes/health'
import { createOrganizationsRouter } from './routes/organizations'

export type AppDependencies = {
  logger: Logger
  sessions: SessionFactory
  identity: IdentityStage
  tenant: TenantStage
  requestIdHeader?: string
}

export function createApp(deps: AppDependencies): Express {
  const requestIdHeader = (deps.requestIdHeader ?? 'x-request-id').toLowerCase()
  const app = express()

  app.disable('x-powered-by')
  app.use(express.json({ limit: '1mb' }))
  app.use(
    pinoHttp({
      logger: deps.logger,
      genReqId(req, res) {
        const incoming = req.headers[requestIdHeader]
        const requestId = typeof incoming === 'string' && incoming.trim().length > 0 ? incoming.trim() : uuidv4()
        res.setHeader(requestIdHeader, requestId)
        return requestId
      }
    })
  )

  app.use(createHealthRouter({ sessions: deps.sessions, logger: deps.logger }))

  const pipeline = createAuthPipeline(deps.identity, deps.tenant)

  app.use(
    '/v1/orgs/:org_id',
    pipeline,
    createOrganizationsRouter({ sessions: deps.sessions, logger: deps.logger })
  )
  app.use('/v1/context', pipeline, createContextRouter())

  app.use((_req, res) => {
    res.status(404).json({ error: 'not found' })
  })
  app.use(createErrorHandler(deps.logger))

  return app
}
