import 'dotenv/config'
import { Pool } from 'pg'
import { createApp } from './app'
import { JwksCache } from './auth/jwks-cache'
import { createTokenVerifier } from './auth/verifiers'
import { loadEnv } from './config/env'
import { PgSessionFactory } from './db/pg-session'
import { createAuthMiddleware } from './middleware/auth'
import { createHeaderIdentityMiddleware } from './middleware/header-identity'
import { createTenantIsolationMiddleware } from './middleware/tenant-isolation'
import type { IdentityStage } from './middleware/stages'
import { MembershipValidator } from './tenancy/membership'
import { createLogger } from './utils/logger'

const env = loadEnv(process.env)
const logger = createLogger(env.LOG_LEVEL)

async function bootstrap(): Promise<void> {
  const pool = new Pool({
    connectionString: env.DATABASE_URL,
    max: env.PG_POOL_MAX,
    idleTimeoutMillis: env.PG_POOL_IDLE_TIMEOUT_MS,
    connectionTimeoutMillis: env.PG_POOL_CONNECTION_TIMEOUT_MS
  })

  pool.on('error', (error) => {
    logger.error({ error }, 'idle postgres client error')
  })

  const sessions = new PgSessionFactory(pool, env.QUERY_TIMEOUT_MS)

  let identity: IdentityStage
  if (env.AUTH_MODE === 'headers') {
    identity = createHeaderIdentityMiddleware({ logger })
  } else {
    // One cache per process, shared by every request.
    const jwksCache = new JwksCache({ logger })
    const verifier = await createTokenVerifier({
      providerType: env.AUTH_PROVIDER_TYPE,
      providerUrl: env.AUTH_PROVIDER_URL,
      issuer: env.AUTH_PROVIDER_ISSUER,
      algorithm: env.JWT_ALGORITHM,
      publicKeyPem: env.JWT_PUBLIC_KEY,
      jwksCache,
      logger
    })

    identity = createAuthMiddleware({
      verifier,
      providerType: env.AUTH_PROVIDER_TYPE,
      logger
    })
  }

  if (!env.ENFORCE_TENANT_ISOLATION) {
    logger.warn('tenant isolation enforcement is disabled')
  }

  const tenant = createTenantIsolationMiddleware({
    membership: new MembershipValidator(sessions, logger),
    enforce: env.ENFORCE_TENANT_ISOLATION,
    logger
  })

  const app = createApp({
    logger,
    sessions,
    identity,
    tenant,
    requestIdHeader: env.REQUEST_ID_HEADER
  })

  const server = app.listen(env.PORT, () => {
    logger.info(
      { port: env.PORT, authMode: env.AUTH_MODE, providerType: env.AUTH_PROVIDER_TYPE },
      'service started'
    )
  })

  const shutdown = (signal: string): void => {
    logger.info({ signal }, 'shutting down')

    server.close(() => {
      pool
        .end()
        .then(() => {
          logger.info('shutdown complete')
          process.exit(0)
        })
        .catch((error: unknown) => {
          logger.error({ error }, 'failed to close database pool')
          process.exit(1)
        })
    })
  }

  process.on('SIGTERM', () => {
    shutdown('SIGTERM')
  })

  process.on('SIGINT', () => {
    shutdown('SIGINT')
  })
}

bootstrap().catch((error) => {
  logger.error({ error }, 'failed to start service')
  process.exit(1)
})
