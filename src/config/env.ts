import { z } from 'zod'
import { asymmetricAlgorithms, providerTypes } from '../auth/types'

const booleanFromEnv = z.preprocess((value) => {
  if (typeof value === 'boolean') {
    return value
  }

  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase()
    if (['1', 'true', 'yes', 'on'].includes(normalized)) {
      return true
    }
    if (['0', 'false', 'no', 'off'].includes(normalized)) {
      return false
    }
  }

  return value
}, z.boolean())

const numberFromEnv = (defaultValue: number, min = 1, max?: number) =>
  z.preprocess((value) => {
    if (value === undefined || value === null || value === '') {
      return defaultValue
    }

    if (typeof value === 'string') {
      const parsed = Number(value)
      return Number.isFinite(parsed) ? parsed : value
    }

    return value
  },
  max === undefined
    ? z.number().int().min(min)
    : z.number().int().min(min).max(max))

const optionalString = z.preprocess(
  (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
  z.string().min(1).optional()
)

// PEM keys are often passed through env files with literal "\n" sequences.
const pemFromEnv = z.preprocess(
  (value) => (typeof value === 'string' && value.trim() !== '' ? value.replace(/\\n/g, '\n').trim() : undefined),
  z
    .string()
    .refine((value) => value.includes('-----BEGIN PUBLIC KEY-----'), 'must be a PEM encoded public key')
    .optional()
)

const algorithmFromEnv = z
  .string()
  .default('RS256')
  .superRefine((value, ctx) => {
    if (/^HS\d+$/i.test(value)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'symmetric HMAC algorithms are not accepted for token verification'
      })
    }
  })
  .pipe(z.enum(asymmetricAlgorithms))

const envSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
    PORT: numberFromEnv(3000, 1, 65535),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

    DATABASE_URL: z.string().min(1),
    QUERY_TIMEOUT_MS: numberFromEnv(5000, 100, 60000),
    PG_POOL_MAX: numberFromEnv(20, 1, 200),
    PG_POOL_IDLE_TIMEOUT_MS: numberFromEnv(30000, 1000, 600000),
    PG_POOL_CONNECTION_TIMEOUT_MS: numberFromEnv(5000, 100, 60000),

    AUTH_MODE: z.enum(['token', 'headers']).default('token'),
    AUTH_PROVIDER_TYPE: z.enum(providerTypes).default('none'),
    AUTH_PROVIDER_URL: optionalString.pipe(z.string().url().optional()),
    AUTH_PROVIDER_ISSUER: optionalString,
    JWT_ALGORITHM: algorithmFromEnv,
    JWT_PUBLIC_KEY: pemFromEnv,
    ENFORCE_TENANT_ISOLATION: booleanFromEnv.default(true),

    REQUEST_ID_HEADER: z.string().min(1).default('x-request-id')
  })
  .superRefine((value, ctx) => {
    if (value.AUTH_PROVIDER_TYPE !== 'none' && !value.AUTH_PROVIDER_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['AUTH_PROVIDER_URL'],
        message: `required when AUTH_PROVIDER_TYPE=${value.AUTH_PROVIDER_TYPE}`
      })
    }

    if (value.AUTH_MODE === 'headers' && !value.ENFORCE_TENANT_ISOLATION) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['ENFORCE_TENANT_ISOLATION'],
        message: 'must be true when AUTH_MODE=headers'
      })
    }
  })

export type Env = z.infer<typeof envSchema>

export function loadEnv(source: NodeJS.ProcessEnv): Env {
  const parsed = envSchema.safeParse(source)

  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ')
    throw new Error(`Invalid environment configuration: ${issues}`)
  }

  return parsed.data
}
