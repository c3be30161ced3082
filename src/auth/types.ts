export const providerTypes = ['none', 'ory', 'keycloak', 'auth0', 'cognito'] as const

export type ProviderType = (typeof providerTypes)[number]

export const asymmetricAlgorithms = [
  'RS256',
  'RS384',
  'RS512',
  'ES256',
  'ES384',
  'ES512',
  'PS256',
  'PS384',
  'PS512'
] as const

export type AsymmetricAlgorithm = (typeof asymmetricAlgorithms)[number]

export function isAsymmetricAlgorithm(value: unknown): value is AsymmetricAlgorithm {
  return asymmetricAlgorithms.some((algorithm) => algorithm === value)
}

/** Decoded token payload, or the JSON body of an introspection/userinfo response. */
export type Claims = Record<string, unknown>

export type Identity = Readonly<{
  subjectId: string
  email: string
  organizationId: string | null
}>

export type AuthMethod = 'bearer' | 'headers' | 'public' | 'disabled'

export type AuthState = Readonly<{
  method: AuthMethod
  identity: Identity | null
}>
