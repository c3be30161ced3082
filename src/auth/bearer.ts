const BEARER_PREFIX = 'Bearer '

/**
 * Returns the token carried by an `Authorization` header value.
 *
 * Only the exact, case-sensitive `Bearer ` prefix is accepted.
 */
export function extractBearerToken(value: string | undefined): string | null {
  if (!value || !value.startsWith(BEARER_PREFIX)) {
    return null
  }

  const token = value.slice(BEARER_PREFIX.length).trim()
  return token.length > 0 ? token : null
}
