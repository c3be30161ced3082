export const PUBLIC_PATH_PREFIXES = ['/health', '/ping', '/docs', '/openapi.json', '/metrics'] as const

export function isPublicPath(path: string, prefixes: readonly string[] = PUBLIC_PATH_PREFIXES): boolean {
  return prefixes.some((prefix) => path.startsWith(prefix))
}
