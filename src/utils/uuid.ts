import { z } from 'zod'

const uuidSchema = z.string().trim().uuid()

/** Parses a UUID string into its lowercase canonical form, or `null`. */
export function parseUuid(value: unknown): string | null {
  const parsed = uuidSchema.safeParse(value)
  return parsed.success ? parsed.data.toLowerCase() : null
}
