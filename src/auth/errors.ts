export type JwksFetchFailure = 'network' | 'status' | 'payload'

export class JwksFetchError extends Error {
  readonly reason: JwksFetchFailure
  readonly status?: number

  constructor(message: string, reason: JwksFetchFailure, status?: number) {
    super(message)
    this.name = 'JwksFetchError'
    this.reason = reason
    this.status = status
  }
}

export class ProviderConfigError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ProviderConfigError'
  }
}
