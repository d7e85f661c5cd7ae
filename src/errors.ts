export class ParleyError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = "ParleyError"
  }
}

/** The active provider has no API key; the session routes to key entry. */
export class ProviderNotReadyError extends ParleyError {
  readonly provider: string

  constructor(provider: string) {
    super(`API key not set for ${provider} provider`)
    this.name = "ProviderNotReadyError"
    this.provider = provider
  }
}

export class TransportError extends ParleyError {
  readonly status: number | null
  readonly body?: unknown

  constructor(message: string, status: number | null, body?: unknown, options?: ErrorOptions) {
    super(message, options)
    this.name = "TransportError"
    this.status = status
    this.body = body
  }
}

export class StreamParseError extends ParleyError {
  readonly data: string

  constructor(data: string, options?: ErrorOptions) {
    super("Malformed stream event", options)
    this.name = "StreamParseError"
    this.data = data
  }
}

export class ValidationError extends ParleyError {
  constructor(message: string) {
    super(message)
    this.name = "ValidationError"
  }
}

export class ClipboardError extends ParleyError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = "ClipboardError"
  }
}

export class ConfigError extends ParleyError {
  readonly path: string

  constructor(message: string, path: string, options?: ErrorOptions) {
    super(message, options)
    this.name = "ConfigError"
    this.path = path
  }
}

export const describeError = (error: unknown): string => {
  if (error instanceof Error) return error.message
  return String(error)
}
