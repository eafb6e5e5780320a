export type StreamFailureKind = "timeout" | "transport" | "malformed"

export class ApiError extends Error {
  readonly status: number
  readonly body?: unknown

  constructor(message: string, status: number, body?: unknown) {
    super(message)
    this.name = "ApiError"
    this.status = status
    this.body = body
  }
}

export abstract class StreamFailure extends Error {
  abstract readonly kind: StreamFailureKind

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
  }
}

export class InvocationTimeoutError extends StreamFailure {
  readonly kind = "timeout"
  readonly timeoutMs: number

  constructor(timeoutMs: number) {
    super(`Model invocation exceeded ${timeoutMs} ms`)
    this.name = "InvocationTimeoutError"
    this.timeoutMs = timeoutMs
  }
}

export class TransportFailureError extends StreamFailure {
  readonly kind = "transport"

  constructor(message: string, cause?: unknown) {
    super(message, { cause })
    this.name = "TransportFailureError"
  }
}

export class MalformedResponseError extends StreamFailure {
  readonly kind = "malformed"
  readonly payload?: string

  constructor(message: string, payload?: string, cause?: unknown) {
    super(message, { cause })
    this.name = "MalformedResponseError"
    this.payload = payload
  }
}

export class InvocationInFlightError extends Error {
  constructor() {
    super("A model invocation is already in flight for this session")
    this.name = "InvocationInFlightError"
  }
}

export const toStreamFailure = (error: unknown): StreamFailure => {
  if (error instanceof StreamFailure) return error
  if (error instanceof ApiError) {
    return new TransportFailureError(`Model server responded with status ${error.status}`, error)
  }
  if (error instanceof Error) {
    return new TransportFailureError(error.message, error)
  }
  return new TransportFailureError(String(error), error)
}
