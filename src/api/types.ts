import type { Role } from "../transcript/types.js"

export interface ChatMessagePayload {
  readonly role: Role
  readonly content: string
}

export interface ModelInvocation {
  readonly modelId: string
  readonly messages: ReadonlyArray<ChatMessagePayload>
  readonly signal: AbortSignal
}

/**
 * Produces the fragments of one model response, in order. The sequence is
 * finite and cannot be restarted; it ends by completing or by throwing.
 */
export interface ModelClient {
  invoke(invocation: ModelInvocation): AsyncIterable<string>
}

export interface ChatCompletionRequest {
  readonly model: string
  readonly messages: ReadonlyArray<ChatMessagePayload>
  readonly stream: true
}

export interface InstalledModel {
  readonly name: string
  readonly size?: number
  readonly modifiedAt?: string
}
