export type Role = "user" | "assistant"

export interface Turn {
  readonly role: Role
  readonly content: string
}

export type TurnPhase = "awaiting_response" | "committed" | "failed"

export interface InvocationSettings {
  readonly modelId: string
  readonly durationReporting: boolean
}

export const userTurn = (content: string): Turn => ({ role: "user", content })

export const assistantTurn = (content: string): Turn => ({ role: "assistant", content })
