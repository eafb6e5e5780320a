export const MODEL_IDS = ["llama3.2:1b", "llama3.1", "tinyllama", "llama3", "mistral-small"] as const

export type ModelId = (typeof MODEL_IDS)[number]

export const FALLBACK_MODEL_ID: ModelId = MODEL_IDS[0]

export const isKnownModel = (value: string): value is ModelId =>
  MODEL_IDS.some((candidate) => candidate === value)

export const resolveModelId = (value: string | null | undefined): ModelId => {
  const trimmed = value?.trim()
  return trimmed && isKnownModel(trimmed) ? trimmed : FALLBACK_MODEL_ID
}
