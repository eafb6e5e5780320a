import { createParser, type ParsedEvent, type ReconnectInterval } from "eventsource-parser"
import { ApiError, MalformedResponseError, TransportFailureError } from "../stream/errors.js"
import type { ChatCompletionRequest, InstalledModel, ModelClient, ModelInvocation } from "./types.js"

export interface OllamaClientConfig {
  readonly baseUrl: string
  readonly requestTimeoutMs?: number
  readonly fetch?: typeof fetch
}

export interface OllamaClient extends ModelClient {
  listModels(): Promise<InstalledModel[]>
}

const DONE_SENTINEL = "[DONE]"
const DEFAULT_LIST_TIMEOUT_MS = 30_000

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value)

const buildUrl = (baseUrl: string, path: string): URL =>
  new URL(path, baseUrl.endsWith("/") ? baseUrl : `${baseUrl}/`)

const describeError = (value: unknown): string => {
  if (typeof value === "string") return value
  if (isRecord(value) && typeof value.message === "string") return value.message
  return JSON.stringify(value)
}

const parseChunk = (data: string): unknown => {
  try {
    return JSON.parse(data)
  } catch (error) {
    throw new MalformedResponseError("Model server sent an unparseable chunk", data, error)
  }
}

export const readChunkDelta = (chunk: unknown, status = 200): string => {
  if (!isRecord(chunk)) {
    throw new MalformedResponseError("Chunk is not a JSON object", JSON.stringify(chunk))
  }
  if (chunk.error !== undefined && chunk.error !== null) {
    throw new ApiError(`Model server reported an error: ${describeError(chunk.error)}`, status, chunk.error)
  }
  const choices = chunk.choices
  if (!Array.isArray(choices)) {
    throw new MalformedResponseError("Chunk has no choices", JSON.stringify(chunk))
  }
  const first: unknown = choices[0]
  if (first === undefined) return ""
  if (!isRecord(first)) {
    throw new MalformedResponseError("Chunk choice is not an object", JSON.stringify(chunk))
  }
  const delta = first.delta
  if (delta === undefined || delta === null) return ""
  if (!isRecord(delta)) {
    throw new MalformedResponseError("Chunk delta is not an object", JSON.stringify(chunk))
  }
  const content = delta.content
  if (content === undefined || content === null) return ""
  if (typeof content !== "string") {
    throw new MalformedResponseError("Chunk delta content is not text", JSON.stringify(chunk))
  }
  return content
}

const streamChatCompletion = async function* (
  config: OllamaClientConfig,
  invocation: ModelInvocation,
): AsyncGenerator<string, void, void> {
  const fetchImpl = config.fetch ?? fetch
  const payload: ChatCompletionRequest = {
    model: invocation.modelId,
    messages: invocation.messages.map((message) => ({ role: message.role, content: message.content })),
    stream: true,
  }
  const response = await fetchImpl(buildUrl(config.baseUrl, "v1/chat/completions"), {
    method: "POST",
    headers: { "Content-Type": "application/json", Accept: "text/event-stream" },
    body: JSON.stringify(payload),
    signal: invocation.signal,
  })
  if (!response.ok) {
    const text = await response.text().catch(() => "")
    throw new ApiError(`Chat request failed with status ${response.status}`, response.status, text)
  }
  if (!response.body) {
    throw new MalformedResponseError("Chat response provided no body")
  }

  const body = response.body
  const reader = body.getReader()
  const decoder = new TextDecoder()
  const pending: string[] = []
  const parser = createParser((event: ParsedEvent | ReconnectInterval) => {
    if (event.type === "event") {
      pending.push(event.data)
    }
  })

  let finished = false
  try {
    while (!finished) {
      const { value, done } = await reader.read()
      parser.feed(done ? decoder.decode() : decoder.decode(value, { stream: true }))
      while (pending.length > 0 && !finished) {
        const data = pending.shift()
        if (data === undefined) break
        if (data.trim() === DONE_SENTINEL) {
          finished = true
          break
        }
        const delta = readChunkDelta(parseChunk(data), response.status)
        if (delta.length > 0) {
          yield delta
        }
      }
      if (done && !finished) {
        throw new TransportFailureError("Model stream closed before completion")
      }
    }
  } finally {
    parser.reset()
    reader.releaseLock()
    await body.cancel().catch(() => undefined)
  }
}

export const createOllamaClient = (config: OllamaClientConfig): OllamaClient => ({
  invoke: (invocation) => streamChatCompletion(config, invocation),
  listModels: async () => {
    const fetchImpl = config.fetch ?? fetch
    const controller = new AbortController()
    const timeout = setTimeout(() => controller.abort(), config.requestTimeoutMs ?? DEFAULT_LIST_TIMEOUT_MS)
    try {
      const response = await fetchImpl(buildUrl(config.baseUrl, "api/tags"), {
        method: "GET",
        headers: { Accept: "application/json" },
        signal: controller.signal,
      })
      if (!response.ok) {
        const text = await response.text().catch(() => "")
        throw new ApiError(`Model listing failed with status ${response.status}`, response.status, text)
      }
      const parsed: unknown = await response.json()
      return normalizeTags(parsed)
    } finally {
      clearTimeout(timeout)
    }
  },
})

export const normalizeTags = (payload: unknown): InstalledModel[] => {
  if (!isRecord(payload) || !Array.isArray(payload.models)) return []
  const entries: unknown[] = payload.models
  const models: InstalledModel[] = []
  for (const entry of entries) {
    if (!isRecord(entry)) continue
    const name = typeof entry.name === "string" ? entry.name : typeof entry.model === "string" ? entry.model : null
    if (!name) continue
    models.push({
      name,
      ...(typeof entry.size === "number" ? { size: entry.size } : {}),
      ...(typeof entry.modified_at === "string" ? { modifiedAt: entry.modified_at } : {}),
    })
  }
  return models
}
