import { describe, it, expect } from "vitest"
import { Either } from "effect"
import { StreamingAccumulator, type StreamState } from "../src/stream/accumulator.js"
import {
  ApiError,
  InvocationInFlightError,
  InvocationTimeoutError,
  MalformedResponseError,
  TransportFailureError,
} from "../src/stream/errors.js"
import { userTurn } from "../src/transcript/types.js"
import { createGatedClient, createScriptedClient } from "./helpers/scriptedClient.js"

const messages = [userTurn("hi")]

describe("StreamingAccumulator", () => {
  it("concatenates fragments in receipt order and publishes each buffer", async () => {
    const client = createScriptedClient({ fragments: ["The ", "quick ", "brown ", "fox"] })
    const accumulator = new StreamingAccumulator({ client, now: () => 42 })
    const published: StreamState[] = []

    const result = await accumulator.run("llama3", messages, { onProgress: (state) => published.push(state) })

    expect(result).toEqual(Either.right("The quick brown fox"))
    expect(published.map((state) => state.buffer)).toEqual(["The ", "The quick ", "The quick brown ", "The quick brown fox"])
    expect(published.map((state) => state.fragmentsSeen)).toEqual([1, 2, 3, 4])
    expect(published.every((state) => state.startedAt === 42)).toBe(true)
  })

  it("forwards the model id and the projected messages to the client", async () => {
    const client = createScriptedClient({ fragments: ["ok"] })
    const accumulator = new StreamingAccumulator({ client })
    await accumulator.run("mistral-small", [userTurn("first"), { role: "assistant", content: "reply" }, userTurn("second")])
    expect(client.calls).toHaveLength(1)
    expect(client.calls[0]?.modelId).toBe("mistral-small")
    expect(client.calls[0]?.messages).toEqual([
      { role: "user", content: "first" },
      { role: "assistant", content: "reply" },
      { role: "user", content: "second" },
    ])
  })

  it("treats a stream without fragments as an empty success", async () => {
    const accumulator = new StreamingAccumulator({ client: createScriptedClient({ fragments: [] }) })
    expect(await accumulator.run("m", messages)).toEqual(Either.right(""))
  })

  it("discards the partial buffer when the stream fails", async () => {
    const client = createScriptedClient({ fragments: ["par", "tial"], error: new Error("socket hang up") })
    const accumulator = new StreamingAccumulator({ client })

    const result = await accumulator.run("m", messages)

    expect(Either.isLeft(result)).toBe(true)
    if (Either.isLeft(result)) {
      expect(result.left).toBeInstanceOf(TransportFailureError)
      expect(result.left.kind).toBe("transport")
      expect(result.left.message).toBe("socket hang up")
      expect(result.left.cause).toBeInstanceOf(Error)
    }
  })

  it("keeps malformed-response failures as they are", async () => {
    const malformed = new MalformedResponseError("Chunk has no choices", "{}")
    const accumulator = new StreamingAccumulator({ client: createScriptedClient({ fragments: [], error: malformed }) })
    expect(await accumulator.run("m", messages)).toEqual(Either.left(malformed))
  })

  it("wraps server errors as transport failures", async () => {
    const apiError = new ApiError("Chat request failed with status 404", 404, "model not found")
    const accumulator = new StreamingAccumulator({ client: createScriptedClient({ fragments: [], error: apiError }) })
    const result = await accumulator.run("m", messages)
    if (!Either.isLeft(result)) throw new Error("expected a failure")
    expect(result.left.message).toBe("Model server responded with status 404")
    expect(result.left.cause).toBe(apiError)
  })

  it("fails with a timeout when the whole invocation runs too long", async () => {
    const client = createScriptedClient({ fragments: ["slow"], hang: true })
    const accumulator = new StreamingAccumulator({ client, timeoutMs: 20 })

    const result = await accumulator.run("m", messages)

    if (!Either.isLeft(result)) throw new Error("expected a failure")
    expect(result.left).toBeInstanceOf(InvocationTimeoutError)
    expect(result.left.kind).toBe("timeout")
    expect(accumulator.busy).toBe(false)
  })

  it("aborts the transport signal on timeout", async () => {
    let observed: AbortSignal | undefined
    const accumulator = new StreamingAccumulator({
      timeoutMs: 10,
      client: {
        invoke(invocation) {
          observed = invocation.signal
          return (async function* () {
            await new Promise<void>((_, reject) => {
              invocation.signal.addEventListener("abort", () => reject(new Error("aborted")), { once: true })
            })
            yield "never"
          })()
        },
      },
    })
    const result = await accumulator.run("m", messages)
    expect(Either.isLeft(result)).toBe(true)
    expect(observed?.aborted).toBe(true)
  })

  it("rejects a second run while one is in flight", async () => {
    const client = createGatedClient()
    const accumulator = new StreamingAccumulator({ client })
    const first = accumulator.run("m", messages)
    expect(accumulator.busy).toBe(true)
    await expect(accumulator.run("m", messages)).rejects.toBeInstanceOf(InvocationInFlightError)
    client.release(["done"])
    expect(await first).toEqual(Either.right("done"))
    expect(accumulator.busy).toBe(false)
  })

  it("starts every run with a fresh buffer", async () => {
    const client = createScriptedClient({ fragments: ["one"] }, { fragments: ["two"] })
    const accumulator = new StreamingAccumulator({ client })
    expect(await accumulator.run("m", messages)).toEqual(Either.right("one"))
    expect(await accumulator.run("m", messages)).toEqual(Either.right("two"))
  })
})
