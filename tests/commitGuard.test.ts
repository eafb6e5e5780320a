import { describe, it, expect } from "vitest"
import { createMemoryLogger } from "../src/logging/logger.js"
import { annotateResponse, commitAssistantTurn, formatDurationAnnotation } from "../src/transcript/commitGuard.js"
import { TranscriptStore } from "../src/transcript/transcriptStore.js"
import { userTurn } from "../src/transcript/types.js"

const storeAwaitingAnswer = (): TranscriptStore => {
  const store = new TranscriptStore()
  store.append(userTurn("hi"))
  return store
}

describe("commitAssistantTurn", () => {
  it("appends the final text once for an unanswered user turn", () => {
    const store = storeAwaitingAnswer()
    const outcome = commitAssistantTurn(store, "Hello")
    expect(outcome).toEqual({ committed: true, turn: { role: "assistant", content: "Hello" } })
    expect(store.all()).toEqual([
      { role: "user", content: "hi" },
      { role: "assistant", content: "Hello" },
    ])
  })

  it("drops a second commit for the same user turn", () => {
    const store = storeAwaitingAnswer()
    const logger = createMemoryLogger()
    commitAssistantTurn(store, "Hello", { logger })
    const second = commitAssistantTurn(store, "Hello", { logger })
    expect(second).toEqual({ committed: false, reason: "duplicate" })
    expect(store.size).toBe(2)
    expect(logger.entries).toEqual([
      { level: "debug", message: "Duplicate commit ignored", context: { lastRole: "assistant", characters: 5 } },
    ])
  })

  it("refuses to commit into an empty transcript", () => {
    const store = new TranscriptStore()
    expect(commitAssistantTurn(store, "orphan").committed).toBe(false)
    expect(store.size).toBe(0)
  })

  it("suffixes the duration when reporting is on", () => {
    const store = storeAwaitingAnswer()
    const outcome = commitAssistantTurn(store, "Hello", { durationSeconds: 1.234, reportDuration: true })
    expect(outcome.committed && outcome.turn.content).toBe("Hello\n\nDuration: 1.23 seconds")
  })

  it("leaves the text untouched when reporting is off", () => {
    expect(annotateResponse("Hello", { durationSeconds: 3, reportDuration: false })).toBe("Hello")
    expect(annotateResponse("Hello", { reportDuration: true })).toBe("Hello")
  })

  it("formats durations with two decimals", () => {
    expect(formatDurationAnnotation(0)).toBe("\n\nDuration: 0.00 seconds")
    expect(formatDurationAnnotation(12.5)).toBe("\n\nDuration: 12.50 seconds")
  })
})
