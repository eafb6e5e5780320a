import { describe, it, expect } from "vitest"
import { ReplController, type ReplState } from "../src/commands/chat/controller.js"
import { createMemoryLogger } from "../src/logging/logger.js"
import { ChatSession } from "../src/session/chatSession.js"
import { FAILURE_MESSAGE } from "../src/transcript/failureNormalizer.js"
import { createMemoryClipboard } from "./helpers/memoryClipboard.js"
import { createGatedClient, createScriptedClient, type ScriptedResponse } from "./helpers/scriptedClient.js"

const setup = (responses: ScriptedResponse[] = [{ fragments: ["Hello"] }], clipboardError?: Error) => {
  const client = createScriptedClient(...responses)
  const logger = createMemoryLogger()
  const session = new ChatSession({ client, logger })
  const clipboard = createMemoryClipboard(clipboardError)
  const controller = new ReplController({
    session,
    clipboard,
    modelId: "llama3.2:1b",
    durationReporting: false,
    logger,
  })
  return { client, logger, session, clipboard, controller }
}

const lastNotice = (state: ReplState) => state.notices.at(-1)

describe("ReplController", () => {
  it("submits prompts with the current settings and shows the turns", async () => {
    const { controller, client } = setup()
    await controller.handleInput("hi")
    const state = controller.getState()
    expect(state.turns).toEqual([
      { role: "user", content: "hi" },
      { role: "assistant", content: "Hello" },
    ])
    expect(state.pending).toBe(false)
    expect(state.streamingText).toBeNull()
    expect(state.status).toMatch(/^Ready · last response \d+\.\d{2}s$/)
    expect(client.calls[0]?.modelId).toBe("llama3.2:1b")
  })

  it("shows the live buffer while a response streams", async () => {
    const client = createGatedClient()
    const session = new ChatSession({ client })
    const controller = new ReplController({ session, clipboard: createMemoryClipboard(), modelId: "llama3", durationReporting: false })
    const seen: Array<string | null> = []
    controller.onChange((state) => seen.push(state.streamingText))

    const pending = controller.handleInput("hi")
    expect(controller.getState().pending).toBe(true)
    expect(controller.getState().status).toBe("Writing…")
    client.release(["Hel", "lo"])
    await pending

    expect(seen).toContain("Hel")
    expect(seen).toContain("Hello")
    expect(controller.getState().streamingText).toBeNull()
    expect(controller.getState().turns.at(-1)).toEqual({ role: "assistant", content: "Hello" })
  })

  it("reports a failed response with the fixed message", async () => {
    const { controller } = setup([{ fragments: ["par"], error: new Error("ECONNRESET") }])
    await controller.handleInput("hi")
    const state = controller.getState()
    expect(state.turns.at(-1)).toEqual({ role: "assistant", content: FAILURE_MESSAGE })
    expect(lastNotice(state)).toMatchObject({ text: FAILURE_MESSAGE, tone: "error" })
    expect(state.status).toBe("Ready · last response failed")
  })

  it("clears the history on /clear", async () => {
    const { controller, session } = setup()
    await controller.handleInput("hi")
    await controller.handleInput("/clear")
    expect(controller.getState().turns).toEqual([])
    expect(session.transcript.size).toBe(0)
    expect(lastNotice(controller.getState())).toMatchObject({ text: "Chat history cleared!", tone: "success" })
  })

  it("switches models and passes the new model with the next prompt", async () => {
    const { controller, client, logger } = setup()
    await controller.handleInput("/model gpt-4")
    expect(lastNotice(controller.getState())?.tone).toBe("error")
    expect(controller.getState().modelId).toBe("llama3.2:1b")

    await controller.handleInput("/model tinyllama")
    await controller.handleInput("hi")
    expect(controller.getState().modelId).toBe("tinyllama")
    expect(client.calls[0]?.modelId).toBe("tinyllama")
    expect(logger.entries).toContainEqual({ level: "info", message: "Model selected", context: { modelId: "tinyllama" } })
  })

  it("toggles duration reporting", async () => {
    const { controller } = setup()
    await controller.handleInput("/duration on")
    expect(controller.getState().durationReporting).toBe(true)
    await controller.handleInput("hi")
    expect(controller.getState().turns.at(-1)?.content).toMatch(/^Hello\n\nDuration: \d+\.\d{2} seconds$/)
    await controller.handleInput("/duration")
    expect(controller.getState().durationReporting).toBe(false)
  })

  it("copies displayed turns to the clipboard", async () => {
    const { controller, clipboard } = setup()
    await controller.handleInput("hi")
    await controller.handleInput("/copy")
    await controller.handleInput("/copy 1")
    expect(clipboard.writes).toEqual(["Hello", "hi"])
    expect(lastNotice(controller.getState())).toMatchObject({ text: "Message copied to clipboard!", tone: "success" })

    await controller.handleInput("/copy 9")
    expect(lastNotice(controller.getState())?.text).toBe("No message #9 to copy.")
    await controller.handleInput("/copy zero")
    expect(lastNotice(controller.getState())?.text).toBe("Usage: /copy [n] where n is a message number.")
  })

  it("reports an unavailable clipboard without touching the transcript", async () => {
    const { controller, session, logger } = setup(undefined, new Error("xsel not found"))
    await controller.handleInput("hi")
    await controller.handleInput("/copy")
    expect(lastNotice(controller.getState())).toMatchObject({ text: "Clipboard is unavailable.", tone: "error" })
    expect(session.transcript.size).toBe(2)
    expect(logger.entries.some((entry) => entry.level === "warn" && entry.message === "Clipboard write failed")).toBe(true)
  })

  it("has nothing to copy before the first message", async () => {
    const { controller } = setup()
    await controller.handleInput("/copy")
    expect(lastNotice(controller.getState())?.text).toBe("Nothing to copy yet.")
  })

  it("requests exit on /quit and rejects unknown commands", async () => {
    const { controller } = setup()
    await controller.handleInput("/nope")
    expect(lastNotice(controller.getState())?.text).toBe(
      "Unknown command /nope. /help, /clear, /model <id>, /models, /duration on|off, /copy [n], /quit",
    )
    await controller.handleInput("/quit")
    expect(controller.getState().exitRequested).toBe(true)
  })

  it("keeps only the latest notices", async () => {
    const { controller } = setup()
    for (const state of ["on", "off", "on", "off", "on"]) {
      await controller.handleInput(`/duration ${state}`)
    }
    const notices = controller.getState().notices
    expect(notices).toHaveLength(4)
    expect(notices.map((notice) => notice.id)).toEqual([2, 3, 4, 5])
  })

  it("stops following the session after dispose", async () => {
    const { controller, session } = setup()
    controller.dispose()
    await session.submit("hi", { modelId: "llama3", durationReporting: false })
    expect(controller.getState().turns).toEqual([])
  })
})
