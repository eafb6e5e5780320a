import { EventEmitter } from "node:events"
import { isKnownModel, MODEL_IDS, type ModelId } from "../../config/models.js"
import { silentLogger, type Logger } from "../../logging/logger.js"
import { SLASH_COMMAND_HINT, parseSlashCommand } from "../../repl/slashCommands.js"
import type { ChatSession, SubmitOutcome } from "../../session/chatSession.js"
import { FAILURE_MESSAGE } from "../../transcript/failureNormalizer.js"
import type { Turn } from "../../transcript/types.js"
import type { ClipboardWriter } from "../../util/clipboard.js"

const MAX_NOTICES = 4

export type NoticeTone = "info" | "success" | "error"

export interface ReplNotice {
  readonly id: number
  readonly text: string
  readonly tone: NoticeTone
}

export interface ReplState {
  readonly turns: ReadonlyArray<Turn>
  readonly streamingText: string | null
  readonly pending: boolean
  readonly status: string
  readonly modelId: ModelId
  readonly durationReporting: boolean
  readonly notices: ReadonlyArray<ReplNotice>
  readonly exitRequested: boolean
}

export interface ReplControllerOptions {
  readonly session: ChatSession
  readonly clipboard: ClipboardWriter
  readonly modelId: ModelId
  readonly durationReporting: boolean
  readonly logger?: Logger
}

type StateListener = (state: ReplState) => void

type SlashHandler = (args: ReadonlyArray<string>) => Promise<void> | void

export class ReplController extends EventEmitter {
  private readonly session: ChatSession
  private readonly clipboard: ClipboardWriter
  private readonly logger: Logger
  private readonly unsubscribers: Array<() => void> = []
  private displayed: Turn[] = []
  private notices: ReplNotice[] = []
  private noticeSequence = 0
  private streamingText: string | null = null
  private pending = false
  private status = "Ready"
  private modelId: ModelId
  private durationReporting: boolean
  private exitRequested = false

  constructor(options: ReplControllerOptions) {
    super()
    this.session = options.session
    this.clipboard = options.clipboard
    this.logger = options.logger ?? silentLogger
    this.modelId = options.modelId
    this.durationReporting = options.durationReporting
    this.unsubscribers.push(
      this.session.onProgress((state) => {
        this.streamingText = state.buffer
        this.emitChange()
      }),
      this.session.onTurn(({ turn }) => {
        this.displayed.push(turn)
        if (turn.role === "assistant") {
          this.streamingText = null
        }
        this.emitChange()
      }),
      this.session.onCleared(() => {
        this.displayed = []
        this.emitChange()
      }),
    )
  }

  getState(): ReplState {
    return {
      turns: [...this.displayed],
      streamingText: this.streamingText,
      pending: this.pending,
      status: this.status,
      modelId: this.modelId,
      durationReporting: this.durationReporting,
      notices: [...this.notices],
      exitRequested: this.exitRequested,
    }
  }

  onChange(listener: StateListener): () => void {
    this.on("change", listener)
    listener(this.getState())
    return () => this.off("change", listener)
  }

  dispose(): void {
    for (const unsubscribe of this.unsubscribers.splice(0)) {
      unsubscribe()
    }
    this.removeAllListeners()
  }

  async handleInput(text: string): Promise<void> {
    const command = parseSlashCommand(text)
    if (command) {
      await this.dispatchSlashCommand(command.name, command.args)
      return
    }
    if (!text.trim()) return
    await this.submit(text)
  }

  selectModel(candidate: string): void {
    if (!isKnownModel(candidate)) {
      this.pushNotice(`Unknown model "${candidate}". Choose one of: ${MODEL_IDS.join(", ")}.`, "error")
      return
    }
    this.modelId = candidate
    this.logger.info("Model selected", { modelId: candidate })
    this.pushNotice(`Model set to ${candidate}.`, "info")
  }

  setDurationReporting(enabled: boolean): void {
    this.durationReporting = enabled
    this.pushNotice(`Duration reporting ${enabled ? "enabled" : "disabled"}.`, "info")
  }

  clearHistory(): void {
    if (!this.session.clear()) {
      this.pushNotice("Wait for the current response before clearing the history.", "error")
      return
    }
    this.pushNotice("Chat history cleared!", "success")
  }

  async copyTurn(position?: number): Promise<void> {
    const target = position === undefined ? this.displayed.at(-1) : this.displayed[position - 1]
    if (!target) {
      this.pushNotice(position === undefined ? "Nothing to copy yet." : `No message #${position} to copy.`, "error")
      return
    }
    try {
      await this.clipboard.write(target.content)
      this.pushNotice("Message copied to clipboard!", "success")
    } catch (error) {
      this.logger.warn("Clipboard write failed", { error })
      this.pushNotice("Clipboard is unavailable.", "error")
    }
  }

  requestExit(): void {
    this.exitRequested = true
    this.emitChange()
  }

  private async submit(text: string): Promise<void> {
    if (this.pending) {
      this.pushNotice("A response is still being written.", "error")
      return
    }
    this.pending = true
    this.status = "Writing…"
    this.emitChange()
    let outcome: SubmitOutcome
    try {
      outcome = await this.session.submit(text, {
        modelId: this.modelId,
        durationReporting: this.durationReporting,
      })
    } finally {
      this.pending = false
      this.streamingText = null
    }
    this.status = this.describeOutcome(outcome)
    if (outcome.status === "failed") {
      this.pushNotice(FAILURE_MESSAGE, "error")
      return
    }
    this.emitChange()
  }

  private describeOutcome(outcome: SubmitOutcome): string {
    switch (outcome.status) {
      case "committed":
        return `Ready · last response ${outcome.durationSeconds.toFixed(2)}s`
      case "failed":
        return "Ready · last response failed"
      case "busy":
        return "Writing…"
      case "ignored":
      case "duplicate":
        return "Ready"
    }
  }

  private async dispatchSlashCommand(name: string, args: ReadonlyArray<string>): Promise<void> {
    const handlers: Record<string, SlashHandler> = {
      help: () => this.pushNotice(`Commands: ${SLASH_COMMAND_HINT}`, "info"),
      clear: () => this.clearHistory(),
      model: (commandArgs) => {
        const [candidate] = commandArgs
        if (!candidate) {
          this.pushNotice(`Current model: ${this.modelId}. Usage: /model <id>`, "info")
          return
        }
        this.selectModel(candidate)
      },
      models: () =>
        this.pushNotice(
          `Models: ${MODEL_IDS.map((id) => (id === this.modelId ? `${id} (current)` : id)).join(", ")}`,
          "info",
        ),
      duration: (commandArgs) => {
        const [value] = commandArgs
        const normalized = value?.toLowerCase()
        if (normalized === "on" || normalized === "off") {
          this.setDurationReporting(normalized === "on")
          return
        }
        this.setDurationReporting(!this.durationReporting)
      },
      copy: async (commandArgs) => {
        const [value] = commandArgs
        if (value === undefined) {
          await this.copyTurn()
          return
        }
        const position = Number(value)
        if (!Number.isInteger(position) || position < 1) {
          this.pushNotice("Usage: /copy [n] where n is a message number.", "error")
          return
        }
        await this.copyTurn(position)
      },
      quit: () => this.requestExit(),
      exit: () => this.requestExit(),
    }
    const handler = handlers[name]
    if (!handler) {
      this.pushNotice(`Unknown command /${name}. ${SLASH_COMMAND_HINT}`, "error")
      return
    }
    await handler(args)
  }

  private pushNotice(text: string, tone: NoticeTone): void {
    this.noticeSequence += 1
    this.notices = [...this.notices, { id: this.noticeSequence, text, tone }].slice(-MAX_NOTICES)
    this.emitChange()
  }

  private emitChange(): void {
    this.emit("change", this.getState())
  }
}
