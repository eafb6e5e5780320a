import { EventEmitter } from "node:events"
import { Either } from "effect"
import type { ModelClient } from "../api/types.js"
import { silentLogger, type Logger } from "../logging/logger.js"
import { StreamingAccumulator, type StreamState } from "../stream/accumulator.js"
import type { StreamFailure } from "../stream/errors.js"
import { commitAssistantTurn } from "../transcript/commitGuard.js"
import { normalizeFailure } from "../transcript/failureNormalizer.js"
import { TranscriptStore, type TranscriptView } from "../transcript/transcriptStore.js"
import { userTurn, type InvocationSettings, type Turn, type TurnPhase } from "../transcript/types.js"

export interface ChatSessionOptions {
  readonly client: ModelClient
  readonly timeoutMs?: number
  readonly now?: () => number
  readonly logger?: Logger
  readonly transcript?: TranscriptStore
}

export type SubmitOutcome =
  | { readonly status: "ignored" }
  | { readonly status: "busy" }
  | { readonly status: "committed"; readonly turn: Turn; readonly durationSeconds: number }
  | { readonly status: "duplicate" }
  | { readonly status: "failed"; readonly turn: Turn; readonly failure: StreamFailure }

export interface DisplayedTurn {
  readonly index: number
  readonly turn: Turn
}

type ProgressListener = (state: StreamState) => void
type TurnListener = (displayed: DisplayedTurn) => void
type PhaseListener = (phase: TurnPhase) => void
type ClearedListener = () => void

/**
 * One conversation: a transcript plus the single invocation that may be in
 * flight for it. Settings arrive with each submission and are not retained.
 */
export class ChatSession {
  private readonly store: TranscriptStore
  private readonly emitter = new EventEmitter()
  private readonly accumulator: StreamingAccumulator
  private readonly now: () => number
  private readonly logger: Logger
  private pending = false
  private phase: TurnPhase | null = null

  constructor(options: ChatSessionOptions) {
    this.store = options.transcript ?? new TranscriptStore()
    this.now = options.now ?? Date.now
    this.logger = options.logger ?? silentLogger
    this.accumulator = new StreamingAccumulator({
      client: options.client,
      timeoutMs: options.timeoutMs,
      now: this.now,
      logger: this.logger,
    })
  }

  // Read-only: turns enter the transcript only through submit.
  get transcript(): TranscriptView {
    return this.store
  }

  get busy(): boolean {
    return this.pending
  }

  get currentPhase(): TurnPhase | null {
    return this.phase
  }

  onProgress(listener: ProgressListener): () => void {
    return this.subscribe("progress", listener)
  }

  onTurn(listener: TurnListener): () => void {
    return this.subscribe("turn", listener)
  }

  onPhase(listener: PhaseListener): () => void {
    return this.subscribe("phase", listener)
  }

  onCleared(listener: ClearedListener): () => void {
    return this.subscribe("cleared", listener)
  }

  async submit(text: string, settings: InvocationSettings): Promise<SubmitOutcome> {
    if (!text.trim()) return { status: "ignored" }
    if (this.pending) return { status: "busy" }
    this.pending = true
    const { modelId, durationReporting } = settings
    try {
      const startedAt = this.now()
      this.logger.info("User input", { modelId, content: text })
      this.appendDisplayed(userTurn(text))
      this.setPhase("awaiting_response")

      const result = await this.accumulator.run(modelId, this.store.all(), {
        onProgress: (state) => this.emitter.emit("progress", state),
      })
      const durationSeconds = (this.now() - startedAt) / 1000

      return Either.match(result, {
        onLeft: (failure): SubmitOutcome => {
          const turn = normalizeFailure(this.store, failure, this.logger)
          this.emitDisplayed(turn)
          this.setPhase("failed")
          return { status: "failed", turn, failure }
        },
        onRight: (finalText): SubmitOutcome => {
          const outcome = commitAssistantTurn(this.store, finalText, {
            durationSeconds,
            reportDuration: durationReporting,
            logger: this.logger,
          })
          if (!outcome.committed) {
            this.setPhase("committed")
            return { status: "duplicate" }
          }
          this.logger.info("Response committed", {
            modelId,
            response: finalText,
            durationSeconds: Number(durationSeconds.toFixed(2)),
          })
          this.emitDisplayed(outcome.turn)
          this.setPhase("committed")
          return { status: "committed", turn: outcome.turn, durationSeconds }
        },
      })
    } finally {
      this.pending = false
    }
  }

  clear(): boolean {
    if (this.pending) return false
    this.store.clear()
    this.phase = null
    this.logger.info("Chat history cleared")
    this.emitter.emit("cleared")
    return true
  }

  // A throwing subscriber is logged and skipped; it cannot interrupt a submission.
  private subscribe<Args extends unknown[]>(event: string, listener: (...args: Args) => void): () => void {
    const guarded = (...args: Args) => {
      try {
        listener(...args)
      } catch (error) {
        this.logger.warn("Session listener failed", { event, error })
      }
    }
    this.emitter.on(event, guarded)
    return () => this.emitter.off(event, guarded)
  }

  private appendDisplayed(turn: Turn): void {
    this.store.append(turn)
    this.emitDisplayed(turn)
  }

  private emitDisplayed(turn: Turn): void {
    const displayed: DisplayedTurn = { index: this.store.size - 1, turn }
    this.emitter.emit("turn", displayed)
  }

  private setPhase(phase: TurnPhase): void {
    this.phase = phase
    this.emitter.emit("phase", phase)
  }
}
