import { Either } from "effect"
import type { ModelClient } from "../api/types.js"
import { silentLogger, type Logger } from "../logging/logger.js"
import type { Turn } from "../transcript/types.js"
import {
  InvocationInFlightError,
  InvocationTimeoutError,
  toStreamFailure,
  type StreamFailure,
} from "./errors.js"

export const DEFAULT_REQUEST_TIMEOUT_MS = 240_000

export interface StreamState {
  readonly buffer: string
  readonly startedAt: number
  readonly fragmentsSeen: number
}

export type StreamResult = Either.Either<string, StreamFailure>

export interface StreamingAccumulatorOptions {
  readonly client: ModelClient
  readonly timeoutMs?: number
  readonly now?: () => number
  readonly logger?: Logger
}

export interface RunOptions {
  readonly onProgress?: (state: StreamState) => void
}

const TIMED_OUT = Symbol("timed-out")

/**
 * Drives one model invocation at a time and folds its fragments into a single
 * buffer. Faults come back as `Left`; the partial buffer is dropped with them.
 */
export class StreamingAccumulator {
  private readonly client: ModelClient
  private readonly timeoutMs: number
  private readonly now: () => number
  private readonly logger: Logger
  private inFlight = false

  constructor(options: StreamingAccumulatorOptions) {
    this.client = options.client
    this.timeoutMs = options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS
    this.now = options.now ?? Date.now
    this.logger = options.logger ?? silentLogger
  }

  get busy(): boolean {
    return this.inFlight
  }

  async run(modelId: string, messages: ReadonlyArray<Turn>, options: RunOptions = {}): Promise<StreamResult> {
    if (this.inFlight) {
      throw new InvocationInFlightError()
    }
    this.inFlight = true
    const controller = new AbortController()
    const expired = new Promise<typeof TIMED_OUT>((resolve) => {
      controller.signal.addEventListener("abort", () => resolve(TIMED_OUT), { once: true })
    })
    const timer = setTimeout(() => controller.abort(new InvocationTimeoutError(this.timeoutMs)), this.timeoutMs)
    let state: StreamState = { buffer: "", startedAt: this.now(), fragmentsSeen: 0 }
    this.logger.debug("Model invocation started", { modelId, messages: messages.length, timeoutMs: this.timeoutMs })

    try {
      const iterator = this.client
        .invoke({
          modelId,
          messages: messages.map((turn) => ({ role: turn.role, content: turn.content })),
          signal: controller.signal,
        })
        [Symbol.asyncIterator]()
      while (true) {
        const next = await Promise.race([iterator.next(), expired])
        if (next === TIMED_OUT) {
          this.release(iterator)
          return Either.left(new InvocationTimeoutError(this.timeoutMs))
        }
        if (next.done) break
        state = {
          buffer: state.buffer + next.value,
          startedAt: state.startedAt,
          fragmentsSeen: state.fragmentsSeen + 1,
        }
        options.onProgress?.(state)
      }
      this.logger.debug("Model invocation completed", {
        modelId,
        fragments: state.fragmentsSeen,
        characters: state.buffer.length,
        elapsedMs: this.now() - state.startedAt,
      })
      return Either.right(state.buffer)
    } catch (error) {
      if (controller.signal.aborted) {
        return Either.left(new InvocationTimeoutError(this.timeoutMs))
      }
      return Either.left(toStreamFailure(error))
    } finally {
      clearTimeout(timer)
      this.inFlight = false
    }
  }

  private release(iterator: AsyncIterator<string>): void {
    const closing = iterator.return?.()
    if (!closing) return
    void closing.catch((error: unknown) => {
      this.logger.debug("Model stream did not close after timeout", { error })
    })
  }
}
