import { silentLogger, type Logger } from "../logging/logger.js"
import type { TranscriptStore } from "./transcriptStore.js"
import { assistantTurn, type Turn } from "./types.js"

export type CommitOutcome =
  | { readonly committed: true; readonly turn: Turn }
  | { readonly committed: false; readonly reason: "duplicate" }

export interface CommitOptions {
  readonly durationSeconds?: number
  readonly reportDuration?: boolean
  readonly logger?: Logger
}

export const formatDurationAnnotation = (seconds: number): string => `\n\nDuration: ${seconds.toFixed(2)} seconds`

export const annotateResponse = (finalText: string, options: CommitOptions): string => {
  if (!options.reportDuration || options.durationSeconds === undefined) return finalText
  return `${finalText}${formatDurationAnnotation(options.durationSeconds)}`
}

/**
 * Folds a finished response into the transcript, at most once per user turn.
 * A commit with no unanswered user turn is dropped.
 */
export const commitAssistantTurn = (
  store: TranscriptStore,
  finalText: string,
  options: CommitOptions = {},
): CommitOutcome => {
  const logger = options.logger ?? silentLogger
  if (store.lastRole() !== "user") {
    logger.debug("Duplicate commit ignored", { lastRole: store.lastRole(), characters: finalText.length })
    return { committed: false, reason: "duplicate" }
  }
  const turn = assistantTurn(annotateResponse(finalText, options))
  store.append(turn)
  return { committed: true, turn }
}
