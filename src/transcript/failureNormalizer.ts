import type { Logger } from "../logging/logger.js"
import type { StreamFailure } from "../stream/errors.js"
import type { TranscriptStore } from "./transcriptStore.js"
import { assistantTurn, type Turn } from "./types.js"

export const FAILURE_MESSAGE = "An error occurred while generating the response."

// Closes the outstanding user turn whatever the transcript's last role is.
// The turn is appended before anything else runs.
export const normalizeFailure = (store: TranscriptStore, cause: StreamFailure, logger: Logger): Turn => {
  const turn = assistantTurn(FAILURE_MESSAGE)
  store.append(turn)
  logger.error("Error during streaming", { kind: cause.kind, error: cause })
  return turn
}
