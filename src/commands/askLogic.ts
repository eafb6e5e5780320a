import type { ChatSession, SubmitOutcome } from "../session/chatSession.js"
import type { InvocationSettings } from "../transcript/types.js"

export interface AskOptions {
  readonly prompt: string
  readonly settings: InvocationSettings
}

/**
 * Streams one answer through `write`. Only the unseen tail of the buffer is
 * written per fragment; once committed, whatever the commit added (the
 * duration annotation) follows with a trailing newline.
 */
export const runAsk = async (
  session: ChatSession,
  options: AskOptions,
  write: (text: string) => void,
): Promise<SubmitOutcome> => {
  let printed = 0
  const stop = session.onProgress((state) => {
    write(state.buffer.slice(printed))
    printed = state.buffer.length
  })
  try {
    const outcome = await session.submit(options.prompt, options.settings)
    if (outcome.status === "committed") {
      write(`${outcome.turn.content.slice(printed)}\n`)
    } else if (outcome.status === "failed" && printed > 0) {
      write("\n")
    }
    return outcome
  } finally {
    stop()
  }
}
