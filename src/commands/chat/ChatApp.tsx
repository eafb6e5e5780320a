import React, { useCallback, useEffect, useState } from "react"
import { useApp } from "ink"
import type { Logger } from "../../logging/logger.js"
import { ChatView } from "../../repl/components/ChatView.js"
import type { ReplController } from "./controller.js"

interface ChatAppProps {
  readonly controller: ReplController
  readonly logger: Logger
}

export const ChatApp: React.FC<ChatAppProps> = ({ controller, logger }) => {
  const { exit } = useApp()
  const [state, setState] = useState(() => controller.getState())

  useEffect(() => controller.onChange(setState), [controller])

  useEffect(() => {
    if (state.exitRequested) exit()
  }, [state.exitRequested, exit])

  const handleSubmit = useCallback(
    (text: string) => {
      void controller.handleInput(text).catch((error: unknown) => {
        logger.error("Input handling failed", { error })
      })
    },
    [controller, logger],
  )

  return <ChatView state={state} onSubmit={handleSubmit} />
}
