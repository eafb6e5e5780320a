import React, { useCallback, useMemo, useState } from "react"
import { Box, Text } from "ink"
import TextInput from "ink-text-input"
import chalk from "chalk"
import type { NoticeTone, ReplState } from "../../commands/chat/controller.js"
import { buildSuggestions } from "../slashCommands.js"
import { APP_SUBTITLE, APP_TITLE, SEMANTIC_COLORS } from "../theme.js"
import { StreamingSlot } from "./StreamingSlot.js"
import { TurnView } from "./TurnView.js"

export interface ChatViewProps {
  readonly state: ReplState
  readonly onSubmit: (text: string) => void
}

const NOTICE_COLORS: Record<NoticeTone, string> = {
  info: SEMANTIC_COLORS.info,
  success: SEMANTIC_COLORS.success,
  error: SEMANTIC_COLORS.error,
}

export const formatFooter = (state: Pick<ReplState, "modelId" | "durationReporting" | "status">): string =>
  `model ${state.modelId} · duration ${state.durationReporting ? "on" : "off"} · ${state.status}`

export const ChatView: React.FC<ChatViewProps> = ({ state, onSubmit }) => {
  const [input, setInput] = useState("")
  const suggestions = useMemo(() => buildSuggestions(input), [input])
  const handleSubmit = useCallback(
    (value: string) => {
      setInput("")
      onSubmit(value)
    },
    [onSubmit],
  )

  return (
    <Box flexDirection="column">
      <Box flexDirection="column" marginBottom={1}>
        <Text bold>{APP_TITLE}</Text>
        <Text color="gray">{APP_SUBTITLE}</Text>
      </Box>
      {state.turns.map((turn, index) => (
        <TurnView key={`turn-${index}`} turn={turn} position={index + 1} />
      ))}
      {state.pending ? <StreamingSlot text={state.streamingText} /> : null}
      {state.notices.map((notice) => (
        <Text key={notice.id}>{chalk.hex(NOTICE_COLORS[notice.tone])(notice.text)}</Text>
      ))}
      <Box>
        <Text>{chalk.hex(SEMANTIC_COLORS.user)("❯")} </Text>
        <TextInput value={input} onChange={setInput} onSubmit={handleSubmit} placeholder="Your question" />
      </Box>
      {suggestions.map((suggestion) => (
        <Text key={suggestion.command} color="gray">
          {`${suggestion.command}${suggestion.usage ? ` ${suggestion.usage}` : ""}  ${suggestion.summary}`}
        </Text>
      ))}
      <Text color="gray">{formatFooter(state)}</Text>
    </Box>
  )
}
