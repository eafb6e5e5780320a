import React from "react"
import { Box, Text } from "ink"
import chalk from "chalk"
import type { Turn } from "../../transcript/types.js"
import { SEMANTIC_COLORS } from "../theme.js"

interface TurnViewProps {
  readonly turn: Turn
  readonly position: number
}

export const speakerLabel = (turn: Turn): string => (turn.role === "user" ? "You" : "CARL")

export const TurnView: React.FC<TurnViewProps> = ({ turn, position }) => {
  const color = turn.role === "user" ? SEMANTIC_COLORS.user : SEMANTIC_COLORS.assistant
  return (
    <Box flexDirection="column" marginBottom={1}>
      <Text>
        {chalk.hex(color).bold(speakerLabel(turn))} {chalk.hex(SEMANTIC_COLORS.muted)(`#${position}`)}
      </Text>
      <Text>{turn.content}</Text>
    </Box>
  )
}
