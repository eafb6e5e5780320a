import React from "react"
import { Box, Text } from "ink"
import chalk from "chalk"
import { useSpinner } from "../hooks/useSpinner.js"
import { SEMANTIC_COLORS, WRITING_LABEL } from "../theme.js"

interface StreamingSlotProps {
  readonly text: string | null
}

export const StreamingSlot: React.FC<StreamingSlotProps> = ({ text }) => {
  const spinner = useSpinner(true)
  return (
    <Box flexDirection="column" marginBottom={1}>
      <Text>
        {spinner} {chalk.hex(SEMANTIC_COLORS.muted)(WRITING_LABEL)}
      </Text>
      {text ? <Text>{text}</Text> : null}
    </Box>
  )
}
