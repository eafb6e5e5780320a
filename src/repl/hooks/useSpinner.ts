import chalk from "chalk"
import { SEMANTIC_COLORS, SPINNER_FRAMES } from "../theme.js"
import { useAnimationClock } from "./useAnimationClock.js"

export const useSpinner = (active: boolean): string => {
  const tick = useAnimationClock(active)
  const frame = active ? SPINNER_FRAMES[tick % SPINNER_FRAMES.length] : "●"
  return chalk.hex(SEMANTIC_COLORS.spinner)(frame)
}
