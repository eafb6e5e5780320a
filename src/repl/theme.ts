export const BRAND_COLORS = {
  ember: "#ff4d6d",
  amber: "#ed840f",
  mint: "#2ee59d",
  sky: "#4da3ff",
  teal: "#14b8a6",
} as const

export const NEUTRAL_COLORS = {
  offWhite: "#dcdce1",
  midGray: "#8c8c96",
  dimGray: "#64646e",
} as const

export const SEMANTIC_COLORS = {
  user: BRAND_COLORS.sky,
  assistant: NEUTRAL_COLORS.offWhite,
  success: BRAND_COLORS.mint,
  error: BRAND_COLORS.ember,
  info: BRAND_COLORS.amber,
  spinner: BRAND_COLORS.teal,
  muted: NEUTRAL_COLORS.dimGray,
} as const

export const SPINNER_FRAMES = ["⠋", "⠙", "⠹", "⠸", "⠼", "⠴", "⠦", "⠧", "⠇", "⠏"] as const

export const APP_TITLE = "CARL (Research)"
export const APP_SUBTITLE = "Corporate Assistant for Rapid Lookups"
export const WRITING_LABEL = "Writing…"
