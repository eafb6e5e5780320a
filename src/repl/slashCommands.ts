export type SlashCommandName = "help" | "clear" | "model" | "models" | "duration" | "copy" | "quit"

export interface SlashCommandInfo {
  readonly name: SlashCommandName
  readonly summary: string
  readonly usage?: string
}

export interface SlashSuggestion {
  readonly command: string
  readonly usage?: string
  readonly summary: string
}

export interface ParsedSlashCommand {
  readonly name: string
  readonly args: ReadonlyArray<string>
}

export const SLASH_COMMANDS: ReadonlyArray<SlashCommandInfo> = [
  { name: "help", summary: "Show available slash commands." },
  { name: "clear", summary: "Clear the chat history." },
  { name: "model", usage: "<id>", summary: "Switch to another model." },
  { name: "models", summary: "List the models you can choose from." },
  { name: "duration", usage: "on|off", summary: "Show or hide response durations." },
  { name: "copy", usage: "[n]", summary: "Copy the last message (or message n) to the clipboard." },
  { name: "quit", summary: "Exit the session." },
]

export const SLASH_COMMAND_HINT = SLASH_COMMANDS.map((entry) => `/${entry.name}${entry.usage ? ` ${entry.usage}` : ""}`).join(", ")

export const parseSlashCommand = (input: string): ParsedSlashCommand | null => {
  const trimmed = input.trim()
  if (!trimmed.startsWith("/")) return null
  const [name = "", ...args] = trimmed.slice(1).split(/\s+/)
  return { name: name.toLowerCase(), args }
}

const scoreFuzzy = (candidate: string, query: string): number | null => {
  const needle = query.trim().toLowerCase()
  if (!needle) return 0
  const haystack = candidate.toLowerCase()
  let score = 0
  let lastIndex = -1
  let consecutive = 0
  for (const ch of needle) {
    const index = haystack.indexOf(ch, lastIndex + 1)
    if (index === -1) return null
    score += 10
    if (index === lastIndex + 1) {
      consecutive += 1
      score += 8 + consecutive
    } else {
      consecutive = 0
      score -= index - lastIndex - 1
    }
    lastIndex = index
  }
  return score + Math.max(0, 24 - haystack.length)
}

const toSuggestion = (entry: SlashCommandInfo): SlashSuggestion => ({
  command: `/${entry.name}`,
  usage: entry.usage,
  summary: entry.summary,
})

export const buildSuggestions = (input: string, limit = 5): SlashSuggestion[] => {
  const parsed = parseSlashCommand(input)
  if (!parsed) return []
  if (!parsed.name) {
    return SLASH_COMMANDS.slice(0, limit).map(toSuggestion)
  }
  const scored = SLASH_COMMANDS.map((entry) => {
    const score = scoreFuzzy(entry.name, parsed.name)
    return score == null ? null : { entry, score }
  }).filter((item): item is { entry: SlashCommandInfo; score: number } => item != null)
  scored.sort((a, b) => {
    if (b.score !== a.score) return b.score - a.score
    if (a.entry.name.length !== b.entry.name.length) return a.entry.name.length - b.entry.name.length
    return a.entry.name.localeCompare(b.entry.name)
  })
  return scored.slice(0, limit).map(({ entry }) => toSuggestion(entry))
}
