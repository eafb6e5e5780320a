import { homedir } from "node:os"
import path from "node:path"
import fs from "node:fs"

export interface UserConfigFile {
  readonly baseUrl?: string
  readonly defaultModel?: string
  readonly requestTimeoutMs?: number
  readonly durationReporting?: boolean
  readonly logLevel?: string
  readonly logFile?: string
}

export const resolveCarlHome = (): string => path.join(homedir(), ".carl")

const resolveConfigPath = (): string => {
  const explicit = process.env.CARL_USER_CONFIG?.trim()
  if (explicit) {
    return path.resolve(explicit)
  }
  return path.join(resolveCarlHome(), "config.json")
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value)

export const parseUserConfig = (parsed: unknown): UserConfigFile => {
  if (!isRecord(parsed)) return {}
  return {
    ...(typeof parsed.baseUrl === "string" ? { baseUrl: parsed.baseUrl } : {}),
    ...(typeof parsed.defaultModel === "string" ? { defaultModel: parsed.defaultModel } : {}),
    ...(typeof parsed.requestTimeoutMs === "number" ? { requestTimeoutMs: parsed.requestTimeoutMs } : {}),
    ...(typeof parsed.durationReporting === "boolean" ? { durationReporting: parsed.durationReporting } : {}),
    ...(typeof parsed.logLevel === "string" ? { logLevel: parsed.logLevel } : {}),
    ...(typeof parsed.logFile === "string" ? { logFile: parsed.logFile } : {}),
  }
}

// A missing or unreadable file means "no overrides"; the CLI still starts.
export const loadUserConfigSync = (): UserConfigFile => {
  const configPath = resolveConfigPath()
  if (!fs.existsSync(configPath)) return {}
  try {
    const raw = fs.readFileSync(configPath, "utf8")
    return parseUserConfig(JSON.parse(raw))
  } catch (error) {
    if (process.env.CARL_LOG_DEBUG === "1") {
      console.error(JSON.stringify({ userConfigError: String(error), configPath }))
    }
    return {}
  }
}
