import dotenv from "dotenv"
import path from "node:path"
import { Context, Effect, Layer } from "effect"
import { parseLogLevel, type LogLevel } from "../logging/logger.js"
import { DEFAULT_REQUEST_TIMEOUT_MS } from "../stream/accumulator.js"
import { resolveModelId, type ModelId } from "./models.js"
import { loadUserConfigSync, resolveCarlHome, type UserConfigFile } from "./userConfig.js"

dotenv.config()

export interface AppConfig {
  readonly baseUrl: string
  readonly requestTimeoutMs: number
  readonly defaultModel: ModelId
  readonly durationReporting: boolean
  readonly logLevel: LogLevel
  readonly logFile: string
}

export const DEFAULT_BASE_URL = "http://127.0.0.1:11434"

type Env = Readonly<Record<string, string | undefined>>

export const parseBooleanFlag = (value: string | undefined): boolean | undefined => {
  const normalized = value?.trim().toLowerCase()
  if (normalized === undefined || normalized === "") return undefined
  if (normalized === "1" || normalized === "true" || normalized === "yes" || normalized === "on") return true
  if (normalized === "0" || normalized === "false" || normalized === "no" || normalized === "off") return false
  return undefined
}

const parseTimeout = (value: string | number | undefined): number | undefined => {
  if (value === undefined || value === "") return undefined
  const parsed = Number(value)
  return Number.isFinite(parsed) && parsed > 0 ? parsed : undefined
}

export const computeConfig = (env: Env, userConfig: UserConfigFile): AppConfig => {
  const baseUrl = env.CARL_API_URL?.trim() || userConfig.baseUrl || DEFAULT_BASE_URL
  const requestTimeoutMs =
    parseTimeout(env.CARL_REQUEST_TIMEOUT_MS) ?? parseTimeout(userConfig.requestTimeoutMs) ?? DEFAULT_REQUEST_TIMEOUT_MS
  const defaultModel = resolveModelId(env.CARL_DEFAULT_MODEL?.trim() || userConfig.defaultModel)
  const durationReporting = parseBooleanFlag(env.CARL_SHOW_DURATION) ?? userConfig.durationReporting ?? true
  const logLevel = parseLogLevel(env.CARL_LOG_LEVEL ?? userConfig.logLevel)
  const logFileRaw = env.CARL_LOG_FILE?.trim() || userConfig.logFile
  const logFile = logFileRaw ? path.resolve(logFileRaw) : path.join(resolveCarlHome(), "carl.log")
  return { baseUrl, requestTimeoutMs, defaultModel, durationReporting, logLevel, logFile }
}

export const loadAppConfig = (): AppConfig => computeConfig(process.env, loadUserConfigSync())

export const AppConfigTag = Context.GenericTag<AppConfig>("AppConfig")

export const AppConfigLayer = Layer.effect(AppConfigTag, Effect.sync(loadAppConfig))
