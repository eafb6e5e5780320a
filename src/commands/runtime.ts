import { createOllamaClient, type OllamaClient } from "../api/ollamaClient.js"
import type { AppConfig } from "../config/appConfig.js"
import { createLogger, fileSink, type Logger } from "../logging/logger.js"
import { ChatSession } from "../session/chatSession.js"

export interface CliRuntime {
  readonly logger: Logger
  readonly client: OllamaClient
  readonly session: ChatSession
}

export interface RuntimeOverrides {
  readonly logger?: Logger
  readonly fetch?: typeof fetch
}

export const createRuntime = (config: AppConfig, overrides: RuntimeOverrides = {}): CliRuntime => {
  const logger = overrides.logger ?? createLogger({ level: config.logLevel, sink: fileSink(config.logFile) })
  const client = createOllamaClient({
    baseUrl: config.baseUrl,
    requestTimeoutMs: config.requestTimeoutMs,
    fetch: overrides.fetch,
  })
  const session = new ChatSession({ client, timeoutMs: config.requestTimeoutMs, logger })
  return { logger, client, session }
}
