import { Command, Options } from "@effect/cli"
import { Console, Effect } from "effect"
import { createOllamaClient } from "../api/ollamaClient.js"
import type { InstalledModel } from "../api/types.js"
import { AppConfigTag } from "../config/appConfig.js"
import { MODEL_IDS } from "../config/models.js"

const remoteOption = Options.boolean("remote").pipe(Options.withDescription("List the models installed on the server"))

export const formatModelList = (defaultModel: string): string =>
  MODEL_IDS.map((id) => `${id === defaultModel ? "*" : " "} ${id}`).join("\n")

const formatSize = (bytes: number): string => `${(bytes / 1024 ** 3).toFixed(1)} GB`

export const formatInstalledModels = (models: ReadonlyArray<InstalledModel>): string => {
  if (models.length === 0) return "No models installed."
  return models.map((model) => (model.size !== undefined ? `${model.name}  ${formatSize(model.size)}` : model.name)).join("\n")
}

export const modelsCommand = Command.make("models", { remote: remoteOption }, ({ remote }) =>
  Effect.gen(function* () {
    const config = yield* AppConfigTag
    if (!remote) {
      yield* Console.log(formatModelList(config.defaultModel))
      return
    }
    const client = createOllamaClient({ baseUrl: config.baseUrl, requestTimeoutMs: config.requestTimeoutMs })
    const installed = yield* Effect.tryPromise({
      try: () => client.listModels(),
      catch: (error) => (error instanceof Error ? error : new Error(String(error))),
    })
    yield* Console.log(formatInstalledModels(installed))
  }),
).pipe(Command.withDescription("List available models"))
