import React from "react"
import { Command, Options } from "@effect/cli"
import { Effect, Option } from "effect"
import { render } from "ink"
import { AppConfigTag } from "../../config/appConfig.js"
import { MODEL_IDS } from "../../config/models.js"
import { systemClipboard } from "../../util/clipboard.js"
import { createRuntime } from "../runtime.js"
import { ChatApp } from "./ChatApp.js"
import { ReplController } from "./controller.js"

const modelOption = Options.choice("model", MODEL_IDS).pipe(
  Options.withDescription("Model to chat with"),
  Options.optional,
)
const durationOption = Options.choice("duration", ["on", "off"] as const).pipe(
  Options.withDescription("Append the response duration to each answer"),
  Options.optional,
)

export const chatCommand = Command.make("chat", { model: modelOption, duration: durationOption }, ({ model, duration }) =>
  Effect.gen(function* () {
    const config = yield* AppConfigTag
    const modelId = Option.getOrElse(model, () => config.defaultModel)
    const durationReporting = Option.match(duration, {
      onNone: () => config.durationReporting,
      onSome: (value) => value === "on",
    })
    const runtime = createRuntime(config)
    runtime.logger.info("App started", { baseUrl: config.baseUrl })
    runtime.logger.info("Model selected", { modelId })
    const controller = new ReplController({
      session: runtime.session,
      clipboard: systemClipboard,
      modelId,
      durationReporting,
      logger: runtime.logger,
    })
    yield* Effect.promise(async () => {
      const instance = render(<ChatApp controller={controller} logger={runtime.logger} />)
      try {
        await instance.waitUntilExit()
      } finally {
        controller.dispose()
      }
    })
  }),
).pipe(Command.withDescription("Chat interactively with a model"))
