import { Args, Command, Options } from "@effect/cli"
import { Console, Effect, Option } from "effect"
import { AppConfigTag } from "../config/appConfig.js"
import { MODEL_IDS } from "../config/models.js"
import { FAILURE_MESSAGE } from "../transcript/failureNormalizer.js"
import { runAsk } from "./askLogic.js"
import { createRuntime } from "./runtime.js"

export class AskFailedError extends Error {
  constructor(message: string) {
    super(message)
    this.name = "AskFailedError"
  }
}

const modelOption = Options.choice("model", MODEL_IDS).pipe(Options.optional)
const durationOption = Options.choice("duration", ["on", "off"] as const).pipe(Options.optional)

export const askCommand = Command.make(
  "ask",
  { prompt: Args.text({ name: "prompt" }), model: modelOption, duration: durationOption },
  ({ prompt, model, duration }) =>
    Effect.gen(function* () {
      const config = yield* AppConfigTag
      const runtime = createRuntime(config)
      const settings = {
        modelId: Option.getOrElse(model, () => config.defaultModel),
        durationReporting: Option.match(duration, {
          onNone: () => config.durationReporting,
          onSome: (value) => value === "on",
        }),
      }
      const outcome = yield* Effect.promise(() =>
        runAsk(runtime.session, { prompt, settings }, (text) => {
          process.stdout.write(text)
        }),
      )
      switch (outcome.status) {
        case "committed":
        case "duplicate":
          return
        case "ignored":
          yield* Console.error("Prompt is empty.")
          return yield* Effect.fail(new AskFailedError("Prompt is empty"))
        case "busy":
          return yield* Effect.fail(new AskFailedError("A response is already being written"))
        case "failed":
          yield* Console.error(FAILURE_MESSAGE)
          return yield* Effect.fail(new AskFailedError(FAILURE_MESSAGE))
      }
    }),
).pipe(Command.withDescription("Ask a single question and stream the answer"))
