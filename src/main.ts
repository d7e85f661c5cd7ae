#!/usr/bin/env node
import { Args, Command, Options } from "@effect/cli"
import { NodeContext, NodeRuntime } from "@effect/platform-node"
import { Effect, Option } from "effect"
import { runOneShot } from "./commands/ask.js"
import { runChatSession } from "./commands/chat/command.js"
import { configCommand } from "./commands/config.js"
import { attempt, createCommandContext, reportFailure } from "./commands/context.js"
import { joinPrompt, readPipedStdin } from "./commands/input.js"
import { runProviderSetup } from "./commands/setup.js"
import { APP_NAME, APP_VERSION } from "./version.js"

const promptArgs = Args.text({ name: "prompt" }).pipe(Args.repeated)
const providerOption = Options.boolean("provider").pipe(
  Options.withAlias("p"),
  Options.withDescription("Choose a provider and set its API key before starting"),
)
const noInteractionOption = Options.boolean("no-interaction").pipe(
  Options.withAlias("n"),
  Options.withDescription("Send the prompt, print the answer and exit"),
)
const configOption = Options.text("config").pipe(
  Options.optional,
  Options.withDescription("Path of the configuration file"),
)

const root = Command.make(
  APP_NAME,
  { prompt: promptArgs, provider: providerOption, noInteraction: noInteractionOption, config: configOption },
  ({ prompt, provider, noInteraction, config }) =>
    Effect.gen(function* () {
      const context = createCommandContext(Option.getOrNull(config))
      const stdinPiped = !process.stdin.isTTY
      const piped = yield* attempt(readPipedStdin)
      const promptText = joinPrompt(prompt, piped)
      const needsSetup = provider || context.registry.readyProviders().length === 0
      if (needsSetup && !noInteraction) {
        yield* runProviderSetup(context.registry)
      }
      if (noInteraction) {
        yield* attempt(() => runOneShot(context.registry, promptText))
        return
      }
      yield* attempt(() =>
        runChatSession({
          registry: context.registry,
          configPath: context.config.configPath,
          debugLogPath: context.config.debugLogPath,
          initialPrompt: promptText,
          stdinPiped,
        }),
      )
    }).pipe(Effect.catchAll(reportFailure)),
).pipe(Command.withDescription("Chat with OpenAI-compatible language models from the terminal"), Command.withSubcommands([configCommand]))

const cli = Command.run(root, { name: APP_NAME, version: APP_VERSION })

cli(process.argv).pipe(Effect.provide(NodeContext.layer), NodeRuntime.runMain)
