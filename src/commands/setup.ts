import { Prompt } from "@effect/cli"
import { Console, Effect, Redacted } from "effect"
import type { ProviderRegistry } from "../providers/registry.js"
import { attempt } from "./context.js"

const providerChoices = (registry: ProviderRegistry) =>
  registry.providerSummaries().map((summary) => ({
    title: `${summary.name} [${summary.isReady ? "Ready" : "Not Ready"}]`,
    value: summary.name,
    description: `Models: ${summary.models.join(", ")}`,
  }))

/** Picks the active provider and asks for its API key when it has none. */
export const runProviderSetup = (registry: ProviderRegistry) =>
  Effect.gen(function* () {
    const name = yield* Prompt.select({
      message: "Select a provider",
      choices: providerChoices(registry),
    })
    yield* attempt(() => registry.setActiveProvider(name))
    if (!registry.active().isReady()) {
      const secret = yield* Prompt.password({
        message: `Please enter your API key of ${name}`,
        validate: (value) => (value.trim() ? Effect.succeed(value) : Effect.fail("API key cannot be empty")),
      })
      yield* attempt(() => registry.setApiKey(Redacted.value(secret).trim()))
      yield* Console.log(`API key for '${name}' has been set successfully.`)
    }
    yield* Console.log(`Using provider ${name} (model ${registry.active().settings().model}).`)
  })
