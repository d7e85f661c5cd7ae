import { Args, Command, Options } from "@effect/cli"
import { Console, Effect, Option } from "effect"
import { stringify } from "yaml"
import { ConfigStore, parseConfigValue, resolveConfigPath } from "../config/userConfig.js"
import { ConfigError } from "../errors.js"
import { maskApiKey } from "../providers/provider.js"
import { isRecord } from "../util/guards.js"
import { attempt, reportFailure } from "./context.js"

const configPathOption = Options.text("config").pipe(Options.optional)
const outputOption = Options.choice("output", ["json", "yaml"] as const).pipe(Options.withDefault("json"))

const openStore = (configPath: Option.Option<string>): ConfigStore =>
  new ConfigStore(resolveConfigPath(Option.getOrNull(configPath)))

/** Copy of the raw file with every provider `api_key` masked. */
export const maskConfigSecrets = (raw: Record<string, unknown>): Record<string, unknown> => {
  const providers = raw.providers
  if (!isRecord(providers)) return raw
  const masked: Record<string, unknown> = {}
  for (const [name, entry] of Object.entries(providers)) {
    masked[name] =
      isRecord(entry) && typeof entry.api_key === "string" ? { ...entry, api_key: maskApiKey(entry.api_key) } : entry
  }
  return { ...raw, providers: masked }
}

export const formatConfigValue = (value: unknown): string =>
  typeof value === "object" && value !== null ? JSON.stringify(value, null, 2) : String(value)

const setCommand = Command.make(
  "set",
  { config: configPathOption, key: Args.text({ name: "key" }), value: Args.text({ name: "value" }) },
  ({ config, key, value }) =>
    attempt(() => openStore(config).setValue(key, parseConfigValue(value))).pipe(
      Effect.zipRight(Console.log(`Set ${key}`)),
      Effect.catchAll(reportFailure),
    ),
)

const getCommand = Command.make("get", { config: configPathOption, key: Args.text({ name: "key" }) }, ({ config, key }) =>
  Effect.try({
    try: () => {
      const store = openStore(config)
      const value = store.getValue(key)
      if (value === undefined) throw new ConfigError(`Key not found: ${key}`, store.path)
      return formatConfigValue(value)
    },
    catch: (error) => error,
  }).pipe(Effect.flatMap(Console.log), Effect.catchAll(reportFailure)),
)

const showCommand = Command.make("show", { config: configPathOption, output: outputOption }, ({ config, output }) =>
  Effect.try({ try: () => maskConfigSecrets(openStore(config).readRaw()), catch: (error) => error }).pipe(
    Effect.flatMap((raw) => Console.log(output === "yaml" ? stringify(raw).trimEnd() : JSON.stringify(raw, null, 2))),
    Effect.catchAll(reportFailure),
  ),
)

const pathCommand = Command.make("path", { config: configPathOption }, ({ config }) =>
  Console.log(openStore(config).path),
)

export const configCommand = Command.make("config").pipe(
  Command.withDescription("Read and change the persisted configuration"),
  Command.withSubcommands([setCommand, getCommand, showCommand, pathCommand]),
)
