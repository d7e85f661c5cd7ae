import { QuitException } from "@effect/platform/Terminal"
import { Console, Effect } from "effect"
import { loadAppConfig, type AppConfig } from "../config/appConfig.js"
import { ConfigStore } from "../config/userConfig.js"
import { describeError } from "../errors.js"
import { ProviderRegistry } from "../providers/registry.js"
import { configureDebugLog } from "../util/debugLog.js"

export interface CommandContext {
  readonly config: AppConfig
  readonly store: ConfigStore
  readonly registry: ProviderRegistry
}

export const createCommandContext = (configPath: string | null): CommandContext => {
  const config = loadAppConfig({ configPath })
  configureDebugLog({ enabled: config.debug, filePath: config.debugLogPath })
  const store = new ConfigStore(config.configPath)
  const registry = ProviderRegistry.fromConfig({
    user: config.user,
    store,
    requestTimeoutMs: config.requestTimeoutMs,
  })
  return { config, store, registry }
}

export const attempt = <A>(action: () => Promise<A>): Effect.Effect<A, unknown> =>
  Effect.tryPromise({ try: () => action(), catch: (error) => error })

/** Command-line error boundary: one `Error:` line on stderr and a failing exit code. */
export const reportFailure = (error: unknown): Effect.Effect<void> => {
  if (error instanceof QuitException) {
    return Effect.sync(() => {
      process.exitCode = 130
    })
  }
  return Console.error(`Error: ${describeError(error)}`).pipe(
    Effect.zipRight(
      Effect.sync(() => {
        process.exitCode = 1
      }),
    ),
  )
}
