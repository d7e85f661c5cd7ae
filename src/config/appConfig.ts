import dotenv from "dotenv"
import { ConfigStore, resolveConfigPath, type UserConfigFile } from "./userConfig.js"

dotenv.config()

export interface AppConfig {
  readonly configPath: string
  readonly debug: boolean
  readonly debugLogPath: string | null
  readonly requestTimeoutMs: number
  readonly user: UserConfigFile
}

const DEFAULT_TIMEOUT_MS = 60_000

export interface AppConfigOverrides {
  readonly configPath?: string | null
}

const computeConfig = (overrides: AppConfigOverrides): AppConfig => {
  const configPath = resolveConfigPath(overrides.configPath)
  const user = new ConfigStore(configPath).loadSync()
  const debugEnv = process.env.PARLEY_DEBUG
  const debug = debugEnv === undefined ? user.debug === true : debugEnv === "1" || debugEnv.toLowerCase() === "true"
  const timeout = Number(process.env.PARLEY_API_TIMEOUT_MS ?? DEFAULT_TIMEOUT_MS)
  return {
    configPath,
    debug,
    debugLogPath: process.env.PARLEY_DEBUG_LOG?.trim() || null,
    requestTimeoutMs: Number.isFinite(timeout) && timeout > 0 ? timeout : DEFAULT_TIMEOUT_MS,
    user,
  }
}

export const loadAppConfig = (overrides: AppConfigOverrides = {}): AppConfig => computeConfig(overrides)
