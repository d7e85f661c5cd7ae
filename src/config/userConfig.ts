import { homedir } from "node:os"
import path from "node:path"
import fs from "node:fs"
import { promises as fsp } from "node:fs"
import { ConfigError, describeError } from "../errors.js"
import { debugLog } from "../util/debugLog.js"
import { isRecord } from "../util/guards.js"
import { APP_VERSION } from "../version.js"

export interface ProviderConfigEntry {
  readonly apiKey?: string
  readonly model?: string
  readonly temperature?: number
  readonly baseUrl?: string
}

export interface UserConfigFile {
  readonly version?: string
  readonly provider?: string
  readonly debug?: boolean
  readonly providers: Readonly<Record<string, ProviderConfigEntry>>
}

export type ConfigValue = string | number | boolean

export const resolveConfigPath = (explicit?: string | null): string => {
  const fromArgs = explicit?.trim()
  if (fromArgs) return path.resolve(fromArgs)
  const fromEnv = process.env.PARLEY_CONFIG?.trim()
  if (fromEnv) return path.resolve(fromEnv)
  return path.join(homedir(), ".config", "parley", "config.json")
}

const parseProviderEntry = (value: unknown): ProviderConfigEntry | null => {
  if (!isRecord(value)) return null
  return {
    ...(typeof value.api_key === "string" ? { apiKey: value.api_key } : {}),
    ...(typeof value.model === "string" ? { model: value.model } : {}),
    ...(typeof value.temperature === "number" && Number.isFinite(value.temperature)
      ? { temperature: value.temperature }
      : {}),
    ...(typeof value.base_url === "string" && value.base_url.trim() ? { baseUrl: value.base_url.trim() } : {}),
  }
}

export const parseUserConfig = (raw: Record<string, unknown>): UserConfigFile => {
  const providers: Record<string, ProviderConfigEntry> = {}
  if (isRecord(raw.providers)) {
    for (const [name, entry] of Object.entries(raw.providers)) {
      const parsed = parseProviderEntry(entry)
      if (parsed) providers[name] = parsed
    }
  }
  return {
    ...(typeof raw.version === "string" ? { version: raw.version } : {}),
    ...(typeof raw.provider === "string" && raw.provider.trim() ? { provider: raw.provider.trim() } : {}),
    ...(typeof raw.debug === "boolean" ? { debug: raw.debug } : {}),
    providers,
  }
}

/** `"true"`/`"false"` become booleans, numeric strings become numbers. */
export const parseConfigValue = (value: string): ConfigValue => {
  const lowered = value.trim().toLowerCase()
  if (lowered === "true") return true
  if (lowered === "false") return false
  if (/^-?\d+(\.\d+)?$/.test(value.trim())) return Number(value.trim())
  return value
}

const splitKey = (key: string): string[] => {
  const parts = key.split(".").map((part) => part.trim())
  if (parts.length === 0 || parts.some((part) => part.length === 0)) {
    throw new ConfigError(`Invalid config key '${key}'`, key)
  }
  return parts
}

export const getDottedValue = (raw: Record<string, unknown>, key: string): unknown => {
  let cursor: unknown = raw
  for (const part of splitKey(key)) {
    if (!isRecord(cursor)) return undefined
    cursor = cursor[part]
  }
  return cursor
}

export const setDottedValue = (
  raw: Record<string, unknown>,
  key: string,
  value: unknown,
): Record<string, unknown> => {
  const [head, ...rest] = splitKey(key)
  if (rest.length === 0) return { ...raw, [head]: value }
  const current = raw[head]
  const child = isRecord(current) ? current : {}
  return { ...raw, [head]: setDottedValue(child, rest.join("."), value) }
}

export class ConfigStore {
  readonly path: string
  private queue: Promise<void> = Promise.resolve()

  constructor(configPath: string) {
    this.path = configPath
  }

  /** Throws ConfigError when the file exists but is not a JSON object. */
  readRaw(): Record<string, unknown> {
    if (!fs.existsSync(this.path)) return {}
    let parsed: unknown
    try {
      parsed = JSON.parse(fs.readFileSync(this.path, "utf8"))
    } catch (error) {
      throw new ConfigError(`Could not parse ${this.path}: ${describeError(error)}`, this.path, { cause: error })
    }
    if (!isRecord(parsed)) {
      throw new ConfigError(`Config file ${this.path} must contain a JSON object`, this.path)
    }
    return parsed
  }

  loadSync(): UserConfigFile {
    try {
      return parseUserConfig(this.readRaw())
    } catch (error) {
      debugLog("config", { loadError: describeError(error), path: this.path })
      return { providers: {} }
    }
  }

  getValue(key: string): unknown {
    return getDottedValue(this.readRaw(), key)
  }

  /** Writes are serialized; each caller sees its own failure through the returned promise. */
  update(mutate: (raw: Record<string, unknown>) => Record<string, unknown>): Promise<void> {
    const task = this.queue.then(async () => {
      const next = mutate(this.readRaw())
      const payload = typeof next.version === "string" ? next : { version: APP_VERSION, ...next }
      await fsp.mkdir(path.dirname(this.path), { recursive: true })
      await fsp.writeFile(this.path, `${JSON.stringify(payload, null, 2)}\n`, { encoding: "utf8", mode: 0o600 })
    })
    this.queue = task.then(
      () => undefined,
      () => undefined,
    )
    return task
  }

  setValue(key: string, value: unknown): Promise<void> {
    return this.update((raw) => setDottedValue(raw, key, value))
  }
}
