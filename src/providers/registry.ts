import type { UserConfigFile } from "../config/userConfig.js"
import { ValidationError } from "../errors.js"
import { debugLog } from "../util/debugLog.js"
import { BUILTIN_PROVIDERS, DEFAULT_PROVIDER } from "./definitions.js"
import { createChatProvider, resolveInitialSettings } from "./provider.js"
import type {
  ChatMessage,
  ChatProvider,
  ChatRequestOptions,
  ProviderDefinition,
  ProviderSnapshot,
  ProviderSummary,
  StreamChunk,
} from "./types.js"

/** Where the registry persists changes; `ConfigStore` implements it. */
export interface SettingsStore {
  setValue(key: string, value: unknown): Promise<void>
}

export interface RegistryFromConfigOptions {
  readonly user: UserConfigFile
  readonly store: SettingsStore
  readonly requestTimeoutMs?: number
  readonly env?: NodeJS.ProcessEnv
  readonly definitions?: ReadonlyArray<ProviderDefinition>
}

export class ProviderRegistry {
  private readonly providers = new Map<string, ChatProvider>()
  private readonly store: SettingsStore
  private activeName: string

  constructor(providers: ReadonlyArray<ChatProvider>, store: SettingsStore, activeName?: string) {
    if (providers.length === 0) {
      throw new ValidationError("at least one provider must be registered")
    }
    for (const provider of providers) {
      this.providers.set(provider.name, provider)
    }
    this.store = store
    const fallback = this.providers.has(DEFAULT_PROVIDER) ? DEFAULT_PROVIDER : providers[0].name
    this.activeName = activeName && this.providers.has(activeName) ? activeName : fallback
  }

  static fromConfig(options: RegistryFromConfigOptions): ProviderRegistry {
    const env = options.env ?? process.env
    const definitions = options.definitions ?? BUILTIN_PROVIDERS
    const providers = definitions.map((definition) => {
      const entry = options.user.providers[definition.name] ?? {}
      const envKey = env[definition.apiKeyEnv]?.trim()
      const settings = resolveInitialSettings(definition, {
        ...entry,
        apiKey: entry.apiKey || envKey || "",
      })
      return createChatProvider(definition, settings, { requestTimeoutMs: options.requestTimeoutMs })
    })
    return new ProviderRegistry(providers, options.store, options.user.provider)
  }

  list(): ReadonlyArray<ChatProvider> {
    return Array.from(this.providers.values())
  }

  get(name: string): ChatProvider | undefined {
    return this.providers.get(name)
  }

  active(): ChatProvider {
    const provider = this.providers.get(this.activeName)
    if (!provider) throw new ValidationError(`provider ${this.activeName} not found`)
    return provider
  }

  snapshot(): ProviderSnapshot {
    const provider = this.active()
    const settings = provider.settings()
    return {
      name: provider.name,
      currentModel: settings.model,
      currentTemperature: settings.temperature,
      availableModels: provider.definition.models,
      temperaturePresets: provider.definition.temperaturePresets,
      isReady: provider.isReady(),
    }
  }

  providerSummaries(): ReadonlyArray<ProviderSummary> {
    return this.list().map((provider) => ({
      name: provider.name,
      isReady: provider.isReady(),
      models: provider.definition.models,
      currentModel: provider.settings().model,
      maskedApiKey: provider.maskedApiKey(),
    }))
  }

  readyProviders(): ReadonlyArray<ChatProvider> {
    return this.list().filter((provider) => provider.isReady())
  }

  async setActiveProvider(name: string): Promise<void> {
    if (!this.providers.has(name)) throw new ValidationError(`provider ${name} not found`)
    const previous = this.activeName
    this.activeName = name
    await this.persist("provider", name, () => {
      this.activeName = previous
    })
  }

  async setModel(model: string): Promise<void> {
    const provider = this.active()
    const previous = provider.settings()
    provider.setModel(model)
    await this.persist(`providers.${provider.name}.model`, model, () => provider.restore(previous))
  }

  async setTemperature(temperature: number): Promise<void> {
    const provider = this.active()
    const previous = provider.settings()
    provider.setTemperature(temperature)
    await this.persist(`providers.${provider.name}.temperature`, temperature, () => provider.restore(previous))
  }

  async setApiKey(apiKey: string, providerName?: string): Promise<void> {
    const provider = providerName ? this.get(providerName) : this.active()
    if (!provider) throw new ValidationError(`provider ${providerName ?? ""} not found`)
    const previous = provider.settings()
    provider.setApiKey(apiKey)
    await this.persist(`providers.${provider.name}.api_key`, apiKey.trim(), () => provider.restore(previous))
  }

  streamChat(messages: ReadonlyArray<ChatMessage>, options?: ChatRequestOptions): AsyncGenerator<StreamChunk, void, void> {
    return this.active().streamChat(messages, options)
  }

  sendChat(messages: ReadonlyArray<ChatMessage>, options?: ChatRequestOptions): Promise<string> {
    return this.active().sendChat(messages, options)
  }

  private async persist(key: string, value: unknown, rollback: () => void): Promise<void> {
    try {
      await this.store.setValue(key, value)
      debugLog("registry", { persisted: key })
    } catch (error) {
      rollback()
      throw error
    }
  }
}
