export type ChatRole = "system" | "user" | "assistant"

export interface ChatMessage {
  readonly role: ChatRole
  readonly content: string
}

export interface TemperaturePreset {
  readonly name: string
  readonly value: number
  readonly description: string
}

export interface StreamChunk {
  readonly content: string
}

export interface ProviderDefinition {
  readonly name: string
  readonly url: string
  readonly models: ReadonlyArray<string>
  readonly defaultModel: string
  readonly defaultTemperature: number
  readonly temperatureRange: { readonly min: number; readonly max: number }
  readonly temperaturePresets: ReadonlyArray<TemperaturePreset>
  /** Models that reject a `temperature` field. */
  readonly fixedTemperatureModels: ReadonlyArray<string>
  readonly apiKeyEnv: string
}

export interface ProviderSettings {
  readonly apiKey: string
  readonly model: string
  readonly temperature: number
  readonly baseUrl: string | null
}

export interface ChatRequestOptions {
  readonly signal?: AbortSignal
}

/** Capability set the session depends on; concrete providers differ only in their definition. */
export interface ChatProvider {
  readonly name: string
  readonly definition: ProviderDefinition
  settings(): ProviderSettings
  isReady(): boolean
  maskedApiKey(): string
  setApiKey(apiKey: string): void
  setModel(model: string): void
  setTemperature(temperature: number): void
  /** Replaces the settings wholesale; used to roll back a change that failed to persist. */
  restore(settings: ProviderSettings): void
  streamChat(messages: ReadonlyArray<ChatMessage>, options?: ChatRequestOptions): AsyncGenerator<StreamChunk, void, void>
  sendChat(messages: ReadonlyArray<ChatMessage>, options?: ChatRequestOptions): Promise<string>
}

export interface ProviderSnapshot {
  readonly name: string
  readonly currentModel: string
  readonly currentTemperature: number
  readonly availableModels: ReadonlyArray<string>
  readonly temperaturePresets: ReadonlyArray<TemperaturePreset>
  readonly isReady: boolean
}

export interface ProviderSummary {
  readonly name: string
  readonly isReady: boolean
  readonly models: ReadonlyArray<string>
  readonly currentModel: string
  readonly maskedApiKey: string
}
