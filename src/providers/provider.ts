import { postChatCompletion, requestChatCompletion, type ChatEndpoint } from "../api/client.js"
import { readCompletionStream } from "../api/stream.js"
import { ProviderNotReadyError, ValidationError } from "../errors.js"
import { debugLog } from "../util/debugLog.js"
import type {
  ChatMessage,
  ChatProvider,
  ChatRequestOptions,
  ProviderDefinition,
  ProviderSettings,
  StreamChunk,
} from "./types.js"

export interface ProviderTransportOptions {
  readonly requestTimeoutMs?: number
}

export const maskApiKey = (apiKey: string): string => {
  if (!apiKey) return ""
  if (apiKey.length <= 8) return "****"
  return `${apiKey.slice(0, 4)}****${apiKey.slice(-4)}`
}

export const validateModel = (definition: ProviderDefinition, model: string): string => {
  if (!definition.models.includes(model)) {
    throw new ValidationError(`invalid model: ${model}. Available models: ${definition.models.join(", ")}`)
  }
  return model
}

export const validateTemperature = (definition: ProviderDefinition, temperature: number): number => {
  const { min, max } = definition.temperatureRange
  if (!Number.isFinite(temperature) || temperature < min || temperature > max) {
    throw new ValidationError(
      `${definition.name} temperature must be between ${min.toFixed(1)} and ${max.toFixed(1)}`,
    )
  }
  return temperature
}

/** Loaded values that fail validation fall back to the definition defaults. */
export const resolveInitialSettings = (
  definition: ProviderDefinition,
  stored: Partial<ProviderSettings>,
): ProviderSettings => {
  const model = stored.model && definition.models.includes(stored.model) ? stored.model : definition.defaultModel
  const { min, max } = definition.temperatureRange
  const temperature =
    typeof stored.temperature === "number" && stored.temperature >= min && stored.temperature <= max
      ? stored.temperature
      : definition.defaultTemperature
  return {
    apiKey: stored.apiKey ?? "",
    model,
    temperature,
    baseUrl: stored.baseUrl ?? null,
  }
}

export const buildChatRequestBody = (
  definition: ProviderDefinition,
  settings: ProviderSettings,
  messages: ReadonlyArray<ChatMessage>,
  stream: boolean,
): Record<string, unknown> => ({
  model: settings.model,
  messages: messages.map((message) => ({ role: message.role, content: message.content })),
  ...(definition.fixedTemperatureModels.includes(settings.model) ? {} : { temperature: settings.temperature }),
  ...(stream ? { stream: true } : {}),
})

const endpointFor = (
  definition: ProviderDefinition,
  settings: ProviderSettings,
  transport: ProviderTransportOptions,
): ChatEndpoint => {
  if (!settings.apiKey) throw new ProviderNotReadyError(definition.name)
  return {
    url: settings.baseUrl ?? definition.url,
    apiKey: settings.apiKey,
    requestTimeoutMs: transport.requestTimeoutMs,
  }
}

export const createChatProvider = (
  definition: ProviderDefinition,
  initial: ProviderSettings,
  transport: ProviderTransportOptions = {},
): ChatProvider => {
  let settings = initial
  return {
    name: definition.name,
    definition,
    settings: () => settings,
    isReady: () => settings.apiKey.length > 0,
    maskedApiKey: () => maskApiKey(settings.apiKey),
    setApiKey(apiKey: string) {
      const trimmed = apiKey.trim()
      if (!trimmed) throw new ValidationError("API key must not be empty")
      settings = { ...settings, apiKey: trimmed }
    },
    setModel(model: string) {
      settings = { ...settings, model: validateModel(definition, model) }
      debugLog("provider", { provider: definition.name, model })
    },
    setTemperature(temperature: number) {
      settings = { ...settings, temperature: validateTemperature(definition, temperature) }
      debugLog("provider", { provider: definition.name, temperature })
    },
    restore(previous: ProviderSettings) {
      settings = previous
    },
    async *streamChat(
      messages: ReadonlyArray<ChatMessage>,
      options: ChatRequestOptions = {},
    ): AsyncGenerator<StreamChunk, void, void> {
      const current = settings
      const endpoint = endpointFor(definition, current, transport)
      debugLog("provider", { provider: definition.name, model: current.model, messages: messages.length, stream: true })
      const body = buildChatRequestBody(definition, current, messages, true)
      const response = await postChatCompletion(endpoint, body, { signal: options.signal, stream: true })
      yield* readCompletionStream(response, options.signal)
    },
    async sendChat(messages: ReadonlyArray<ChatMessage>, options: ChatRequestOptions = {}): Promise<string> {
      const current = settings
      const endpoint = endpointFor(definition, current, transport)
      debugLog("provider", { provider: definition.name, model: current.model, messages: messages.length, stream: false })
      const body = buildChatRequestBody(definition, current, messages, false)
      return requestChatCompletion(endpoint, body, { signal: options.signal })
    },
  }
}
