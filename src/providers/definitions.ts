import type { ProviderDefinition } from "./types.js"

export const openAiDefinition: ProviderDefinition = {
  name: "openai",
  url: "https://api.openai.com/v1/chat/completions",
  models: ["o1", "o3-mini", "gpt-4.5", "gpt-4o", "gpt-4o-mini"],
  defaultModel: "gpt-4o",
  defaultTemperature: 1.0,
  temperatureRange: { min: 0, max: 1 },
  temperaturePresets: [
    { name: "Code Generation", value: 0.0, description: "Code generation or math problem solving" },
    { name: "Data Extraction", value: 0.3, description: "Data extraction and analysis" },
    { name: "General Conversation", value: 0.7, description: "General conversation" },
    { name: "Translation", value: 0.5, description: "Translation tasks" },
    { name: "Creative Writing", value: 1.0, description: "Creative writing or poetry" },
  ],
  fixedTemperatureModels: ["o1", "o3-mini"],
  apiKeyEnv: "OPENAI_API_KEY",
}

export const deepseekDefinition: ProviderDefinition = {
  name: "deepseek",
  url: "https://api.deepseek.com/v1/chat/completions",
  models: ["deepseek-chat", "deepseek-reasoner"],
  defaultModel: "deepseek-chat",
  defaultTemperature: 1.0,
  temperatureRange: { min: 0, max: 2 },
  temperaturePresets: [
    { name: "Code Generation", value: 0.0, description: "Code generation or math problem solving" },
    { name: "Data Extraction", value: 1.0, description: "Data extraction and analysis" },
    { name: "General Conversation", value: 1.3, description: "General conversation" },
    { name: "Translation", value: 1.3, description: "Translation tasks" },
    { name: "Creative Writing", value: 1.5, description: "Creative writing or poetry" },
  ],
  fixedTemperatureModels: [],
  apiKeyEnv: "DEEPSEEK_API_KEY",
}

export const grokDefinition: ProviderDefinition = {
  name: "grok",
  url: "https://api.x.ai/v1/chat/completions",
  models: ["grok-2-1212"],
  defaultModel: "grok-2-1212",
  defaultTemperature: 1.0,
  temperatureRange: { min: 0, max: 2 },
  temperaturePresets: [
    { name: "Focused", value: 0.2, description: "More focused and deterministic responses for specific tasks" },
    { name: "Balanced Low", value: 0.5, description: "Good balance with slight focus on determinism" },
    { name: "Balanced", value: 1.0, description: "Default balance between randomness and determinism" },
    { name: "Creative", value: 1.5, description: "More random and creative responses" },
    { name: "Highly Creative", value: 2.0, description: "Maximum randomness for highly varied outputs" },
  ],
  fixedTemperatureModels: [],
  apiKeyEnv: "XAI_API_KEY",
}

export const BUILTIN_PROVIDERS: ReadonlyArray<ProviderDefinition> = [openAiDefinition, deepseekDefinition, grokDefinition]

export const DEFAULT_PROVIDER = "deepseek"
