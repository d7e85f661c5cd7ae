import { deepseekDefinition, grokDefinition } from "../../providers/definitions.js"
import type { ProviderSnapshot, ProviderSummary } from "../../providers/types.js"
import type { MouseInput, NamedKey, SessionCommand, SessionEvent } from "../events.js"
import type { Message } from "../messages.js"
import { reduceSession } from "../reducer.js"
import { createSessionState, type SessionState } from "../state.js"

export const deepseekSnapshot = (overrides: Partial<ProviderSnapshot> = {}): ProviderSnapshot => ({
  name: "deepseek",
  currentModel: "deepseek-chat",
  currentTemperature: 1.0,
  availableModels: deepseekDefinition.models,
  temperaturePresets: deepseekDefinition.temperaturePresets,
  isReady: true,
  ...overrides,
})

export const grokSnapshot = (): ProviderSnapshot => ({
  name: "grok",
  currentModel: "grok-2-1212",
  currentTemperature: 1.0,
  availableModels: grokDefinition.models,
  temperaturePresets: grokDefinition.temperaturePresets,
  isReady: false,
})

export const summaries = (deepseekReady = true): ProviderSummary[] => [
  { name: "openai", isReady: false, models: ["gpt-4o"], currentModel: "gpt-4o", maskedApiKey: "" },
  {
    name: "deepseek",
    isReady: deepseekReady,
    models: deepseekDefinition.models,
    currentModel: "deepseek-chat",
    maskedApiKey: deepseekReady ? "test****cret" : "",
  },
  { name: "grok", isReady: false, models: grokDefinition.models, currentModel: "grok-2-1212", maskedApiKey: "" },
]

export interface MakeStateOptions {
  readonly width?: number
  readonly height?: number
  readonly ready?: boolean
  readonly messages?: ReadonlyArray<Message>
}

export const makeState = (options: MakeStateOptions = {}): SessionState =>
  createSessionState({
    provider: deepseekSnapshot({ isReady: options.ready ?? true }),
    providers: summaries(options.ready ?? true),
    width: options.width ?? 40,
    height: options.height ?? 12,
    messages: options.messages,
  })

export const text = (value: string): SessionEvent => ({ type: "key", key: { kind: "text", text: value } })
export const named = (name: NamedKey, alt = false): SessionEvent => ({
  type: "key",
  key: alt ? { kind: "named", name, alt } : { kind: "named", name },
})
export const ctrl = (letter: string): SessionEvent => ({ type: "key", key: { kind: "ctrl", letter } })
export const mouse = (input: MouseInput): SessionEvent => ({ type: "mouse", mouse: input })

export interface RunResult {
  readonly state: SessionState
  readonly commands: SessionCommand[]
}

export const run = (initial: SessionState, events: ReadonlyArray<SessionEvent>): RunResult => {
  let state = initial
  const commands: SessionCommand[] = []
  for (const event of events) {
    const result = reduceSession(state, event)
    state = result.state
    commands.push(...result.commands)
  }
  return { state, commands }
}
