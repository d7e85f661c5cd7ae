import { EventEmitter } from "node:events"
import { describeError, ValidationError } from "../errors.js"
import type { ProviderRegistry } from "../providers/registry.js"
import { writeClipboardText, type ClipboardWriter } from "../util/clipboard.js"
import { debugLog } from "../util/debugLog.js"
import type { SessionCommand, SessionEvent } from "./events.js"
import { reduceSession } from "./reducer.js"
import type { SettingChange } from "./selector.js"
import { createSessionState, type SessionState } from "./state.js"
import { StreamBridge } from "./streamBridge.js"

export const CURSOR_BLINK_MS = 530

export type SessionBackend = Pick<
  ProviderRegistry,
  | "active"
  | "snapshot"
  | "providerSummaries"
  | "setActiveProvider"
  | "setModel"
  | "setTemperature"
  | "setApiKey"
  | "streamChat"
>

export interface ChatSessionControllerOptions {
  readonly registry: SessionBackend
  readonly width: number
  readonly height: number
  readonly clipboard?: ClipboardWriter
  readonly initialPrompt?: string
  /** `0` disables the blink timer. */
  readonly blinkIntervalMs?: number
}

type StateListener = (state: SessionState) => void

/**
 * Hosts the session reducer: dispatches events, runs the commands it returns
 * and feeds their outcomes back in as events.
 */
export class ChatSessionController extends EventEmitter {
  private readonly registry: SessionBackend
  private readonly clipboard: ClipboardWriter
  private readonly options: ChatSessionControllerOptions
  private state: SessionState
  private readonly streams = new Map<number, StreamBridge>()
  private readonly tasks = new Set<Promise<void>>()
  private emitScheduled = false
  private blinkTimer: NodeJS.Timeout | null = null
  private started = false
  private stopped = false
  private resolveStopped: () => void = () => undefined
  private readonly stoppedPromise: Promise<void>

  constructor(options: ChatSessionControllerOptions) {
    super()
    this.options = options
    this.registry = options.registry
    this.clipboard = options.clipboard ?? writeClipboardText
    this.state = createSessionState({
      provider: options.registry.snapshot(),
      providers: options.registry.providerSummaries(),
      width: options.width,
      height: options.height,
    })
    this.stoppedPromise = new Promise((resolve) => {
      this.resolveStopped = resolve
    })
  }

  getState(): SessionState {
    return this.state
  }

  onChange(listener: StateListener): () => void {
    this.on("change", listener)
    listener(this.getState())
    return () => this.off("change", listener)
  }

  start(): void {
    if (this.started || this.stopped) return
    this.started = true
    const interval = this.options.blinkIntervalMs ?? CURSOR_BLINK_MS
    if (interval > 0) {
      this.blinkTimer = setInterval(() => this.dispatch({ type: "blink" }), interval)
    }
    const prompt = this.options.initialPrompt?.trim()
    if (prompt) this.dispatch({ type: "submit_prompt", text: prompt })
  }

  async stop(): Promise<void> {
    if (this.stopped) return this.stoppedPromise
    this.stopped = true
    if (this.blinkTimer) {
      clearInterval(this.blinkTimer)
      this.blinkTimer = null
    }
    for (const bridge of this.streams.values()) bridge.cancel()
    this.streams.clear()
    await Promise.allSettled([...this.tasks])
    this.emit("change", this.getState())
    this.resolveStopped()
    return this.stoppedPromise
  }

  untilStopped(): Promise<void> {
    return this.stoppedPromise
  }

  /** Resolves once every in-flight command has settled. */
  async idle(): Promise<void> {
    while (this.tasks.size > 0) {
      await Promise.allSettled([...this.tasks])
    }
  }

  dispatch(event: SessionEvent): void {
    if (this.stopped) return
    const previous = this.state
    const { state, commands } = reduceSession(previous, event)
    this.state = state
    if (state !== previous) this.emitChange()
    for (const command of commands) this.execute(command)
  }

  private execute(command: SessionCommand): void {
    switch (command.type) {
      case "start_stream": {
        const bridge = new StreamBridge((signal) => this.registry.streamChat(command.messages, { signal }))
        for (const [turn, stale] of this.streams) {
          stale.cancel()
          this.streams.delete(turn)
        }
        this.streams.set(command.turn, bridge)
        debugLog("session", { event: "stream_start", turn: command.turn, messages: command.messages.length })
        return
      }
      case "receive_next":
        this.receive(command.turn)
        return
      case "cancel_stream":
        this.streams.get(command.turn)?.cancel()
        this.streams.delete(command.turn)
        debugLog("session", { event: "stream_cancel", turn: command.turn })
        return
      case "apply_setting":
        this.track(this.applySetting(command.change))
        return
      case "save_api_key":
        this.track(this.saveApiKey(command.apiKey))
        return
      case "copy_selection":
        this.track(
          this.clipboard(command.text).catch((error: unknown) => {
            debugLog("clipboard", { event: "write_failed", error: describeError(error) })
          }),
        )
        return
      case "quit":
        this.track(this.stop())
        return
    }
  }

  private receive(turn: number): void {
    const bridge = this.streams.get(turn)
    if (!bridge) return
    this.track(
      bridge.receive().then((outcome) => {
        switch (outcome.kind) {
          case "chunk":
            this.dispatch({ type: "stream_chunk", turn, content: outcome.content })
            return
          case "done":
            this.streams.delete(turn)
            this.dispatch({ type: "stream_done", turn })
            return
          case "error":
            this.streams.delete(turn)
            debugLog("session", { event: "stream_error", turn, error: describeError(outcome.error) })
            this.dispatch({
              type: "stream_error",
              turn,
              message: describeError(outcome.error),
              notReady: outcome.notReady,
            })
            return
        }
      }),
    )
  }

  private async applySetting(change: SettingChange): Promise<void> {
    try {
      switch (change.kind) {
        case "provider":
          await this.registry.setActiveProvider(change.value)
          break
        case "model":
          await this.registry.setModel(change.value)
          break
        case "temperature":
          await this.registry.setTemperature(change.value)
          break
      }
      this.dispatchProviderUpdate()
    } catch (error) {
      debugLog("session", { event: "setting_failed", kind: change.kind, error: describeError(error) })
      this.dispatchProviderUpdate()
      this.dispatch({
        type: "setting_failed",
        message: `Failed to update ${change.kind}: ${describeError(error)}`,
        validation: error instanceof ValidationError,
      })
    }
  }

  private async saveApiKey(apiKey: string): Promise<void> {
    const providerName = this.registry.active().name
    try {
      await this.registry.setApiKey(apiKey)
      this.dispatch({
        type: "api_key_saved",
        providerName,
        provider: this.registry.snapshot(),
        providers: this.registry.providerSummaries(),
      })
    } catch (error) {
      this.dispatch({ type: "api_key_failed", message: describeError(error) })
    }
  }

  private dispatchProviderUpdate(): void {
    this.dispatch({
      type: "provider_updated",
      provider: this.registry.snapshot(),
      providers: this.registry.providerSummaries(),
    })
  }

  private track(task: Promise<void>): void {
    const tracked = task
      .catch((error: unknown) => {
        debugLog("session", { event: "task_failed", error: describeError(error) })
      })
      .finally(() => {
        this.tasks.delete(tracked)
      })
    this.tasks.add(tracked)
  }

  private emitChange(): void {
    if (this.emitScheduled) return
    this.emitScheduled = true
    queueMicrotask(() => {
      this.emitScheduled = false
      this.emit("change", this.getState())
    })
  }
}
