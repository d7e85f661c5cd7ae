import React from "react"
import { render } from "ink"
import fs from "node:fs"
import path from "node:path"
import { ReadStream } from "node:tty"
import type { ProviderRegistry } from "../../providers/registry.js"
import { ChatView } from "../../repl/components/ChatView.js"
import { createTerminalModes } from "../../repl/terminalControl.js"
import { ChatSessionController } from "../../session/controller.js"
import type { SessionEvent } from "../../session/events.js"
import type { SessionState } from "../../session/state.js"
import { configureDebugLog, debugLog, isDebugEnabled } from "../../util/debugLog.js"

export interface ChatSessionOptions {
  readonly registry: ProviderRegistry
  readonly configPath: string
  readonly initialPrompt?: string
  /** Prompt text arrived on stdin, so keyboard input comes from the controlling terminal. */
  readonly stdinPiped: boolean
  readonly debugLogPath: string | null
}

const openTerminalInput = (): ReadStream => new ReadStream(fs.openSync("/dev/tty", "r"))

export const runChatSession = async (options: ChatSessionOptions): Promise<void> => {
  if (isDebugEnabled() && !options.debugLogPath) {
    configureDebugLog({ filePath: path.join(path.dirname(options.configPath), "debug.log") })
  }
  const terminalInput = options.stdinPiped ? openTerminalInput() : null
  const controller = new ChatSessionController({
    registry: options.registry,
    width: process.stdout.columns ?? 0,
    height: process.stdout.rows ?? 0,
    initialPrompt: options.initialPrompt,
  })
  const modes = createTerminalModes((chunk) => {
    process.stdout.write(chunk)
  }, Boolean(process.stdout.isTTY))

  const onEvent = (event: SessionEvent) => controller.dispatch(event)
  const view = (state: SessionState) => <ChatView state={state} onEvent={onEvent} />

  modes.enable()
  const ink = render(view(controller.getState()), {
    stdin: terminalInput ?? process.stdin,
    exitOnCtrlC: false,
  })
  const unsubscribe = controller.onChange((state) => ink.rerender(view(state)))

  const resizeHandler = () => {
    controller.dispatch({ type: "resize", width: process.stdout.columns ?? 0, height: process.stdout.rows ?? 0 })
  }
  if (process.stdout.isTTY) {
    process.stdout.on("resize", resizeHandler)
  }

  debugLog("session", { event: "start", provider: options.registry.active().name })
  controller.start()
  try {
    await controller.untilStopped()
  } finally {
    if (process.stdout.isTTY) {
      process.stdout.off("resize", resizeHandler)
    }
    unsubscribe()
    ink.unmount()
    modes.disable()
    terminalInput?.destroy()
    debugLog("session", { event: "stop" })
  }
}
