import { describeError } from "../errors.js"
import { debugLog } from "../util/debugLog.js"

export const ALT_SCREEN_ENTER = "\u001b[?1049h"
export const ALT_SCREEN_EXIT = "\u001b[?1049l"
export const CLEAR_SCREEN = "\u001b[H\u001b[2J"
// Button-event tracking (1002) reported in SGR form (1006).
export const MOUSE_TRACKING_ENABLE = "\u001b[?1002h\u001b[?1006h"
export const MOUSE_TRACKING_DISABLE = "\u001b[?1006l\u001b[?1002l"

export type TerminalWriter = (chunk: string) => void

export interface TerminalModes {
  readonly enabled: boolean
  isActive(): boolean
  enable(): void
  disable(): void
}

const SIGNALS: Array<NodeJS.Signals> = ["SIGINT", "SIGTERM", "SIGQUIT"]

let activeRefs = 0
let cleanupRegistered = false
let restoreActive: (() => void) | null = null

const handleProcessExit = () => {
  restoreActive?.()
}

const handleSignal = (signal: NodeJS.Signals) => {
  restoreActive?.()
  unregisterCleanupHandlers()
  process.kill(process.pid, signal)
}

const registerCleanupHandlers = () => {
  if (cleanupRegistered) return
  cleanupRegistered = true
  process.on("exit", handleProcessExit)
  for (const signal of SIGNALS) {
    process.on(signal, handleSignal)
  }
}

const unregisterCleanupHandlers = () => {
  if (!cleanupRegistered) return
  cleanupRegistered = false
  process.removeListener("exit", handleProcessExit)
  for (const signal of SIGNALS) {
    process.removeListener(signal, handleSignal)
  }
}

/**
 * Alternate screen plus mouse reporting for the interactive session. Nested
 * sessions share one activation; the last `disable` restores the terminal.
 */
export const createTerminalModes = (writer: TerminalWriter, enabled: boolean): TerminalModes => {
  let active = false
  const write = (chunk: string): void => {
    try {
      writer(chunk)
    } catch (error) {
      debugLog("terminal", { event: "write_failed", error: describeError(error) })
    }
  }
  const restore = () => write(`${MOUSE_TRACKING_DISABLE}${ALT_SCREEN_EXIT}`)
  return {
    enabled,
    isActive: () => active,
    enable: () => {
      if (!enabled || active) return
      active = true
      if (activeRefs === 0) {
        write(`${ALT_SCREEN_ENTER}${CLEAR_SCREEN}${MOUSE_TRACKING_ENABLE}`)
        restoreActive = restore
        registerCleanupHandlers()
      }
      activeRefs += 1
    },
    disable: () => {
      if (!active) return
      active = false
      activeRefs = Math.max(0, activeRefs - 1)
      if (activeRefs === 0) {
        restore()
        restoreActive = null
        unregisterCleanupHandlers()
      }
    },
  }
}
