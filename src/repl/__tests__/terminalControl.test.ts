import { describe, expect, it } from "vitest"
import {
  ALT_SCREEN_ENTER,
  ALT_SCREEN_EXIT,
  CLEAR_SCREEN,
  createTerminalModes,
  MOUSE_TRACKING_DISABLE,
  MOUSE_TRACKING_ENABLE,
} from "../terminalControl.js"

describe("createTerminalModes", () => {
  it("enters and restores the terminal once across nested sessions", () => {
    const writes: string[] = []
    const outer = createTerminalModes((chunk) => writes.push(chunk), true)
    const inner = createTerminalModes((chunk) => writes.push(chunk), true)
    outer.enable()
    inner.enable()
    inner.disable()
    expect(writes).toEqual([`${ALT_SCREEN_ENTER}${CLEAR_SCREEN}${MOUSE_TRACKING_ENABLE}`])
    outer.disable()
    expect(writes).toEqual([
      `${ALT_SCREEN_ENTER}${CLEAR_SCREEN}${MOUSE_TRACKING_ENABLE}`,
      `${MOUSE_TRACKING_DISABLE}${ALT_SCREEN_EXIT}`,
    ])
    expect(outer.isActive()).toBe(false)
  })

  it("writes nothing when disabled", () => {
    const writes: string[] = []
    const modes = createTerminalModes((chunk) => writes.push(chunk), false)
    modes.enable()
    modes.disable()
    expect(modes.isActive()).toBe(false)
    expect(writes).toEqual([])
  })

  it("survives a failing writer", () => {
    const modes = createTerminalModes(() => {
      throw new Error("EPIPE")
    }, true)
    expect(() => modes.enable()).not.toThrow()
    expect(modes.isActive()).toBe(true)
    modes.disable()
  })
})
