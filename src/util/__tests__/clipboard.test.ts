import { afterEach, beforeEach, describe, expect, it, vi } from "vitest"
import { fakeClipboardWrites, resetFakeClipboard, writeClipboardText } from "../clipboard.js"

describe("writeClipboardText", () => {
  beforeEach(() => {
    vi.stubEnv("PARLEY_FAKE_CLIPBOARD", "1")
    resetFakeClipboard()
  })

  afterEach(() => {
    vi.unstubAllEnvs()
  })

  it("records copies while the fake clipboard is on", async () => {
    await writeClipboardText("first")
    await writeClipboardText("")
    await writeClipboardText("second")
    expect(fakeClipboardWrites()).toEqual(["first", "second"])
  })

  it("starts empty after a reset", async () => {
    await writeClipboardText("gone")
    resetFakeClipboard()
    expect(fakeClipboardWrites()).toEqual([])
  })
})
