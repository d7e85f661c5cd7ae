import { describe, expect, it } from "vitest"
import { deleteBackward, deleteForward, emptyInput, insertText, moveCursor, splitAtCursor } from "../inputBuffer.js"

describe("input buffer", () => {
  it("inserts at the cursor", () => {
    const state = insertText(moveCursor(insertText(emptyInput, "helo"), -1), "l")
    expect(state).toEqual({ text: "hello", cursor: 4 })
  })

  it("edits whole graphemes", () => {
    const state = insertText(emptyInput, "a👍🏽b")
    expect(state.cursor).toBe(3)
    const removed = deleteBackward(moveCursor(state, -1))
    expect(removed).toEqual({ text: "ab", cursor: 1 })
    expect(deleteForward(removed)).toEqual({ text: "a", cursor: 1 })
  })

  it("keeps the cursor within the text", () => {
    const state = insertText(emptyInput, "ab")
    expect(moveCursor(state, 5).cursor).toBe(2)
    expect(moveCursor(state, -5).cursor).toBe(0)
    expect(deleteBackward(moveCursor(state, -5))).toEqual({ text: "ab", cursor: 0 })
  })

  it("splits around the cursor", () => {
    expect(splitAtCursor({ text: "abcd", cursor: 1 })).toEqual({ before: "a", after: "bcd" })
  })
})
