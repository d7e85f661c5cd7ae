import { describe, expect, it } from "vitest"
import { toKeyInput, type InkKey } from "../keys.js"

const key = (flags: Partial<InkKey> = {}): InkKey => ({
  upArrow: false,
  downArrow: false,
  leftArrow: false,
  rightArrow: false,
  pageDown: false,
  pageUp: false,
  return: false,
  escape: false,
  ctrl: false,
  shift: false,
  tab: false,
  backspace: false,
  delete: false,
  meta: false,
  ...flags,
})

describe("toKeyInput", () => {
  it("maps enter with and without alt", () => {
    expect(toKeyInput("\r", key({ return: true }))).toEqual({ kind: "named", name: "enter", alt: false })
    expect(toKeyInput("\r", key({ return: true, meta: true }))).toEqual({ kind: "named", name: "enter", alt: true })
  })

  it("maps navigation keys", () => {
    expect(toKeyInput("", key({ upArrow: true }))).toEqual({ kind: "named", name: "up" })
    expect(toKeyInput("", key({ pageDown: true }))).toEqual({ kind: "named", name: "pageDown" })
    expect(toKeyInput("", key({ escape: true }))).toEqual({ kind: "named", name: "escape" })
  })

  it("recognises home and end from raw sequences or flags", () => {
    expect(toKeyInput("[H", key())).toEqual({ kind: "named", name: "home" })
    expect(toKeyInput("[4~", key())).toEqual({ kind: "named", name: "end" })
    expect(toKeyInput("", key({ end: true }))).toEqual({ kind: "named", name: "end" })
  })

  it("treats an empty delete as backspace", () => {
    expect(toKeyInput("", key({ delete: true }))).toEqual({ kind: "named", name: "backspace" })
    expect(toKeyInput("[3~", key({ delete: true }))).toEqual({ kind: "named", name: "delete" })
  })

  it("maps ctrl letters and drops other ctrl input", () => {
    expect(toKeyInput("P", key({ ctrl: true }))).toEqual({ kind: "ctrl", letter: "p" })
    expect(toKeyInput("]", key({ ctrl: true }))).toBeNull()
    expect(toKeyInput("x", key({ meta: true }))).toBeNull()
  })

  it("normalises pasted text", () => {
    expect(toKeyInput("one\r\ntwo\u0007", key())).toEqual({ kind: "text", text: "one\ntwo" })
    expect(toKeyInput("\u0001", key())).toBeNull()
  })
})
