import { describe, expect, it } from "vitest"
import { clampRange, extractSelectedText, hasExtent, selectionSpan, visualColumnToIndex } from "../selection.js"

const lines = (...contents: string[]) => contents.map((content) => ({ content }))

describe("extractSelectedText", () => {
  it("takes a substring on one line", () => {
    expect(extractSelectedText(lines("hello world"), { line: 0, col: 6 }, { line: 0, col: 11 })).toBe("world")
  })

  it("returns as many characters as cells selected on ASCII lines", () => {
    const source = lines("The quick brown fox")
    for (const [start, end] of [
      [0, 3],
      [4, 9],
      [2, 19],
    ]) {
      expect(extractSelectedText(source, { line: 0, col: start }, { line: 0, col: end })).toHaveLength(end - start)
    }
  })

  it("normalizes an inverted selection", () => {
    expect(extractSelectedText(lines("hello"), { line: 0, col: 4 }, { line: 0, col: 1 })).toBe("ell")
  })

  it("yields nothing for a zero-width selection or no lines", () => {
    expect(extractSelectedText(lines("hello"), { line: 0, col: 2 }, { line: 0, col: 2 })).toBe("")
    expect(extractSelectedText([], { line: 0, col: 0 }, { line: 0, col: 3 })).toBe("")
  })

  it("joins first, middle and last lines", () => {
    const source = lines("first line", "middle", "last line")
    expect(extractSelectedText(source, { line: 0, col: 6 }, { line: 2, col: 4 })).toBe("line\nmiddle\nlast")
  })

  it("clamps points outside the lines", () => {
    expect(extractSelectedText(lines("hello"), { line: -1, col: 5 }, { line: 0, col: 3 })).toBe("hel")
    expect(extractSelectedText(lines("hello", "world"), { line: 0, col: 2 }, { line: 5, col: 0 })).toBe("llo\nworld")
  })

  it("maps display columns across wide glyphs", () => {
    expect(extractSelectedText(lines("你好ab"), { line: 0, col: 2 }, { line: 0, col: 4 })).toBe("好")
    expect(extractSelectedText(lines("你好ab"), { line: 0, col: 4 }, { line: 0, col: 6 })).toBe("ab")
  })
})

describe("selection helpers", () => {
  it("maps columns to code point indices", () => {
    expect(visualColumnToIndex(Array.from("你好ab"), 3)).toBe(2)
    expect(visualColumnToIndex(Array.from("ab"), 10)).toBe(2)
  })

  it("computes the highlighted span per line", () => {
    const range = clampRange({ line: 0, col: 2 }, { line: 2, col: 3 }, 3)
    expect(range).not.toBeNull()
    if (!range) return
    expect(selectionSpan("abcdef", 0, range)).toEqual({ start: 2, end: 6 })
    expect(selectionSpan("abcdef", 1, range)).toEqual({ start: 0, end: 6 })
    expect(selectionSpan("abcdef", 2, range)).toEqual({ start: 0, end: 3 })
    expect(selectionSpan("abcdef", 3, range)).toBeNull()
  })

  it("reports whether a selection has extent", () => {
    expect(hasExtent({ anchor: { line: 1, col: 1 }, head: { line: 1, col: 1 }, dragging: true })).toBe(false)
    expect(hasExtent({ anchor: { line: 1, col: 1 }, head: { line: 1, col: 2 }, dragging: true })).toBe(true)
  })
})
