import { describe, expect, it } from "vitest"
import { charWidth, stringWidth, visibleWidth } from "../displayWidth.js"

describe("display width", () => {
  it("counts ASCII as one cell", () => {
    expect(stringWidth("hello")).toBe(5)
  })

  it("counts CJK and emoji as two cells", () => {
    expect(stringWidth("你好")).toBe(4)
    expect(charWidth("👍")).toBe(2)
  })

  it("gives combining marks and controls no width", () => {
    expect(stringWidth("e\u0301")).toBe(1)
    expect(charWidth("\u0007")).toBe(0)
  })

  it("ignores ANSI styling in visible width", () => {
    expect(visibleWidth("\u001b[31mred\u001b[0m")).toBe(3)
  })
})
