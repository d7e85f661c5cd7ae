import { describe, expect, it } from "vitest"
import {
  createScrollWindow,
  initialScrollState,
  maxScrollPosition,
  pageDown,
  pageUp,
  scrollBy,
  settleScroll,
  toBottom,
  toTop,
  viewportHeight,
  type ScrollState,
} from "../scroll.js"

describe("scroll controller", () => {
  it("reserves three rows for the prompt", () => {
    expect(viewportHeight(24)).toBe(21)
    expect(viewportHeight(2)).toBe(1)
  })

  it("clamps explicit scrolls and follows only at the bottom", () => {
    const bottom = toBottom(50, 10)
    expect(bottom).toEqual({ position: 40, autoFollow: true })
    expect(scrollBy(bottom, -5, 50, 10)).toEqual({ position: 35, autoFollow: false })
    expect(scrollBy(bottom, 100, 50, 10)).toEqual({ position: 40, autoFollow: true })
    expect(scrollBy(bottom, -100, 50, 10)).toEqual({ position: 0, autoFollow: false })
  })

  it("pages by half a viewport, at least one line", () => {
    const bottom = toBottom(50, 10)
    expect(pageUp(bottom, 50, 10).position).toBe(35)
    expect(pageDown(pageUp(bottom, 50, 10), 50, 10)).toEqual({ position: 40, autoFollow: true })
    expect(pageUp(toBottom(5, 1), 5, 1).position).toBe(3)
  })

  it("moves to the top", () => {
    expect(toTop(toBottom(50, 10), 50, 10)).toEqual({ position: 0, autoFollow: false })
  })

  it("re-pins while following and re-clamps otherwise", () => {
    expect(settleScroll(initialScrollState, 30, 10)).toEqual({ position: 20, autoFollow: true })
    const manual: ScrollState = { position: 25, autoFollow: false }
    expect(settleScroll(manual, 30, 10)).toEqual({ position: 20, autoFollow: false })
    expect(settleScroll({ position: 5, autoFollow: false }, 30, 10)).toEqual({ position: 5, autoFollow: false })
  })

  it("stays within bounds under any sequence of actions", () => {
    let state = initialScrollState
    let total = 3
    const viewport = 4
    const deltas = [-7, 3, 12, -1, 5, -20, 9, 2, -3, 8]
    for (const [step, delta] of deltas.entries()) {
      total += step % 3 === 0 ? 5 : 0
      state = settleScroll(scrollBy(state, delta, total, viewport), total, viewport)
      expect(state.position).toBeGreaterThanOrEqual(0)
      expect(state.position).toBeLessThanOrEqual(maxScrollPosition(total, viewport))
    }
  })

  it("slices the visible window", () => {
    const window = createScrollWindow(["a", "b", "c", "d", "e"], 3, 2)
    expect(window.visible).toEqual(["d", "e"])
    expect(createScrollWindow(["a", "b"], 9, 5)).toMatchObject({ scroll: 0, start: 0, end: 2, maxScroll: 0 })
  })
})
