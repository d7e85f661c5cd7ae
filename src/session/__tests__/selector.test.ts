import { describe, expect, it } from "vitest"
import {
  activateOnly,
  activeSelectorKind,
  activateSelector,
  buildSelectors,
  cancelSelector,
  confirmActive,
  confirmSelector,
  createSelector,
  nextOption,
  previousOption,
  selectByIndex,
  selectorHeading,
  selectorRowText,
} from "../selector.js"
import { deepseekSnapshot, summaries } from "./fixtures.js"

const letters = () =>
  createSelector("model", [
    { label: "a", value: "a" },
    { label: "b", value: "b" },
    { label: "c", value: "c" },
  ])

describe("selector widget", () => {
  it("cycles in both directions", () => {
    const widget = letters()
    const back = previousOption(widget)
    expect(back.currentIndex).toBe(2)
    expect(nextOption(back).currentIndex).toBe(0)
  })

  it("leaves an empty list alone", () => {
    const empty = createSelector<string>("model", [])
    expect(nextOption(empty)).toBe(empty)
    expect(selectByIndex(empty, 0)).toBe(empty)
  })

  it("bounds-checks selection by index", () => {
    expect(selectByIndex(letters(), 2).currentIndex).toBe(2)
    expect(selectByIndex(letters(), 3).currentIndex).toBe(0)
    expect(selectByIndex(letters(), -1).currentIndex).toBe(0)
  })

  it("returns the chosen value on confirm and deactivates", () => {
    const { widget, value } = confirmSelector({ ...selectByIndex(letters(), 1), active: true })
    expect(value).toBe("b")
    expect(widget.active).toBe(false)
  })

  it("cancels by deactivating", () => {
    const open = activateSelector(selectByIndex(letters(), 2))
    const closed = cancelSelector(open)
    expect(open.active).toBe(true)
    expect(closed.active).toBe(false)
    expect(closed.currentIndex).toBe(2)
    expect(cancelSelector(closed)).toBe(closed)
  })

  it("formats the panel text", () => {
    const widget = letters()
    expect(selectorHeading(widget)).toBe("Select a model (↑/↓ to navigate, Enter to select, ESC to cancel):")
    expect(selectorRowText(widget.options[0], true)).toBe(" > [*] a")
    expect(selectorRowText(widget.options[1], false)).toBe("   [ ] b")
  })
})

describe("selector set", () => {
  const set = () => buildSelectors(deepseekSnapshot(), summaries())

  it("labels providers with readiness", () => {
    expect(set().provider.options.map((option) => option.label)).toEqual([
      "openai [Not Ready]",
      "deepseek [Ready]",
      "grok [Not Ready]",
    ])
  })

  it("keeps at most one selector active", () => {
    const opened = activateOnly(activateOnly(set(), "model"), "temperature")
    expect(activeSelectorKind(opened)).toBe("temperature")
    expect(opened.model.active).toBe(false)
  })

  it("confirms the active selector into a setting change", () => {
    const { selectors, change } = confirmActive(activateOnly(set(), "temperature"))
    expect(change).toEqual({ kind: "temperature", value: 1.0 })
    expect(activeSelectorKind(selectors)).toBeNull()
    expect(confirmActive(set()).change).toBeNull()
  })
})
