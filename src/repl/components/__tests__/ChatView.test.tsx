import React from "react"
import { render } from "ink-testing-library"
import stripAnsi from "strip-ansi"
import { describe, expect, it, vi } from "vitest"
import { makeState } from "../../../session/__tests__/fixtures.js"
import type { SessionEvent } from "../../../session/events.js"
import { activateOnly } from "../../../session/selector.js"
import { ChatView } from "../ChatView.js"

const flush = () => new Promise((resolve) => setTimeout(resolve, 0))

const frameLines = (frame: string | undefined): string[] => stripAnsi(frame ?? "").split("\n").map((line) => line.trimEnd())

describe("ChatView", () => {
  it("renders the conversation above the prompt", async () => {
    const state = makeState({
      width: 30,
      height: 6,
      messages: [
        { type: "system", content: "You are terse." },
        { type: "user", content: "hi" },
      ],
    })
    const { lastFrame, unmount } = render(<ChatView state={state} onEvent={vi.fn()} />)
    await flush()
    expect(frameLines(lastFrame())).toEqual(["System: You are terse.", "> hi", "", "> |"])
    unmount()
  })

  it("shows the active selector in place of the conversation", async () => {
    const base = makeState({ width: 60, height: 12 })
    const state = { ...base, selectors: activateOnly(base.selectors, "provider") }
    const { lastFrame, unmount } = render(<ChatView state={state} onEvent={vi.fn()} />)
    await flush()
    const frame = stripAnsi(lastFrame() ?? "")
    expect(frame).toContain(" > [*] deepseek [Ready]")
    expect(frame).toContain("   [ ] grok [Not Ready]")
    expect(frame).not.toContain("Welcome to parley")
    unmount()
  })

  it("forwards keys and mouse reports as session events", async () => {
    const events: SessionEvent[] = []
    const { stdin, unmount } = render(<ChatView state={makeState()} onEvent={(event) => events.push(event)} />)
    await flush()
    stdin.write("a")
    await flush()
    stdin.write("\r")
    await flush()
    stdin.write("[<65;3;2M")
    await flush()
    expect(events).toEqual([
      { type: "key", key: { kind: "text", text: "a" } },
      { type: "key", key: { kind: "named", name: "enter", alt: false } },
      { type: "mouse", mouse: { kind: "wheel", direction: "down", x: 2, y: 1 } },
    ])
    unmount()
  })
})
