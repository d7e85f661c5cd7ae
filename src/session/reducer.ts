import type { KeyInput, MouseInput, SessionCommand, SessionEvent } from "./events.js"
import { deleteBackward, deleteForward, emptyInput, insertText, moveCursor } from "./inputBuffer.js"
import type { VisualLine } from "./layout.js"
import {
  appendMessage,
  errorMessage,
  extendLastAssistant,
  helpMessage,
  noticeMessage,
  replaceLastAssistant,
  resetConversation,
  toRequestMessages,
  type Message,
} from "./messages.js"
import { pageDown, pageUp, scrollBy, toBottom, toTop, WHEEL_SCROLL_LINES } from "./scroll.js"
import { extractSelectedText, type Point } from "./selection.js"
import {
  activateOnly,
  activeSelectorKind,
  buildSelectors,
  confirmActive,
  deactivateAll,
  moveActive,
  type SelectorKind,
} from "./selector.js"
import {
  conversationRows,
  isViewPinned,
  layoutLines,
  promptVisible,
  sessionPhase,
  settleLayout,
  type SessionState,
} from "./state.js"

export interface Transition {
  readonly state: SessionState
  readonly commands: ReadonlyArray<SessionCommand>
}

const stay = (state: SessionState): Transition => ({ state, commands: [] })

const COLON_COMMAND = /^:([hpmtkc])$/

const SHORTCUTS: Readonly<Record<string, SelectorKind>> = {
  p: "provider",
  k: "model",
  t: "temperature",
}

const withMessages = (state: SessionState, messages: ReadonlyArray<Message>): SessionState => ({ ...state, messages })

/** Moves to the bottom once the new content has been laid out. */
const followOutput = (state: SessionState): SessionState => ({
  ...state,
  scroll: { ...state.scroll, autoFollow: true },
})

const scrollTo = (
  state: SessionState,
  lines: ReadonlyArray<VisualLine>,
  update: (total: number, viewport: number) => SessionState["scroll"],
): SessionState => ({ ...state, scroll: update(lines.length, conversationRows(state)) })

const openSelector = (state: SessionState, kind: SelectorKind): SessionState => ({
  ...state,
  selectors: activateOnly(buildSelectors(state.provider, state.providers), kind),
})

const closeSelectors = (state: SessionState): SessionState => ({
  ...state,
  selectors: deactivateAll(buildSelectors(state.provider, state.providers)),
})

const enterApiKeyEntry = (state: SessionState): SessionState =>
  followOutput({
    ...withMessages(state, appendMessage(state.messages, noticeMessage(`Please enter your API key of ${state.provider.name}:`))),
    apiKeyEntry: true,
    inputEnabled: true,
    input: emptyInput,
  })

const sendMessage = (state: SessionState, text: string): Transition => {
  const withUser = appendMessage(state.messages, { type: "user", content: text })
  const cleared: SessionState = { ...state, input: emptyInput, selection: null }
  if (!state.provider.isReady) return stay(enterApiKeyEntry(withMessages(cleared, withUser)))
  const turn = state.lastTurn + 1
  const next = followOutput({
    ...withMessages(cleared, appendMessage(withUser, { type: "assistant", content: "" })),
    inputEnabled: false,
    streamTurn: turn,
    lastTurn: turn,
  })
  return {
    state: next,
    commands: [
      { type: "start_stream", turn, messages: toRequestMessages(withUser) },
      { type: "receive_next", turn },
    ],
  }
}

const runColonCommand = (state: SessionState, command: string): SessionState => {
  const cleared: SessionState = { ...state, input: emptyInput }
  switch (command) {
    case "h":
      return followOutput(withMessages(cleared, appendMessage(cleared.messages, helpMessage())))
    case "p":
      return openSelector(cleared, "provider")
    case "m":
      return openSelector(cleared, "model")
    case "t":
      return openSelector(cleared, "temperature")
    case "k":
      return enterApiKeyEntry(cleared)
    case "c":
      return followOutput({ ...withMessages(cleared, resetConversation(cleared.messages)), selection: null })
    default:
      return state
  }
}

const cancel = (state: SessionState): Transition => {
  const phase = sessionPhase(state)
  switch (phase.kind) {
    case "selector":
      return stay(closeSelectors(state))
    case "apiKeyEntry":
      return stay({ ...state, apiKeyEntry: false, input: emptyInput })
    case "streaming": {
      const turn = state.streamTurn ?? state.lastTurn
      return {
        state: { ...state, streamTurn: null, inputEnabled: true },
        commands: [{ type: "cancel_stream", turn }],
      }
    }
    case "idle":
      return { state: { ...state, terminated: true }, commands: [{ type: "quit" }] }
  }
}

const handleSelectorKey = (state: SessionState, key: KeyInput): Transition => {
  if (key.kind === "named") {
    switch (key.name) {
      case "up":
        return stay({ ...state, selectors: moveActive(state.selectors, "previous") })
      case "down":
        return stay({ ...state, selectors: moveActive(state.selectors, "next") })
      case "enter":
        return confirm(state, state.selectors)
      default:
        return stay(state)
    }
  }
  if (key.kind === "text" && /^[1-9]$/.test(key.text)) {
    const index = Number(key.text) - 1
    const kind = activeSelectorKind(state.selectors)
    if (!kind || index >= state.selectors[kind].options.length) return stay(state)
    return confirm(state, moveActive(state.selectors, { index }))
  }
  return stay(state)
}

const confirm = (state: SessionState, selectors: SessionState["selectors"]): Transition => {
  const { selectors: confirmed, change } = confirmActive(selectors)
  return {
    state: { ...state, selectors: confirmed },
    commands: change ? [{ type: "apply_setting", change }] : [],
  }
}

const handleEnter = (state: SessionState, alt: boolean, lines: ReadonlyArray<VisualLine>): Transition => {
  if (state.apiKeyEntry) {
    if (alt) return stay(state)
    const apiKey = state.input.text.trim()
    if (!apiKey) return stay(state)
    return {
      state: { ...state, apiKeyEntry: false, input: emptyInput },
      commands: [{ type: "save_api_key", apiKey }],
    }
  }
  if (!isViewPinned(state, lines)) return stay(scrollTo(state, lines, toBottom))
  if (!state.inputEnabled) return stay(state)
  if (alt) return stay({ ...state, input: insertText(state.input, "\n") })
  const text = state.input.text
  if (text.trim() === "") return stay(state)
  return sendMessage(state, text)
}

const handleKey = (state: SessionState, key: KeyInput): Transition => {
  if ((key.kind === "ctrl" && key.letter === "c") || (key.kind === "named" && key.name === "escape")) {
    return cancel(state)
  }
  if (sessionPhase(state).kind === "selector") return handleSelectorKey(state, key)

  if (key.kind === "ctrl") {
    const kind = SHORTCUTS[key.letter]
    if (kind && !state.apiKeyEntry) return stay(openSelector(state, kind))
    return stay(state)
  }

  const lines = layoutLines(state)
  const editable = state.apiKeyEntry || promptVisible(state, lines)

  if (key.kind === "named") {
    switch (key.name) {
      case "pageUp":
        return stay(scrollTo(state, lines, (total, viewport) => pageUp(state.scroll, total, viewport)))
      case "pageDown":
        return stay(scrollTo(state, lines, (total, viewport) => pageDown(state.scroll, total, viewport)))
      case "home":
        return stay(scrollTo(state, lines, (total, viewport) => toTop(state.scroll, total, viewport)))
      case "end":
        return stay(scrollTo(state, lines, toBottom))
      case "enter":
        return handleEnter(state, key.alt === true, lines)
      case "left":
        return stay(editable ? { ...state, input: moveCursor(state.input, -1) } : state)
      case "right":
        return stay(editable ? { ...state, input: moveCursor(state.input, 1) } : state)
      case "backspace":
        return stay(editable ? { ...state, input: deleteBackward(state.input) } : state)
      case "delete":
        return stay(editable ? { ...state, input: deleteForward(state.input) } : state)
      default:
        return stay(state)
    }
  }

  if (!editable || key.text === "") return stay(state)
  const input = insertText(state.input, key.text)
  const command = state.apiKeyEntry ? null : COLON_COMMAND.exec(input.text)
  if (command) return stay(runColonCommand(state, command[1]))
  return stay({ ...state, input })
}

/** Rows below the conversation map onto its last visible row. */
const toContentPoint = (state: SessionState, mouse: MouseInput): Point => ({
  line: Math.min(mouse.y, conversationRows(state) - 1) + state.scroll.position,
  col: mouse.x,
})

const handleMouse = (state: SessionState, mouse: MouseInput): Transition => {
  if (sessionPhase(state).kind === "selector") return stay(state)
  const lines = layoutLines(state)
  switch (mouse.kind) {
    case "wheel": {
      const delta = mouse.direction === "up" ? -WHEEL_SCROLL_LINES : WHEEL_SCROLL_LINES
      return stay(scrollTo(state, lines, (total, viewport) => scrollBy(state.scroll, delta, total, viewport)))
    }
    case "press": {
      if (mouse.y >= conversationRows(state)) return stay(state)
      const point = toContentPoint(state, mouse)
      return stay({
        ...state,
        selection: { anchor: point, head: point, dragging: true },
        scroll: { ...state.scroll, autoFollow: false },
      })
    }
    case "drag":
      if (!state.selection?.dragging) return stay(state)
      return stay({ ...state, selection: { ...state.selection, head: toContentPoint(state, mouse) } })
    case "release": {
      if (!state.selection?.dragging) return stay(state)
      const head = toContentPoint(state, mouse)
      const text = extractSelectedText(lines, state.selection.anchor, head)
      if (!text) return stay({ ...state, selection: null })
      return {
        state: { ...state, selection: { anchor: state.selection.anchor, head, dragging: false } },
        commands: [{ type: "copy_selection", text }],
      }
    }
  }
}

const isCurrentTurn = (state: SessionState, turn: number): boolean => state.streamTurn !== null && state.streamTurn === turn

const dropEmptyPlaceholder = (messages: ReadonlyArray<Message>): Message[] => {
  const last = messages[messages.length - 1]
  return last && last.type === "assistant" && last.content === "" ? messages.slice(0, -1) : [...messages]
}

const step = (state: SessionState, event: SessionEvent): Transition => {
  switch (event.type) {
    case "key":
      return handleKey(state, event.key)
    case "mouse":
      return handleMouse(state, event.mouse)
    case "resize":
      if (event.width <= 0 || event.height <= 0) return stay(state)
      return stay({ ...state, viewport: { width: event.width, height: event.height } })
    case "blink":
      return stay({ ...state, cursorVisible: !state.cursorVisible })
    case "submit_prompt":
      if (state.streamTurn !== null || event.text.trim() === "") return stay(state)
      return sendMessage(state, event.text)
    case "stream_chunk":
      if (!isCurrentTurn(state, event.turn)) return stay(state)
      return {
        state: withMessages(state, extendLastAssistant(state.messages, event.content)),
        commands: [{ type: "receive_next", turn: event.turn }],
      }
    case "stream_done":
      if (!isCurrentTurn(state, event.turn)) return stay(state)
      return stay({ ...state, streamTurn: null, inputEnabled: true })
    case "stream_error": {
      if (!isCurrentTurn(state, event.turn)) return stay(state)
      const settled: SessionState = { ...state, streamTurn: null, inputEnabled: true }
      if (event.notReady) return stay(enterApiKeyEntry(withMessages(settled, dropEmptyPlaceholder(settled.messages))))
      return stay(withMessages(settled, replaceLastAssistant(settled.messages, errorMessage(event.message))))
    }
    case "provider_updated": {
      const kind = activeSelectorKind(state.selectors)
      const selectors = buildSelectors(event.provider, event.providers)
      return stay({
        ...state,
        provider: event.provider,
        providers: event.providers,
        selectors: kind ? activateOnly(selectors, kind) : selectors,
      })
    }
    case "setting_failed":
      if (event.validation) return stay(state)
      return stay(withMessages(state, appendMessage(state.messages, errorMessage(event.message))))
    case "api_key_saved":
      return stay(
        followOutput({
          ...withMessages(
            state,
            appendMessage(state.messages, noticeMessage(`API key for '${event.providerName}' has been set successfully.`)),
          ),
          provider: event.provider,
          providers: event.providers,
          selectors: buildSelectors(event.provider, event.providers),
        }),
      )
    case "api_key_failed":
      return stay(
        followOutput(withMessages(state, appendMessage(state.messages, errorMessage(`Error setting API key: ${event.message}`)))),
      )
  }
}

/**
 * Pure transition function for the interactive session. Side effects are
 * described by the returned commands and carried out by the controller.
 */
export const reduceSession = (state: SessionState, event: SessionEvent): Transition => {
  if (state.terminated) return stay(state)
  const { state: next, commands } = step(state, event)
  return { state: next === state ? state : settleLayout(next), commands }
}
