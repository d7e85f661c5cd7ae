import type { ProviderSnapshot, ProviderSummary } from "../providers/types.js"
import { emptyInput, type InputState } from "./inputBuffer.js"
import { wrapMessages, type VisualLine } from "./layout.js"
import { createInitialMessages, type Message } from "./messages.js"
import { initialScrollState, isPinnedToBottom, settleScroll, viewportHeight, type ScrollState } from "./scroll.js"
import type { SelectionState } from "./selection.js"
import { activeSelectorKind, buildSelectors, type SelectorKind, type SelectorSet } from "./selector.js"

export interface Viewport {
  readonly width: number
  readonly height: number
}

export interface SessionState {
  readonly messages: ReadonlyArray<Message>
  readonly input: InputState
  readonly inputEnabled: boolean
  readonly apiKeyEntry: boolean
  /** Turn whose stream is being consumed; `null` when not streaming. */
  readonly streamTurn: number | null
  readonly lastTurn: number
  readonly viewport: Viewport
  readonly scroll: ScrollState
  readonly selection: SelectionState | null
  readonly selectors: SelectorSet
  readonly provider: ProviderSnapshot
  readonly providers: ReadonlyArray<ProviderSummary>
  readonly cursorVisible: boolean
  readonly terminated: boolean
}

export type SessionPhase =
  | { readonly kind: "selector"; readonly selector: SelectorKind }
  | { readonly kind: "apiKeyEntry" }
  | { readonly kind: "streaming" }
  | { readonly kind: "idle" }

export interface CreateSessionStateOptions {
  readonly provider: ProviderSnapshot
  readonly providers: ReadonlyArray<ProviderSummary>
  readonly width: number
  readonly height: number
  readonly messages?: ReadonlyArray<Message>
}

export const DEFAULT_VIEWPORT: Viewport = { width: 80, height: 24 }

export const createSessionState = (options: CreateSessionStateOptions): SessionState =>
  settleLayout({
    messages: options.messages ?? createInitialMessages(options.provider),
    input: emptyInput,
    inputEnabled: true,
    apiKeyEntry: false,
    streamTurn: null,
    lastTurn: 0,
    viewport: {
      width: options.width > 0 ? options.width : DEFAULT_VIEWPORT.width,
      height: options.height > 0 ? options.height : DEFAULT_VIEWPORT.height,
    },
    scroll: initialScrollState,
    selection: null,
    selectors: buildSelectors(options.provider, options.providers),
    provider: options.provider,
    providers: options.providers,
    cursorVisible: true,
    terminated: false,
  })

/** Highest-priority mode first. */
export const sessionPhase = (state: SessionState): SessionPhase => {
  const selector = activeSelectorKind(state.selectors)
  if (selector) return { kind: "selector", selector }
  if (state.apiKeyEntry) return { kind: "apiKeyEntry" }
  if (state.streamTurn !== null) return { kind: "streaming" }
  return { kind: "idle" }
}

export const layoutLines = (state: SessionState): VisualLine[] => wrapMessages(state.messages, state.viewport.width)

export const conversationRows = (state: SessionState): number => viewportHeight(state.viewport.height)

export const isViewPinned = (state: SessionState, lines: ReadonlyArray<VisualLine> = layoutLines(state)): boolean =>
  isPinnedToBottom(state.scroll, lines.length, conversationRows(state))

/** The prompt is editable only when shown: input enabled and the view at the bottom. */
export const promptVisible = (state: SessionState, lines?: ReadonlyArray<VisualLine>): boolean =>
  state.inputEnabled && isViewPinned(state, lines)

/** Keeps the scroll position valid for the current layout, re-pinning while following. */
export const settleLayout = (state: SessionState): SessionState => {
  const scroll = settleScroll(state.scroll, layoutLines(state).length, conversationRows(state))
  return scroll === state.scroll ? state : { ...state, scroll }
}
