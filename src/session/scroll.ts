export interface ScrollState {
  readonly position: number
  readonly autoFollow: boolean
}

export interface ScrollWindow<T> {
  readonly total: number
  readonly viewport: number
  readonly maxScroll: number
  readonly scroll: number
  readonly start: number
  readonly end: number
  readonly visible: ReadonlyArray<T>
}

/** Rows kept for the input prompt below the conversation. */
export const PROMPT_RESERVED_ROWS = 3
export const WHEEL_SCROLL_LINES = 3

export const initialScrollState: ScrollState = { position: 0, autoFollow: true }

export const viewportHeight = (terminalRows: number): number => Math.max(1, Math.floor(terminalRows) - PROMPT_RESERVED_ROWS)

export const maxScrollPosition = (total: number, viewport: number): number => Math.max(0, total - Math.max(1, viewport))

const clamp = (position: number, total: number, viewport: number): number =>
  Math.max(0, Math.min(Math.floor(position), maxScrollPosition(total, viewport)))

export const isPinnedToBottom = (state: ScrollState, total: number, viewport: number): boolean =>
  state.position >= maxScrollPosition(total, viewport)

/** Explicit scrolls keep following only when they land on the bottom bound. */
export const scrollBy = (state: ScrollState, delta: number, total: number, viewport: number): ScrollState => {
  const position = clamp(state.position + delta, total, viewport)
  return { position, autoFollow: position === maxScrollPosition(total, viewport) }
}

const pageSize = (viewport: number): number => Math.max(1, Math.floor(viewport / 2))

export const pageUp = (state: ScrollState, total: number, viewport: number): ScrollState =>
  scrollBy(state, -pageSize(viewport), total, viewport)

export const pageDown = (state: ScrollState, total: number, viewport: number): ScrollState =>
  scrollBy(state, pageSize(viewport), total, viewport)

export const toTop = (state: ScrollState, total: number, viewport: number): ScrollState =>
  scrollBy(state, -state.position, total, viewport)

export const toBottom = (total: number, viewport: number): ScrollState => ({
  position: maxScrollPosition(total, viewport),
  autoFollow: true,
})

/** Re-pins after the content changed, or re-clamps when not following. */
export const settleScroll = (state: ScrollState, total: number, viewport: number): ScrollState => {
  if (state.autoFollow) return toBottom(total, viewport)
  const position = clamp(state.position, total, viewport)
  return position === state.position ? state : { ...state, position }
}

export const createScrollWindow = <T>(rows: ReadonlyArray<T>, requestedScroll: number, requestedViewport: number): ScrollWindow<T> => {
  const total = rows.length
  const viewport = Math.max(1, Math.floor(Number.isFinite(requestedViewport) ? requestedViewport : 1))
  const maxScroll = Math.max(0, total - viewport)
  const boundedScroll = Number.isFinite(requestedScroll) ? Math.floor(requestedScroll) : 0
  const scroll = Math.max(0, Math.min(boundedScroll, maxScroll))
  const start = scroll
  const end = Math.min(total, start + viewport)
  return {
    total,
    viewport,
    maxScroll,
    scroll,
    start,
    end,
    visible: rows.slice(start, end),
  }
}
