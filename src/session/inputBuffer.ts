import GraphemerModule from "graphemer"

type GraphemerInstance = {
  splitGraphemes(text: string): string[]
}

const GraphemerCtor = ((GraphemerModule as unknown as { default?: new () => GraphemerInstance }).default ??
  (GraphemerModule as unknown as new () => GraphemerInstance)) as new () => GraphemerInstance

const graphemer = new GraphemerCtor()

export interface InputState {
  readonly text: string
  /** Grapheme index of the cursor. */
  readonly cursor: number
}

export const emptyInput: InputState = { text: "", cursor: 0 }

export const splitGraphemes = (text: string): string[] => (text ? graphemer.splitGraphemes(text) : [])

export const graphemeCount = (text: string): number => splitGraphemes(text).length

export const insertText = (state: InputState, inserted: string): InputState => {
  if (!inserted) return state
  const parts = splitGraphemes(state.text)
  const before = parts.slice(0, state.cursor).join("")
  const after = parts.slice(state.cursor).join("")
  const text = `${before}${inserted}${after}`
  return { text, cursor: graphemeCount(`${before}${inserted}`) }
}

export const deleteBackward = (state: InputState): InputState => {
  if (state.cursor <= 0) return state
  const parts = splitGraphemes(state.text)
  parts.splice(state.cursor - 1, 1)
  return { text: parts.join(""), cursor: state.cursor - 1 }
}

export const deleteForward = (state: InputState): InputState => {
  const parts = splitGraphemes(state.text)
  if (state.cursor >= parts.length) return state
  parts.splice(state.cursor, 1)
  return { text: parts.join(""), cursor: state.cursor }
}

export const moveCursor = (state: InputState, delta: number): InputState => {
  const cursor = Math.max(0, Math.min(graphemeCount(state.text), state.cursor + delta))
  return cursor === state.cursor ? state : { ...state, cursor }
}

/** Splits the text around the cursor for rendering. */
export const splitAtCursor = (state: InputState): { before: string; after: string } => {
  const parts = splitGraphemes(state.text)
  return { before: parts.slice(0, state.cursor).join(""), after: parts.slice(state.cursor).join("") }
}
