import chalk from "chalk"
import { graphemeCount, splitAtCursor } from "../../session/inputBuffer.js"
import { wrapText, type VisualLine } from "../../session/layout.js"
import { createScrollWindow } from "../../session/scroll.js"
import { clampRange, hasExtent, selectionSpan, type SelectionRange } from "../../session/selection.js"
import { toCodePoints } from "../../session/displayWidth.js"
import { conversationRows, layoutLines, promptVisible, type SessionState } from "../../session/state.js"
import { paint, paintSelected, PROMPT_COLOR } from "./theme.js"

export const PROMPT_PREFIX = "> "
export const CURSOR_GLYPH = "|"
const PROMPT_CONTINUATION = "  "

const activeRange = (state: SessionState, lines: ReadonlyArray<VisualLine>): SelectionRange | null => {
  const selection = state.selection
  if (!selection || !hasExtent(selection)) return null
  return clampRange(selection.anchor, selection.head, lines.length)
}

const renderLine = (line: VisualLine, lineIndex: number, range: SelectionRange | null): string => {
  const span = range ? selectionSpan(line.content, lineIndex, range) : null
  if (!span) return paint(line.sourceMessageType, line.content)
  const chars = toCodePoints(line.content)
  return [
    paint(line.sourceMessageType, chars.slice(0, span.start).join("")),
    paintSelected(line.sourceMessageType, chars.slice(span.start, span.end).join("")),
    paint(line.sourceMessageType, chars.slice(span.end).join("")),
  ].join("")
}

/** Visible conversation rows, selection drawn in reverse video. */
export const renderConversationRows = (
  state: SessionState,
  lines: ReadonlyArray<VisualLine> = layoutLines(state),
): string[] => {
  const window = createScrollWindow(lines, state.scroll.position, conversationRows(state))
  const range = activeRange(state, lines)
  return window.visible.map((line, offset) => renderLine(line, window.start + offset, range))
}

/** Text shown in the prompt; API keys are masked while being entered. */
export const promptText = (state: SessionState): string => {
  const cursor = state.cursorVisible ? CURSOR_GLYPH : " "
  if (state.apiKeyEntry) {
    const before = state.input.cursor
    const after = graphemeCount(state.input.text) - before
    return `${"*".repeat(before)}${cursor}${"*".repeat(after)}`
  }
  const { before, after } = splitAtCursor(state.input)
  return `${before}${cursor}${after}`
}

/** Prompt rows; empty while the prompt is hidden (streaming or scrolled away). */
export const renderPromptRows = (state: SessionState, lines: ReadonlyArray<VisualLine> = layoutLines(state)): string[] => {
  if (!promptVisible(state, lines) && !state.apiKeyEntry) return []
  const segments = wrapText(promptText(state), state.viewport.width - PROMPT_PREFIX.length)
  return segments.map((segment, index) =>
    index === 0 ? `${chalk.hex(PROMPT_COLOR)(PROMPT_PREFIX)}${segment.text}` : `${PROMPT_CONTINUATION}${segment.text}`,
  )
}
