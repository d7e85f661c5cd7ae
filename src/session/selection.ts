import { charWidth, toCodePoints } from "./displayWidth.js"

export interface Point {
  readonly line: number
  /** Display cells from the start of the line. */
  readonly col: number
}

export interface SelectionState {
  readonly anchor: Point
  readonly head: Point
  /** The mouse button is still down. */
  readonly dragging: boolean
}

export interface SelectionRange {
  readonly start: Point
  readonly end: Point
}

export interface Span {
  readonly start: number
  readonly end: number
}

const END_OF_LINE = Number.MAX_SAFE_INTEGER

export const comparePoints = (a: Point, b: Point): number => (a.line !== b.line ? a.line - b.line : a.col - b.col)

export const normalizeRange = (a: Point, b: Point): SelectionRange =>
  comparePoints(a, b) <= 0 ? { start: a, end: b } : { start: b, end: a }

const clampPoint = (point: Point, lineCount: number): Point => {
  if (point.line < 0) return { line: 0, col: 0 }
  if (point.line >= lineCount) return { line: lineCount - 1, col: END_OF_LINE }
  return point
}

/** Ordered and clamped to existing lines; `null` when there are no lines. */
export const clampRange = (a: Point, b: Point, lineCount: number): SelectionRange | null => {
  if (lineCount <= 0) return null
  const { start, end } = normalizeRange(a, b)
  return { start: clampPoint(start, lineCount), end: clampPoint(end, lineCount) }
}

/** First code point whose starting cell is at or beyond `col`. */
export const visualColumnToIndex = (chars: ReadonlyArray<string>, col: number): number => {
  let visual = 0
  for (let index = 0; index < chars.length; index += 1) {
    if (visual >= col) return index
    visual += charWidth(chars[index])
  }
  return chars.length
}

export const extractSelectedText = (lines: ReadonlyArray<{ readonly content: string }>, a: Point, b: Point): string => {
  const range = clampRange(a, b, lines.length)
  if (!range) return ""
  const { start, end } = range
  const startChars = toCodePoints(lines[start.line].content)
  if (start.line === end.line) {
    const from = visualColumnToIndex(startChars, start.col)
    const to = visualColumnToIndex(startChars, end.col)
    return from < to ? startChars.slice(from, to).join("") : ""
  }
  const parts = [startChars.slice(visualColumnToIndex(startChars, start.col)).join("")]
  for (let line = start.line + 1; line < end.line; line += 1) {
    parts.push(lines[line].content)
  }
  const endChars = toCodePoints(lines[end.line].content)
  parts.push(endChars.slice(0, visualColumnToIndex(endChars, end.col)).join(""))
  return parts.join("\n")
}

/** Code-point span of `content` covered by the selection, for reverse-video rendering. */
export const selectionSpan = (content: string, lineIndex: number, range: SelectionRange): Span | null => {
  const { start, end } = range
  if (lineIndex < start.line || lineIndex > end.line) return null
  const chars = toCodePoints(content)
  const from = lineIndex === start.line ? visualColumnToIndex(chars, start.col) : 0
  const to = lineIndex === end.line ? visualColumnToIndex(chars, end.col) : chars.length
  return from < to ? { start: from, end: to } : null
}

export const hasExtent = (selection: SelectionState): boolean => comparePoints(selection.anchor, selection.head) !== 0
