import { charWidth, stringWidth, toCodePoints } from "./displayWidth.js"
import type { Message, MessageType } from "./messages.js"

export interface VisualLine {
  readonly sourceMessageType: MessageType
  readonly content: string
  readonly messageIndex: number
  /** Width of the type prefix; non-zero only on a message's first line. */
  readonly prefixWidth: number
  /** A newline from the message content ends this line. */
  readonly hardBreak: boolean
  /** Blank separator emitted after assistant messages. */
  readonly spacer: boolean
}

export interface WrappedSegment {
  readonly text: string
  readonly hardBreak: boolean
}

const PREFIXES: Record<MessageType, string> = {
  user: "> ",
  system: "System: ",
  assistant: "Assistant: ",
  error: "Error: ",
  notice: "",
}

export const messagePrefix = (type: MessageType): string => PREFIXES[type]

const isBreakSpace = (char: string): boolean => char === " " || char === "\t"

/**
 * Number of code points that go on the current line. Always at least one, so a
 * glyph wider than `width` still advances the wrap.
 */
export const findBreakPoint = (chars: ReadonlyArray<string>, width: number): number => {
  let used = 0
  let pos = 0
  while (pos < chars.length) {
    const next = charWidth(chars[pos])
    if (used + next > width) break
    used += next
    pos += 1
  }
  if (pos >= chars.length) return chars.length
  for (let index = pos - 1; index > 0; index -= 1) {
    if (isBreakSpace(chars[index])) return index + 1
  }
  return Math.max(1, pos)
}

export const wrapText = (text: string, width: number, firstLineOffset = 0): WrappedSegment[] => {
  const logicalLines = text.split("\n")
  const lastLogical = logicalLines.length - 1
  if (width <= 0) {
    return logicalLines.map((line, index) => ({ text: line, hardBreak: index < lastLogical }))
  }
  const segments: WrappedSegment[] = []
  let available = width - firstLineOffset
  logicalLines.forEach((line, logicalIndex) => {
    let remaining = toCodePoints(line)
    if (remaining.length === 0) {
      segments.push({ text: "", hardBreak: logicalIndex < lastLogical })
      available = width
      return
    }
    while (remaining.length > 0) {
      const cut = findBreakPoint(remaining, available)
      const piece = remaining.slice(0, cut).join("")
      remaining = remaining.slice(cut)
      segments.push({ text: piece, hardBreak: remaining.length === 0 && logicalIndex < lastLogical })
      available = width
    }
  })
  return segments
}

export const wrapMessage = (message: Message, messageIndex: number, width: number): VisualLine[] => {
  const prefix = messagePrefix(message.type)
  const prefixWidth = stringWidth(prefix)
  // A prefix that fills the row gets the row to itself.
  const prefixRow = width > 0 && prefixWidth > 0 && prefixWidth >= width
  const segments = wrapText(message.content, width, prefixRow ? 0 : prefixWidth)
  const rows: WrappedSegment[] = prefixRow ? [{ text: "", hardBreak: false }, ...segments] : segments
  const lines: VisualLine[] = rows.map((segment, index) => ({
    sourceMessageType: message.type,
    content: index === 0 ? `${prefix}${segment.text}` : segment.text,
    messageIndex,
    prefixWidth: index === 0 ? prefixWidth : 0,
    hardBreak: segment.hardBreak,
    spacer: false,
  }))
  if (message.type === "assistant") {
    lines.push({
      sourceMessageType: message.type,
      content: "",
      messageIndex,
      prefixWidth: 0,
      hardBreak: false,
      spacer: true,
    })
  }
  return lines
}

export const wrapMessages = (messages: ReadonlyArray<Message>, width: number): VisualLine[] =>
  messages.flatMap((message, index) => wrapMessage(message, index, width))
