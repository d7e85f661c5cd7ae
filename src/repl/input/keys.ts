import type { Key } from "ink"
import type { KeyInput } from "../../session/events.js"

/** Ink key flags, plus the home/end flags newer Ink releases report. */
export type InkKey = Key & { home?: boolean; end?: boolean }

const HOME_SEQUENCES = new Set(["[H", "[1~", "[7~", "OH"])
const END_SEQUENCES = new Set(["[F", "[4~", "[8~", "OF"])

/** Maps one Ink `useInput` callback to a session key, or `null` for keys the session ignores. */
export const toKeyInput = (input: string, key: InkKey): KeyInput | null => {
  if (key.home || HOME_SEQUENCES.has(input)) return { kind: "named", name: "home" }
  if (key.end || END_SEQUENCES.has(input)) return { kind: "named", name: "end" }
  if (key.return) return { kind: "named", name: "enter", alt: key.meta }
  if (key.escape) return { kind: "named", name: "escape" }
  if (key.upArrow) return { kind: "named", name: "up" }
  if (key.downArrow) return { kind: "named", name: "down" }
  if (key.leftArrow) return { kind: "named", name: "left" }
  if (key.rightArrow) return { kind: "named", name: "right" }
  if (key.pageUp) return { kind: "named", name: "pageUp" }
  if (key.pageDown) return { kind: "named", name: "pageDown" }
  if (key.backspace) return { kind: "named", name: "backspace" }
  // Ink reports the backspace byte (0x7f) as delete with no input.
  if (key.delete) return { kind: "named", name: input === "" ? "backspace" : "delete" }
  if (key.tab) return { kind: "named", name: "tab" }
  if (key.ctrl) {
    const letter = input.toLowerCase()
    return /^[a-z]$/.test(letter) ? { kind: "ctrl", letter } : null
  }
  if (key.meta) return null
  const text = input.replace(/\r\n?/g, "\n").replace(/[\u0000-\u0009\u000b-\u001f\u007f]/g, "")
  return text ? { kind: "text", text } : null
}
