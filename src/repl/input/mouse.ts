import type { MouseInput } from "../../session/events.js"

// Ink strips the leading ESC from the sequences it hands to useInput.
const SGR_MOUSE = /\u001b?\[<(\d+);(\d+);(\d+)([Mm])/g

const WHEEL_FLAG = 64
const MOTION_FLAG = 32
const BUTTON_MASK = 3

export const containsMouseReport = (input: string): boolean => /\u001b?\[<\d+;\d+;\d+[Mm]/.test(input)

const decode = (code: number, column: number, row: number, final: string): MouseInput | null => {
  const x = Math.max(0, column - 1)
  const y = Math.max(0, row - 1)
  if ((code & WHEEL_FLAG) === WHEEL_FLAG) {
    return { kind: "wheel", direction: (code & 1) === 1 ? "down" : "up", x, y }
  }
  if ((code & BUTTON_MASK) !== 0) return null
  if (final === "m") return { kind: "release", x, y }
  if ((code & MOTION_FLAG) === MOTION_FLAG) return { kind: "drag", x, y }
  return { kind: "press", x, y }
}

/** Decodes every SGR (1006) report in a chunk of terminal input; other buttons are dropped. */
export const parseMouseReports = (input: string): MouseInput[] => {
  const reports: MouseInput[] = []
  for (const match of input.matchAll(SGR_MOUSE)) {
    const report = decode(Number(match[1]), Number(match[2]), Number(match[3]), match[4])
    if (report) reports.push(report)
  }
  return reports
}
