import clipboardy from "clipboardy"
import { ClipboardError } from "../errors.js"
import { debugLog } from "./debugLog.js"

const FAKE_ENV = "PARLEY_FAKE_CLIPBOARD"

const fakeWrites: string[] = []

export type ClipboardWriter = (text: string) => Promise<void>

const isFakeClipboard = (): boolean => process.env[FAKE_ENV] === "1"

/** Copies recorded while `PARLEY_FAKE_CLIPBOARD=1`, oldest first. */
export const fakeClipboardWrites = (): ReadonlyArray<string> => [...fakeWrites]

export const resetFakeClipboard = (): void => {
  fakeWrites.length = 0
}

export const writeClipboardText: ClipboardWriter = async (text) => {
  if (!text) return
  if (isFakeClipboard()) {
    fakeWrites.push(text)
    return
  }
  try {
    await clipboardy.write(text)
    debugLog("clipboard", { event: "write", length: text.length })
  } catch (error) {
    throw new ClipboardError("Failed to write to the clipboard", { cause: error })
  }
}
