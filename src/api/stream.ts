import { createParser, type ParsedEvent, type ReconnectInterval } from "eventsource-parser"
import { describeError, StreamParseError, TransportError } from "../errors.js"
import type { StreamChunk } from "../providers/types.js"
import { debugLog } from "../util/debugLog.js"
import { isRecord } from "../util/guards.js"
import { extractApiErrorMessage } from "./client.js"

const DONE_SENTINEL = "[DONE]"

type ParsedPayload =
  | { readonly kind: "chunk"; readonly content: string }
  | { readonly kind: "skip" }
  | { readonly kind: "done" }
  | { readonly kind: "error"; readonly message: string }

export const parseCompletionEvent = (data: string): ParsedPayload => {
  const trimmed = data.trim()
  if (trimmed === DONE_SENTINEL) return { kind: "done" }
  if (trimmed === "" || trimmed === "{}") return { kind: "skip" }
  let payload: unknown
  try {
    payload = JSON.parse(trimmed)
  } catch (error) {
    const parseError = new StreamParseError(trimmed, { cause: error })
    debugLog("stream", { skipped: parseError.message, data: parseError.data })
    return { kind: "skip" }
  }
  const apiMessage = extractApiErrorMessage(payload)
  if (apiMessage) return { kind: "error", message: `API error: ${apiMessage}` }
  if (!isRecord(payload) || !Array.isArray(payload.choices)) return { kind: "skip" }
  const first: unknown = payload.choices[0]
  if (!isRecord(first) || !isRecord(first.delta)) return { kind: "skip" }
  const content = first.delta.content
  return typeof content === "string" && content.length > 0 ? { kind: "chunk", content } : { kind: "skip" }
}

/**
 * Yields content deltas from an OpenAI-style SSE completion body. Returns on
 * `[DONE]`, end of body, or abort; throws TransportError on an in-band error.
 */
export const readCompletionStream = async function* (
  response: Response,
  signal?: AbortSignal,
): AsyncGenerator<StreamChunk, void, void> {
  if (!response.body) {
    throw new TransportError("Streaming response provided no body", response.status)
  }
  const reader = response.body.getReader()
  const decoder = new TextDecoder()
  const buffer: StreamChunk[] = []
  const progress: { finished: boolean; failure: string | null } = { finished: false, failure: null }
  const parser = createParser((event: ParsedEvent | ReconnectInterval) => {
    if (event.type !== "event" || progress.finished || progress.failure !== null) return
    const parsed = parseCompletionEvent(event.data)
    switch (parsed.kind) {
      case "chunk":
        buffer.push({ content: parsed.content })
        break
      case "done":
        progress.finished = true
        break
      case "error":
        progress.failure = parsed.message
        break
      case "skip":
        break
    }
  })

  type ReadResult = Awaited<ReturnType<typeof reader.read>>

  const readWithAbort = async (): Promise<ReadResult> => {
    if (!signal) {
      return reader.read()
    }
    if (signal.aborted) {
      return { done: true, value: undefined }
    }
    return await new Promise<ReadResult>((resolve, reject) => {
      const onAbort = () => resolve({ done: true, value: undefined })
      signal.addEventListener("abort", onAbort, { once: true })
      reader
        .read()
        .then((result) => resolve(result))
        .catch((error: unknown) => reject(error))
        .finally(() => {
          signal.removeEventListener("abort", onAbort)
        })
    })
  }

  try {
    while (!progress.finished && progress.failure === null) {
      const { value, done } = await readWithAbort()
      if (done || signal?.aborted) {
        parser.reset()
        break
      }
      if (value) {
        parser.feed(decoder.decode(value, { stream: true }))
        while (buffer.length > 0) {
          const next = buffer.shift()
          if (next) {
            yield next
          }
        }
      }
    }
    if (progress.failure !== null) {
      throw new TransportError(progress.failure, response.status)
    }
  } finally {
    // Cancelling settles a read left pending by an abort before the lock is released.
    await reader.cancel().catch((error: unknown) => {
      debugLog("stream", { cancelError: describeError(error) })
    })
    reader.releaseLock()
  }
}
