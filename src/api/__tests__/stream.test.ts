import { describe, expect, it } from "vitest"
import { TransportError } from "../../errors.js"
import type { StreamChunk } from "../../providers/types.js"
import { parseCompletionEvent, readCompletionStream } from "../stream.js"
import { deltaFrame, sseBody } from "./sse.js"

const collect = async (iterable: AsyncIterable<StreamChunk>): Promise<string[]> => {
  const out: string[] = []
  for await (const chunk of iterable) out.push(chunk.content)
  return out
}

describe("parseCompletionEvent", () => {
  it("recognises the done sentinel", () => {
    expect(parseCompletionEvent(" [DONE] ")).toEqual({ kind: "done" })
  })

  it("skips empty and malformed payloads", () => {
    expect(parseCompletionEvent("{}")).toEqual({ kind: "skip" })
    expect(parseCompletionEvent("")).toEqual({ kind: "skip" })
    expect(parseCompletionEvent("{not json")).toEqual({ kind: "skip" })
    expect(parseCompletionEvent('{"choices":[]}')).toEqual({ kind: "skip" })
    expect(parseCompletionEvent('{"choices":[{"delta":{"content":""}}]}')).toEqual({ kind: "skip" })
  })

  it("extracts delta content", () => {
    expect(parseCompletionEvent('{"choices":[{"delta":{"content":"Hi"}}]}')).toEqual({ kind: "chunk", content: "Hi" })
  })

  it("reports in-band api errors", () => {
    expect(parseCompletionEvent('{"error":{"message":"quota exceeded"}}')).toEqual({
      kind: "error",
      message: "API error: quota exceeded",
    })
  })
})

describe("readCompletionStream", () => {
  it("yields deltas in order and stops at the sentinel", async () => {
    const response = new Response(
      sseBody([deltaFrame("Hel"), deltaFrame("lo"), "data: [DONE]\n\n", deltaFrame("ignored")]),
    )
    expect(await collect(readCompletionStream(response))).toEqual(["Hel", "lo"])
  })

  it("reassembles events split across reads", async () => {
    const frame = deltaFrame("split")
    const response = new Response(sseBody([frame.slice(0, 12), frame.slice(12)]))
    expect(await collect(readCompletionStream(response))).toEqual(["split"])
  })

  it("ends quietly when the body closes without a sentinel", async () => {
    const response = new Response(sseBody([deltaFrame("a"), ": keep-alive\n\n"]))
    expect(await collect(readCompletionStream(response))).toEqual(["a"])
  })

  it("throws a transport error for an in-band error event", async () => {
    const response = new Response(sseBody(['data: {"error":{"message":"overloaded"}}\n\n', deltaFrame("after")]))
    const received: string[] = []
    const failure = await (async () => {
      try {
        for await (const chunk of readCompletionStream(response)) received.push(chunk.content)
        return null
      } catch (error) {
        return error
      }
    })()
    expect(received).toEqual([])
    expect(failure).toBeInstanceOf(TransportError)
    expect(failure).toHaveProperty("message", "API error: overloaded")
  })

  it("returns without output once the signal is aborted", async () => {
    const controller = new AbortController()
    controller.abort()
    const response = new Response(sseBody([deltaFrame("late")]))
    expect(await collect(readCompletionStream(response, controller.signal))).toEqual([])
  })

  it("rejects a response without a body", async () => {
    const iterator = readCompletionStream(new Response(null, { status: 204 }))
    await expect(iterator.next()).rejects.toThrow("Streaming response provided no body")
  })
})
