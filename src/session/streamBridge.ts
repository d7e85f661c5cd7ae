import { describeError, ProviderNotReadyError } from "../errors.js"
import type { StreamChunk } from "../providers/types.js"
import { debugLog } from "../util/debugLog.js"

export type StreamOutcome =
  | { readonly kind: "chunk"; readonly content: string }
  | { readonly kind: "done" }
  | { readonly kind: "error"; readonly error: unknown; readonly notReady: boolean }

export type StreamFactory = (signal: AbortSignal) => AsyncIterable<StreamChunk>

/**
 * Pull-based handle over one provider stream. Only one receive is ever
 * outstanding; a repeated call while pending returns the same promise.
 */
export class StreamBridge {
  private readonly abortController = new AbortController()
  private iterator: AsyncIterator<StreamChunk> | null = null
  private pending: Promise<StreamOutcome> | null = null
  private finished = false

  constructor(private readonly factory: StreamFactory) {}

  get signal(): AbortSignal {
    return this.abortController.signal
  }

  get isFinished(): boolean {
    return this.finished
  }

  receive(): Promise<StreamOutcome> {
    if (this.finished || this.signal.aborted) return Promise.resolve({ kind: "done" })
    if (!this.pending) {
      this.pending = this.next().finally(() => {
        this.pending = null
      })
    }
    return this.pending
  }

  cancel(): void {
    if (this.finished) return
    this.finished = true
    this.abortController.abort()
    const iterator = this.iterator
    if (iterator?.return) {
      iterator.return().catch((error: unknown) => {
        debugLog("stream", { event: "close_failed", error: describeError(error) })
      })
    }
  }

  private async next(): Promise<StreamOutcome> {
    try {
      this.iterator ??= this.factory(this.signal)[Symbol.asyncIterator]()
      const result = await this.iterator.next()
      if (this.signal.aborted) return { kind: "done" }
      if (result.done) {
        this.finished = true
        return { kind: "done" }
      }
      return { kind: "chunk", content: result.value.content }
    } catch (error) {
      this.finished = true
      if (this.signal.aborted) return { kind: "done" }
      return { kind: "error", error, notReady: error instanceof ProviderNotReadyError }
    }
  }
}
