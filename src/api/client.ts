import { TransportError } from "../errors.js"
import { isRecord } from "../util/guards.js"

export interface ChatEndpoint {
  readonly url: string
  readonly apiKey: string
  readonly requestTimeoutMs?: number
}

export interface PostOptions {
  readonly signal?: AbortSignal
  /** Streaming requests only time out while waiting for response headers. */
  readonly stream?: boolean
}

const DEFAULT_TIMEOUT_MS = 60_000

const parseJson = (text: string): unknown => {
  try {
    return JSON.parse(text)
  } catch {
    return undefined
  }
}

export const extractApiErrorMessage = (payload: unknown): string | null => {
  if (!isRecord(payload) || !isRecord(payload.error)) return null
  const message = payload.error.message
  return typeof message === "string" && message.length > 0 ? message : null
}

export const postChatCompletion = async (
  endpoint: ChatEndpoint,
  body: Record<string, unknown>,
  options: PostOptions = {},
): Promise<Response> => {
  const controller = new AbortController()
  const timeoutMs = endpoint.requestTimeoutMs ?? DEFAULT_TIMEOUT_MS
  let timedOut = false
  const timeout = setTimeout(() => {
    timedOut = true
    controller.abort()
  }, timeoutMs)
  const external = options.signal
  const forwardAbort = () => controller.abort()
  if (external) {
    if (external.aborted) controller.abort()
    else external.addEventListener("abort", forwardAbort, { once: true })
  }
  let response: Response
  try {
    response = await fetch(endpoint.url, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        Authorization: `Bearer ${endpoint.apiKey}`,
      },
      body: JSON.stringify(body),
      signal: controller.signal,
    })
  } catch (error) {
    clearTimeout(timeout)
    external?.removeEventListener("abort", forwardAbort)
    if (timedOut) {
      throw new TransportError(`Request timed out after ${timeoutMs}ms`, null, undefined, { cause: error })
    }
    if (external?.aborted) throw error
    const reason = error instanceof Error ? error.message : String(error)
    throw new TransportError(`error sending request: ${reason}`, null, undefined, { cause: error })
  }
  if (options.stream) clearTimeout(timeout)
  try {
    if (!response.ok) {
      const text = await response.text().catch(() => "")
      const payload = parseJson(text)
      const apiMessage = extractApiErrorMessage(payload)
      throw new TransportError(
        apiMessage ? `API error: ${apiMessage}` : `API request failed with status ${response.status}: ${text}`,
        response.status,
        payload ?? text,
      )
    }
    return response
  } finally {
    if (!options.stream) {
      clearTimeout(timeout)
    }
  }
}

export const requestChatCompletion = async (
  endpoint: ChatEndpoint,
  body: Record<string, unknown>,
  options: PostOptions = {},
): Promise<string> => {
  const response = await postChatCompletion(endpoint, body, { ...options, stream: false })
  const text = await response.text()
  const payload = parseJson(text)
  if (payload === undefined) {
    throw new TransportError("error unmarshaling response", response.status, text)
  }
  const apiMessage = extractApiErrorMessage(payload)
  if (apiMessage) throw new TransportError(`API error: ${apiMessage}`, response.status, payload)
  const choices = isRecord(payload) && Array.isArray(payload.choices) ? payload.choices : []
  const first: unknown = choices[0]
  if (!isRecord(first) || !isRecord(first.message) || typeof first.message.content !== "string") {
    throw new TransportError("no response from API", response.status, payload)
  }
  return first.message.content
}
