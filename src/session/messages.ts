import type { ChatMessage, ProviderSnapshot } from "../providers/types.js"
import { APP_NAME } from "../version.js"

export type MessageType = "system" | "user" | "assistant" | "notice" | "error"

export interface Message {
  readonly type: MessageType
  readonly content: string
}

export const SYSTEM_PROMPT = "You are a helpful assistant."
export const MAX_HISTORY_MESSAGES = 20
const RULE = "-----------------------------------"

export const systemMessage = (): Message => ({ type: "system", content: SYSTEM_PROMPT })

export const noticeMessage = (content: string): Message => ({ type: "notice", content })

export const errorMessage = (content: string): Message => ({ type: "error", content })

export const helloMessage = (snapshot: ProviderSnapshot): Message =>
  noticeMessage(
    [
      `Welcome to ${APP_NAME} interactive mode!`,
      `Provider: ${snapshot.name} (Model: ${snapshot.currentModel}, Temperature: ${snapshot.currentTemperature.toFixed(1)})`,
      "Type ':h' to see all available commands.",
      RULE,
    ].join("\n"),
  )

export const helpMessage = (): Message =>
  noticeMessage(
    [
      "",
      "Available commands:",
      "- ':h' - Show this message",
      "- ':p' - Select a provider (ctrl+p)",
      "- ':m' - Select a model (ctrl+k)",
      "- ':t' - Set the temperature (ctrl+t)",
      "- ':k' - Set the API key",
      "- ':c' - Start a new conversation",
      "- 'alt+enter' - Insert a newline",
      "- 'pgup/pgdn/home/end' - Scroll the conversation",
      "- 'esc' - Cancel a selector or the current response",
      "- 'ctrl+c' - Exit interactive mode",
      RULE,
    ].join("\n"),
  )

/** The System message always stays first. */
export const createInitialMessages = (snapshot: ProviderSnapshot): Message[] => [systemMessage(), helloMessage(snapshot)]

export const appendMessage = (messages: ReadonlyArray<Message>, message: Message): Message[] => [...messages, message]

/** `:c` keeps only the System message. */
export const resetConversation = (messages: ReadonlyArray<Message>): Message[] => {
  const first = messages[0]
  return [first && first.type === "system" ? first : systemMessage()]
}

const lastIndexOfType = (messages: ReadonlyArray<Message>, type: MessageType): number => {
  for (let index = messages.length - 1; index >= 0; index -= 1) {
    if (messages[index].type === type) return index
  }
  return -1
}

export const extendLastAssistant = (messages: ReadonlyArray<Message>, delta: string): Message[] => {
  const index = lastIndexOfType(messages, "assistant")
  if (index < 0) return appendMessage(messages, { type: "assistant", content: delta })
  const next = [...messages]
  next[index] = { type: "assistant", content: messages[index].content + delta }
  return next
}

export const replaceLastAssistant = (messages: ReadonlyArray<Message>, replacement: Message): Message[] => {
  const index = lastIndexOfType(messages, "assistant")
  if (index < 0) return appendMessage(messages, replacement)
  const next = [...messages]
  next[index] = replacement
  return next
}

/** System message plus the most recent user/assistant turns, in request shape. */
export const toRequestMessages = (
  messages: ReadonlyArray<Message>,
  limit: number = MAX_HISTORY_MESSAGES,
): ChatMessage[] => {
  const system = messages.find((message) => message.type === "system") ?? systemMessage()
  const turns: ChatMessage[] = []
  for (const message of messages) {
    if (message.type === "user" || message.type === "assistant") {
      turns.push({ role: message.type, content: message.content })
    }
  }
  return [{ role: "system", content: system.content }, ...turns.slice(Math.max(0, turns.length - limit))]
}
