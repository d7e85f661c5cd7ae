import chalk from "chalk"
import type { MessageType } from "../../session/messages.js"

export const MESSAGE_COLORS: Record<MessageType, string> = {
  user: "#5e9aa4",
  assistant: "#5ea46b",
  system: "#87CEEB",
  notice: "#D3D3D3",
  error: "#a45e8b",
}

export const PANEL_COLORS = {
  border: "#5e9aa4",
  heading: "#87CEEB",
  option: "#D3D3D3",
  current: "#5ea46b",
} as const

export const PROMPT_COLOR = MESSAGE_COLORS.user

export const paint = (type: MessageType, text: string): string => (text ? chalk.hex(MESSAGE_COLORS[type])(text) : text)

export const paintSelected = (type: MessageType, text: string): string =>
  text ? chalk.inverse(chalk.hex(MESSAGE_COLORS[type])(text)) : text
