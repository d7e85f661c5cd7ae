import React from "react"
import { Box, Text, useInput } from "ink"
import type { SessionEvent } from "../../session/events.js"
import { activeWidget } from "../../session/selector.js"
import { conversationRows, layoutLines, type SessionState } from "../../session/state.js"
import { toKeyInput } from "../input/keys.js"
import { containsMouseReport, parseMouseReports } from "../input/mouse.js"
import { renderConversationRows, renderPromptRows } from "../render/frame.js"
import { SelectPanel } from "./SelectPanel.js"

export interface ChatViewProps {
  readonly state: SessionState
  readonly onEvent: (event: SessionEvent) => void
}

export const ChatView = ({ state, onEvent }: ChatViewProps) => {
  useInput((input, key) => {
    if (containsMouseReport(input)) {
      for (const mouse of parseMouseReports(input)) onEvent({ type: "mouse", mouse })
      return
    }
    const keyInput = toKeyInput(input, key)
    if (keyInput) onEvent({ type: "key", key: keyInput })
  })

  const widget = activeWidget(state.selectors)
  if (widget) {
    return (
      <Box flexDirection="column" width={state.viewport.width}>
        <SelectPanel widget={widget} maxWidth={state.viewport.width} />
      </Box>
    )
  }

  const lines = layoutLines(state)
  const conversation = renderConversationRows(state, lines)
  const prompt = renderPromptRows(state, lines)
  return (
    <Box flexDirection="column" width={state.viewport.width}>
      <Box flexDirection="column" height={conversationRows(state)}>
        {conversation.map((row, idx) => (
          <Text key={`line-${idx}`} wrap="truncate-end">
            {row || " "}
          </Text>
        ))}
      </Box>
      {prompt.map((row, idx) => (
        <Text key={`prompt-${idx}`} wrap="truncate-end">
          {row}
        </Text>
      ))}
    </Box>
  )
}
