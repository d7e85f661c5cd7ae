import React from "react"
import { Box, Text } from "ink"
import { visibleWidth } from "../../session/displayWidth.js"
import { selectorHeading, selectorRowText, type SelectorWidget } from "../../session/selector.js"
import { PANEL_COLORS } from "../render/theme.js"

export interface SelectPanelRow {
  readonly text: string
  readonly isActive: boolean
}

export interface SelectPanelProps {
  readonly widget: SelectorWidget<string | number>
  readonly maxWidth: number
}

const PADDING_X = 1
// Border columns on either side.
const CHROME_WIDTH = 2 + PADDING_X * 2

export const selectPanelRows = (widget: SelectorWidget<string | number>): SelectPanelRow[] =>
  widget.options.map((option, index) => ({
    text: selectorRowText(option, index === widget.currentIndex),
    isActive: index === widget.currentIndex,
  }))

export const SelectPanel = ({ widget, maxWidth }: SelectPanelProps) => {
  const heading = selectorHeading(widget)
  const rows = selectPanelRows(widget)
  const contentWidth = Math.max(visibleWidth(heading), ...rows.map((row) => visibleWidth(row.text)))
  const width = Math.max(CHROME_WIDTH + 1, Math.min(maxWidth, contentWidth + CHROME_WIDTH))
  return (
    <Box flexDirection="column" borderStyle="round" borderColor={PANEL_COLORS.border} paddingX={PADDING_X} width={width}>
      <Text color={PANEL_COLORS.heading} wrap="truncate-end">
        {heading}
      </Text>
      <Box flexDirection="column" marginTop={1}>
        {rows.map((row, idx) => (
          <Text
            key={`row-${idx}`}
            color={row.isActive ? PANEL_COLORS.current : PANEL_COLORS.option}
            bold={row.isActive}
            wrap="truncate-end"
          >
            {row.text}
          </Text>
        ))}
      </Box>
    </Box>
  )
}
