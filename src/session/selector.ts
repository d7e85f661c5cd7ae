import type { ProviderSnapshot, ProviderSummary } from "../providers/types.js"

export type SelectorKind = "provider" | "model" | "temperature"

export interface SelectorOption<T> {
  readonly label: string
  readonly value: T
}

export interface SelectorWidget<T> {
  readonly kind: SelectorKind
  readonly title: string
  readonly options: ReadonlyArray<SelectorOption<T>>
  readonly currentIndex: number
  readonly active: boolean
}

interface SelectorValues {
  readonly provider: string
  readonly model: string
  readonly temperature: number
}

export type SelectorSet = { readonly [K in SelectorKind]: SelectorWidget<SelectorValues[K]> }

export type SettingChange =
  | { readonly kind: "provider"; readonly value: string }
  | { readonly kind: "model"; readonly value: string }
  | { readonly kind: "temperature"; readonly value: number }

export const SELECTOR_KINDS: ReadonlyArray<SelectorKind> = ["provider", "model", "temperature"]

export const SELECTOR_TITLES: Record<SelectorKind, string> = {
  provider: "Select a provider",
  model: "Select a model",
  temperature: "Select a temperature preset",
}

export const createSelector = <T>(
  kind: SelectorKind,
  options: ReadonlyArray<SelectorOption<T>>,
  currentIndex = 0,
): SelectorWidget<T> => ({
  kind,
  title: SELECTOR_TITLES[kind],
  options,
  currentIndex: currentIndex >= 0 && currentIndex < options.length ? currentIndex : 0,
  active: false,
})

export const activateSelector = <T>(widget: SelectorWidget<T>): SelectorWidget<T> =>
  widget.active ? widget : { ...widget, active: true }

export const deactivateSelector = <T>(widget: SelectorWidget<T>): SelectorWidget<T> =>
  widget.active ? { ...widget, active: false } : widget

export const nextOption = <T>(widget: SelectorWidget<T>): SelectorWidget<T> => {
  const count = widget.options.length
  if (count === 0) return widget
  return { ...widget, currentIndex: (widget.currentIndex + 1) % count }
}

export const previousOption = <T>(widget: SelectorWidget<T>): SelectorWidget<T> => {
  const count = widget.options.length
  if (count === 0) return widget
  return { ...widget, currentIndex: (widget.currentIndex - 1 + count) % count }
}

/** Returns the same widget when `index` is out of range. */
export const selectByIndex = <T>(widget: SelectorWidget<T>, index: number): SelectorWidget<T> => {
  if (!Number.isInteger(index) || index < 0 || index >= widget.options.length) return widget
  return { ...widget, currentIndex: index }
}

export const confirmSelector = <T>(widget: SelectorWidget<T>): { widget: SelectorWidget<T>; value: T | undefined } => ({
  widget: deactivateSelector(widget),
  value: widget.options[widget.currentIndex]?.value,
})

export const cancelSelector = deactivateSelector

export const formatTemperaturePresetLabel = (preset: { name: string; value: number; description: string }): string =>
  `${preset.name} (${preset.value.toFixed(1)}) - ${preset.description}`

const indexOrZero = (index: number): number => (index < 0 ? 0 : index)

export const buildSelectors = (snapshot: ProviderSnapshot, providers: ReadonlyArray<ProviderSummary>): SelectorSet => ({
  provider: createSelector(
    "provider",
    providers.map((provider) => ({
      label: `${provider.name} [${provider.isReady ? "Ready" : "Not Ready"}]`,
      value: provider.name,
    })),
    indexOrZero(providers.findIndex((provider) => provider.name === snapshot.name)),
  ),
  model: createSelector(
    "model",
    snapshot.availableModels.map((model) => ({ label: model, value: model })),
    indexOrZero(snapshot.availableModels.indexOf(snapshot.currentModel)),
  ),
  temperature: createSelector(
    "temperature",
    snapshot.temperaturePresets.map((preset) => ({ label: formatTemperaturePresetLabel(preset), value: preset.value })),
    indexOrZero(snapshot.temperaturePresets.findIndex((preset) => preset.value === snapshot.currentTemperature)),
  ),
})

export const activeSelectorKind = (set: SelectorSet): SelectorKind | null =>
  SELECTOR_KINDS.find((kind) => set[kind].active) ?? null

/** Activating one selector deactivates the others. */
export const activateOnly = (set: SelectorSet, kind: SelectorKind): SelectorSet => ({
  provider: kind === "provider" ? activateSelector(set.provider) : deactivateSelector(set.provider),
  model: kind === "model" ? activateSelector(set.model) : deactivateSelector(set.model),
  temperature: kind === "temperature" ? activateSelector(set.temperature) : deactivateSelector(set.temperature),
})

export const deactivateAll = (set: SelectorSet): SelectorSet => ({
  provider: deactivateSelector(set.provider),
  model: deactivateSelector(set.model),
  temperature: deactivateSelector(set.temperature),
})

export type SelectorMove = "next" | "previous" | { readonly index: number }

const move = <T>(widget: SelectorWidget<T>, action: SelectorMove): SelectorWidget<T> => {
  if (action === "next") return nextOption(widget)
  if (action === "previous") return previousOption(widget)
  return selectByIndex(widget, action.index)
}

export const moveActive = (set: SelectorSet, action: SelectorMove): SelectorSet => {
  switch (activeSelectorKind(set)) {
    case "provider":
      return { ...set, provider: move(set.provider, action) }
    case "model":
      return { ...set, model: move(set.model, action) }
    case "temperature":
      return { ...set, temperature: move(set.temperature, action) }
    case null:
      return set
  }
}

export const confirmActive = (set: SelectorSet): { selectors: SelectorSet; change: SettingChange | null } => {
  switch (activeSelectorKind(set)) {
    case "provider": {
      const { widget, value } = confirmSelector(set.provider)
      return { selectors: { ...set, provider: widget }, change: value === undefined ? null : { kind: "provider", value } }
    }
    case "model": {
      const { widget, value } = confirmSelector(set.model)
      return { selectors: { ...set, model: widget }, change: value === undefined ? null : { kind: "model", value } }
    }
    case "temperature": {
      const { widget, value } = confirmSelector(set.temperature)
      return {
        selectors: { ...set, temperature: widget },
        change: value === undefined ? null : { kind: "temperature", value },
      }
    }
    case null:
      return { selectors: set, change: null }
  }
}

export const activeWidget = (set: SelectorSet): SelectorWidget<string | number> | null => {
  const kind = activeSelectorKind(set)
  return kind ? set[kind] : null
}

export const selectorHeading = (widget: SelectorWidget<unknown>): string =>
  `${widget.title} (↑/↓ to navigate, Enter to select, ESC to cancel):`

export const selectorRowText = (option: SelectorOption<unknown>, isCurrent: boolean): string =>
  isCurrent ? ` > [*] ${option.label}` : `   [ ] ${option.label}`
