import fs from "node:fs"
import path from "node:path"

interface DebugLogSettings {
  enabled: boolean
  filePath: string | null
}

const settings: DebugLogSettings = {
  enabled: false,
  filePath: null,
}

export const configureDebugLog = (next: { readonly enabled?: boolean; readonly filePath?: string | null }): void => {
  if (typeof next.enabled === "boolean") settings.enabled = next.enabled
  if (next.filePath !== undefined) settings.filePath = next.filePath ? path.resolve(next.filePath) : null
}

export const isDebugEnabled = (): boolean => settings.enabled || process.env.PARLEY_DEBUG === "1"

export const debugLog = (scope: string, payload: Record<string, unknown>): void => {
  if (!isDebugEnabled()) return
  const line = JSON.stringify({ at: new Date().toISOString(), scope, ...payload })
  const target = settings.filePath ?? process.env.PARLEY_DEBUG_LOG?.trim() ?? ""
  if (!target) {
    console.error(line)
    return
  }
  try {
    fs.mkdirSync(path.dirname(target), { recursive: true })
    fs.appendFileSync(target, `${line}\n`, "utf8")
  } catch (error) {
    console.error(JSON.stringify({ debugLogWriteError: String(error), target }))
  }
}
