import type { ChatMessage, ProviderSnapshot, ProviderSummary } from "../providers/types.js"
import type { SettingChange } from "./selector.js"

export type NamedKey =
  | "enter"
  | "escape"
  | "up"
  | "down"
  | "left"
  | "right"
  | "pageUp"
  | "pageDown"
  | "home"
  | "end"
  | "backspace"
  | "delete"
  | "tab"

export type KeyInput =
  | { readonly kind: "text"; readonly text: string }
  | { readonly kind: "named"; readonly name: NamedKey; readonly alt?: boolean }
  | { readonly kind: "ctrl"; readonly letter: string }

/** Zero-based cell coordinates relative to the top-left of the frame. */
export type MouseInput =
  | { readonly kind: "press" | "drag" | "release"; readonly x: number; readonly y: number }
  | { readonly kind: "wheel"; readonly direction: "up" | "down"; readonly x: number; readonly y: number }

export type SessionEvent =
  | { readonly type: "key"; readonly key: KeyInput }
  | { readonly type: "mouse"; readonly mouse: MouseInput }
  | { readonly type: "resize"; readonly width: number; readonly height: number }
  | { readonly type: "blink" }
  | { readonly type: "submit_prompt"; readonly text: string }
  | { readonly type: "stream_chunk"; readonly turn: number; readonly content: string }
  | { readonly type: "stream_done"; readonly turn: number }
  | { readonly type: "stream_error"; readonly turn: number; readonly message: string; readonly notReady: boolean }
  | {
      readonly type: "provider_updated"
      readonly provider: ProviderSnapshot
      readonly providers: ReadonlyArray<ProviderSummary>
    }
  | { readonly type: "setting_failed"; readonly message: string; readonly validation: boolean }
  | {
      readonly type: "api_key_saved"
      readonly providerName: string
      readonly provider: ProviderSnapshot
      readonly providers: ReadonlyArray<ProviderSummary>
    }
  | { readonly type: "api_key_failed"; readonly message: string }

export type SessionCommand =
  | { readonly type: "start_stream"; readonly turn: number; readonly messages: ReadonlyArray<ChatMessage> }
  | { readonly type: "receive_next"; readonly turn: number }
  | { readonly type: "cancel_stream"; readonly turn: number }
  | { readonly type: "apply_setting"; readonly change: SettingChange }
  | { readonly type: "save_api_key"; readonly apiKey: string }
  | { readonly type: "copy_selection"; readonly text: string }
  | { readonly type: "quit" }
