import { Effect } from "effect"
import { afterEach, describe, expect, it, vi } from "vitest"
import { deepseekDefinition } from "../../providers/definitions.js"
import { createChatProvider, resolveInitialSettings } from "../../providers/provider.js"
import { ProviderRegistry } from "../../providers/registry.js"
import type { ChatMessage } from "../../providers/types.js"
import { SYSTEM_PROMPT } from "../../session/messages.js"
import { runOneShot } from "../ask.js"
import { formatConfigValue, maskConfigSecrets } from "../config.js"
import { reportFailure } from "../context.js"
import { joinPrompt } from "../input.js"

const registryStreaming = (parts: string[], requests: Array<ReadonlyArray<ChatMessage>> = []) => {
  const provider = createChatProvider(deepseekDefinition, resolveInitialSettings(deepseekDefinition, { apiKey: "test-secret" }))
  return new ProviderRegistry(
    [
      {
        ...provider,
        async *streamChat(messages) {
          requests.push(messages)
          for (const content of parts) yield { content }
        },
      },
    ],
    { setValue: async () => undefined },
  )
}

describe("joinPrompt", () => {
  it("joins arguments and piped input with a blank line", () => {
    expect(joinPrompt(["explain", "this"], "const x = 1\n")).toBe("explain this\n\nconst x = 1")
    expect(joinPrompt([], "  only piped ")).toBe("only piped")
    expect(joinPrompt(["  "], "")).toBe("")
  })
})

describe("maskConfigSecrets", () => {
  it("masks every provider api key", () => {
    expect(
      maskConfigSecrets({
        provider: "openai",
        providers: { openai: { api_key: "test-secret-openai", model: "o1" }, grok: { model: "grok-2-1212" } },
      }),
    ).toEqual({
      provider: "openai",
      providers: { openai: { api_key: "test****enai", model: "o1" }, grok: { model: "grok-2-1212" } },
    })
  })

  it("formats nested values as json", () => {
    expect(formatConfigValue({ model: "o1" })).toBe('{\n  "model": "o1"\n}')
    expect(formatConfigValue(0.7)).toBe("0.7")
  })
})

describe("runOneShot", () => {
  it("streams the answer and ends with a newline", async () => {
    const requests: Array<ReadonlyArray<ChatMessage>> = []
    const output: string[] = []
    await runOneShot(registryStreaming(["Hel", "lo"], requests), "hi", (chunk) => output.push(chunk))
    expect(output).toEqual(["Hel", "lo", "\n"])
    expect(requests).toEqual([
      [
        { role: "system", content: SYSTEM_PROMPT },
        { role: "user", content: "hi" },
      ],
    ])
  })

  it("requires a prompt", async () => {
    await expect(runOneShot(registryStreaming([]), "  ", () => undefined)).rejects.toThrow(
      "A prompt is required with --no-interaction",
    )
  })
})

describe("reportFailure", () => {
  const previousExitCode = process.exitCode

  afterEach(() => {
    process.exitCode = previousExitCode
    vi.restoreAllMocks()
  })

  it("prints one error line and fails the exit code", async () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => undefined)
    await Effect.runPromise(reportFailure(new Error("Key not found: debug")))
    expect(errorSpy).toHaveBeenCalledWith("Error: Key not found: debug")
    expect(process.exitCode).toBe(1)
  })
})
