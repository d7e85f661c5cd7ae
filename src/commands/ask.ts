import { ValidationError } from "../errors.js"
import type { ProviderRegistry } from "../providers/registry.js"
import { systemMessage, toRequestMessages } from "../session/messages.js"

export type OutputWriter = (chunk: string) => void

const writeStdout: OutputWriter = (chunk) => {
  process.stdout.write(chunk)
}

/** Sends one prompt and streams the answer, ending with a newline. */
export const runOneShot = async (
  registry: ProviderRegistry,
  prompt: string,
  write: OutputWriter = writeStdout,
  signal?: AbortSignal,
): Promise<void> => {
  if (!prompt.trim()) {
    throw new ValidationError("A prompt is required with --no-interaction")
  }
  const messages = toRequestMessages([systemMessage(), { type: "user", content: prompt }])
  for await (const chunk of registry.streamChat(messages, { signal })) {
    write(chunk.content)
  }
  write("\n")
}
