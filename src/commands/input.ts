import { text } from "node:stream/consumers"

/** Prompt arguments and piped stdin, separated by a blank line. */
export const joinPrompt = (args: ReadonlyArray<string>, piped: string): string =>
  [args.join(" ").trim(), piped.trim()].filter((part) => part.length > 0).join("\n\n")

export const readPipedStdin = (stdin: NodeJS.ReadStream = process.stdin): Promise<string> =>
  stdin.isTTY ? Promise.resolve("") : text(stdin)
