import type { Command } from "commander"
import type { CommandContext } from "../core/command-context"
import type { ExitCode } from "../core/exit-code"

/** What a registered command needs from the program it is attached to. */
export type CommandRuntime = {
  context(command: Command): Promise<CommandContext>
  finish(code: ExitCode): void
}
