import { AccountIdRef } from "@tessera/account-id"
import type { Command } from "commander"
import type { CommandContext } from "../core/command-context"
import { ExitCode } from "../core/exit-code"
import { reportInvalid } from "./report-invalid"
import type { CommandRuntime } from "./runtime"

export function printParent(ctx: CommandContext, id: string): ExitCode {
  const log = ctx.logger.child({ command: "parent", accountId: id })

  const result = AccountIdRef.safeParse(id)
  if (!result.success) return reportInvalid(ctx, log, id, result.error)

  const parent = result.value.getParentAccountId()
  log.debug("Resolved parent account", { parent: parent?.asStr() ?? null })

  if (!parent) {
    ctx.output.emit(`${id}: no parent`, { accountId: id, parent: null })
    return ExitCode.Failure
  }

  ctx.output.emit(parent.asStr(), { accountId: id, parent: parent.asStr() })
  return ExitCode.Success
}

export function registerParentCommand(program: Command, runtime: CommandRuntime): void {
  program
    .command("parent")
    .description("print the parent of an account ID")
    .argument("<id>", "account ID")
    .action(async (id: string, _options: unknown, command: Command) => {
      runtime.finish(printParent(await runtime.context(command), id))
    })
}
