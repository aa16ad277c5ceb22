import { AccountId } from "@tessera/account-id"
import type { Command } from "commander"
import type { CommandContext } from "../core/command-context"
import { ExitCode, worstOf } from "../core/exit-code"
import { reportInvalid } from "./report-invalid"
import type { CommandRuntime } from "./runtime"

export function validateIds(ctx: CommandContext, ids: readonly string[]): ExitCode {
  const log = ctx.logger.child({ command: "validate" })

  return worstOf(
    ids.map((id) => {
      const result = AccountId.validate(id)
      log.debug("Validated account ID", { accountId: id, valid: result.success })

      if (!result.success) return reportInvalid(ctx, log, id, result.error)

      ctx.output.emit(`${id}: valid`, { accountId: id, valid: true })
      return ExitCode.Success
    }),
  )
}

export function registerValidateCommand(program: Command, runtime: CommandRuntime): void {
  program
    .command("validate")
    .description("check account IDs against the grammar")
    .argument("<ids...>", "account IDs to check")
    .action(async (ids: string[], _options: unknown, command: Command) => {
      runtime.finish(validateIds(await runtime.context(command), ids))
    })
}
