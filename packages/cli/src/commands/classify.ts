import { AccountId, isImplicitAccountType } from "@tessera/account-id"
import type { Command } from "commander"
import type { CommandContext } from "../core/command-context"
import { ExitCode, worstOf } from "../core/exit-code"
import { reportInvalid } from "./report-invalid"
import type { CommandRuntime } from "./runtime"

export function classifyIds(ctx: CommandContext, ids: readonly string[]): ExitCode {
  const log = ctx.logger.child({ command: "classify" })

  return worstOf(
    ids.map((id) => {
      const result = AccountId.safeParse(id)
      if (!result.success) return reportInvalid(ctx, log, id, result.error)

      const accountType = result.value.getAccountType()
      log.debug("Classified account ID", { accountId: id, accountType })

      ctx.output.emit(`${id}: ${accountType}`, {
        accountId: id,
        accountType,
        implicit: isImplicitAccountType(accountType),
      })
      return ExitCode.Success
    }),
  )
}

export function registerClassifyCommand(program: Command, runtime: CommandRuntime): void {
  program
    .command("classify")
    .description("print the account type of each account ID")
    .argument("<ids...>", "account IDs to classify")
    .action(async (ids: string[], _options: unknown, command: Command) => {
      runtime.finish(classifyIds(await runtime.context(command), ids))
    })
}
