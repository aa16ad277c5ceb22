import { AccountIdRef } from "@tessera/account-id"
import type { Command } from "commander"
import type { CommandContext } from "../core/command-context"
import { ExitCode } from "../core/exit-code"
import { reportInvalid } from "./report-invalid"
import type { CommandRuntime } from "./runtime"

export function checkSubAccount(ctx: CommandContext, childId: string, parentId: string): ExitCode {
  const log = ctx.logger.child({ command: "sub-account" })

  const child = AccountIdRef.safeParse(childId)
  if (!child.success) return reportInvalid(ctx, log, childId, child.error)

  const parent = AccountIdRef.safeParse(parentId)
  if (!parent.success) return reportInvalid(ctx, log, parentId, parent.error)

  const isSubAccount = child.value.isSubAccountOf(parent.value)
  log.debug("Checked sub-account relation", { accountId: childId, parent: parentId, isSubAccount })

  ctx.output.emit(String(isSubAccount), { child: childId, parent: parentId, isSubAccount })

  return isSubAccount ? ExitCode.Success : ExitCode.Failure
}

export function registerSubAccountCommand(program: Command, runtime: CommandRuntime): void {
  program
    .command("sub-account")
    .description("check whether <child> is a direct sub-account of <parent>")
    .argument("<child>", "candidate sub-account")
    .argument("<parent>", "candidate parent account")
    .action(async (child: string, parent: string, _options: unknown, command: Command) => {
      runtime.finish(checkSubAccount(await runtime.context(command), child, parent))
    })
}
