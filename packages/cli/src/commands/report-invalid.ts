import { type ParseAccountError, serializeError } from "@tessera/account-id"
import type { CommandContext } from "../core/command-context"
import { ExitCode } from "../core/exit-code"
import type { Logger } from "../ports/logger"

export function reportInvalid(
  ctx: CommandContext,
  log: Logger,
  id: string,
  error: ParseAccountError,
): ExitCode {
  log.info("Rejected account ID", { accountId: id, err: error })

  ctx.output.emit(`${id}: ${error.message}`, {
    accountId: id,
    valid: false,
    error: serializeError(error),
  })

  return ExitCode.Failure
}
