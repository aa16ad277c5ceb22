import { accountIdJsonSchema } from "@tessera/account-id"
import type { Command } from "commander"
import type { CommandContext } from "../core/command-context"
import { ExitCode } from "../core/exit-code"
import type { CommandRuntime } from "./runtime"

export function printSchema(ctx: CommandContext): ExitCode {
  const schema = accountIdJsonSchema()

  ctx.output.emit(JSON.stringify(schema, null, 2), schema)

  return ExitCode.Success
}

export function registerSchemaCommand(program: Command, runtime: CommandRuntime): void {
  program
    .command("schema")
    .description("print the JSON Schema of the account ID text form")
    .action(async (_options: unknown, command: Command) => {
      runtime.finish(printSchema(await runtime.context(command)))
    })
}
