import { Command, CommanderError, Option } from "commander"
import { z } from "zod"
import { registerClassifyCommand } from "./commands/classify"
import { registerGenerateCommand } from "./commands/generate"
import { registerParentCommand } from "./commands/parent"
import type { CommandRuntime } from "./commands/runtime"
import { registerSchemaCommand } from "./commands/schema"
import { registerSubAccountCommand } from "./commands/sub-account"
import { registerValidateCommand } from "./commands/validate"
import { type CommandContextDeps, createCommandContext } from "./core/command-context"
import { ConfigError } from "./core/config/config-error"
import { ExitCode } from "./core/exit-code"
import { logLevelNames } from "./ports/log-level"
import type { TextSink } from "./ports/text-sink"

export type ProgramDeps = Omit<CommandContextDeps, "env"> & {
  stderr: TextSink
  env?: Record<string, string | undefined>
}

const globalOptionsSchema = z.object({
  json: z.boolean().optional(),
  logLevel: z.enum(logLevelNames).optional(),
  pretty: z.boolean().optional(),
})

export function createProgram(deps: ProgramDeps, finish: (code: ExitCode) => void): Command {
  const program = new Command("account-id")
    .description("Validate, classify and generate account IDs")
    .option("--json", "write one JSON document per line (ACCOUNT_ID_OUTPUT=json)")
    .addOption(
      new Option("--log-level <level>", "minimum log level on stderr (ACCOUNT_ID_LOG_LEVEL)").choices(
        logLevelNames,
      ),
    )
    .option("--pretty", "pretty-print log entries (ACCOUNT_ID_LOG_PRETTY)")
    .exitOverride()
    .configureOutput({
      writeOut: (text) => deps.stdout.write(text),
      writeErr: (text) => deps.stderr.write(text),
    })

  const runtime: CommandRuntime = {
    context: (command) =>
      createCommandContext(globalOptionsSchema.parse(command.optsWithGlobals()), {
        stdout: deps.stdout,
        env: deps.env ?? process.env,
        logger: deps.logger,
        logDestination: deps.logDestination,
      }),
    finish,
  }

  registerValidateCommand(program, runtime)
  registerClassifyCommand(program, runtime)
  registerParentCommand(program, runtime)
  registerSubAccountCommand(program, runtime)
  registerGenerateCommand(program, runtime)
  registerSchemaCommand(program, runtime)

  return program
}

/**
 * Runs the tool on `argv` (arguments only, without the node and script
 * paths) and resolves to the process exit code.
 *
 * Usage errors and invalid configuration resolve to `ExitCode.Usage`; any
 * other error is rethrown.
 */
export async function run(argv: readonly string[], deps: ProgramDeps): Promise<ExitCode> {
  let exitCode: ExitCode = ExitCode.Success

  const program = createProgram(deps, (code) => {
    exitCode = code
  })

  try {
    await program.parseAsync([...argv], { from: "user" })
  } catch (err) {
    if (err instanceof CommanderError) {
      return err.exitCode === 0 ? ExitCode.Success : ExitCode.Usage
    }

    if (err instanceof ConfigError) {
      deps.stderr.write(`error: ${err.message}\n`)
      return ExitCode.Usage
    }

    throw err
  }

  return exitCode
}
