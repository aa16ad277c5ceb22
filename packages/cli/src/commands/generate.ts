import {
  type AccountId,
  accountIdArbitrary,
  ethImplicitAccountIdArbitrary,
  namedAccountIdArbitrary,
  nearDeterministicAccountIdArbitrary,
  nearImplicitAccountIdArbitrary,
} from "@tessera/account-id"
import { type Command, InvalidArgumentError, Option } from "commander"
import fc from "fast-check"
import { z } from "zod"
import type { CommandContext } from "../core/command-context"
import { ExitCode } from "../core/exit-code"
import type { CommandRuntime } from "./runtime"

export const generatorKinds = ["any", "named", "near-implicit", "eth-implicit", "deterministic"] as const
export type GeneratorKind = (typeof generatorKinds)[number]

const generators: Record<GeneratorKind, () => fc.Arbitrary<AccountId>> = {
  any: () => accountIdArbitrary(),
  named: namedAccountIdArbitrary,
  "near-implicit": nearImplicitAccountIdArbitrary,
  "eth-implicit": ethImplicitAccountIdArbitrary,
  deterministic: nearDeterministicAccountIdArbitrary,
}

const generateOptionsSchema = z.object({
  kind: z.enum(generatorKinds),
  count: z.number().int().positive(),
  seed: z.number().int().optional(),
})

export type GenerateOptions = z.infer<typeof generateOptionsSchema>

export const DEFAULT_COUNT = 5

export function generateIds(ctx: CommandContext, options: GenerateOptions): ExitCode {
  const log = ctx.logger.child({ command: "generate" })

  const ids = fc.sample(generators[options.kind](), { numRuns: options.count, seed: options.seed })
  log.debug("Generated account IDs", { kind: options.kind, count: ids.length, seed: options.seed })

  for (const id of ids) {
    ctx.output.emit(id.asStr(), { accountId: id.asStr(), accountType: id.getAccountType() })
  }

  return ExitCode.Success
}

function integerAtLeast(min: number) {
  return (raw: string): number => {
    const value = Number(raw)

    if (raw.trim() === "" || !Number.isSafeInteger(value) || value < min) {
      throw new InvalidArgumentError(`Expected an integer >= ${min}.`)
    }

    return value
  }
}

export function registerGenerateCommand(program: Command, runtime: CommandRuntime): void {
  program
    .command("generate")
    .description("print random valid account IDs")
    .addOption(
      new Option("-k, --kind <kind>", "account type to generate").choices(generatorKinds).default("any"),
    )
    .option("-n, --count <n>", "how many IDs to print", integerAtLeast(1), DEFAULT_COUNT)
    .option("-s, --seed <seed>", "seed for reproducible output", integerAtLeast(Number.MIN_SAFE_INTEGER))
    .action(async (options: unknown, command: Command) => {
      const ctx = await runtime.context(command)

      runtime.finish(generateIds(ctx, generateOptionsSchema.parse(options)))
    })
}
