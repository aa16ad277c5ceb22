export const ExitCode = {
  Success: 0,
  /** The command ran and the answer was negative: invalid input, no parent, not a sub-account. */
  Failure: 1,
  /** Bad arguments or configuration. */
  Usage: 2,
} as const

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode]

export function worstOf(codes: readonly ExitCode[]): ExitCode {
  return codes.reduce<ExitCode>((worst, code) => (code > worst ? code : worst), ExitCode.Success)
}
