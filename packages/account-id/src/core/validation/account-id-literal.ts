import type { MAX_LEN } from "./validate"

type LowerAlpha =
  | "a" | "b" | "c" | "d" | "e" | "f" | "g" | "h" | "i" | "j" | "k" | "l" | "m"
  | "n" | "o" | "p" | "q" | "r" | "s" | "t" | "u" | "v" | "w" | "x" | "y" | "z"

type Digit = "0" | "1" | "2" | "3" | "4" | "5" | "6" | "7" | "8" | "9"

type BodyChar = LowerAlpha | Digit
type SeparatorChar = "-" | "_" | "."

/**
 * Type-level scan of a string literal: same state machine as `validate`,
 * counting characters in `Seen` to enforce the length bounds.
 */
type Scan<S extends string, PreviousIsSeparator extends boolean, Seen extends unknown[]> =
  S extends `${infer Char}${infer Rest}`
    ? Seen["length"] extends typeof MAX_LEN
      ? false
      : Char extends BodyChar
        ? Scan<Rest, false, [...Seen, Char]>
        : Char extends SeparatorChar
          ? PreviousIsSeparator extends true
            ? false
            : Scan<Rest, true, [...Seen, Char]>
          : false
    : PreviousIsSeparator extends true
      ? false
      : Seen extends [unknown, unknown, ...unknown[]]
        ? true
        : false

/**
 * `S` when the string literal `S` is a valid account ID, `never` otherwise.
 * A non-literal `string` also yields `never`: only values known at compile
 * time can be checked here.
 *
 * @example
 * ```ts
 * type Ok = AccountIdLiteral<"alice.near"> // "alice.near"
 * type Bad = AccountIdLiteral<"alice..near"> // never
 * ```
 */
export type AccountIdLiteral<S extends string> = string extends S
  ? never
  : Scan<S, true, []> extends true
    ? S
    : never
