#!/usr/bin/env tsx
import { serializeError } from "@tessera/account-id"
import { run } from "../program"

try {
  process.exitCode = await run(process.argv.slice(2), {
    stdout: process.stdout,
    stderr: process.stderr,
    env: process.env,
  })
} catch (err) {
  process.stderr.write(`${JSON.stringify(serializeError(err, { includeStack: true }))}\n`)
  process.exitCode = 1
}
