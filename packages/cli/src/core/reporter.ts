import type { TextSink } from "../ports/text-sink"
import type { OutputFormat } from "./config/cli-config"

/**
 * Writes command results to stdout, one line per result: the human-readable
 * `text` in text mode, the JSON-encoded `record` in json mode.
 */
export class Reporter {
  constructor(
    private readonly sink: TextSink,
    readonly format: OutputFormat,
  ) {}

  emit(text: string, record: object): void {
    const line = this.format === "json" ? JSON.stringify(record) : text

    this.sink.write(`${line}\n`)
  }
}
