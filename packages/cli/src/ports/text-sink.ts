/** Anything text can be written to: `process.stdout`, a stream, a test buffer. */
export interface TextSink {
  write(chunk: string): unknown
}
