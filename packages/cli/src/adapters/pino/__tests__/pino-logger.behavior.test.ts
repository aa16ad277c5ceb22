import { ParseAccountError, ParseErrorKind } from "@tessera/account-id"
import { errWithCause } from "pino-std-serializers"
import { jsonLineDestination } from "../../../__tests__/text-buffer"
import { PinoLogger, pinoOptionsFor } from "../pino-logger"

describe("PinoLogger behavior", () => {
  it("emits JSON to the provided destination", () => {
    const { entries, destination } = jsonLineDestination()

    const logger = new PinoLogger({ destination }, { level: "trace", prettify: false }, {
      service: "account-id",
    })

    logger.info("hello", { accountId: "alice.near" })

    expect(entries).toHaveLength(1)
    expect(entries[0]).toMatchObject({
      msg: "hello",
      service: "account-id",
      accountId: "alice.near",
      level: 30,
    })
    expect(typeof entries[0]?.time).toBe("number")
  })

  it("drops entries below the configured level", () => {
    const { entries, destination } = jsonLineDestination()

    const logger = new PinoLogger({ destination }, { level: "warn" })

    logger.debug("dropped")
    logger.info("dropped")
    logger.warn("kept")
    logger.error("kept")

    expect(entries.map((e) => e.msg)).toEqual(["kept", "kept"])
  })

  it("child() inherits the sink, level and context", () => {
    const { entries, destination } = jsonLineDestination()

    const base = new PinoLogger({ destination }, { level: "info" }, { service: "account-id" })
    const child = base.child({ command: "validate" })

    child.debug("ignored")
    child.info("logged")

    expect(entries).toHaveLength(1)
    expect(entries[0]).toMatchObject({ msg: "logged", service: "account-id", command: "validate" })
  })

  it("child() does not add context to the parent", () => {
    const { entries, destination } = jsonLineDestination()

    const parent = new PinoLogger({ destination }, { level: "info" })
    parent.child({ command: "parent" })

    parent.info("from parent")

    expect(entries[0]).not.toHaveProperty("command")
  })

  it("serializes err with its type and own fields", () => {
    const { entries, destination } = jsonLineDestination()
    const logger = new PinoLogger({ destination }, { level: "info" })

    logger.error("Rejected", { err: new ParseAccountError(ParseErrorKind.TooShort) })

    expect(entries[0]?.err).toMatchObject({
      type: "ParseAccountError",
      message: "the Account ID is too short",
      code: "too_short",
    })
  })

  it("writes every level", () => {
    const { entries, destination } = jsonLineDestination()
    const logger = new PinoLogger({ destination }, { level: "trace" })

    logger.trace("t")
    logger.debug("d")
    logger.info("i")
    logger.warn("w")
    logger.error("e")
    logger.fatal("f")

    expect(entries.map((e) => e.level)).toEqual([10, 20, 30, 40, 50, 60])
  })
})

describe("pinoOptionsFor", () => {
  it("routes entries through pino-pretty on stderr when prettify is on", () => {
    const options = pinoOptionsFor({ level: "debug", prettify: true })

    expect(options.level).toBe("debug")
    expect(options.transport).toEqual({
      target: "pino-pretty",
      options: {
        colorize: true,
        destination: 2,
        translateTime: "HH:MM:ss.l",
        ignore: "hostname,pid",
      },
    })
  })

  it("uses no transport when prettify is off", () => {
    const options = pinoOptionsFor({ level: "warn", prettify: false })

    expect(options.transport).toBeUndefined()
    expect(options.level).toBe("warn")
  })

  it("serialises errors with their cause chain in both modes", () => {
    expect(pinoOptionsFor({ prettify: true }).serializers?.err).toBe(errWithCause)
    expect(pinoOptionsFor({}).serializers?.err).toBe(errWithCause)
  })
})
