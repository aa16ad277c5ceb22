import { z } from "zod"
import { ObjectSource } from "../../../adapters/object/object-source"
import { ConfigError } from "../config-error"
import type { ConfigSource } from "../../../ports/source"
import { type LoadConfigOptions, loadConfig } from "../load"

const schema = z.object({
  OUTPUT: z.enum(["text", "json"]),
  LOG_LEVEL: z.string().default("warn"),
})

describe("loadConfig", () => {
  it("merges sources left to right", async () => {
    const config = await loadConfig({
      schema,
      sources: [new ObjectSource({ OUTPUT: "text" }, "first"), new ObjectSource({ OUTPUT: "json" }, "second")],
    })

    expect(config.get("OUTPUT")).toBe("json")
    expect(config.explain("OUTPUT")).toBe("second")
  })

  it("explains schema defaults", async () => {
    const config = await loadConfig({ schema, sources: [new ObjectSource({ OUTPUT: "text" }, "flags")] })

    expect(config.get("LOG_LEVEL")).toBe("warn")
    expect(config.explain("LOG_LEVEL")).toBe("default")
    expect(config.sourcesUsed()).toEqual(["flags"])
  })

  it("treats undefined values as not provided", async () => {
    const config = await loadConfig({
      schema,
      sources: [
        new ObjectSource({ OUTPUT: "json", LOG_LEVEL: "info" }, "env"),
        new ObjectSource({ LOG_LEVEL: undefined }, "flags"),
      ],
    })

    expect(config.get("LOG_LEVEL")).toBe("info")
    expect(config.explain("LOG_LEVEL")).toBe("env")
  })

  it("reports keys the schema does not know", async () => {
    const config = await loadConfig({
      schema,
      sources: [new ObjectSource({ OUTPUT: "json", OUTPUTS: "json" })],
    })

    expect(config.unknownKeys()).toEqual(["OUTPUTS"])
    expect(config.value).toEqual({ OUTPUT: "json", LOG_LEVEL: "warn" })
  })

  it("throws ConfigError naming the failing key", async () => {
    const load = loadConfig({ schema, sources: [new ObjectSource({ OUTPUT: "yaml" }, "flags")] })

    await expect(load).rejects.toThrow(ConfigError)
    await expect(load).rejects.toThrow(/^Configuration validation failed:\n/)
    await expect(load).rejects.toThrow("→ at OUTPUT")
  })

  it("records the sources it read in the error context", async () => {
    const error = await loadConfig({ schema, sources: [new ObjectSource({}, "flags")] }).catch(
      (err: unknown) => err,
    )

    expect(error).toBeInstanceOf(ConfigError)
    expect(error).toMatchObject({ code: "invalid_config", context: { sources: ["flags"] } })
  })

  it("requires the caller to name its sources", () => {
    expectTypeOf<LoadConfigOptions<{ OUTPUT: string }>>()
      .toHaveProperty("sources")
      .toEqualTypeOf<readonly ConfigSource[]>()
  })

  it("reads nothing when given no sources", async () => {
    const config = await loadConfig({ schema: schema.partial({ OUTPUT: true }), sources: [] })

    expect(config.value).toEqual({ LOG_LEVEL: "warn" })
    expect(config.sourcesUsed()).toEqual([])
    expect(config.explain("LOG_LEVEL")).toBe("default")
  })
})
