import type { Codec } from "../codec"

export function describeCodecContract<T>(
  name: string,
  createCodec: () => Codec<T>,
  samples: () => T[],
  equals: (a: T, b: T) => boolean,
) {
  describe(`Codec contract: ${name}`, () => {
    let codec: Codec<T>

    beforeEach(() => {
      codec = createCodec()
    })

    it("encodes to bytes", () => {
      for (const value of samples()) {
        expect(codec.encode(value)).toBeInstanceOf(Uint8Array)
      }
    })

    it("decodes what it encodes", () => {
      for (const value of samples()) {
        expect(equals(codec.decode(codec.encode(value)), value)).toBe(true)
      }
    })

    it("encodes deterministically", () => {
      for (const value of samples()) {
        expect(Array.from(codec.encode(value))).toEqual(Array.from(codec.encode(value)))
      }
    })

    it("encodes different values differently", () => {
      const encoded = samples().map((value) => Array.from(codec.encode(value)).join(","))

      expect(new Set(encoded).size).toBe(encoded.length)
    })
  })
}
