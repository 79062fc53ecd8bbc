import { mock } from "vitest-mock-extended"
import type { ScalarCodec } from "../../ports/scalar"
import {
  fromOptional,
  fromOptionalMapping,
  fromOptionalSequence,
  toOptional,
  toOptionalMapping,
  toOptionalSequence,
} from "../convert"
import { absent, present } from "../optional"
import { scalars, ZERO_INSTANT_MS } from "../scalars"

type Cell = { n: number }

const cellCodec: ScalarCodec<Cell> = {
  zero: () => ({ n: 0 }),
  copy: (value) => ({ n: value.n }),
}

describe("convert", () => {
  describe("codec usage", () => {
    it("copies on lift and on lower", () => {
      const codec = mock<ScalarCodec<number>>()
      codec.copy.mockImplementation((v) => v * 10)

      const box = toOptional(codec, 2)

      expect(box).toEqual({ kind: "present", value: 20 })
      expect(fromOptional(codec, box)).toBe(200)
      expect(codec.copy).toHaveBeenCalledTimes(2)
      expect(codec.zero).not.toHaveBeenCalled()
    })

    it("asks the codec for a zero on every absent entry", () => {
      const codec = mock<ScalarCodec<number>>()
      codec.zero.mockReturnValue(-1)
      codec.copy.mockImplementation((v) => v)

      expect(fromOptionalSequence(codec, [absent(), present(4), null, undefined])).toEqual([
        -1, 4, -1, -1,
      ])
      expect(codec.zero).toHaveBeenCalledTimes(3)
    })
  })

  describe("aliasing", () => {
    it("the box does not share state with the lifted value", () => {
      const cell = { n: 1 }
      const box = toOptional(cellCodec, cell)

      cell.n = 2

      expect(box.value).toEqual({ n: 1 })
    })

    it("the lowered value does not share state with the box", () => {
      const box = present({ n: 1 })
      const lowered = fromOptional(cellCodec, box)

      lowered.n = 5

      expect(box.value).toEqual({ n: 1 })
    })

    it("zero values are fresh per entry", () => {
      const [first, second] = fromOptionalSequence(cellCodec, [absent(), absent()])

      expect(first).toEqual({ n: 0 })
      expect(first).not.toBe(second)
    })
  })

  describe("sequences", () => {
    it("returns a new array and leaves the input alone", () => {
      const input = [{ n: 1 }, { n: 2 }]
      const lifted = toOptionalSequence(cellCodec, input)

      expect(lifted).not.toBe(input)
      expect(input).toEqual([{ n: 1 }, { n: 2 }])
      expect(lifted).toEqual([present({ n: 1 }), present({ n: 2 })])
    })

    it("reads holes in a sparse input as absent", () => {
      const sparse = new Array<ReturnType<typeof absent>>(3)

      const lowered = fromOptionalSequence(cellCodec, sparse)

      expect(lowered).toEqual([{ n: 0 }, { n: 0 }, { n: 0 }])
      expect(0 in lowered).toBe(true)
    })

    it("keeps holes on lift without copying them", () => {
      const sparse: Date[] = []
      sparse[2] = new Date("2024-05-01T00:00:00.000Z")

      const lifted = toOptionalSequence(scalars.time, sparse)

      expect(lifted).toHaveLength(3)
      expect(Object.keys(lifted)).toEqual(["2"])
      expect(lifted[2]).toEqual(present(new Date("2024-05-01T00:00:00.000Z")))
      expect(fromOptionalSequence(scalars.time, lifted).map((d) => d.getTime())).toEqual([
        ZERO_INSTANT_MS,
        ZERO_INSTANT_MS,
        Date.parse("2024-05-01T00:00:00.000Z"),
      ])
    })
  })

  describe("mappings", () => {
    it("keeps __proto__ as an ordinary own key", () => {
      const input: Record<string, Cell> = Object.fromEntries([["__proto__", { n: 7 }]])

      const lifted = toOptionalMapping(cellCodec, input)

      expect(Object.keys(lifted)).toEqual(["__proto__"])
      expect(Object.getPrototypeOf(lifted)).toBe(Object.prototype)
      expect(fromOptionalMapping(cellCodec, lifted)).toEqual(
        Object.fromEntries([["__proto__", { n: 7 }]]),
      )
    })

    it("ignores inherited keys", () => {
      const input: Record<string, Cell> = Object.create({ inherited: { n: 1 } })
      input.own = { n: 2 }

      expect(Object.keys(toOptionalMapping(cellCodec, input))).toEqual(["own"])
    })

    it("returns a new record and leaves the input alone", () => {
      const input = { a: present({ n: 1 }), b: absent() }

      const lowered = fromOptionalMapping(cellCodec, input)

      expect(lowered).toEqual({ a: { n: 1 }, b: { n: 0 } })
      expect(input).toEqual({ a: present({ n: 1 }), b: absent() })
    })
  })
})
