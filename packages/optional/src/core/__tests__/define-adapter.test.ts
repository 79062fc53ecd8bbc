import { defineAdapter } from "../define-adapter"
import { absent, present } from "../optional"
import { scalars } from "../scalars"

describe("defineAdapter", () => {
  const adapter = defineAdapter(scalars.int16)

  it("exposes the kind and its zero value", () => {
    expect(adapter.kind).toBe("int16")
    expect(adapter.zero()).toBe(0)
  })

  it("is frozen", () => {
    expect(Object.isFrozen(adapter)).toBe(true)
  })

  it("binds operations that work detached from the adapter", () => {
    const { toOptional, fromOptional, fromOptionalSequence, fromOptionalMapping } = adapter

    expect(fromOptional(toOptional(-12))).toBe(-12)
    expect(fromOptionalSequence([present(1), absent()])).toEqual([1, 0])
    expect(fromOptionalMapping({ k: absent() })).toEqual({ k: 0 })
  })

  it("uses the descriptor's copy rule", () => {
    const times = defineAdapter(scalars.time)
    const date = new Date("2024-03-01T00:00:00.000Z")

    const box = times.toOptional(date)

    expect(box.value).not.toBe(date)
    expect(box.value).toEqual(date)
  })

  it("does not validate: typed operations accept any value of the representation", () => {
    const uint8 = defineAdapter(scalars.uint8)

    expect(uint8.fromOptional(uint8.toOptional(1000))).toBe(1000)
  })
})
