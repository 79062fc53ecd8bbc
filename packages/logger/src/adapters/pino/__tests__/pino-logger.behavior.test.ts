import { Writable } from "node:stream"
import { PinoLogger } from "../pino-logger"

function makeLineDestination() {
  const lines: string[] = []

  const destination = new Writable({
    write(chunk, _encoding, callback) {
      const line = chunk.toString("utf8").trim()
      if (line) lines.push(line)
      callback()
    },
  })

  return { lines, destination }
}

function parse(line: string | undefined): Record<string, unknown> {
  return JSON.parse(line ?? "{}")
}

describe("PinoLogger behavior", () => {
  it("writes JSON lines with pino's msg, time and level fields", () => {
    const { lines, destination } = makeLineDestination()

    const logger = new PinoLogger({ destination }, { level: "trace" }, { module: "optional" })

    logger.info("boxed value", { kind: "bool" })

    expect(lines).toHaveLength(1)

    const payload = parse(lines[0])

    expect(payload).toMatchObject({ msg: "boxed value", module: "optional", kind: "bool" })
    expect(payload.level).toBe(30)
    expect(typeof payload.time).toBe("number")
  })

  it("serializes err through the std serializer", () => {
    const { lines, destination } = makeLineDestination()
    const logger = new PinoLogger({ destination }, { level: "trace" })

    const err = new Error("cannot box value", { cause: new TypeError("not a bigint") })
    logger.warn("rejected", { err })

    expect(parse(lines[0]).err).toMatchObject({
      type: "Error",
      message: "cannot box value",
    })
  })

  it("child() shares the parent's destination and level", () => {
    const { lines, destination } = makeLineDestination()

    const base = new PinoLogger({ destination }, { level: "warn" }, { module: "optional" })
    const child = base.child({ operation: "dynamicToOptional" })

    child.info("ignored")
    child.warn("logged")

    expect(lines).toHaveLength(1)
    expect(parse(lines[0])).toMatchObject({
      msg: "logged",
      module: "optional",
      operation: "dynamicToOptional",
    })
  })

  it("ignores prettify when a destination is given", () => {
    const { lines, destination } = makeLineDestination()

    const logger = new PinoLogger({ destination }, { level: "info", prettify: true })
    logger.info("plain")

    expect(parse(lines[0]).msg).toBe("plain")
  })
})
