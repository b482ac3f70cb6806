import { Writable } from "node:stream"

import { PinoLogger } from "../pino-logger"

function makeLineDestination() {
  const lines: string[] = []

  const destination = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      const line = chunk.toString("utf8").trim()
      if (line) lines.push(line)
      callback()
    },
  })

  return { lines, destination }
}

function parseLine(line: string | undefined): Record<string, unknown> {
  return JSON.parse(line ?? "{}")
}

describe("PinoLogger behavior", () => {
  it("emits JSON to the provided destination", () => {
    const { lines, destination } = makeLineDestination()

    const logger = new PinoLogger(
      { destination },
      { level: "trace", prettify: false },
      { requestId: "r-1" },
    )

    logger.info("hello", { userId: "alice" })

    expect(lines).toHaveLength(1)

    const payload = parseLine(lines[0])

    expect(payload).toMatchObject({
      msg: "hello",
      level: 30,
      requestId: "r-1",
      userId: "alice",
    })
    expect(typeof payload.time).toBe("number")
  })

  it("child() inherits the base logger sink and level", () => {
    const { lines, destination } = makeLineDestination()

    const base = new PinoLogger(
      { destination },
      { level: "warn", prettify: false },
      { requestId: "r-1" },
    )
    const child = base.child({ module: "placeholder-avatar" })

    child.info("ignored")
    child.warn("logged")

    expect(lines).toHaveLength(1)
    expect(parseLine(lines[0])).toMatchObject({
      msg: "logged",
      requestId: "r-1",
      module: "placeholder-avatar",
    })
  })

  it("serializes err with its cause chain", () => {
    const { lines, destination } = makeLineDestination()
    const logger = new PinoLogger({ destination }, { level: "info" })

    const cause = new Error("disk full")
    logger.error("Failed to save", { err: new Error("write failed", { cause }) })

    const payload = parseLine(lines[0])

    expect(payload.err).toMatchObject({
      type: "Error",
      message: "write failed",
      cause: { type: "Error", message: "disk full" },
    })
  })
})
