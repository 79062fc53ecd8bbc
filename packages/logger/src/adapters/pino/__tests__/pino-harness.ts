import { Writable } from "node:stream"
import type {
  CapturedLog,
  LoggerContractSubject,
} from "../../../ports/__tests__/logger.contract"
import { type LogLevelName, LogLevels } from "../../../ports/log-level"
import { PinoLogger } from "../pino-logger"

const severityToName: Record<number, LogLevelName> = {
  [LogLevels.Trace]: "trace",
  [LogLevels.Debug]: "debug",
  [LogLevels.Info]: "info",
  [LogLevels.Warn]: "warn",
  [LogLevels.Error]: "error",
  [LogLevels.Fatal]: "fatal",
}

function toCapturedLog(line: string): CapturedLog {
  const payload: Record<string, unknown> = JSON.parse(line)

  return {
    level: severityToName[Number(payload.level)] ?? "info",
    msg: String(payload.msg),
    payload,
  }
}

export const pinoSubject: LoggerContractSubject = {
  name: "PinoLogger",
  make: (level) => {
    const captured: CapturedLog[] = []

    const destination = new Writable({
      write(chunk, _encoding, callback) {
        captured.push(toCapturedLog(chunk.toString("utf8")))
        callback()
      },
    })

    return {
      logger: new PinoLogger({ destination }, { level }),
      read: () => [...captured],
      clear: () => {
        captured.length = 0
      },
    }
  },
}
