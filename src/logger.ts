import pino, { type Logger } from "pino"
import type { LogLevel } from "./config"

export function createLogger(name: string, level: LogLevel = "info"): Logger {
  return pino({ name, level })
}
