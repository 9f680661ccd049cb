import type { Logger } from './types.js'

type Level = 'INFO' | 'WARN' | 'ERROR'

/** Line sink for serialized log events. */
export type LogWriter = (line: string) => void

function emit(write: LogWriter, level: Level, event: string, data?: Record<string, unknown>): void {
  const payload = {
    ts: new Date().toISOString(),
    level,
    event,
    ...(data ?? {})
  }
  write(JSON.stringify(payload))
}

/**
 * Builds a JSON-lines logger writing through the given sink.
 */
export function createLogger(write: LogWriter): Logger {
  return {
    info(event, data) {
      emit(write, 'INFO', event, data)
    },
    warn(event, data) {
      emit(write, 'WARN', event, data)
    },
    error(event, data) {
      emit(write, 'ERROR', event, data)
    }
  }
}

/** Simple JSON logger used by default across runtime modules. */
// eslint-disable-next-line no-console
export const logger: Logger = createLogger((line) => console.log(line))

/** Logger that drops every event. */
export const silentLogger: Logger = {
  info() {},
  warn() {},
  error() {}
}
