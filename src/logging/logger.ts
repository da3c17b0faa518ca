export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export interface Logger {
  debug(message: string, ...args: unknown[]): void
  info(message: string, ...args: unknown[]): void
  warn(message: string, ...args: unknown[]): void
  error(message: string, ...args: unknown[]): void
}

export interface LogEntry {
  id?: number
  timestamp: number
  level: LogLevel
  message: string
  args: unknown[]
}

export class LogStore {
  private logs: LogEntry[] = []
  private maxLogs: number = 1000
  private nextId: number = 0

  add(level: LogLevel, message: string, args: unknown[]): void {
    const entry: LogEntry = {
      id: this.nextId++,
      timestamp: Date.now(),
      level,
      message,
      args,
    }
    this.logs.push(entry)

    if (this.logs.length > this.maxLogs * 1.5) {
      this.logs = this.logs.slice(-this.maxLogs)
    }
  }

  getEntries(): LogEntry[] {
    return this.logs
  }

  /** Messages at the given level, oldest first. */
  messages(level?: LogLevel): string[] {
    return this.logs
      .filter((entry) => level === undefined || entry.level === level)
      .map((entry) => entry.message)
  }

  get size(): number {
    return this.logs.length
  }
}

export function basicLogger(): Logger {
  return console
}

export function storeLogger(store: LogStore): Logger {
  return {
    debug: (msg, ...args) => store.add('debug', msg, args),
    info: (msg, ...args) => store.add('info', msg, args),
    warn: (msg, ...args) => store.add('warn', msg, args),
    error: (msg, ...args) => store.add('error', msg, args),
  }
}
