// Levelled console logging
//
// Level comes from HUFFCODE_DEBUG: "1"/"true" → debug, "warn", "error",
// anything else → info. Callbacks registered with onLog see every entry
// that passes the level filter.

import process from 'node:process'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export interface LogEntry {
  level: LogLevel
  message: string
  timestamp: string
  data?: Record<string, unknown>
}

export type LogCallback = (entry: LogEntry) => void

const LEVELS: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 }

const callbacks = new Set<LogCallback>()

let currentLevel: LogLevel = levelFromEnv(process.env.HUFFCODE_DEBUG)

export function levelFromEnv(value: string | undefined): LogLevel {
  if (value === '1' || value === 'true') return 'debug'
  if (value === 'warn' || value === 'error') return value
  return 'info'
}

export function setLogLevel(level: LogLevel): void {
  currentLevel = level
}

export function getLogLevel(): LogLevel {
  return currentLevel
}

function log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
  if (LEVELS[level] < LEVELS[currentLevel]) return

  const entry: LogEntry = {
    level,
    message,
    timestamp: new Date().toISOString(),
    data,
  }

  const line = `[huffcode] ${message}${data ? ` ${JSON.stringify(data)}` : ''}`
  switch (level) {
    case 'debug':
      console.debug(line)
      break
    case 'info':
      console.info(line)
      break
    case 'warn':
      console.warn(line)
      break
    case 'error':
      console.error(line)
      break
  }

  for (const cb of callbacks) {
    try {
      cb(entry)
    } catch (e) {
      console.error('[huffcode] Log callback error:', e)
    }
  }
}

export function debug(message: string, data?: Record<string, unknown>): void {
  log('debug', message, data)
}

export function info(message: string, data?: Record<string, unknown>): void {
  log('info', message, data)
}

export function error(message: string, data?: Record<string, unknown>): void {
  log('error', message, data)
}

// Returns an unsubscribe function
export function onLog(callback: LogCallback): () => void {
  callbacks.add(callback)
  return () => {
    callbacks.delete(callback)
  }
}

export class Timer {
  private readonly label: string
  private readonly startTime: number

  constructor(label: string) {
    this.label = label
    this.startTime = performance.now()
  }

  // Logs at debug level and returns the elapsed milliseconds
  end(data?: Record<string, unknown>): number {
    const durationMs = performance.now() - this.startTime
    debug(`${this.label}: ${durationMs.toFixed(2)}ms`, { ...data, durationMs })
    return durationMs
  }
}

export function timer(label: string): Timer {
  return new Timer(label)
}
