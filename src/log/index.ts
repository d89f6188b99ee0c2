import console from 'console'
import process from 'process'

const MAP = [
  console.log,
  console.debug,
  console.info,
  console.warn,
  console.error
]

export const enum Level {
  LOG = 0,
  DEBUG = 1,
  INFO = 2,
  WARN = 3,
  ERROR = 4
}

const NAMES: Record<string, Level> = {
  log: Level.LOG,
  debug: Level.DEBUG,
  info: Level.INFO,
  warn: Level.WARN,
  error: Level.ERROR
}

export const parseLevel = (name: string | undefined, fallback = Level.WARN): Level => {
  if (!name) {
    return fallback
  }
  return NAMES[name.trim().toLowerCase()] ?? fallback
}

// LOG is the plain channel used by tests and tools, it is never filtered
let threshold = parseLevel(process.env.AVL_LOG_LEVEL)

export const setLevel = (level: Level) => {
  threshold = level
}

export const getLevel = () => threshold

export const enabled = (level: Level) => level === Level.LOG || level >= threshold

export const logg = (msg: string, level = Level.LOG) => {
  if (!enabled(level)) {
    return
  }

  msg = `[${new Date().toISOString()}][${msg}]`

  MAP[level](msg)
}
