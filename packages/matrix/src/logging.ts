import * as core from '@actions/core'

export interface Logger {
  info: (message: string) => void
  debug: (message: string) => void
  warn: (message: string) => void
  error: (message: string) => void
  group: <T>(name: string, fn: () => Promise<T>) => Promise<T>
}

export interface LoggerOptions {
  /** Log debug output as info */
  verbose?: boolean
  /**
   * Write plain lines here instead of workflow commands on stdout. Used when
   * stdout carries the JSON matrix.
   */
  stream?: NodeJS.WritableStream
}

function streamLogger(stream: NodeJS.WritableStream, verbose: boolean): Logger {
  const line = (text: string): void => {
    stream.write(`${text}\n`)
  }

  return {
    info: line,
    debug: (message) => {
      if (verbose)
        line(message)
    },
    warn: message => line(`warning: ${message}`),
    error: message => line(`error: ${message}`),
    group: (name, fn) => {
      line(name)
      return fn()
    },
  }
}

/**
 * Logger backed by @actions/core. Outside GitHub Actions the workflow
 * commands are plain lines on stdout, which is fine for local runs.
 *
 * With `verbose`, debug messages are promoted to info so they show up
 * without ACTIONS_STEP_DEBUG.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const verbose = options.verbose ?? false
  if (options.stream)
    return streamLogger(options.stream, verbose)

  return {
    info: message => core.info(message),
    debug: message => verbose ? core.info(message) : core.debug(message),
    warn: message => core.warning(message),
    error: message => core.error(message),
    group: (name, fn) => core.group(name, fn),
  }
}

/**
 * Logger that drops everything, for tests and library callers
 */
export const silentLogger: Logger = {
  info: () => {},
  debug: () => {},
  warn: () => {},
  error: () => {},
  group: (_name, fn) => fn(),
}
