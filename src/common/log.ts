import riverpig, { Logger, LoggerConfig } from 'riverpig'
import debug from 'debug'
import through2 from 'through2'

const logStream = through2()
logStream.pipe(process.stdout)

export class ValidatorLogger {
  river: Logger
  tracer: debug.Debugger

  constructor (namespace: string, config0?: LoggerConfig) {
    this.river = riverpig(namespace, config0)
    this.tracer = debug(namespace + ':trace')
  }

  info (msg: string, ...elements: unknown[]): void {
    this.river.info(msg, ...elements)
  }

  warn (msg: string, ...elements: unknown[]): void {
    this.river.warn(msg, ...elements)
  }

  error (msg: string, ...elements: unknown[]): void {
    this.river.error(msg, ...elements)
  }

  debug (msg: string, ...elements: unknown[]): void {
    this.river.debug(msg, ...elements)
  }

  trace (msg: unknown, ...elements: unknown[]): void {
    this.tracer(msg, ...elements)
  }
}

export const createRaw = (namespace: string): ValidatorLogger => {
  return new ValidatorLogger(namespace, {
    stream: logStream
  })
}

export const create = (namespace: string) => createRaw('rtr:' + namespace)

let outputStream: NodeJS.WritableStream = process.stdout
export const setOutputStream = (newOutputStream: NodeJS.WritableStream) => {
  logStream.unpipe(outputStream)
  logStream.pipe(newOutputStream)
  outputStream = newOutputStream
}

/**
 * Render a thrown value for a log line, preferring the stack trace.
 */
export const formatError = (err: unknown): string => {
  if (err instanceof Error) {
    return err.stack || err.message
  }
  return String(err)
}
