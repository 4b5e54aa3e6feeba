import { serializeError } from "@dotsettings/errors"
import pino, { type DestinationStream, type Logger as PinoBase } from "pino"
import type { LogContext, LogContextPatch, LogMeta } from "../../ports/log-context"
import type { LogLevelName } from "../../ports/log-level"
import type { Logger } from "../../ports/logger"

export type PinoLoggerOptions = {
  /** @default "info" */
  level?: LogLevelName

  /**
   * Human-readable lines through pino-pretty, for local development.
   * Ignored when `destination` is set.
   */
  prettify?: boolean

  /**
   * Receives one JSON line per entry.
   *
   * @default stdout
   */
  destination?: DestinationStream
}

/**
 * Logger backed by pino. Entries carry the bound context of every ancestor
 * (`module`, then `file` and `scope` for a `.env` file), and `err` is written
 * with its code, context, stack and cause chain.
 */
export class PinoLogger<TContext extends LogContext = LogContext>
  implements Logger<TContext>
{
  private readonly pino: PinoBase

  /** `parent` is used by {@link child}; `options` then has no effect. */
  constructor(options: PinoLoggerOptions = {}, bindings: LogContextPatch = {}, parent?: PinoBase) {
    this.pino = (parent ?? rootLogger(options)).child(bindings)
  }

  trace(message: string, meta?: LogMeta<TContext>): void {
    this.pino.trace(meta ?? {}, message)
  }

  debug(message: string, meta?: LogMeta<TContext>): void {
    this.pino.debug(meta ?? {}, message)
  }

  info(message: string, meta?: LogMeta<TContext>): void {
    this.pino.info(meta ?? {}, message)
  }

  warn(message: string, meta?: LogMeta<TContext>): void {
    this.pino.warn(meta ?? {}, message)
  }

  error(message: string, meta?: LogMeta<TContext>): void {
    this.pino.error(meta ?? {}, message)
  }

  fatal(message: string, meta?: LogMeta<TContext>): void {
    this.pino.fatal(meta ?? {}, message)
  }

  child<U extends LogContextPatch>(context: U): Logger<TContext & U> {
    return new PinoLogger<TContext & U>({}, context, this.pino)
  }
}

function rootLogger({ level = "info", prettify, destination }: PinoLoggerOptions): PinoBase {
  const errSerializer = (err: unknown) => serializeError(err, { includeStack: true })
  const options = { level, serializers: { err: errSerializer } }

  if (destination) return pino(options, destination)

  if (prettify) {
    return pino({
      ...options,
      transport: {
        target: "pino-pretty",
        options: { colorize: true, translateTime: "HH:MM:ss.l", ignore: "hostname,pid" },
      },
    })
  }

  return pino(options)
}

export function createPinoLogger<TContext extends LogContext = LogContext>(
  options: PinoLoggerOptions = {},
): Logger<TContext> {
  return new PinoLogger<TContext>(options)
}
