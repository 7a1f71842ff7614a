import pino, {
  type DestinationStream,
  type Logger as PinoLoggerBase,
  type LoggerOptions as PinoOptions,
} from "pino"
import pretty from "pino-pretty"
import { errWithCause } from "pino-std-serializers"
import type { LogContext, LogContextPatch, LogMeta } from "../../ports/log-context"
import type { Logger } from "../../ports/logger"
import type { LoggerOptions } from "../../ports/logger-options"

export type PinoLoggerDeps = {
  /** Where lines go, JSON or prettified. Defaults to stdout. */
  destination?: DestinationStream
}

export class PinoLogger<TContext extends LogContext = LogContext>
  implements Logger<TContext>
{
  protected readonly logger: PinoLoggerBase
  protected readonly opts: Partial<LoggerOptions>

  constructor(
    private readonly deps: PinoLoggerDeps = {},
    opts: Partial<LoggerOptions> = {},
    bindings: LogContextPatch = {},
    base?: PinoLoggerBase,
  ) {
    this.opts = opts
    this.logger = this.init(bindings, base)
  }

  private init(bindings: LogContextPatch, base?: PinoLoggerBase): PinoLoggerBase {
    if (base) return base.child(bindings)

    const pinoOpts: PinoOptions = {
      ...(this.opts.level && { level: this.opts.level }),
      serializers: { err: errWithCause },
    }

    if (this.opts.prettify) {
      const stream = pretty({
        destination: this.deps.destination ?? 1,
        translateTime: "HH:MM:ss.l",
        ignore: "pid,hostname",
      })

      return pino(pinoOpts, stream).child(bindings)
    }

    const root = this.deps.destination ? pino(pinoOpts, this.deps.destination) : pino(pinoOpts)

    return root.child(bindings)
  }

  trace(message: string, meta?: LogMeta<TContext>): void {
    this.logger.trace(meta ?? {}, message)
  }

  debug(message: string, meta?: LogMeta<TContext>): void {
    this.logger.debug(meta ?? {}, message)
  }

  info(message: string, meta?: LogMeta<TContext>): void {
    this.logger.info(meta ?? {}, message)
  }

  warn(message: string, meta?: LogMeta<TContext>): void {
    this.logger.warn(meta ?? {}, message)
  }

  error(message: string, meta?: LogMeta<TContext>): void {
    this.logger.error(meta ?? {}, message)
  }

  fatal(message: string, meta?: LogMeta<TContext>): void {
    this.logger.fatal(meta ?? {}, message)
  }

  child<U extends LogContextPatch>(context: U): Logger<TContext & U> {
    return new PinoLogger<TContext & U>(this.deps, this.opts, context, this.logger)
  }
}
