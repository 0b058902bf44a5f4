import { Config, Effect, Layer, LogLevel, Logger } from "effect"

/**
 * logfmt lines on stderr, so stdout stays free for CLI output.
 */
export const StderrLogger = Logger.make<unknown, void>(options => {
  console.error(Logger.logfmtLogger.log(options))
})

const logLevel = Config.logLevel("LOG_LEVEL").pipe(Config.withDefault(LogLevel.Info))

/**
 * Replaces the default logger and sets the minimum level from `LOG_LEVEL`
 * (Info when unset).
 */
export const LoggerLive = Layer.unwrapEffect(
  Effect.map(logLevel, level =>
    Layer.merge(
      Logger.replace(Logger.defaultLogger, StderrLogger),
      Logger.minimumLogLevel(level),
    ),
  ),
)
