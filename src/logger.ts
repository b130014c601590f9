import { Layer, Logger, LogLevel } from "effect";

const formatMessage = (message: unknown): string =>
  Array.isArray(message) ? message.map(String).join(" ") : String(message);

/**
 * Create a logger layer writing to stderr, so stdout stays free for
 * command output
 */
export const createLoggerLayer = (
  level: LogLevel.LogLevel = LogLevel.Info,
  write: (line: string) => void = (line) => process.stderr.write(`${line}\n`),
): Layer.Layer<never> => {
  const cliLogger = Logger.make(({ logLevel, message }) => {
    write(`[production-graph:${logLevel.label}] ${formatMessage(message)}`);
  });

  return Layer.merge(
    Logger.replace(Logger.defaultLogger, cliLogger),
    Logger.minimumLogLevel(level),
  );
};
