import pino, { type Logger, type LoggerOptions } from "pino";

/**
 * Creates a Pino logger writing to stderr, with optional pretty printing
 * and verbosity. Stdout is left to command output.
 * @param options Logger options, including pretty and verbose flags.
 */
export function createLogger(
  options?: LoggerOptions & { pretty?: boolean; verbose?: boolean },
): Logger {
  const { pretty = true, verbose = false, ...pinoOptions } = options ?? {};
  const level = verbose ? "debug" : "info";
  if (pretty) {
    return pino({
      name: "yumkit",
      level,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          singleLine: true,
          destination: 2,
        },
      },
      ...pinoOptions,
    });
  }
  return pino({ name: "yumkit", level, ...pinoOptions }, pino.destination(2));
}
