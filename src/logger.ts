import pino, { type Logger } from "pino";

export type { Logger };

export interface LoggerOptions {
  level?: string;
  filePath?: string;
}

/**
 * JSON-lines logger on stderr, or on `filePath` when given. stdout stays free
 * for command output.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const destination = options.filePath
    ? pino.destination({ dest: options.filePath, mkdir: true, sync: false })
    : pino.destination(2);

  return pino(
    {
      name: "folio-rag",
      level: options.level ?? process.env["LOG_LEVEL"] ?? "info",
      redact: ["apiKey", "headers.authorization"],
    },
    destination,
  );
}

export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
