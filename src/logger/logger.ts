import { createLogger as createWinstonLogger, format, transports, type Logger as WinstonLogger } from "winston";
import type { LogLevel } from "#/schemas";

export interface LoggerOptions {
  level: LogLevel;
  /** Also write JSON lines to this file */
  file?: string;
  service?: string;
}

export interface LogLine {
  level: string;
  message: unknown;
  timestamp?: unknown;
  service?: unknown;
  [key: string]: unknown;
}

/**
 * Console line: `2024-01-01T00:00:00.000Z [nacos-agent] info: message {"meta":1}`
 */
export function renderLine({ timestamp, level, message, service, ...metadata }: LogLine): string {
  const prefix = service ? ` [${String(service)}]` : "";
  let line = `${String(timestamp ?? "")}${prefix} ${level}: ${String(message)}`;
  if (Object.keys(metadata).length > 0) {
    line += ` ${JSON.stringify(metadata)}`;
  }
  return line.trimStart();
}

export function createLogger(options: LoggerOptions): WinstonLogger {
  const consoleTransport = new transports.Console({
    format: format.combine(
      format.colorize(),
      format.printf((info) => renderLine(info))
    ),
  });

  const logger = createWinstonLogger({
    level: options.level,
    format: format.combine(format.timestamp(), format.errors({ stack: true }), format.json()),
    defaultMeta: options.service ? { service: options.service } : undefined,
    transports: [consoleTransport],
  });

  if (options.file) {
    logger.add(new transports.File({ filename: options.file }));
  }

  return logger;
}
