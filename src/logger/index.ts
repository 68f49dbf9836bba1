export { createLogger, renderLine, type LogLine, type LoggerOptions } from "./logger";
