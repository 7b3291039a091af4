export { createLogger, setLogFile, getLogFile, appendToLogFile, setConsoleLevel, logger } from "./logger";
export type { Logger, LogLevel } from "./logger";
