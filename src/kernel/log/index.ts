export { ConsoleLogger, MemoryLogger, SILENT_LOGGER, isLevelEnabled, isLogLevel } from './logger.ts';
export type { ConsoleLoggerOptions, LogEntry, LogLevel, LogSink } from './logger.ts';
