export { createConsoleLogger, silentLogger, type Logger, type LogLevel, type ConsoleLoggerOptions } from './logger.js';
