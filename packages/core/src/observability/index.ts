export {
	LogLevel,
	Logger,
	ConsoleTransport,
	JsonTransport,
	FileTransport,
	createLogger,
	configureLogging,
	resetLoggingConfig,
	parseLogLevel,
} from "./logger.js";
export type { LogEntry, LogTransport, LoggerConfig } from "./logger.js";
