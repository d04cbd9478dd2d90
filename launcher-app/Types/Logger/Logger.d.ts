export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

export interface LogContext {
	module?: string;
	[key: string]: unknown;
}

export interface LauncherLoggerOptions {
	/** Directory for the JSON log file; no file is written when omitted */
	logDir?: string | undefined;
	level?: LogLevel | undefined;
	/** Echo a colored line per entry to the console */
	console?: boolean | undefined;
}
