import { join } from "node:path";
import { pino, destination, type Logger, type LoggerOptions } from "pino";
import type { LauncherLoggerOptions, LogContext, LogLevel } from "../../Types/Logger/Logger.js";

type EntryLevel = Exclude<LogLevel, "silent">;

const LEVELS: Record<LogLevel, number> = {
	trace: 10,
	debug: 20,
	info: 30,
	warn: 40,
	error: 50,
	fatal: 60,
	silent: Infinity,
};

const colors: Record<EntryLevel, string> = {
	trace: "\x1b[90m",
	debug: "\x1b[35m",
	info: "\x1b[36m",
	warn: "\x1b[33m",
	error: "\x1b[31m",
	fatal: "\x1b[41m\x1b[37m",
};
const RESET = "\x1b[0m";

export function isLogLevel(value: string): value is LogLevel {
	return Object.hasOwn(LEVELS, value);
}

export function createLogFileName(date: Date = new Date()): string {
	const pad = (n: number) => String(n).padStart(2, "0");
	const stamp = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}_${pad(date.getHours())}-${pad(date.getMinutes())}-${pad(date.getSeconds())}`;
	return `ametrine-${stamp}.log`;
}

export class LauncherLogger {
	private readonly logger: Logger;
	private readonly consoleEnabled: boolean;
	private readonly bindings: LogContext;
	public readonly logFile: string | undefined;

	constructor(options: LauncherLoggerOptions = {}, parent?: { logger: Logger; logFile: string | undefined }, bindings: LogContext = {}) {
		this.consoleEnabled = options.console ?? false;
		this.bindings = bindings;

		if (parent) {
			this.logger = parent.logger.child(bindings);
			this.logFile = parent.logFile;
			return;
		}

		const level = options.level ?? "info";
		const baseConfig: LoggerOptions = {
			level,
			timestamp: pino.stdTimeFunctions.isoTime,
			base: null,
		};

		if (options.logDir) {
			this.logFile = join(options.logDir, createLogFileName());
			this.logger = pino(baseConfig, destination({ dest: this.logFile, mkdir: true, sync: false }));
		} else {
			this.logFile = undefined;
			this.logger = pino(baseConfig, { write: () => {} });
		}
	}

	/** Same destination and level, with `module` attached to every entry */
	public child(module: string): LauncherLogger {
		return new LauncherLogger(
			{ console: this.consoleEnabled },
			{ logger: this.logger, logFile: this.logFile },
			{ ...this.bindings, module },
		);
	}

	public get level(): string {
		return this.logger.level;
	}

	public set level(level: LogLevel) {
		this.logger.level = level;
	}

	public isLevelEnabled(level: EntryLevel): boolean {
		const current = this.logger.level;
		return LEVELS[level] >= (isLogLevel(current) ? LEVELS[current] : LEVELS.info);
	}

	private write(type: EntryLevel, message: string, context?: LogContext): void {
		if (this.consoleEnabled && this.isLevelEnabled(type)) {
			const module = context?.module ?? this.bindings.module;
			const suffix = typeof module === "string" ? ` (${module})` : "";
			console.log(`${colors[type]}[${type.toUpperCase()}] ${message}${suffix}${RESET}`);
		}
		if (context) this.logger[type](context, message);
		else this.logger[type](message);
	}

	trace(message: string, context?: LogContext) {
		this.write("trace", message, context);
	}

	debug(message: string, context?: LogContext) {
		this.write("debug", message, context);
	}

	info(message: string, context?: LogContext) {
		this.write("info", message, context);
	}

	warn(message: string, context?: LogContext) {
		this.write("warn", message, context);
	}

	error(message: string | Error, context?: LogContext) {
		const msg = message instanceof Error ? message.stack ?? message.message : message;
		this.write("error", msg, context);
	}

	fatal(message: string, context?: LogContext) {
		this.write("fatal", message, context);
	}

	public flush(): void {
		this.logger.flush();
	}
}

/** Logger used when the caller supplies none */
export const silentLogger = new LauncherLogger({ level: "silent" });
