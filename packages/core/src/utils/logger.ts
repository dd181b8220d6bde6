import fs from "node:fs";
import path from "node:path";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
	ts: string;
	level: LogLevel;
	event: string;
	module: string;
	data: Record<string, unknown>;
}

export interface LogSink {
	write: (entry: LogEntry) => void;
	close: () => void;
}

export interface ModuleLogger {
	log: (level: LogLevel, event: string, data?: Record<string, unknown>) => void;
	debug: (event: string, data?: Record<string, unknown>) => void;
	info: (event: string, data?: Record<string, unknown>) => void;
	warn: (event: string, data?: Record<string, unknown>) => void;
	error: (event: string, data?: Record<string, unknown>) => void;
}

/**
 * Logger handle owned by a single job run. Created once at process start,
 * passed to every stage, and closed when the run ends.
 */
export interface JobLogger extends ModuleLogger {
	close: () => void;
}

export interface LoggerSettings {
	minLevel: LogLevel;
	console: boolean;
}

export interface JobLoggerOptions extends Partial<LoggerSettings> {
	logFile: string;
	module?: string;
	now?: () => Date;
}

const LEVELS: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
};

const isLogLevel = (value: string): value is LogLevel => value in LEVELS;

export const normalizeLevel = (value?: string): LogLevel => {
	if (!value) {
		return "info";
	}
	const normalized = value.trim().toLowerCase();
	return isLogLevel(normalized) ? normalized : "info";
};

export const readLoggerSettings = (
	env: NodeJS.ProcessEnv = process.env
): LoggerSettings => ({
	minLevel: normalizeLevel(env.LOG_LEVEL),
	console: env.LOG_CONSOLE === "true",
});

const formatValue = (value: unknown): string => {
	if (typeof value === "string") {
		return value;
	}
	if (typeof value === "number" || typeof value === "boolean") {
		return String(value);
	}
	if (value === null || value === undefined) {
		return String(value);
	}
	return JSON.stringify(sanitizeValue(value, new WeakSet<object>()));
};

/**
 * Renders an event and its payload as a single human-readable message,
 * e.g. `Config loaded: seed=42, window=5`.
 */
export const formatMessage = (
	event: string,
	data: Record<string, unknown> = {}
): string => {
	const pairs = Object.entries(data)
		.filter(([, value]) => value !== undefined)
		.map(([key, value]) => `${key}=${formatValue(value)}`);
	return pairs.length ? `${event}: ${pairs.join(", ")}` : event;
};

export const formatLogLine = (entry: LogEntry): string =>
	`${entry.ts} - ${entry.level.toUpperCase()} - ${formatMessage(
		entry.event,
		entry.data
	)}`;

export const createFileSink = (filePath: string): LogSink => {
	fs.mkdirSync(path.dirname(path.resolve(filePath)), { recursive: true });
	let fd: number | null = fs.openSync(filePath, "a");
	return {
		write: (entry) => {
			if (fd === null) {
				return;
			}
			fs.writeSync(fd, `${formatLogLine(entry)}\n`);
		},
		close: () => {
			if (fd === null) {
				return;
			}
			fs.closeSync(fd);
			fd = null;
		},
	};
};

export const createConsoleSink = (): LogSink => ({
	write: (entry) => {
		const { data, ...rest } = entry;
		try {
			console.error(
				JSON.stringify(sanitizeValue({ ...rest, ...data }, new WeakSet()))
			);
		} catch (err) {
			console.error(
				JSON.stringify({
					ts: entry.ts,
					level: "error",
					event: "logging_error",
					module: "logger",
					error: err instanceof Error ? err.message : "serialization_failed",
				})
			);
		}
	},
	close: () => undefined,
});

export const createLogger = (
	moduleName: string,
	sinks: LogSink[],
	minLevel: LogLevel = "info",
	now: () => Date = () => new Date()
): JobLogger => {
	let closed = false;
	const log = (
		level: LogLevel,
		event: string,
		data: Record<string, unknown> = {}
	): void => {
		if (closed || LEVELS[level] < LEVELS[minLevel]) {
			return;
		}
		const entry: LogEntry = {
			ts: now().toISOString(),
			level,
			event,
			module: moduleName,
			data,
		};
		for (const sink of sinks) {
			sink.write(entry);
		}
	};
	return {
		log,
		debug: (event, data) => log("debug", event, data),
		info: (event, data) => log("info", event, data),
		warn: (event, data) => log("warn", event, data),
		error: (event, data) => log("error", event, data),
		close: () => {
			if (closed) {
				return;
			}
			closed = true;
			for (const sink of sinks) {
				sink.close();
			}
		},
	};
};

export const openJobLogger = (options: JobLoggerOptions): JobLogger => {
	const sinks = [createFileSink(options.logFile)];
	if (options.console) {
		sinks.push(createConsoleSink());
	}
	return createLogger(
		options.module ?? "job",
		sinks,
		options.minLevel ?? "info",
		options.now
	);
};

const sanitizeValue = (value: unknown, seen: WeakSet<object>): unknown => {
	if (typeof value === "bigint") {
		return value.toString();
	}
	if (typeof value === "function") {
		return "[function]";
	}
	if (value instanceof Error) {
		return { name: value.name, message: value.message, stack: value.stack };
	}
	if (value instanceof Date) {
		return value.toISOString();
	}
	if (Array.isArray(value)) {
		if (seen.has(value)) {
			return "[circular]";
		}
		seen.add(value);
		const arr = value.map((item) => sanitizeValue(item, seen));
		seen.delete(value);
		return arr;
	}
	if (value && typeof value === "object") {
		if (seen.has(value)) {
			return "[circular]";
		}
		seen.add(value);
		const clone: Record<string, unknown> = {};
		for (const [key, nested] of Object.entries(value)) {
			clone[key] = sanitizeValue(nested, seen);
		}
		seen.delete(value);
		return clone;
	}
	return value;
};
