export type LogLevel = "debug" | "info" | "warn" | "error";

export interface BaseLogPayload {
	level: LogLevel;
	event: string;
	module: string;
	ts?: string;
	[key: string]: unknown;
}

interface LoggerSettings {
	minLevel: LogLevel;
	moduleFilter: Set<string> | null;
	pretty: boolean;
	json: boolean;
}

const LEVELS: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
};

const isLogLevel = (value: string): value is LogLevel => value in LEVELS;

const normalizeLevel = (value?: string): LogLevel => {
	if (!value) {
		return "info";
	}
	const normalized = value.toLowerCase();
	return isLogLevel(normalized) ? normalized : "info";
};

const parseModuleFilter = (raw?: string): Set<string> | null => {
	if (!raw) {
		return null;
	}
	const entries = raw
		.split(",")
		.map((value) => value.trim())
		.filter((value) => value.length > 0);
	return entries.length ? new Set(entries) : null;
};

// Resolved on first use so env files loaded at startup still apply.
let settings: LoggerSettings | null = null;

const getSettings = (): LoggerSettings => {
	if (settings) {
		return settings;
	}
	const pretty =
		process.env.LOG_PRETTY === "true" || process.env.NODE_ENV === "development";
	settings = {
		minLevel: normalizeLevel(process.env.LOG_LEVEL),
		moduleFilter: parseModuleFilter(process.env.LOG_MODULE),
		pretty,
		json: process.env.LOG_JSON === "true" || !pretty,
	};
	return settings;
};

/** Drops cached settings; the next log call re-reads the environment. */
export const resetLoggerSettings = (): void => {
	settings = null;
};

const shouldLog = (level: LogLevel, moduleName: string, current: LoggerSettings): boolean => {
	if (LEVELS[level] < LEVELS[current.minLevel]) {
		return false;
	}
	if (current.moduleFilter && !current.moduleFilter.has(moduleName)) {
		return false;
	}
	return true;
};

export function log(payload: BaseLogPayload): void {
	const current = getSettings();
	if (!shouldLog(payload.level, payload.module, current)) {
		return;
	}
	const ts = payload.ts ?? new Date().toISOString();
	const base: BaseLogPayload = { ts, ...payload };

	if (current.pretty) {
		printPretty(base);
	}

	if (current.json) {
		try {
			console.log(JSON.stringify(sanitizeValue(base, new WeakSet())));
		} catch (err) {
			console.log(
				JSON.stringify({
					ts,
					level: "error",
					event: "logging_error",
					module: "logger",
					error: err instanceof Error ? err.message : "serialization_failed",
				})
			);
		}
	}
}

export interface ModuleLogger {
	log: (level: LogLevel, event: string, data?: Record<string, unknown>) => void;
	debug: (event: string, data?: Record<string, unknown>) => void;
	info: (event: string, data?: Record<string, unknown>) => void;
	warn: (event: string, data?: Record<string, unknown>) => void;
	error: (event: string, data?: Record<string, unknown>) => void;
}

export const createLogger = (moduleName: string): ModuleLogger => {
	const emit = (level: LogLevel, event: string, data?: Record<string, unknown>) =>
		log({ ...(data ?? {}), level, event, module: moduleName });
	return {
		log: emit,
		debug: (event, data) => emit("debug", event, data),
		info: (event, data) => emit("info", event, data),
		warn: (event, data) => emit("warn", event, data),
		error: (event, data) => emit("error", event, data),
	};
};

const sanitizeValue = (value: unknown, seen: WeakSet<object>): unknown => {
	if (typeof value === "bigint") {
		return value.toString();
	}
	if (typeof value === "function") {
		return "[function]";
	}
	if (typeof value === "number" && !Number.isFinite(value)) {
		return String(value);
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

const formatField = (value: unknown): string => {
	if (value === undefined || value === null) {
		return "-";
	}
	if (typeof value === "number") {
		return Number.isInteger(value) ? String(value) : value.toFixed(4);
	}
	if (typeof value === "string") {
		return value;
	}
	return JSON.stringify(sanitizeValue(value, new WeakSet()));
};

function printPretty(base: BaseLogPayload): void {
	const { level, event, module, ts, ...rest } = base;
	const fields = Object.entries(rest)
		.map(([key, value]) => `${key}=${formatField(value)}`)
		.join(" ");
	console.log(
		`[${ts ?? ""}] [${level.toUpperCase()}] ${module}:${event}${fields ? ` ${fields}` : ""}`
	);
}
