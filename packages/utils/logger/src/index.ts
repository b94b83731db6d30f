import { type Logger, pino } from "pino";

export type LogLevel =
	| "fatal"
	| "error"
	| "warn"
	| "info"
	| "debug"
	| "trace"
	| "silent";

const levels: LogLevel[] = [
	"fatal",
	"error",
	"warn",
	"info",
	"debug",
	"trace",
	"silent",
];

const isLogLevel = (value: string): value is LogLevel =>
	levels.some((level) => level === value);

export const getEnv = (key: string): string | undefined => process.env[key];

export const getLogLevel = (): LogLevel | undefined => {
	const level = getEnv("LOG_LEVEL");
	if (!level) return undefined;

	if (!isLogLevel(level)) {
		throw new Error(
			`Unexpected LOG_LEVEL: ${level}. Expecting one of: ${JSON.stringify(levels)}`,
		);
	}
	return level;
};

const logger = (options?: { module?: string; level?: LogLevel }): Logger => {
	let base: Logger = pino();

	if (options?.module) {
		base = base.child({ module: options.module });
	}

	const level = options?.level ?? getLogLevel();
	if (level) {
		base.level = level;
	}

	return base;
};

export { logger, type Logger };
