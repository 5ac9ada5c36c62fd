/**
 * Library configuration read from the environment.
 *
 * Only the connection string and the log level are configurable. The token
 * time-to-live is fixed (see DEFAULT_TOKEN_TTL_MS in auth/credential-context).
 */

import type { LogLevel } from "../lib/logger/index.js";
import { ConfigError } from "./errors.js";

export interface CredentialsConfig {
	/** Raw connection string, e.g. `HostName=...;SharedAccessKeyName=...;SharedAccessKey=...` */
	readonly connectionString?: string | undefined;
	/** Minimum level emitted by the library logger */
	readonly logLevel: LogLevel;
}

export const DEFAULT_CREDENTIALS_CONFIG: CredentialsConfig = {
	logLevel: "info",
};

const LOG_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal"];

/** Mutable builder shape for constructing Partial<CredentialsConfig>. */
interface MutableCredentialsConfig {
	connectionString?: string;
	logLevel?: LogLevel;
}

function isLogLevel(raw: string): raw is LogLevel {
	return LOG_LEVELS.some((level) => level === raw);
}

/**
 * Reads config values from environment variables.
 * Supported: IOTHUB_CONNECTION_STRING, IOTHUB_LOG_LEVEL.
 * @throws ConfigError if IOTHUB_LOG_LEVEL is not a known level
 */
export function configFromEnv(): Partial<CredentialsConfig> {
	const result: MutableCredentialsConfig = {};

	const connectionString = process.env.IOTHUB_CONNECTION_STRING;
	if (connectionString && connectionString.trim().length > 0) {
		result.connectionString = connectionString.trim();
	}

	const rawLevel = process.env.IOTHUB_LOG_LEVEL;
	if (rawLevel) {
		const level = rawLevel.trim().toLowerCase();
		if (!isLogLevel(level)) {
			throw new ConfigError(
				`Invalid IOTHUB_LOG_LEVEL: "${rawLevel}" must be one of ${LOG_LEVELS.join(", ")}`,
			);
		}
		result.logLevel = level;
	}

	return result;
}

/** Merges defaults, then environment, then explicit overrides. */
export function resolveConfig(overrides: Partial<CredentialsConfig> = {}): CredentialsConfig {
	return { ...DEFAULT_CREDENTIALS_CONFIG, ...configFromEnv(), ...overrides };
}
