export {
	type Result,
	ok,
	err,
	map,
	flatMap,
	unwrap,
	isOk,
	isErr,
} from "./result.js";

export {
	ErrorCategory,
	CredentialError,
	InvalidArgumentError,
	InvalidOperationError,
	ConfigError,
	SystemError,
	isInvalidArgumentError,
	isInvalidOperationError,
	isConfigError,
	isSystemError,
} from "./errors.js";

export {
	type Clock,
	SystemClock,
	FakeClock,
	MAX_TIMESTAMP_MS,
	expiryFrom,
	toEpochSeconds,
} from "./time.js";
export {
	type CredentialsConfig,
	DEFAULT_CREDENTIALS_CONFIG,
	configFromEnv,
	resolveConfig,
} from "./config.js";
