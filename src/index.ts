// ── Shared Kernel ────────────────────────────────────────────────────
export {
	type Result,
	ok,
	err,
	map,
	flatMap,
	unwrap,
	isOk,
	isErr,
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
	type Clock,
	SystemClock,
	FakeClock,
	MAX_TIMESTAMP_MS,
	expiryFrom,
	toEpochSeconds,
	type CredentialsConfig,
	DEFAULT_CREDENTIALS_CONFIG,
	configFromEnv,
	resolveConfig,
} from "./shared/index.js";

// ── Infrastructure ───────────────────────────────────────────────────
export { type Logger, type LoggerConfig, type LogLevel, createLogger } from "./lib/logger/index.js";
export {
	ValidationError,
	type ValidationIssue,
	isValidationError,
	validate,
} from "./lib/validation/index.js";

// ── Connection string ────────────────────────────────────────────────
export {
	type ConnectionStringFields,
	ConnectionStringKey,
	formatConnectionString,
	parseConnectionString,
} from "./connection-string/index.js";

// ── Auth ─────────────────────────────────────────────────────────────
export {
	type AuthorizationHeaderProvider,
	type CbsToken,
	type CbsTokenProvider,
	type Credential,
	type CredentialKind,
	type SignRequest,
	type SignatureBuilder,
	type SignedToken,
	IOTHUB_SAS_TOKEN_TYPE,
	AMQPS_DEFAULT_PORT,
	CredentialContext,
	type CredentialContextOptions,
	DEFAULT_TOKEN_TTL_MS,
	SharedAccessSignatureBuilder,
	type TokenScope,
	urlEncode,
	resolveTokenTarget,
} from "./auth/index.js";
