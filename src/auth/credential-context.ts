/**
 * CredentialContext — resolved connection fields, derived endpoints, and the
 * two credential capabilities (authorization header and CBS token) over them.
 *
 * The context never caches a token: every getPassword/getToken call signs
 * again from the current clock.
 */

import { parseConnectionString } from "../connection-string/parser.js";
import type { ConnectionStringFields } from "../connection-string/types.js";
import { type Logger, createLogger } from "../lib/logger/index.js";
import { resolveConfig } from "../shared/config.js";
import {
	ConfigError,
	InvalidArgumentError,
	InvalidOperationError,
	SystemError,
} from "../shared/errors.js";
import { unwrap } from "../shared/result.js";
import { type Clock, MAX_TIMESTAMP_MS, SystemClock, expiryFrom } from "../shared/time.js";
import { SharedAccessSignatureBuilder } from "./signature-builder.js";
import { resolveTokenTarget } from "./token-target.js";
import {
	type AuthorizationHeaderProvider,
	type CbsToken,
	type CbsTokenProvider,
	type Credential,
	IOTHUB_SAS_TOKEN_TYPE,
	type SharedAccessKeyCredential,
	type SignatureBuilder,
	type SignedToken,
} from "./types.js";

/** Time-to-live requested for every computed signature. */
export const DEFAULT_TOKEN_TTL_MS = 60 * 60 * 1_000;

/** Secure AMQP port. */
export const AMQPS_DEFAULT_PORT = 5671;

const USER_SEPARATOR = "@";

const defaultLogger = createLogger({ level: "warn" });

export interface CredentialContextOptions {
	readonly signatureBuilder?: SignatureBuilder | undefined;
	readonly clock?: Clock | undefined;
	readonly logger?: Logger | undefined;
}

function nonEmpty(value: string | undefined): string | undefined {
	return value === undefined || value.length === 0 ? undefined : value;
}

function selectCredential(fields: ConnectionStringFields): Credential {
	const signature = fields.sharedAccessSignature;
	if (signature !== undefined && signature.trim().length > 0) {
		return { kind: "signature", signature };
	}
	return {
		kind: "sharedAccessKey",
		keyName: fields.sharedAccessKeyName,
		key: fields.sharedAccessKey,
	};
}

function endpoint(href: string): URL {
	try {
		return new URL(href);
	} catch (error) {
		throw new InvalidArgumentError(`Cannot build endpoint "${href}"`, { cause: error });
	}
}

interface ResolvedToken extends SignedToken {
	readonly target: string;
}

function assertNever(value: never): never {
	throw new SystemError("Unhandled credential kind", { credential: value });
}

export class CredentialContext implements AuthorizationHeaderProvider, CbsTokenProvider {
	readonly iotHubName: string;
	/** Host the client connects to: the gateway when present, else the hub */
	readonly hostName: string;
	/** Hub host; the base resource every signature targets */
	readonly audience: string;
	readonly sharedAccessKeyName: string | undefined;
	readonly sharedAccessKey: string | undefined;
	readonly sharedAccessSignature: string | undefined;
	readonly deviceId: string | undefined;
	readonly moduleId: string | undefined;
	readonly gatewayHostName: string | undefined;
	readonly credential: Credential;

	private readonly httpsHref: string;
	private readonly amqpHref: string;
	private readonly signatureBuilder: SignatureBuilder;
	private readonly clock: Clock;
	private readonly logger: Logger;

	/**
	 * @throws InvalidArgumentError if `fields` is null or undefined, or a host cannot form a URL
	 */
	constructor(
		fields: ConnectionStringFields | null | undefined,
		options: CredentialContextOptions = {},
	) {
		if (fields === null || fields === undefined) {
			throw new InvalidArgumentError("Connection fields are required", { argument: "fields" });
		}

		const gatewayHostName = nonEmpty(fields.gatewayHostName);
		const hostName = gatewayHostName ?? fields.hostName;
		// The AMQP endpoint binds to the hub host even when a gateway is in use.
		const https = endpoint(`https://${hostName}`);
		const amqp = endpoint(`amqps://${fields.hostName}:${AMQPS_DEFAULT_PORT}`);

		this.iotHubName = fields.iotHubName;
		this.hostName = hostName;
		this.audience = fields.hostName;
		this.sharedAccessKeyName = fields.sharedAccessKeyName;
		this.sharedAccessKey = fields.sharedAccessKey;
		this.sharedAccessSignature = fields.sharedAccessSignature;
		this.deviceId = fields.deviceId;
		this.moduleId = fields.moduleId;
		this.gatewayHostName = gatewayHostName;
		this.credential = Object.freeze(selectCredential(fields));
		this.httpsHref = https.href;
		this.amqpHref = amqp.href;
		this.clock = options.clock ?? SystemClock;
		this.signatureBuilder = options.signatureBuilder ?? new SharedAccessSignatureBuilder(this.clock);
		this.logger = (options.logger ?? defaultLogger).child({ module: "credential-context" });

		this.logger.debug(
			{
				hostName: this.hostName,
				audience: this.audience,
				credentialKind: this.credential.kind,
				deviceId: this.deviceId,
				moduleId: this.moduleId,
			},
			"Credential context created",
		);
		Object.freeze(this);
	}

	/**
	 * Parses a connection string and builds a context from it.
	 * @throws ValidationError if the connection string is malformed
	 */
	static parse(connectionString: string, options: CredentialContextOptions = {}): CredentialContext {
		return new CredentialContext(unwrap(parseConnectionString(connectionString)), options);
	}

	/**
	 * Builds a context from IOTHUB_CONNECTION_STRING. Without an explicit
	 * logger, one is created at IOTHUB_LOG_LEVEL.
	 * @throws ConfigError if IOTHUB_CONNECTION_STRING is unset or IOTHUB_LOG_LEVEL is invalid
	 */
	static fromEnv(options: CredentialContextOptions = {}): CredentialContext {
		const config = resolveConfig();
		if (config.connectionString === undefined) {
			throw new ConfigError("IOTHUB_CONNECTION_STRING is not set");
		}
		return CredentialContext.parse(config.connectionString, {
			...options,
			logger: options.logger ?? createLogger({ level: config.logLevel }),
		});
	}

	/** `https://{hostName}`, copied on every read. */
	get httpsEndpoint(): URL {
		return new URL(this.httpsHref);
	}

	/** `amqps://{hub host}:5671`, copied on every read. */
	get amqpEndpoint(): URL {
		return new URL(this.amqpHref);
	}

	// ── Authorization header ──────────────────────────────────────────

	/** `{sharedAccessKeyName}@sas.root.{iotHubName}`; absent parts become empty segments. */
	getUser(): string {
		return `${this.sharedAccessKeyName ?? ""}${USER_SEPARATOR}sas.root.${this.iotHubName}`;
	}

	/**
	 * The pre-issued signature verbatim, or a freshly computed one.
	 * @throws InvalidOperationError if a signature must be computed and the key material is unusable
	 */
	getPassword(): string {
		switch (this.credential.kind) {
			case "signature":
				return this.credential.signature;
			case "sharedAccessKey": {
				const { signature, target } = this.resolveToken(this.credential);
				this.logger.debug({ target }, "Password signed");
				return signature;
			}
			default:
				return assertNever(this.credential);
		}
	}

	/** Same value as getPassword(); no scheme prefix is added. */
	getAuthorizationHeader(): string {
		return this.getPassword();
	}

	// ── CBS token ─────────────────────────────────────────────────────

	/**
	 * Returns an already-settled promise. The token is always scoped to this
	 * context's own target; the arguments are accepted for the CBS contract
	 * and otherwise unused. A signing failure rejects with the builder's error.
	 */
	getToken(
		_namespaceAddress: URL | string,
		_appliesTo: string,
		_requiredClaims: readonly string[],
	): Promise<CbsToken> {
		try {
			return Promise.resolve(this.issueToken());
		} catch (error) {
			return Promise.reject(error);
		}
	}

	/** The AMQP endpoint with its path replaced; scheme, host and port are kept. */
	buildLinkAddress(path: string): URL {
		const address = this.amqpEndpoint;
		address.pathname = path;
		return address;
	}

	/** Redacts key material. */
	toJSON(): Record<string, unknown> {
		return {
			iotHubName: this.iotHubName,
			hostName: this.hostName,
			audience: this.audience,
			gatewayHostName: this.gatewayHostName,
			deviceId: this.deviceId,
			moduleId: this.moduleId,
			sharedAccessKeyName: this.sharedAccessKeyName,
			credentialKind: this.credential.kind,
			httpsEndpoint: this.httpsHref,
			amqpEndpoint: this.amqpHref,
		};
	}

	private issueToken(): CbsToken {
		switch (this.credential.kind) {
			case "signature":
				return {
					value: this.credential.signature,
					type: IOTHUB_SAS_TOKEN_TYPE,
					expiresAt: new Date(MAX_TIMESTAMP_MS),
				};
			case "sharedAccessKey": {
				const { signature, timeToLiveMs, target } = this.resolveToken(this.credential);
				const expiresAt = new Date(expiryFrom(this.clock, timeToLiveMs));
				this.logger.debug({ target, expiresAt: expiresAt.toISOString() }, "CBS token issued");
				return { value: signature, type: IOTHUB_SAS_TOKEN_TYPE, expiresAt };
			}
			default:
				return assertNever(this.credential);
		}
	}

	/**
	 * Signs the resolved target with the default time-to-live and returns the
	 * signature, the time-to-live the builder reports and the target. Builder
	 * errors propagate unchanged.
	 * @throws InvalidOperationError if a hub-scoped key has no key name
	 * @throws InvalidArgumentError if a device or module id cannot be encoded
	 */
	private resolveToken(credential: SharedAccessKeyCredential): ResolvedToken {
		// Only device-scoped keys may sign without a policy name.
		if (!credential.keyName && !this.deviceId) {
			throw new InvalidOperationError(
				"Shared access key name is required to sign for the hub",
				{ target: this.audience },
				"Provide SharedAccessKeyName, or a DeviceId for a device-scoped key",
			);
		}
		const target = resolveTokenTarget({
			audience: this.audience,
			deviceId: this.deviceId,
			moduleId: this.moduleId,
		});
		const signed = this.signatureBuilder.sign({
			keyName: credential.keyName,
			key: credential.key,
			timeToLiveMs: DEFAULT_TOKEN_TTL_MS,
			target,
		});
		return { ...signed, target };
	}
}
