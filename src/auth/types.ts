/**
 * Auth bounded context — type definitions.
 *
 * A CredentialContext signs with exactly one credential: a pre-issued
 * signature used verbatim, or a shared access key pair from which a fresh
 * signature is computed on every call.
 */

// ── Credential ───────────────────────────────────────────────────────

/** The signing path chosen once at construction. */
export type Credential =
	| { readonly kind: "signature"; readonly signature: string }
	| {
			readonly kind: "sharedAccessKey";
			readonly keyName: string | undefined;
			readonly key: string | undefined;
	  };

export type CredentialKind = Credential["kind"];

export type SharedAccessKeyCredential = Extract<Credential, { readonly kind: "sharedAccessKey" }>;

// ── Signing ──────────────────────────────────────────────────────────

/** Input to a signature builder. */
export interface SignRequest {
	readonly keyName: string | undefined;
	readonly key: string | undefined;
	readonly timeToLiveMs: number;
	/** Resource the signature is computed for, unencoded */
	readonly target: string;
}

/** A signature string plus the time-to-live the builder actually used. */
export interface SignedToken {
	readonly signature: string;
	readonly timeToLiveMs: number;
}

/**
 * Signing primitive. Implementations throw InvalidOperationError when the
 * key material cannot produce a signature.
 */
export interface SignatureBuilder {
	sign(request: SignRequest): SignedToken;
}

// ── Capabilities ─────────────────────────────────────────────────────

/** Basic-auth style identity and password. */
export interface AuthorizationHeaderProvider {
	getUser(): string;
	getPassword(): string;
	getAuthorizationHeader(): string;
}

/** Token type tag carried by every IoT hub SAS token in a CBS put-token. */
export const IOTHUB_SAS_TOKEN_TYPE = "servicebus.windows.net:sastoken";

/** Token handed to a claims-based-security negotiation. */
export interface CbsToken {
	readonly value: string;
	readonly type: typeof IOTHUB_SAS_TOKEN_TYPE;
	readonly expiresAt: Date;
}

/** Claims-based-security token source. */
export interface CbsTokenProvider {
	getToken(
		namespaceAddress: URL | string,
		appliesTo: string,
		requiredClaims: readonly string[],
	): Promise<CbsToken>;
}
