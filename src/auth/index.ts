export type {
	AuthorizationHeaderProvider,
	CbsToken,
	CbsTokenProvider,
	Credential,
	CredentialKind,
	SharedAccessKeyCredential,
	SignRequest,
	SignatureBuilder,
	SignedToken,
} from "./types.js";
export { IOTHUB_SAS_TOKEN_TYPE } from "./types.js";
export {
	AMQPS_DEFAULT_PORT,
	CredentialContext,
	type CredentialContextOptions,
	DEFAULT_TOKEN_TTL_MS,
} from "./credential-context.js";
export { SharedAccessSignatureBuilder } from "./signature-builder.js";
export { type TokenScope, resolveTokenTarget } from "./token-target.js";
export { urlEncode } from "./url-encode.js";
