/**
 * Connection-string bounded context — type definitions.
 *
 * ConnectionStringFields is the resolved field set a CredentialContext is
 * built from. Every optional field is either a non-empty string or undefined.
 */

/** Parsed connection-string fields. */
export interface ConnectionStringFields {
	/** Fully qualified IoT hub host, e.g. `my-hub.azure-devices.net` */
	readonly hostName: string;
	/** First label of the hub host */
	readonly iotHubName: string;
	/** Edge/gateway host the client connects through, when present */
	readonly gatewayHostName?: string | undefined;
	readonly sharedAccessKeyName?: string | undefined;
	/** Base64-encoded symmetric key */
	readonly sharedAccessKey?: string | undefined;
	/** Pre-issued `SharedAccessSignature sr=...&sig=...&se=...` token */
	readonly sharedAccessSignature?: string | undefined;
	readonly deviceId?: string | undefined;
	readonly moduleId?: string | undefined;
}

/** Connection-string keys in canonical spelling and order. */
export const ConnectionStringKey = {
	HostName: "HostName",
	SharedAccessKeyName: "SharedAccessKeyName",
	SharedAccessKey: "SharedAccessKey",
	SharedAccessSignature: "SharedAccessSignature",
	DeviceId: "DeviceId",
	ModuleId: "ModuleId",
	GatewayHostName: "GatewayHostName",
} as const;

export type ConnectionStringKey = (typeof ConnectionStringKey)[keyof typeof ConnectionStringKey];
