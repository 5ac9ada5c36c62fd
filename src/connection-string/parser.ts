/**
 * Connection-string parser — turns `Key=Value;Key=Value` text into
 * ConnectionStringFields, and renders fields back to text.
 */

import {
	type ValidationError,
	type ValidationIssue,
	isBase64,
	validate,
	validationError,
	z,
} from "../lib/validation/index.js";
import { type Result, err, flatMap, ok } from "../shared/result.js";
import { type ConnectionStringFields, ConnectionStringKey } from "./types.js";

type Segments = Partial<Record<ConnectionStringKey, string>>;

const KEY_LOOKUP = new Map<string, ConnectionStringKey>(
	Object.values(ConnectionStringKey).map((key) => [key.toLowerCase(), key]),
);

const HUB_HOST_RE = /^[A-Za-z0-9-]+(?:\.[A-Za-z0-9-]+)+$/;
const GATEWAY_HOST_RE = /^[^\s/;]+$/;
const SIGNATURE_PREFIX = "SharedAccessSignature ";

function hubNameOf(hostName: string): string {
	const dot = hostName.indexOf(".");
	return dot === -1 ? hostName : hostName.slice(0, dot);
}

const segmentsSchema = z
	.object({
		HostName: z
			.string({ error: "HostName is required" })
			.regex(HUB_HOST_RE, "HostName must be a fully qualified host name"),
		SharedAccessKeyName: z.string().optional(),
		SharedAccessKey: z.string().refine(isBase64, "SharedAccessKey must be base64-encoded").optional(),
		SharedAccessSignature: z
			.string()
			.startsWith(SIGNATURE_PREFIX, `SharedAccessSignature must start with "${SIGNATURE_PREFIX}"`)
			.optional(),
		DeviceId: z.string().optional(),
		ModuleId: z.string().optional(),
		GatewayHostName: z
			.string()
			.regex(GATEWAY_HOST_RE, "GatewayHostName must be a bare host name")
			.optional(),
	})
	.superRefine((s, ctx) => {
		if (s.SharedAccessKey === undefined && s.SharedAccessSignature === undefined) {
			ctx.addIssue({
				code: "custom",
				path: ["SharedAccessKey"],
				message: "Either SharedAccessKey or SharedAccessSignature is required",
			});
		}
		if (
			s.SharedAccessKey !== undefined &&
			s.SharedAccessKeyName === undefined &&
			s.DeviceId === undefined
		) {
			ctx.addIssue({
				code: "custom",
				path: ["SharedAccessKeyName"],
				message: "SharedAccessKeyName is required with SharedAccessKey unless DeviceId is given",
			});
		}
		if (s.ModuleId !== undefined && s.DeviceId === undefined) {
			ctx.addIssue({
				code: "custom",
				path: ["ModuleId"],
				message: "ModuleId requires DeviceId",
			});
		}
	})
	.transform(
		(s): ConnectionStringFields => ({
			hostName: s.HostName,
			iotHubName: hubNameOf(s.HostName),
			gatewayHostName: s.GatewayHostName,
			sharedAccessKeyName: s.SharedAccessKeyName,
			sharedAccessKey: s.SharedAccessKey,
			sharedAccessSignature: s.SharedAccessSignature,
			deviceId: s.DeviceId,
			moduleId: s.ModuleId,
		}),
	);

// Empty values count as absent; keys match case-insensitively.
function splitSegments(text: string): Result<Segments, ValidationError> {
	const segments: Segments = {};
	const seen = new Set<ConnectionStringKey>();
	const issues: ValidationIssue[] = [];

	text.split(";").forEach((raw, index) => {
		const segment = raw.trim();
		if (segment.length === 0) return;

		const eq = segment.indexOf("=");
		if (eq <= 0) {
			issues.push({ path: [index], message: `Segment ${index} is not a Key=Value pair` });
			return;
		}

		const name = segment.slice(0, eq).trim();
		const key = KEY_LOOKUP.get(name.toLowerCase());
		if (key === undefined) {
			issues.push({ path: [name], message: `Unknown connection string key "${name}"` });
			return;
		}
		if (seen.has(key)) {
			issues.push({ path: [key], message: `Duplicate connection string key "${key}"` });
			return;
		}
		seen.add(key);

		const value = segment.slice(eq + 1).trim();
		if (value.length > 0) {
			segments[key] = value;
		}
	});

	return issues.length > 0 ? err(validationError(issues)) : ok(segments);
}

/**
 * Parses a connection string into its fields.
 *
 * @example
 * const result = parseConnectionString(
 *   "HostName=my-hub.azure-devices.net;SharedAccessKeyName=iothubowner;SharedAccessKey=dGVzdC1zZWNyZXQ=",
 * );
 * if (result.ok) console.log(result.value.iotHubName); // "my-hub"
 */
export function parseConnectionString(text: string): Result<ConnectionStringFields, ValidationError> {
	return flatMap(splitSegments(text), (segments) => validate(segmentsSchema, segments));
}

/** Renders fields as a connection string in canonical key order, omitting absent fields. */
export function formatConnectionString(fields: ConnectionStringFields): string {
	const values: Record<ConnectionStringKey, string | undefined> = {
		HostName: fields.hostName,
		SharedAccessKeyName: fields.sharedAccessKeyName,
		SharedAccessKey: fields.sharedAccessKey,
		SharedAccessSignature: fields.sharedAccessSignature,
		DeviceId: fields.deviceId,
		ModuleId: fields.moduleId,
		GatewayHostName: fields.gatewayHostName,
	};
	return Object.values(ConnectionStringKey)
		.flatMap((key) => {
			const value = values[key];
			return value === undefined || value.length === 0 ? [] : [`${key}=${value}`];
		})
		.join(";");
}
