/**
 * Token target resolution — the resource string a signature is computed for.
 */

import { urlEncode } from "./url-encode.js";

export interface TokenScope {
	/** Hub host, never the gateway */
	readonly audience: string;
	readonly deviceId?: string | undefined;
	readonly moduleId?: string | undefined;
}

/**
 * Resolves the signing target for a scope.
 *
 * - no device: the bare audience (a module id alone is ignored)
 * - device: `{audience}/devices/{deviceId}`
 * - device and module: `{audience}/devices/{deviceId}/modules/{moduleId}`
 *
 * @example
 * resolveTokenTarget({ audience: "hub.example.com", deviceId: "o'brien dev~1" });
 * // "hub.example.com/devices/o%27brien+dev%7E1"
 *
 * @throws InvalidArgumentError if an id holds an unpaired surrogate
 */
export function resolveTokenTarget(scope: TokenScope): string {
	const { audience, deviceId, moduleId } = scope;
	if (!deviceId) {
		return audience;
	}
	const deviceTarget = `${audience}/devices/${urlEncode(deviceId, "deviceId")}`;
	if (!moduleId) {
		return deviceTarget;
	}
	return `${deviceTarget}/modules/${urlEncode(moduleId, "moduleId")}`;
}
