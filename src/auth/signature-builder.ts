/**
 * Shared access signature builder — HMAC-SHA256 signing of a resource URI
 * with a base64 symmetric key.
 */

import { createHmac } from "node:crypto";
import { isBase64 } from "../lib/validation/index.js";
import { InvalidOperationError } from "../shared/errors.js";
import { type Clock, SystemClock, expiryFrom, toEpochSeconds } from "../shared/time.js";
import type { SignRequest, SignatureBuilder, SignedToken } from "./types.js";
import { urlEncode } from "./url-encode.js";

const SIGNATURE_SCHEME = "SharedAccessSignature";

/**
 * Builds `SharedAccessSignature sr=...&sig=...&se=...[&skn=...]` tokens.
 *
 * The expiry `se` is in epoch seconds, rounded down. The string to sign is
 * the encoded target and the expiry joined by a newline. The key name is
 * optional: device-scoped keys sign without one.
 */
export class SharedAccessSignatureBuilder implements SignatureBuilder {
	private readonly clock: Clock;

	constructor(clock: Clock = SystemClock) {
		this.clock = clock;
	}

	/**
	 * @throws InvalidOperationError if the key is absent or not base64, or the time-to-live is not positive
	 * @throws InvalidArgumentError if the target or key name holds an unpaired surrogate
	 */
	sign(request: SignRequest): SignedToken {
		const { keyName, key, timeToLiveMs, target } = request;
		if (key === undefined || key.trim().length === 0) {
			throw new InvalidOperationError(
				"Shared access key is required to build a signature",
				{ target },
				"Provide SharedAccessKey or a pre-issued SharedAccessSignature",
			);
		}
		if (!isBase64(key)) {
			throw new InvalidOperationError("Shared access key must be base64-encoded", { target });
		}
		if (!Number.isFinite(timeToLiveMs) || timeToLiveMs <= 0) {
			throw new InvalidOperationError("Time-to-live must be a positive finite number", {
				target,
				timeToLiveMs,
			});
		}

		const expiry = toEpochSeconds(expiryFrom(this.clock, timeToLiveMs));
		const encodedTarget = urlEncode(target, "target");
		const digest = createHmac("sha256", Buffer.from(key, "base64"))
			.update(`${encodedTarget}\n${expiry}`)
			.digest("base64");

		let signature = `${SIGNATURE_SCHEME} sr=${encodedTarget}&sig=${urlEncode(digest, "signature")}&se=${expiry}`;
		if (keyName) {
			signature += `&skn=${urlEncode(keyName, "keyName")}`;
		}

		return { signature, timeToLiveMs };
	}
}
