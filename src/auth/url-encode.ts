/**
 * Form-style URL encoding for signing targets and token fields.
 *
 * Letters, digits and `-_.!*()` pass through; a space becomes `+`; every
 * other character is `%XX` over its UTF-8 bytes, upper-case hex. The hub
 * decodes the resource URI this way, so `'` and `~` are escaped too.
 */

import { InvalidArgumentError } from "../shared/errors.js";

const FORM_ESCAPES: Readonly<Record<string, string>> = {
	"%20": "+",
	"'": "%27",
	"~": "%7E",
};

/**
 * @param field name reported in the error context
 * @throws InvalidArgumentError if the value holds an unpaired surrogate
 */
export function urlEncode(value: string, field: string): string {
	let encoded: string;
	try {
		encoded = encodeURIComponent(value);
	} catch (error) {
		throw new InvalidArgumentError(`${field} is not well-formed Unicode`, { field, cause: error });
	}
	return encoded.replace(/%20|['~]/g, (match) => FORM_ESCAPES[match] ?? match);
}
