/**
 * @upid/core
 *
 * UPID generation, parsing and the base32 codec behind it.
 *
 * A UPID is 128 bits: a 40-bit timestamp, 64 random bits and a 24-bit
 * prefix+version field. Its text form leads with the prefix:
 * - Format: "{prefix}_{time}{random}{version}" (e.g. "user_2acdrlkjmhs6ar53taem6a")
 * - Total length: 27 characters (4-char prefix + underscore + 22 characters)
 *
 * @example
 * ```typescript
 * import { generate, Upid } from '@upid/core';
 *
 * const id = generate('user'); // "user_2accvpp5guht4dts56je5a"
 *
 * const upid = Upid.fromString(id);
 * upid.getPrefix(); // "user"
 * upid.getDate(); // creation time, rounded down to ~256ms
 * upid.toUuid(); // same bytes as a UUID
 * ```
 */

// Identifier type
export {
	Upid,
	VERSION,
	PREFIX_FILLER,
	TIMESTAMP_PRECISION_MS,
	MAX_MILLISECONDS,
	normalizePrefix,
	generate,
	isValid,
	getTimestamp,
	toBigInt,
	fromBigInt,
} from './upid.js';

// Base32 codec
export {
	ENCODE,
	DECODE,
	INVALID,
	SEPARATOR,
	BIN_LEN,
	CHAR_LEN,
	PREFIX_CHAR_LEN,
	encode,
	encodePrefix,
	encodeTime,
	encodeRando,
	decode,
	decodePrefix,
	decodeTime,
	decodeRando,
	type EncodedPrefix,
} from './b32.js';

// Errors
export { UpidError, type UpidErrorReason } from './errors.js';
