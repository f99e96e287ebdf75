/**
 * UPID - a 128-bit, time-sortable identifier with a four-character prefix.
 *
 * The binary layout is:
 * - 40 bits of timestamp (milliseconds since the epoch, bottom byte dropped, ~256ms precision)
 * - 64 bits of randomness
 * - 20 bits of prefix and 4 bits of version
 *
 * Encoded as 27 characters, e.g. "user_2acdrlkjmhs6ar53taem6a".
 *
 * Properties:
 * - Sorts by creation time (timestamp occupies the most significant bytes)
 * - Same 16 bytes as a UUID, so it can be stored in a uuid column
 * - No coordination between generators; uniqueness rests on the random bits
 */

import crypto from 'node:crypto';
import { type Result, ok, err } from 'neverthrow';
import {
	BIN_LEN,
	ENCODE,
	END_RANDO_BIN,
	PREFIX_CHAR_LEN,
	RANDO_BIN_LEN,
	TIME_BIN_LEN,
	decode,
	decodePrefix,
	encode,
	encodePrefix,
} from './b32.js';
import { UpidError } from './errors.js';

/**
 * Version character appended to the prefix. Only the first half of the
 * alphabet fits in the 4 version bits; "a" is the first layout.
 */
export const VERSION = 'a';

/** Character used to pad short prefixes and replace invalid ones */
export const PREFIX_FILLER = 'z';

/** Milliseconds covered by one step of the stored timestamp */
export const TIMESTAMP_PRECISION_MS = 256;

/** Exclusive upper bound of a representable timestamp (48 bits of milliseconds) */
export const MAX_MILLISECONDS = 2 ** (TIME_BIN_LEN * 8) * TIMESTAMP_PRECISION_MS;

const MAX_BIGINT = (1n << BigInt(BIN_LEN * 8)) - 1n;
const HEX_PATTERN = /^[0-9a-f]*$/;

/**
 * Bring a prefix to exactly four alphabet characters: unknown characters
 * become 'z', short prefixes are padded with 'z', long ones are clipped.
 */
export function normalizePrefix(prefix: string): string {
	return [...prefix]
		.slice(0, PREFIX_CHAR_LEN)
		.map((char) => (ENCODE.includes(char) ? char : PREFIX_FILLER))
		.join('')
		.padEnd(PREFIX_CHAR_LEN, PREFIX_FILLER);
}

function timeBytes(milliseconds: number): Uint8Array {
	const out = new Uint8Array(TIME_BIN_LEN);
	// bitwise ops are 32-bit, so stay in floating point
	let value = Math.floor(milliseconds / TIMESTAMP_PRECISION_MS);
	for (let i = TIME_BIN_LEN - 1; i >= 0; i--) {
		out[i] = value % 256;
		value = Math.floor(value / 256);
	}
	return out;
}

/**
 * UPID value object. Immutable; equality and ordering compare the raw bytes.
 */
export class Upid {
	private readonly bytes: Uint8Array;

	private constructor(bytes: Uint8Array) {
		this.bytes = bytes;
	}

	/**
	 * Create a new UPID with the current time
	 */
	static fromPrefix(prefix: string): Upid {
		return Upid.fromPrefixAndMilliseconds(prefix, Date.now());
	}

	/**
	 * Create a new UPID at the given instant. Instants before the epoch are
	 * clamped to it.
	 */
	static fromPrefixAndDate(prefix: string, date: Date): Upid {
		const milliseconds = date.getTime();
		if (Number.isNaN(milliseconds)) {
			throw new UpidError('Invalid Date cannot be used as a UPID timestamp', 'out_of_range');
		}
		return Upid.fromPrefixAndMilliseconds(prefix, Math.max(milliseconds, 0));
	}

	/**
	 * Create a new UPID with a timestamp in milliseconds since the epoch.
	 *
	 * The bottom 8 bits of the timestamp are dropped. Supply a prefix of
	 * exactly four alphabet characters to keep it unchanged.
	 */
	static fromPrefixAndMilliseconds(prefix: string, milliseconds: number): Upid {
		if (!Number.isSafeInteger(milliseconds) || milliseconds < 0 || milliseconds >= MAX_MILLISECONDS) {
			throw new UpidError(
				`Timestamp must be an integer in [0, ${MAX_MILLISECONDS}), got ${milliseconds}`,
				'out_of_range',
			);
		}

		const time = timeBytes(milliseconds);
		const rando = crypto.randomBytes(RANDO_BIN_LEN);
		// VERSION is below the overflow limit, so this cannot throw
		const prefixBin = decodePrefix(normalizePrefix(prefix) + VERSION);

		const bytes = new Uint8Array(BIN_LEN);
		bytes.set(time, 0);
		bytes.set(rando, TIME_BIN_LEN);
		bytes.set(prefixBin, END_RANDO_BIN);
		return new Upid(bytes);
	}

	/**
	 * Parse a UPID from its text form
	 */
	static fromString(text: string): Upid {
		return new Upid(decode(text));
	}

	/**
	 * Parse a UPID from its text form without throwing
	 */
	static tryFromString(text: string): Result<Upid, UpidError> {
		try {
			return ok(Upid.fromString(text));
		} catch (e) {
			if (e instanceof UpidError) {
				return err(e);
			}
			throw e;
		}
	}

	/**
	 * Create a UPID from 16 big-endian bytes
	 */
	static fromBytes(bytes: Uint8Array): Upid {
		if (bytes.length !== BIN_LEN) {
			throw new UpidError(`UPID has to be exactly ${BIN_LEN} bytes long, got ${bytes.length}`, 'invalid_length');
		}
		return new Upid(Uint8Array.from(bytes));
	}

	/**
	 * Create a UPID from an unsigned 128-bit integer
	 */
	static fromBigInt(value: bigint): Upid {
		if (value < 0n || value > MAX_BIGINT) {
			throw new UpidError(`UPID integer must fit in ${BIN_LEN * 8} unsigned bits`, 'out_of_range', value.toString());
		}

		const bytes = new Uint8Array(BIN_LEN);
		let rest = value;
		for (let i = BIN_LEN - 1; i >= 0; i--) {
			bytes[i] = Number(rest & 0xffn);
			rest >>= 8n;
		}
		return new Upid(bytes);
	}

	/**
	 * Create a UPID from UUID text, hyphenated or not. The bytes are reused as-is.
	 */
	static fromUuid(uuid: string): Upid {
		const hex = uuid.replace(/-/g, '').toLowerCase();
		if (hex.length !== BIN_LEN * 2) {
			throw new UpidError(`UUID must hold ${BIN_LEN * 2} hex digits, got ${hex.length}`, 'invalid_length', uuid);
		}
		if (!HEX_PATTERN.test(hex)) {
			throw new UpidError(`UUID contains non-hex characters: '${uuid}'`, 'invalid_char', uuid);
		}
		return new Upid(Uint8Array.from(Buffer.from(hex, 'hex')));
	}

	/**
	 * Compare two UPIDs by their bytes. Suitable for Array.prototype.sort.
	 */
	static compare(a: Upid, b: Upid): number {
		return a.compareTo(b);
	}

	/**
	 * Get the four prefix characters
	 */
	getPrefix(): string {
		return encodePrefix(this.bytes.subarray(END_RANDO_BIN)).prefix;
	}

	/**
	 * Get the version character
	 */
	getVersion(): string {
		return encodePrefix(this.bytes.subarray(END_RANDO_BIN)).version;
	}

	/**
	 * Get the timestamp in milliseconds since the epoch. The dropped byte reads
	 * back as zero, so this is at most 255ms earlier than the original.
	 */
	getMilliseconds(): number {
		let value = 0;
		for (let i = 0; i < TIME_BIN_LEN; i++) {
			value = value * 256 + (this.bytes[i] ?? 0);
		}
		return value * TIMESTAMP_PRECISION_MS;
	}

	/**
	 * Get the creation time as a Date
	 */
	getDate(): Date {
		return new Date(this.getMilliseconds());
	}

	/**
	 * Get the 16 bytes as lower-case hex
	 */
	toHex(): string {
		return Buffer.from(this.bytes).toString('hex');
	}

	/**
	 * Get the UPID as an unsigned 128-bit integer
	 */
	toBigInt(): bigint {
		let value = 0n;
		for (const byte of this.bytes) {
			value = (value << 8n) | BigInt(byte);
		}
		return value;
	}

	/**
	 * Get a copy of the 16 big-endian bytes
	 */
	toBytes(): Uint8Array {
		return Uint8Array.from(this.bytes);
	}

	/**
	 * Get the bytes in UUID layout. UPID and UUID share the same 128 bits.
	 */
	toUuidBytes(): Uint8Array {
		return this.toBytes();
	}

	/**
	 * Get the UUID text form, e.g. "01909bc6-0f93-7043-5c61-c99524d61576"
	 */
	toUuid(): string {
		const hex = this.toHex();
		return [hex.slice(0, 8), hex.slice(8, 12), hex.slice(12, 16), hex.slice(16, 20), hex.slice(20)].join('-');
	}

	/**
	 * Get the UPID as a 27-character string
	 */
	toString(): string {
		return encode(this.bytes);
	}

	toJSON(): string {
		return this.toString();
	}

	/**
	 * Negative if this sorts before other, positive if after, 0 if equal
	 */
	compareTo(other: Upid): number {
		return Buffer.compare(this.bytes, other.bytes);
	}

	equals(other: Upid): boolean {
		return this.compareTo(other) === 0;
	}

	/**
	 * 32-bit FNV-1a hash of the bytes
	 */
	hashCode(): number {
		let hash = 0x811c9dc5;
		for (const byte of this.bytes) {
			hash ^= byte;
			hash = Math.imul(hash, 0x01000193);
		}
		return hash >>> 0;
	}
}

/**
 * Generate a new UPID as a string.
 * This is the primary function for generating IDs.
 */
export function generate(prefix: string): string {
	return Upid.fromPrefix(prefix).toString();
}

/**
 * Validate that a string is a decodable UPID
 */
export function isValid(text: string): boolean {
	return Upid.tryFromString(text).isOk();
}

/**
 * Extract the creation timestamp from a UPID string
 */
export function getTimestamp(text: string): Date {
	return Upid.fromString(text).getDate();
}

/**
 * Convert a UPID string to its 128-bit integer
 */
export function toBigInt(text: string): bigint {
	return Upid.fromString(text).toBigInt();
}

/**
 * Convert a 128-bit integer to a UPID string
 */
export function fromBigInt(value: bigint): string {
	return Upid.fromBigInt(value).toString();
}
