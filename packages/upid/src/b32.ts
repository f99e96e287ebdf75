/**
 * Base32 codec for UPIDs.
 *
 * The alphabet is Crockford's, lower-cased and reordered: numerals first so
 * that encoded text sorts sensibly, then the full latin alphabet so any
 * four-letter prefix can be spelled.
 *
 * The binary order is TIME | RANDO | PREFIX+VERSION:
 * - 5 bytes of timestamp (milliseconds >> 8)
 * - 8 bytes of randomness
 * - 3 bytes holding 20 bits of prefix and a 4-bit version
 *
 * The text order is PREFIX _ TIME RANDO VERSION, e.g. "user_2acdrlkjmhs6ar53taem6a".
 *
 * Randomness (64 bits) and prefix+version (24 bits) do not fill a whole number
 * of symbols. Their final symbol carries the last 4 bits right-aligned, so its
 * top bit is padding: always 0 on encode, rejected on decode.
 */

import { UpidError } from './errors.js';

export const ENCODE = '234567abcdefghijklmnopqrstuvwxyz';

/** Marks a character that is not part of the alphabet in {@link DECODE}. */
export const INVALID = 255;

/** ASCII code -> alphabet index, for codes 0-129 */
export const DECODE: readonly number[] = Object.freeze(
	Array.from({ length: 130 }, (_, code) => {
		const index = ENCODE.indexOf(String.fromCharCode(code));
		return index === -1 ? INVALID : index;
	}),
);

export const SEPARATOR = '_';

export const TIME_BIN_LEN = 5;
export const RANDO_BIN_LEN = 8;
export const PREFIX_BIN_LEN = 3; // includes version
export const END_RANDO_BIN = TIME_BIN_LEN + RANDO_BIN_LEN;
export const BIN_LEN = END_RANDO_BIN + PREFIX_BIN_LEN;

export const PREFIX_CHAR_LEN = 4; // excludes version
export const TIME_CHAR_LEN = 8;
export const RANDO_CHAR_LEN = 13;
export const VERSION_CHAR_LEN = 1;
export const END_TIME_CHAR = PREFIX_CHAR_LEN + TIME_CHAR_LEN;
export const CHAR_LEN = END_TIME_CHAR + RANDO_CHAR_LEN + VERSION_CHAR_LEN;

/** Highest value a padded unit's final symbol may take */
const MAX_PADDED_SYMBOL = 15;

/**
 * Prefix and version characters of an encoded prefix field
 */
export interface EncodedPrefix {
	prefix: string;
	version: string;
}

function lookup(encoded: string, index: number): number {
	return DECODE[encoded.charCodeAt(index)] ?? INVALID;
}

function requireBytes(binary: Uint8Array, length: number, unit: string): void {
	if (binary.length !== length) {
		throw new UpidError(
			`${unit} has to be exactly ${length} bytes long, got ${binary.length}`,
			'invalid_length',
		);
	}
}

function requireChars(encoded: string, length: number, unit: string, input = encoded): void {
	if (encoded.length !== length) {
		throw new UpidError(
			`${unit} has to be exactly ${length} characters long, got ${encoded.length}`,
			'invalid_length',
			input,
		);
	}
}

/**
 * Pack bytes into symbols, most significant bit first. When fewer than five
 * bits are left for the last symbol they are placed in its low bits.
 */
function encodeBits(binary: Uint8Array, charLen: number): string {
	let out = '';
	let buffer = 0;
	let bits = 0;
	let index = 0;

	while (out.length < charLen) {
		if (bits < 5 && index < binary.length) {
			buffer = ((buffer << 8) | (binary[index] ?? 0)) & 0xfff;
			bits += 8;
			index++;
		}

		if (bits >= 5) {
			out += ENCODE.charAt((buffer >> (bits - 5)) & 31);
			bits -= 5;
		} else {
			out += ENCODE.charAt(buffer & ((1 << bits) - 1));
			bits = 0;
		}
	}

	return out;
}

/**
 * Inverse of {@link encodeBits}. The final symbol of a unit whose bit width is
 * not a multiple of five contributes only its low bits, so anything above
 * {@link MAX_PADDED_SYMBOL} there would spill into the neighbouring field.
 */
function decodeBits(encoded: string, byteLen: number, unit: string): Uint8Array {
	const out = new Uint8Array(byteLen);
	const lastWidth = byteLen * 8 - (encoded.length - 1) * 5;
	let buffer = 0;
	let bits = 0;
	let index = 0;

	for (let i = 0; i < encoded.length; i++) {
		const value = lookup(encoded, i);
		if (value === INVALID) {
			throw new UpidError(
				`${unit} contains invalid character '${encoded.charAt(i)}', allowed: ${ENCODE}`,
				'invalid_char',
				encoded,
			);
		}

		const isLast = i === encoded.length - 1;
		if (isLast && lastWidth < 5 && value > MAX_PADDED_SYMBOL) {
			throw new UpidError(`${unit} '${encoded}' is too large and would overflow 128 bits`, 'overflow', encoded);
		}

		const width = isLast ? lastWidth : 5;
		buffer = (buffer << width) | value;
		bits += width;

		while (bits >= 8) {
			out[index++] = (buffer >> (bits - 8)) & 0xff;
			bits -= 8;
		}
		buffer &= (1 << bits) - 1;
	}

	return out;
}

/**
 * Encode a 16-byte UPID to its 27-character text form.
 */
export function encode(binary: Uint8Array): string {
	requireBytes(binary, BIN_LEN, 'UPID');

	const time = encodeTime(binary.subarray(0, TIME_BIN_LEN));
	const rando = encodeRando(binary.subarray(TIME_BIN_LEN, END_RANDO_BIN));
	const { prefix, version } = encodePrefix(binary.subarray(END_RANDO_BIN));
	return `${prefix}${SEPARATOR}${time}${rando}${version}`;
}

/**
 * Encode the prefix+version field. 24 bits become 25, the padding bit being
 * the top bit of the version character.
 */
export function encodePrefix(binary: Uint8Array): EncodedPrefix {
	requireBytes(binary, PREFIX_BIN_LEN, 'Prefix value');

	const encoded = encodeBits(binary, PREFIX_CHAR_LEN + VERSION_CHAR_LEN);
	return {
		prefix: encoded.slice(0, PREFIX_CHAR_LEN),
		version: encoded.slice(PREFIX_CHAR_LEN),
	};
}

/**
 * Encode the timestamp field. 40 bits map exactly onto 8 characters.
 */
export function encodeTime(binary: Uint8Array): string {
	requireBytes(binary, TIME_BIN_LEN, 'Timestamp value');
	return encodeBits(binary, TIME_CHAR_LEN);
}

/**
 * Encode the randomness field. 64 bits become 65, with a padding bit in the
 * last character.
 */
export function encodeRando(binary: Uint8Array): string {
	requireBytes(binary, RANDO_BIN_LEN, 'Randomness value');
	return encodeBits(binary, RANDO_CHAR_LEN);
}

/**
 * Decode a UPID from text. Every separator is ignored; the remaining 26
 * characters are validated before any field is decoded.
 */
export function decode(encoded: string): Uint8Array {
	const stripped = encoded.replace(/_/g, '');
	requireChars(stripped, CHAR_LEN, 'Encoded UPID', encoded);

	for (const char of stripped) {
		if (!ENCODE.includes(char)) {
			throw new UpidError(
				`Encoded UPID can only consist of characters in ${ENCODE}, got '${char}'`,
				'invalid_char',
				encoded,
			);
		}
	}

	// text and binary regions don't line up: the version trails the text
	const prefix = decodePrefix(stripped.slice(0, PREFIX_CHAR_LEN) + stripped.slice(CHAR_LEN - VERSION_CHAR_LEN));
	const time = decodeTime(stripped.slice(PREFIX_CHAR_LEN, END_TIME_CHAR));
	const rando = decodeRando(stripped.slice(END_TIME_CHAR, CHAR_LEN - VERSION_CHAR_LEN));

	const out = new Uint8Array(BIN_LEN);
	out.set(time, 0);
	out.set(rando, TIME_BIN_LEN);
	out.set(prefix, END_RANDO_BIN);
	return out;
}

/**
 * Decode four prefix characters followed by the version character.
 */
export function decodePrefix(encoded: string): Uint8Array {
	requireChars(encoded, PREFIX_CHAR_LEN + VERSION_CHAR_LEN, 'UPID prefix');
	return decodeBits(encoded, PREFIX_BIN_LEN, 'Prefix value');
}

export function decodeTime(encoded: string): Uint8Array {
	requireChars(encoded, TIME_CHAR_LEN, 'UPID timestamp');
	return decodeBits(encoded, TIME_BIN_LEN, 'Timestamp value');
}

export function decodeRando(encoded: string): Uint8Array {
	requireChars(encoded, RANDO_CHAR_LEN, 'UPID randomness');
	return decodeBits(encoded, RANDO_BIN_LEN, 'Random value');
}
