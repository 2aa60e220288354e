/**
 * ULID Codec
 *
 * A ULID is a 128-bit value composed of:
 * - 48 bits for timestamp (milliseconds since Unix epoch, big-endian)
 * - 80 bits of randomness
 *
 * Text form is 26 Crockford Base32 characters. 26 x 5 = 130 bits, so the
 * first character carries only the top 3 bits (values 0-7) and the other 25
 * carry 5 bits each, most significant bit first.
 *
 * Binary form is 16 bytes. Both forms sort identically.
 */

import { Result, ok, err } from 'neverthrow';
import { decodeSymbol, encodeSymbol } from './alphabet.js';
import { UlidErrors, type UlidError } from './errors.js';

/** Characters in the text form */
export const ULID_LENGTH = 26;

/** Bytes in the binary form */
export const ULID_BYTE_LENGTH = 16;

/** Leading text characters covering the 48-bit timestamp */
export const TIMESTAMP_LENGTH = 10;

/** Largest value the first character may hold */
const MAX_FIRST_SYMBOL = 7;

/**
 * Read 16 bytes as an unsigned 128-bit integer
 */
function bytesToBigInt(bytes: Uint8Array): bigint {
	let value = 0n;
	for (const byte of bytes) {
		value = (value << 8n) | BigInt(byte);
	}
	return value;
}

/**
 * Encode 16 bytes as a 26-character ULID string.
 *
 * @returns Result with the text form, or `invalid_length` if the input is not 16 bytes
 */
export function encode(bytes: Uint8Array): Result<string, UlidError> {
	if (bytes.length !== ULID_BYTE_LENGTH) {
		return err(UlidErrors.invalidLength(ULID_BYTE_LENGTH, bytes.length));
	}

	let value = bytesToBigInt(bytes);
	const chars: string[] = new Array(ULID_LENGTH);

	// After 25 five-bit fields, the 3 bits left over form the first character
	for (let i = ULID_LENGTH - 1; i >= 0; i--) {
		chars[i] = encodeSymbol(Number(value & 31n));
		value >>= 5n;
	}

	return ok(chars.join(''));
}

/**
 * Decode a 26-character ULID string into 16 bytes.
 *
 * Fails atomically: either all 16 bytes or an error.
 *
 * @returns Result with the binary form, `invalid_length` if the input is not 26
 *          characters, or `invalid_character` for the first character outside the alphabet
 */
export function decode(text: string): Result<Uint8Array, UlidError> {
	if (text.length !== ULID_LENGTH) {
		return err(UlidErrors.invalidLength(ULID_LENGTH, text.length));
	}

	let value = 0n;

	for (let i = 0; i < ULID_LENGTH; i++) {
		const symbol = decodeSymbol(text.charCodeAt(i));
		if (symbol === -1 || (i === 0 && symbol > MAX_FIRST_SYMBOL)) {
			return err(UlidErrors.invalidCharacter(text.charAt(i), i));
		}
		value = (value << 5n) | BigInt(symbol);
	}

	const bytes = new Uint8Array(ULID_BYTE_LENGTH);
	for (let i = ULID_BYTE_LENGTH - 1; i >= 0; i--) {
		bytes[i] = Number(value & 0xffn);
		value >>= 8n;
	}

	return ok(bytes);
}

/**
 * Check whether a value is a well-formed ULID string.
 *
 * Never throws. `isValid(s)` is true exactly when `decode(s)` succeeds.
 */
export function isValid(value: unknown): boolean {
	if (typeof value !== 'string' || value.length !== ULID_LENGTH) {
		return false;
	}

	if (decodeSymbol(value.charCodeAt(0)) > MAX_FIRST_SYMBOL) {
		return false;
	}

	for (let i = 0; i < ULID_LENGTH; i++) {
		if (decodeSymbol(value.charCodeAt(i)) === -1) {
			return false;
		}
	}

	return true;
}
