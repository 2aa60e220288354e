/**
 * ULID generation.
 *
 * The clock and the random source are injected through a {@link UlidProvider}
 * so tests can pin both. The module-level `generate` and `generateBinary`
 * use the system clock and `crypto.randomBytes`.
 */

import crypto from 'node:crypto';
import { encode, ULID_BYTE_LENGTH } from './codec.js';

/** Bytes of randomness in every ULID */
export const RANDOM_BYTE_LENGTH = 10;

/** Largest timestamp that fits in 48 bits */
export const MAX_TIMESTAMP = 2 ** 48 - 1;

const TIMESTAMP_BITS = 48;

/**
 * Source of the two implicit generator inputs
 */
export interface UlidProvider {
	/** Milliseconds since the Unix epoch */
	now(): number;
	/** Cryptographically strong random bytes */
	randomBytes(size: number): Uint8Array;
}

/**
 * Wall clock and node:crypto
 */
export const systemProvider: UlidProvider = {
	now: () => Date.now(),
	randomBytes: (size) => crypto.randomBytes(size),
};

export interface UlidGenerator {
	/** Generate a 26-character ULID string */
	generate(timestamp?: number): string;
	/** Generate a 16-byte ULID */
	generateBinary(timestamp?: number): Uint8Array;
}

/**
 * Wrap a millisecond timestamp into its low 48 bits.
 * Timestamps of 2^48 or more (and negative ones) wrap rather than fail.
 */
function timestampBits(timestamp: number): bigint {
	if (!Number.isFinite(timestamp)) {
		throw new RangeError(`ULID timestamp must be a finite number, got ${timestamp}`);
	}
	return BigInt.asUintN(TIMESTAMP_BITS, BigInt(Math.trunc(timestamp)));
}

/**
 * Create a generator bound to the given clock and random source.
 *
 * @example
 * ```typescript
 * const fixed = createGenerator({
 *     now: () => 1_700_000_000_000,
 *     randomBytes: (size) => new Uint8Array(size),
 * });
 * fixed.generate(); // "01HF7YAT000000000000000000"
 * ```
 */
export function createGenerator(provider: UlidProvider): UlidGenerator {
	function generateBinary(timestamp: number = provider.now()): Uint8Array {
		const random = provider.randomBytes(RANDOM_BYTE_LENGTH);
		if (random.length < RANDOM_BYTE_LENGTH) {
			throw new RangeError(
				`ULID random source returned ${random.length} bytes, expected ${RANDOM_BYTE_LENGTH}`,
			);
		}

		const bytes = new Uint8Array(ULID_BYTE_LENGTH);
		let time = timestampBits(timestamp);
		for (let i = ULID_BYTE_LENGTH - RANDOM_BYTE_LENGTH - 1; i >= 0; i--) {
			bytes[i] = Number(time & 0xffn);
			time >>= 8n;
		}
		bytes.set(random.subarray(0, RANDOM_BYTE_LENGTH), ULID_BYTE_LENGTH - RANDOM_BYTE_LENGTH);

		return bytes;
	}

	function generate(timestamp?: number): string {
		const encoded = encode(generateBinary(timestamp));
		if (encoded.isErr()) {
			// generateBinary always yields 16 bytes
			throw new Error(encoded.error.message);
		}
		return encoded.value;
	}

	return { generate, generateBinary };
}

const systemGenerator = createGenerator(systemProvider);

/**
 * Generate a new ULID as a Crockford Base32 string.
 * This is the primary function for generating IDs.
 *
 * @param timestamp - Unix time in milliseconds (defaults to now)
 */
export function generate(timestamp?: number): string {
	return systemGenerator.generate(timestamp);
}

/**
 * Generate a new ULID as 16 bytes.
 *
 * @param timestamp - Unix time in milliseconds (defaults to now)
 */
export function generateBinary(timestamp?: number): Uint8Array {
	return systemGenerator.generateBinary(timestamp);
}
