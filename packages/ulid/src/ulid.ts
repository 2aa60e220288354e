/**
 * Ulid value class for callers that prefer an object over raw bytes.
 */

import type { Result } from 'neverthrow';
import { decode, encode, ULID_BYTE_LENGTH } from './codec.js';
import type { UlidError } from './errors.js';
import { createGenerator, RANDOM_BYTE_LENGTH, systemProvider, type UlidProvider } from './generator.js';

const TIMESTAMP_BYTE_LENGTH = ULID_BYTE_LENGTH - RANDOM_BYTE_LENGTH;

/**
 * Read the 48-bit big-endian timestamp from the first 6 bytes
 */
function readTimestamp(bytes: Uint8Array): number {
	let timestamp = 0;
	for (let i = 0; i < TIMESTAMP_BYTE_LENGTH; i++) {
		// 2^48 fits in a double, so plain arithmetic stays exact
		timestamp = timestamp * 256 + (bytes[i] ?? 0);
	}
	return timestamp;
}

/**
 * ULID class for working with Universally Unique Lexicographically Sortable Identifiers
 */
export class Ulid {
	private readonly bytes: Uint8Array;
	private readonly text: string;

	private constructor(bytes: Uint8Array, text: string) {
		this.bytes = bytes;
		this.text = text;
	}

	/**
	 * Create a new ULID
	 */
	static generate(timestamp?: number, provider: UlidProvider = systemProvider): Ulid {
		const created = Ulid.fromBytes(createGenerator(provider).generateBinary(timestamp));
		if (created.isErr()) {
			// generateBinary always yields 16 bytes
			throw new Error(created.error.message);
		}
		return created.value;
	}

	/**
	 * Parse a ULID from its 26-character string
	 */
	static parse(text: string): Result<Ulid, UlidError> {
		return decode(text).map((bytes) => new Ulid(bytes, text));
	}

	/**
	 * Create a ULID from its 16 bytes. The input is copied.
	 */
	static fromBytes(bytes: Uint8Array): Result<Ulid, UlidError> {
		const copy = Uint8Array.from(bytes);
		return encode(copy).map((text) => new Ulid(copy, text));
	}

	/**
	 * Get the ULID as a 26-character Crockford Base32 string
	 */
	toString(): string {
		return this.text;
	}

	toJSON(): string {
		return this.text;
	}

	/**
	 * Get a copy of the 16 bytes
	 */
	toBytes(): Uint8Array {
		return Uint8Array.from(this.bytes);
	}

	/**
	 * Get the timestamp component (milliseconds since Unix epoch)
	 */
	getTimestamp(): number {
		return readTimestamp(this.bytes);
	}

	/**
	 * Get the creation time as a Date
	 */
	getDate(): Date {
		return new Date(this.getTimestamp());
	}

	/**
	 * Get a copy of the 10 random bytes
	 */
	getRandom(): Uint8Array {
		return this.bytes.slice(TIMESTAMP_BYTE_LENGTH);
	}

	equals(other: Ulid): boolean {
		return this.compare(other) === 0;
	}

	/**
	 * Order by unsigned byte value, which matches the text order
	 */
	compare(other: Ulid): -1 | 0 | 1 {
		for (let i = 0; i < ULID_BYTE_LENGTH; i++) {
			const a = this.bytes[i] ?? 0;
			const b = other.bytes[i] ?? 0;
			if (a !== b) {
				return a < b ? -1 : 1;
			}
		}
		return 0;
	}
}

/**
 * Extract the creation timestamp (milliseconds since Unix epoch) from a ULID string
 */
export function getTimestamp(text: string): Result<number, UlidError> {
	return decode(text).map(readTimestamp);
}
