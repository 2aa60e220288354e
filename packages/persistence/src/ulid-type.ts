/**
 * ULID column type adapter.
 *
 * Bridges application values (26-character ULID strings) and the storage
 * representation (16 bytes in a `uuid` column):
 * - cast: validate user input
 * - dump: application value -> 16 bytes
 * - load: 16 bytes -> application value
 * - autogenerate: fresh value for inserts
 *
 * Expected failures come back as neverthrow Results. `castOrThrow` is the
 * throwing variant for callers that treat bad input as a hard failure.
 */

import { Result, err } from 'neverthrow';
import { decode, encode, generate, type UlidError } from '@ulidkit/ulid';
import type { UuidError } from './uuid.js';

/**
 * Cast failures: codec errors plus non-string input
 */
export type CastError = UlidError | { type: 'invalid_type'; received: string; message: string };

export type UlidCastErrorReason = CastError['type'] | UuidError['type'];

/**
 * Error thrown when a value cannot be cast to or from a ULID
 */
export class UlidCastError extends Error {
	constructor(
		message: string,
		public readonly reason: UlidCastErrorReason,
		public readonly value: unknown,
	) {
		super(message);
		this.name = 'UlidCastError';
	}
}

function describeType(value: unknown): string {
	if (value === null) return 'null';
	if (Array.isArray(value)) return 'array';
	if (value instanceof Uint8Array) return 'bytes';
	return typeof value;
}

function castUlid(value: unknown): Result<string, CastError> {
	if (typeof value !== 'string') {
		const received = describeType(value);
		return err({ type: 'invalid_type', received, message: `Cannot cast ${received} to ULID` });
	}
	return decode(value).map(() => value);
}

export const UlidType = {
	/**
	 * The underlying column type.
	 */
	type: 'uuid',

	/**
	 * Cast user input to a ULID string. Valid strings are returned unchanged.
	 */
	cast: castUlid,

	/**
	 * Same as `cast` but throws UlidCastError on invalid input.
	 */
	castOrThrow(value: unknown): string {
		const result = castUlid(value);
		if (result.isErr()) {
			throw new UlidCastError(result.error.message, result.error.type, value);
		}
		return result.value;
	},

	/**
	 * Convert a ULID string into its 16 bytes.
	 */
	dump(text: string): Result<Uint8Array, UlidError> {
		return decode(text);
	},

	/**
	 * Convert 16 bytes into a ULID string.
	 */
	load(bytes: Uint8Array): Result<string, UlidError> {
		return encode(bytes);
	},

	/**
	 * Generate a value for a new row.
	 */
	autogenerate(): string {
		return generate();
	},
} as const;
