/**
 * UUID text form of a ULID.
 *
 * PostgreSQL stores a ULID's 16 bytes in a `uuid` column and hands them back
 * as `xxxxxxxx-xxxx-xxxx-xxxx-xxxxxxxxxxxx`. These helpers move between that
 * form, the 16 bytes and the 26-character ULID string.
 */

import { Result, ok, err } from 'neverthrow';
import { decode, encode, UlidErrors, ULID_BYTE_LENGTH, type UlidError } from '@ulidkit/ulid';

const UUID_PATTERN = /^[0-9a-f]{8}-?[0-9a-f]{4}-?[0-9a-f]{4}-?[0-9a-f]{4}-?[0-9a-f]{12}$/i;

export type UuidError = { type: 'invalid_uuid'; value: string; message: string };

/**
 * Format 16 bytes as a lowercase hyphenated UUID.
 */
export function toUuid(bytes: Uint8Array): Result<string, UlidError> {
	if (bytes.length !== ULID_BYTE_LENGTH) {
		return err(UlidErrors.invalidLength(ULID_BYTE_LENGTH, bytes.length));
	}

	const hex = Buffer.from(bytes).toString('hex');
	return ok(`${hex.slice(0, 8)}-${hex.slice(8, 12)}-${hex.slice(12, 16)}-${hex.slice(16, 20)}-${hex.slice(20)}`);
}

/**
 * Parse a UUID (either case, hyphens optional) into 16 bytes.
 */
export function fromUuid(uuid: string): Result<Uint8Array, UuidError> {
	if (!UUID_PATTERN.test(uuid)) {
		return err({ type: 'invalid_uuid', value: uuid, message: `Invalid UUID: ${JSON.stringify(uuid)}` });
	}
	return ok(new Uint8Array(Buffer.from(uuid.replaceAll('-', ''), 'hex')));
}

/**
 * Convert a ULID string to its UUID form.
 */
export function ulidToUuid(text: string): Result<string, UlidError> {
	return decode(text).andThen(toUuid);
}

/**
 * Convert a UUID to its ULID string form.
 */
export function uuidToUlid(uuid: string): Result<string, UuidError | UlidError> {
	return fromUuid(uuid).andThen(encode);
}
