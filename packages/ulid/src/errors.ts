/**
 * ULID codec error types using discriminated unions for neverthrow
 */

/**
 * Codec errors
 */
export type UlidError =
	| { type: 'invalid_length'; expected: number; actual: number; message: string }
	| { type: 'invalid_character'; character: string; position: number; message: string };

/**
 * Helper to create codec errors
 */
export const UlidErrors = {
	invalidLength: (expected: number, actual: number): UlidError => ({
		type: 'invalid_length',
		expected,
		actual,
		message: `Invalid ULID length: expected ${expected}, got ${actual}`,
	}),
	invalidCharacter: (character: string, position: number): UlidError => ({
		type: 'invalid_character',
		character,
		position,
		message: `Invalid ULID character ${JSON.stringify(character)} at position ${position}`,
	}),
};
