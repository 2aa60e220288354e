/**
 * Crockford Base32 symbol tables.
 *
 * Encode direction: symbol value (0-31) -> character.
 * Decode direction: ASCII character code (0-127) -> symbol value, or -1.
 *
 * Only the 32 uppercase symbols decode. Lowercase letters and the usual
 * Crockford substitutions (I, L, O) are rejected.
 */

// Crockford Base32 alphabet (excludes I, L, O, U to avoid confusion)
export const CROCKFORD_ALPHABET = '0123456789ABCDEFGHJKMNPQRSTVWXYZ';

const ENCODE_TABLE: readonly string[] = CROCKFORD_ALPHABET.split('');

const DECODE_TABLE = new Int8Array(128).fill(-1);
for (let i = 0; i < CROCKFORD_ALPHABET.length; i++) {
	DECODE_TABLE[CROCKFORD_ALPHABET.charCodeAt(i)] = i;
}

/**
 * Map a 5-bit symbol value to its character.
 */
export function encodeSymbol(value: number): string {
	return ENCODE_TABLE[value & 31] ?? '';
}

/**
 * Map a character code to its symbol value, or -1 if the code is not in the alphabet.
 */
export function decodeSymbol(charCode: number): number {
	if (charCode < 0 || charCode > 127) {
		return -1;
	}
	return DECODE_TABLE[charCode] ?? -1;
}
