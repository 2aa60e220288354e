/**
 * @ulidkit/ulid
 *
 * ULID (Universally Unique Lexicographically Sortable Identifier) codec.
 *
 * A ULID is 128 bits: a 48-bit millisecond timestamp followed by 80 random bits.
 * - Text form: 26 Crockford Base32 characters (e.g., "01ARYZ6S41041061050R3GG28A")
 * - Binary form: 16 bytes
 *
 * @example
 * ```typescript
 * import { generate, encode, decode, isValid, Ulid } from '@ulidkit/ulid';
 *
 * // Generate a new ULID
 * const id = generate(); // "01HF7YAT..."
 *
 * // Convert between text and bytes
 * const bytes = decode(id)._unsafeUnwrap();
 * encode(bytes); // ok("01HF7YAT...")
 *
 * // Validate user input before lookup
 * isValid(input); // true | false, never throws
 *
 * // Work with the Ulid object
 * const ulid = Ulid.generate();
 * console.log(ulid.getDate()); // Creation timestamp
 * ```
 */

// Codec
export { encode, decode, isValid, ULID_LENGTH, ULID_BYTE_LENGTH, TIMESTAMP_LENGTH } from './codec.js';

// Alphabet
export { CROCKFORD_ALPHABET } from './alphabet.js';

// Errors
export { UlidErrors, type UlidError } from './errors.js';

// Generation
export {
	generate,
	generateBinary,
	createGenerator,
	systemProvider,
	MAX_TIMESTAMP,
	RANDOM_BYTE_LENGTH,
	type UlidProvider,
	type UlidGenerator,
} from './generator.js';

// Ulid object
export { Ulid, getTimestamp } from './ulid.js';
