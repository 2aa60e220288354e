import { describe, it, expect } from 'vitest';
import { Ulid, getTimestamp } from '../ulid.js';
import type { UlidProvider } from '../generator.js';

const KNOWN_TEXT = '01ARYZ6S41041061050R3GG28A';
const KNOWN_TIMESTAMP = 1469918176385;

describe('Ulid class', () => {
	it('should parse and round-trip a ULID string', () => {
		const ulid = Ulid.parse(KNOWN_TEXT)._unsafeUnwrap();
		expect(ulid.toString()).toBe(KNOWN_TEXT);
		expect(Ulid.fromBytes(ulid.toBytes())._unsafeUnwrap().toString()).toBe(KNOWN_TEXT);
	});

	it('should extract the timestamp and date', () => {
		const ulid = Ulid.parse(KNOWN_TEXT)._unsafeUnwrap();
		expect(ulid.getTimestamp()).toBe(KNOWN_TIMESTAMP);
		expect(ulid.getDate().toISOString()).toBe('2016-07-30T22:36:16.385Z');
	});

	it('should extract the random component', () => {
		const ulid = Ulid.parse(KNOWN_TEXT)._unsafeUnwrap();
		expect(Array.from(ulid.getRandom())).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10]);
	});

	it('should read the largest timestamp exactly', () => {
		const ulid = Ulid.parse('7ZZZZZZZZZZZZZZZZZZZZZZZZZ')._unsafeUnwrap();
		expect(ulid.getTimestamp()).toBe(2 ** 48 - 1);
	});

	it('should fail to parse invalid strings', () => {
		expect(Ulid.parse('I'.repeat(26))._unsafeUnwrapErr().type).toBe('invalid_character');
		expect(Ulid.parse('0'.repeat(25))._unsafeUnwrapErr().type).toBe('invalid_length');
	});

	it('should fail to build from the wrong number of bytes', () => {
		expect(Ulid.fromBytes(new Uint8Array(15))._unsafeUnwrapErr()).toMatchObject({
			type: 'invalid_length',
			expected: 16,
			actual: 15,
		});
	});

	it('should not share bytes with callers', () => {
		const input = new Uint8Array(16);
		const ulid = Ulid.fromBytes(input)._unsafeUnwrap();

		input[0] = 0xff;
		const output = ulid.toBytes();
		output[1] = 0xff;

		expect(ulid.toString()).toBe('0'.repeat(26));
		expect(ulid.toBytes()).toEqual(new Uint8Array(16));
	});

	it('should generate from an injected provider', () => {
		const provider: UlidProvider = {
			now: () => KNOWN_TIMESTAMP,
			randomBytes: (size) => Uint8Array.from({ length: size }, (_, i) => i + 1),
		};
		expect(Ulid.generate(undefined, provider).toString()).toBe(KNOWN_TEXT);
		expect(Ulid.generate(0, provider).getTimestamp()).toBe(0);
	});

	it('should generate with the system clock by default', () => {
		const ulid = Ulid.generate();
		expect(Math.abs(ulid.getTimestamp() - Date.now())).toBeLessThan(1000);
	});

	it('should compare by byte order', () => {
		const zero = Ulid.parse('0'.repeat(26))._unsafeUnwrap();
		const known = Ulid.parse(KNOWN_TEXT)._unsafeUnwrap();
		const same = Ulid.parse(KNOWN_TEXT)._unsafeUnwrap();

		expect(zero.compare(known)).toBe(-1);
		expect(known.compare(zero)).toBe(1);
		expect(known.compare(same)).toBe(0);
		expect(known.equals(same)).toBe(true);
		expect(known.equals(zero)).toBe(false);
	});

	it('should serialize to JSON as its string form', () => {
		const ulid = Ulid.parse(KNOWN_TEXT)._unsafeUnwrap();
		expect(JSON.stringify({ id: ulid })).toBe(`{"id":"${KNOWN_TEXT}"}`);
	});
});

describe('getTimestamp', () => {
	it('should extract creation time from a ULID string', () => {
		expect(getTimestamp(KNOWN_TEXT)._unsafeUnwrap()).toBe(KNOWN_TIMESTAMP);
	});

	it('should fail for invalid strings', () => {
		expect(getTimestamp('not-a-ulid').isErr()).toBe(true);
	});
});
