import { describe, it, expect, vi } from 'vitest';
import { createGenerator, generate, generateBinary, MAX_TIMESTAMP, type UlidProvider } from '../generator.js';
import { isValid, TIMESTAMP_LENGTH } from '../codec.js';
import { getTimestamp } from '../ulid.js';

const KNOWN_TIMESTAMP = 1469918176385;

function fixedProvider(now: number, fill?: number): UlidProvider {
	return {
		now: () => now,
		randomBytes: (size) =>
			fill === undefined ? Uint8Array.from({ length: size }, (_, i) => i + 1) : new Uint8Array(size).fill(fill),
	};
}

describe('createGenerator', () => {
	it('should produce the golden vector for a fixed clock and random source', () => {
		const generator = createGenerator(fixedProvider(KNOWN_TIMESTAMP));
		expect(generator.generate()).toBe('01ARYZ6S41041061050R3GG28A');
	});

	it('should lay out the timestamp big-endian in the first 6 bytes', () => {
		const bytes = createGenerator(fixedProvider(0)).generateBinary(KNOWN_TIMESTAMP);
		expect(bytes).toHaveLength(16);
		expect(Array.from(bytes.subarray(0, 6))).toEqual([1, 86, 61, 243, 100, 129]);
		expect(Array.from(bytes.subarray(6))).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10]);
	});

	it('should prefer an explicit timestamp over the clock', () => {
		const provider = fixedProvider(KNOWN_TIMESTAMP, 0);
		const now = vi.spyOn(provider, 'now');
		const generator = createGenerator(provider);

		expect(generator.generate(1_700_000_000_000)).toBe('01HF7YAT000000000000000000');
		expect(now).not.toHaveBeenCalled();
	});

	it('should read the clock when no timestamp is given', () => {
		const provider = fixedProvider(1_700_000_000_000, 0);
		const now = vi.spyOn(provider, 'now');

		expect(createGenerator(provider).generate()).toBe('01HF7YAT000000000000000000');
		expect(now).toHaveBeenCalledTimes(1);
	});

	it('should request exactly 10 random bytes', () => {
		const provider = fixedProvider(0, 0);
		const randomBytes = vi.spyOn(provider, 'randomBytes');

		createGenerator(provider).generateBinary();
		expect(randomBytes).toHaveBeenCalledWith(10);
	});

	it('should truncate timestamps to their low 48 bits', () => {
		const generator = createGenerator(fixedProvider(0, 0));

		expect(generator.generate(MAX_TIMESTAMP)).toBe('7ZZZZZZZZZ0000000000000000');
		expect(generator.generate(2 ** 48 + 5)).toBe('00000000050000000000000000');
		expect(generator.generate(-1)).toBe('7ZZZZZZZZZ0000000000000000');
	});

	it('should drop the fractional part of a timestamp', () => {
		const generator = createGenerator(fixedProvider(0, 0));
		expect(generator.generate(1.9)).toBe('00000000010000000000000000');
	});

	it('should throw for a non-finite timestamp', () => {
		const generator = createGenerator(fixedProvider(0, 0));
		expect(() => generator.generate(Number.NaN)).toThrow(RangeError);
		expect(() => generator.generate(Number.POSITIVE_INFINITY)).toThrow('must be a finite number');
	});

	it('should throw when the random source returns too few bytes', () => {
		const generator = createGenerator({ now: () => 0, randomBytes: () => new Uint8Array(5) });
		expect(() => generator.generateBinary()).toThrow('returned 5 bytes, expected 10');
	});

	it('should sort timestamp prefixes in timestamp order regardless of randomness', () => {
		const high = createGenerator(fixedProvider(0, 0xff));
		const low = createGenerator(fixedProvider(0, 0x00));
		const timestamps = [0, 1, 31, 32, 1_000, KNOWN_TIMESTAMP, 1_700_000_000_000, MAX_TIMESTAMP];

		for (let i = 1; i < timestamps.length; i++) {
			const earlier = high.generate(timestamps[i - 1]);
			const later = low.generate(timestamps[i]);
			expect(earlier.slice(0, TIMESTAMP_LENGTH) < later.slice(0, TIMESTAMP_LENGTH)).toBe(true);
			expect(earlier < later).toBe(true);
		}
	});
});

describe('generate', () => {
	it('should generate a valid 26-character string', () => {
		const id = generate();
		expect(id).toHaveLength(26);
		expect(isValid(id)).toBe(true);
	});

	it('should use the current time by default', () => {
		const before = Date.now();
		const id = generate();
		const after = Date.now();

		const timestamp = getTimestamp(id)._unsafeUnwrap();
		expect(timestamp).toBeGreaterThanOrEqual(before);
		expect(timestamp).toBeLessThanOrEqual(after);
	});

	it('should use the given timestamp', () => {
		expect(generate(KNOWN_TIMESTAMP).slice(0, TIMESTAMP_LENGTH)).toBe('01ARYZ6S41');
	});

	it('should generate unique IDs', () => {
		const ids = new Set<string>();
		for (let i = 0; i < 1000; i++) {
			ids.add(generate());
		}
		expect(ids.size).toBe(1000);
	});
});

describe('generateBinary', () => {
	it('should generate 16 bytes with the timestamp in front', () => {
		const bytes = generateBinary(KNOWN_TIMESTAMP);
		expect(bytes).toHaveLength(16);
		expect(Array.from(bytes.subarray(0, 6))).toEqual([1, 86, 61, 243, 100, 129]);
	});

	it('should fill the random part differently each time', () => {
		const first = generateBinary(0);
		const second = generateBinary(0);
		expect(first.subarray(6)).not.toEqual(second.subarray(6));
	});
});
