/**
 * CLI command implementations.
 *
 * Each command is a pure function of its arguments and context that returns
 * the lines to print and the exit code. The entry point does the printing.
 */

import type { Logger } from '@ulidkit/logging';
import { ok, type Result } from 'neverthrow';
import { decode, encode, isValid, MAX_TIMESTAMP, Ulid, type UlidError, type UlidGenerator } from '@ulidkit/ulid';
import { toUuid } from '@ulidkit/persistence';

export const VERSION = '0.1.0';

const MAX_COUNT = 10_000;

const FORMATS = ['text', 'hex', 'uuid'] as const;
type OutputFormat = (typeof FORMATS)[number];

export interface CommandContext {
	readonly logger: Logger;
	readonly generator: UlidGenerator;
}

export interface CommandResult {
	readonly exitCode: number;
	readonly stdout: string[];
	readonly stderr: string[];
}

export interface ParsedArgs {
	readonly options: Record<string, string>;
	readonly positionals: string[];
}

export function usage(): string {
	return `ulid v${VERSION}

Usage: ulid <command> [options]

Commands:
  generate           Generate ULIDs
  encode <hex>       Encode 16 bytes (32 hex digits) as a ULID
  decode <ulid>      Decode a ULID to 32 hex digits
  validate <ulid>    Check a ULID; exits 1 when invalid
  inspect <ulid>     Show the timestamp, random part and UUID form of a ULID
  version            Print version and exit
  help               Show this help message

generate options:
  --timestamp <ms>   Unix time in milliseconds (default: now)
  --count <n>        Number of ULIDs to generate (default: 1, max: ${MAX_COUNT})
  --format <format>  text, hex or uuid (default: text)

Environment:
  LOG_LEVEL          Log level for diagnostics on stderr (default: warn)
  LOG_PRETTY         Pretty-print logs (default: false)`;
}

/**
 * Split arguments into `--name value` options and positionals
 */
export function parseArgs(args: string[]): ParsedArgs {
	const options: Record<string, string> = {};
	const positionals: string[] = [];
	for (let i = 0; i < args.length; i++) {
		const arg = args[i] ?? '';
		const value = args[i + 1];
		if (arg.startsWith('--') && value !== undefined) {
			options[arg.slice(2)] = value;
			i++;
		} else {
			positionals.push(arg);
		}
	}
	return { options, positionals };
}

function success(...stdout: string[]): CommandResult {
	return { exitCode: 0, stdout, stderr: [] };
}

function failure(message: string): CommandResult {
	return { exitCode: 1, stdout: [], stderr: [`error: ${message}`] };
}

function toHex(bytes: Uint8Array): string {
	return Buffer.from(bytes).toString('hex');
}

function parseInteger(value: string, min: number, max: number): number | null {
	if (!/^\d+$/.test(value)) {
		return null;
	}
	const parsed = Number(value);
	return parsed >= min && parsed <= max ? parsed : null;
}

function isFormat(value: string): value is OutputFormat {
	return (FORMATS as readonly string[]).includes(value);
}

function formatBytes(bytes: Uint8Array, format: OutputFormat): Result<string, UlidError> {
	switch (format) {
		case 'hex':
			return ok(toHex(bytes));
		case 'uuid':
			return toUuid(bytes);
		case 'text':
			return encode(bytes);
	}
}

function runGenerate(args: ParsedArgs, ctx: CommandContext): CommandResult {
	const [unexpected] = args.positionals;
	if (unexpected !== undefined) {
		return failure(`unexpected argument '${unexpected}'`);
	}

	let timestamp: number | undefined;
	if (args.options['timestamp'] !== undefined) {
		const parsed = parseInteger(args.options['timestamp'], 0, MAX_TIMESTAMP);
		if (parsed === null) {
			return failure(`--timestamp must be an integer between 0 and ${MAX_TIMESTAMP}`);
		}
		timestamp = parsed;
	}

	const count = parseInteger(args.options['count'] ?? '1', 1, MAX_COUNT);
	if (count === null) {
		return failure(`--count must be an integer between 1 and ${MAX_COUNT}`);
	}

	const format = args.options['format'] ?? 'text';
	if (!isFormat(format)) {
		return failure(`--format must be one of ${FORMATS.join(', ')}`);
	}

	const lines: string[] = [];
	for (let i = 0; i < count; i++) {
		const line = formatBytes(ctx.generator.generateBinary(timestamp), format);
		if (line.isErr()) {
			return failure(line.error.message);
		}
		lines.push(line.value);
	}

	ctx.logger.debug({ count, format, timestamp }, 'Generated ULIDs');
	return success(...lines);
}

function runEncode(hex: string): CommandResult {
	if (!/^[0-9a-fA-F]*$/.test(hex) || hex.length % 2 !== 0) {
		return failure(`expected hexadecimal bytes, got '${hex}'`);
	}
	return encode(Buffer.from(hex, 'hex')).match(success, (error) => failure(error.message));
}

function runDecode(text: string): CommandResult {
	return decode(text).match(
		(bytes) => success(toHex(bytes)),
		(error) => failure(error.message),
	);
}

function runValidate(text: string): CommandResult {
	return isValid(text) ? success('valid') : { exitCode: 1, stdout: ['invalid'], stderr: [] };
}

function runInspect(text: string): CommandResult {
	return Ulid.parse(text).match(
		(ulid) =>
			toUuid(ulid.toBytes()).match(
				(uuid) =>
					success(
						`timestamp: ${ulid.getTimestamp()}`,
						`date:      ${ulid.getDate().toISOString()}`,
						`random:    ${toHex(ulid.getRandom())}`,
						`uuid:      ${uuid}`,
					),
				(error) => failure(error.message),
			),
		(error) => failure(error.message),
	);
}

/**
 * Commands taking a single positional argument
 */
const SINGLE_ARGUMENT_COMMANDS = new Map<string, { argument: string; run: (value: string) => CommandResult }>([
	['encode', { argument: '<hex>', run: runEncode }],
	['decode', { argument: '<ulid>', run: runDecode }],
	['validate', { argument: '<ulid>', run: runValidate }],
	['inspect', { argument: '<ulid>', run: runInspect }],
]);

/**
 * Route a command name and its arguments to the matching command
 */
export function runCommand(command: string | undefined, argv: string[], ctx: CommandContext): CommandResult {
	const args = parseArgs(argv);
	ctx.logger.debug({ command, args }, 'Running command');

	let result: CommandResult;
	switch (command) {
		case 'generate':
			result = runGenerate(args, ctx);
			break;
		case 'version':
		case '--version':
		case '-v':
			result = success(`ulid v${VERSION}`);
			break;
		case undefined:
		case 'help':
		case '--help':
		case '-h':
			result = success(usage());
			break;
		default: {
			const single = SINGLE_ARGUMENT_COMMANDS.get(command);
			if (!single) {
				result = { exitCode: 1, stdout: [], stderr: [`Unknown command: ${command}\n`, usage()] };
				break;
			}
			const [value, ...rest] = args.positionals;
			if (value === undefined) {
				result = failure(`missing ${single.argument} argument`);
			} else if (rest.length > 0) {
				result = failure(`unexpected argument '${rest[0]}'`);
			} else {
				result = single.run(value);
			}
		}
	}

	if (result.exitCode !== 0) {
		ctx.logger.warn({ command, exitCode: result.exitCode, stderr: result.stderr }, 'Command failed');
	}
	return result;
}
