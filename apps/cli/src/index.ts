#!/usr/bin/env node
/**
 * ulid
 *
 * Command line front end for the ULID codec: generate, encode, decode,
 * validate and inspect identifiers.
 */

import { createLogger, setDefaultLogger } from '@ulidkit/logging';
import { createGenerator, systemProvider } from '@ulidkit/ulid';
import { runCommand } from './commands.js';
import { loadCliEnv, type CliEnv } from './env.js';

function loadEnvOrExit(): CliEnv {
	try {
		return loadCliEnv();
	} catch (error) {
		console.error(`error: ${error instanceof Error ? error.message : String(error)}`);
		process.exit(1);
	}
}

const env = loadEnvOrExit();

const logger = createLogger({
	level: env.LOG_LEVEL,
	serviceName: 'ulid-cli',
	pretty: env.LOG_PRETTY,
	destination: 'stderr',
});
setDefaultLogger(logger);

const result = runCommand(process.argv[2], process.argv.slice(3), {
	logger,
	generator: createGenerator(systemProvider),
});

if (result.stdout.length > 0) {
	console.log(result.stdout.join('\n'));
}
if (result.stderr.length > 0) {
	console.error(result.stderr.join('\n'));
}
process.exitCode = result.exitCode;
