import { CommonEnvSchemas, parseEnv, z, type ConfigType } from '@ulidkit/config';

/**
 * CLI environment. Logs go to stderr and stay quiet unless something fails.
 */
export const CliEnvSchema = z.object({
	LOG_LEVEL: CommonEnvSchemas.logLevel.unwrap().default('warn'),
	LOG_PRETTY: CommonEnvSchemas.boolean,
});

export type CliEnv = ConfigType<typeof CliEnvSchema>;

export function loadCliEnv(env: Record<string, string | undefined> = process.env): CliEnv {
	return parseEnv(CliEnvSchema, env);
}
