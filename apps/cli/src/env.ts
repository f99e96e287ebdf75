import { parseEnv, CommonEnvSchemas, z } from '@upid/config';

/**
 * upid CLI environment configuration
 */
export const envSchema = z.object({
	// Logging (written to stderr so stdout only carries identifiers)
	LOG_LEVEL: CommonEnvSchemas.logLevel,
	LOG_PRETTY: CommonEnvSchemas.boolean,

	// Prefix used when none is given on the command line
	UPID_DEFAULT_PREFIX: CommonEnvSchemas.upidPrefix,
});

export type Env = z.infer<typeof envSchema>;

export function loadEnv(env: Record<string, string | undefined> = process.env): Env {
	return parseEnv(envSchema, env);
}
