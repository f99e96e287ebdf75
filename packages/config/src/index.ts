import 'dotenv/config';
import { z } from 'zod/v4';
import { ENCODE, PREFIX_CHAR_LEN } from '@upid/core';

export { z } from 'zod/v4';

/**
 * Thrown by {@link parseEnv}; `fields` maps each invalid variable to its messages.
 */
export class EnvValidationError extends Error {
	constructor(public readonly fields: Record<string, string[]>) {
		const lines = Object.entries(fields).map(([key, messages]) => `  ${key}: ${messages.join(', ')}`);
		super(`Environment validation failed:\n${lines.join('\n')}`);
		this.name = 'EnvValidationError';
	}
}

/**
 * Parse environment variables with Zod schema validation.
 * Every invalid variable is reported, not only the first.
 */
export function parseEnv<T extends z.ZodRawShape>(
	schema: z.ZodObject<T>,
	env: Record<string, string | undefined> = process.env,
): z.infer<z.ZodObject<T>> {
	const result = schema.safeParse(env);
	if (result.success) {
		return result.data;
	}

	const fields: Record<string, string[]> = {};
	for (const issue of result.error.issues) {
		const key = issue.path.map(String).join('.');
		(fields[key] ??= []).push(issue.message);
	}
	throw new EnvValidationError(fields);
}

/**
 * Common environment variable schemas for reuse.
 *
 * Note: in zod v4, .default() on a transformed schema expects the OUTPUT type.
 * Use .prefault() to provide an INPUT default, applied before parsing.
 */
export const CommonEnvSchemas = {
	logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),

	/** 'true' or '1' */
	boolean: z
		.string()
		.transform((v) => v === 'true' || v === '1')
		.prefault('false'),

	/**
	 * UPID prefix, rejected rather than normalized when it would not survive
	 * encoding unchanged. Shorter prefixes are still padded with 'z'.
	 */
	upidPrefix: z
		.string()
		.max(PREFIX_CHAR_LEN, `Prefix must be at most ${PREFIX_CHAR_LEN} characters`)
		.refine((v) => [...v].every((char) => ENCODE.includes(char)), `Prefix may only contain ${ENCODE}`)
		.default(''),
};
