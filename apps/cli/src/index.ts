#!/usr/bin/env node
/**
 * upid
 *
 * Prints new UPIDs for a prefix, or decodes an existing one.
 * Identifiers go to stdout; logs and errors go to stderr.
 */

import { createLogger, setDefaultLogger } from '@upid/logging';
import { runCli } from './cli.js';
import { loadEnv } from './env.js';

const env = loadEnv();

const logger = createLogger({
	level: env.LOG_LEVEL,
	serviceName: 'upid',
	pretty: env.LOG_PRETTY,
	destination: process.stderr,
});
setDefaultLogger(logger);

process.exitCode = runCli(
	process.argv.slice(2),
	{
		stdout: (line) => process.stdout.write(`${line}\n`),
		stderr: (line) => process.stderr.write(`${line}\n`),
	},
	{ logger, defaultPrefix: env.UPID_DEFAULT_PREFIX },
);
