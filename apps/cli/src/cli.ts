/**
 * upid command routing.
 *
 * Kept free of process globals so it can be driven from tests: output goes
 * through the supplied writers and the exit code is returned.
 */

import { Upid, UpidError, normalizePrefix } from '@upid/core';
import { createChildLogger, type Logger } from '@upid/logging';

export const VERSION = '0.1.0';

export const ExitCode = {
	OK: 0,
	INVALID_INPUT: 1,
	USAGE: 2,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

export interface CliIo {
	stdout: (line: string) => void;
	stderr: (line: string) => void;
}

export interface CliContext {
	logger: Logger;
	/** Prefix used when the command line has none */
	defaultPrefix: string;
}

export interface ParsedArgs {
	positionals: string[];
	flags: Record<string, string>;
}

/**
 * Decoded fields printed by `upid parse`
 */
export interface UpidDescription {
	text: string;
	prefix: string;
	version: string;
	milliseconds: number;
	timestamp: string;
	hex: string;
	uuid: string;
	integer: string;
}

class UsageError extends Error {
	constructor(message: string) {
		super(message);
		this.name = 'UsageError';
	}
}

export function usage(): string {
	return `upid v${VERSION}

Usage: upid [command] [options]

Commands:
  [prefix]              Print a new UPID (same as generate)
  generate [prefix]     Print new UPIDs
  parse <upid>          Print the decoded fields of a UPID as JSON
  version               Print version and exit
  help                  Show this help message

generate options:
  --count <n>           Number of UPIDs to print (default: 1)
  --at <ms>             Timestamp in milliseconds since the epoch (default: now)

Environment:
  UPID_DEFAULT_PREFIX   Prefix used when none is given (default: zzzz)
  LOG_LEVEL             Log level for stderr diagnostics (default: info)
  LOG_PRETTY            Pretty-print logs (default: false)`;
}

export function parseArgs(args: string[]): ParsedArgs {
	const positionals: string[] = [];
	const flags: Record<string, string> = {};

	for (let i = 0; i < args.length; i++) {
		const arg = args[i] ?? '';
		if (arg.startsWith('--')) {
			const value = args[i + 1];
			if (value === undefined) {
				throw new UsageError(`Missing value for ${arg}`);
			}
			flags[arg.slice(2)] = value;
			i++;
		} else {
			positionals.push(arg);
		}
	}

	return { positionals, flags };
}

function parseInteger(flag: string, value: string, min: number): number {
	if (!/^\d+$/.test(value)) {
		throw new UsageError(`--${flag} must be an integer, got '${value}'`);
	}
	const parsed = Number.parseInt(value, 10);
	if (!Number.isSafeInteger(parsed)) {
		throw new UsageError(`--${flag} is too large, got '${value}'`);
	}
	if (parsed < min) {
		throw new UsageError(`--${flag} must be at least ${min}`);
	}
	return parsed;
}

export function describeUpid(upid: Upid): UpidDescription {
	return {
		text: upid.toString(),
		prefix: upid.getPrefix(),
		version: upid.getVersion(),
		milliseconds: upid.getMilliseconds(),
		timestamp: upid.getDate().toISOString(),
		hex: upid.toHex(),
		uuid: upid.toUuid(),
		integer: upid.toBigInt().toString(),
	};
}

function runGenerate(args: string[], io: CliIo, ctx: CliContext): ExitCode {
	const { positionals, flags } = parseArgs(args);
	for (const flag of Object.keys(flags)) {
		if (flag !== 'count' && flag !== 'at') {
			throw new UsageError(`Unknown option: --${flag}`);
		}
	}
	if (positionals.length > 1) {
		throw new UsageError(`Expected at most one prefix, got ${positionals.length}`);
	}

	const prefix = positionals[0] ?? ctx.defaultPrefix;
	const count = flags['count'] === undefined ? 1 : parseInteger('count', flags['count'], 1);
	const at = flags['at'] === undefined ? undefined : parseInteger('at', flags['at'], 0);

	const normalized = normalizePrefix(prefix);
	if (prefix !== '' && normalized !== prefix) {
		ctx.logger.warn({ prefix, normalized }, 'Prefix normalized');
	}

	for (let i = 0; i < count; i++) {
		const upid = at === undefined ? Upid.fromPrefix(prefix) : Upid.fromPrefixAndMilliseconds(prefix, at);
		const text = upid.toString();
		ctx.logger.debug({ upid: text }, 'Generated UPID');
		io.stdout(text);
	}

	return ExitCode.OK;
}

function runParse(args: string[], io: CliIo, ctx: CliContext): ExitCode {
	const { positionals, flags } = parseArgs(args);
	const [text] = positionals;
	if (text === undefined || positionals.length > 1 || Object.keys(flags).length > 0) {
		throw new UsageError('parse expects exactly one UPID');
	}

	return Upid.tryFromString(text).match(
		(upid): ExitCode => {
			ctx.logger.debug({ upid: text }, 'Parsed UPID');
			io.stdout(JSON.stringify(describeUpid(upid), null, 2));
			return ExitCode.OK;
		},
		(error): ExitCode => {
			ctx.logger.error({ input: text, reason: error.reason }, 'Invalid UPID');
			io.stderr(`Invalid UPID '${text}': ${error.message}`);
			return ExitCode.INVALID_INPUT;
		},
	);
}

function forCommand(ctx: CliContext, command: string): CliContext {
	return { ...ctx, logger: createChildLogger(ctx.logger, { command }) };
}

/**
 * Run the CLI with the arguments after the executable name.
 */
export function runCli(args: string[], io: CliIo, ctx: CliContext): ExitCode {
	const [command, ...rest] = args;

	try {
		switch (command) {
			case 'generate':
				return runGenerate(rest, io, forCommand(ctx, 'generate'));
			case 'parse':
				return runParse(rest, io, forCommand(ctx, 'parse'));
			case 'version':
			case '--version':
			case '-v':
				io.stdout(`upid v${VERSION}`);
				return ExitCode.OK;
			case 'help':
			case '--help':
			case '-h':
				io.stdout(usage());
				return ExitCode.OK;
			default:
				return runGenerate(args, io, forCommand(ctx, 'generate'));
		}
	} catch (e) {
		if (e instanceof UsageError) {
			io.stderr(`${e.message}\n`);
			io.stderr(usage());
			return ExitCode.USAGE;
		}
		if (e instanceof UpidError) {
			ctx.logger.error({ reason: e.reason }, e.message);
			io.stderr(e.message);
			return ExitCode.INVALID_INPUT;
		}
		throw e;
	}
}
