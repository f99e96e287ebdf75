import { describe, it, expect } from 'vitest';
import { createLogger, LogLevel } from '@upid/logging';
import { runCli, parseArgs, describeUpid, ExitCode, VERSION, type CliContext } from '../cli.js';
import { loadEnv } from '../env.js';
import { Upid } from '@upid/core';

const KNOWN_TEXT = 'user_2acdrlkjmhs6ar53taem6a';

function harness(defaultPrefix = '') {
	const stdout: string[] = [];
	const stderr: string[] = [];
	const logs: Array<Record<string, unknown>> = [];
	const logger = createLogger({
		level: LogLevel.DEBUG,
		serviceName: 'upid-test',
		destination: {
			write(msg: string) {
				logs.push(JSON.parse(msg) as Record<string, unknown>);
			},
		},
	});
	const ctx: CliContext = { logger, defaultPrefix };
	const run = (...args: string[]) =>
		runCli(args, { stdout: (line) => stdout.push(line), stderr: (line) => stderr.push(line) }, ctx);
	return { stdout, stderr, logs, run };
}

describe('parseArgs', () => {
	it('should split positionals and flags', () => {
		expect(parseArgs(['user', '--count', '3', '--at', '0'])).toEqual({
			positionals: ['user'],
			flags: { count: '3', at: '0' },
		});
	});
});

describe('generate', () => {
	it('should print one UPID for the prefix by default', () => {
		const { stdout, run } = harness();
		expect(run('user')).toBe(ExitCode.OK);
		expect(stdout).toHaveLength(1);
		expect(stdout[0]).toMatch(/^user_[2-7a-z]{21}a$/);
	});

	it('should accept the explicit generate command', () => {
		const { stdout, run } = harness();
		expect(run('generate', 'acct', '--count', '3')).toBe(ExitCode.OK);
		expect(stdout).toHaveLength(3);
		expect(new Set(stdout).size).toBe(3);
		expect(stdout.every((line) => line.startsWith('acct_'))).toBe(true);
	});

	it('should use the timestamp given with --at', () => {
		const { stdout, run } = harness();
		run('user', '--at', '1720560233826');
		expect(stdout[0]?.slice(0, 13)).toBe('user_2acdmshh');
		expect(Upid.fromString(stdout[0] ?? '').getMilliseconds()).toBe(1720560233728);
	});

	it('should fall back to the default prefix', () => {
		const { stdout, run } = harness('dflt');
		run();
		expect(stdout[0]?.startsWith('dflt_')).toBe(true);
	});

	it('should log each generated UPID at debug', () => {
		const { stdout, logs, run } = harness();
		run('user');
		expect(logs).toContainEqual(
			expect.objectContaining({ level: 'debug', command: 'generate', upid: stdout[0], msg: 'Generated UPID' }),
		);
	});

	it('should warn when the prefix is normalized', () => {
		const { stdout, logs, run } = harness();
		run('ab');
		expect(stdout[0]?.startsWith('abzz_')).toBe(true);
		expect(logs).toContainEqual(
			expect.objectContaining({ level: 'warn', prefix: 'ab', normalized: 'abzz', msg: 'Prefix normalized' }),
		);
	});

	it('should reject bad options as usage errors', () => {
		for (const args of [
			['user', '--count', '0'],
			['user', '--count', 'many'],
			['user', '--at', '-5'],
			['user', '--bogus', '1'],
			['user', 'extra'],
			['user', '--count'],
		]) {
			const { stdout, stderr, run } = harness();
			expect(run(...args)).toBe(ExitCode.USAGE);
			expect(stdout).toHaveLength(0);
			expect(stderr.length).toBeGreaterThan(0);
		}
	});

	it('should reject integers that lose precision', () => {
		const { stdout, stderr, run } = harness();
		expect(run('user', '--count', '99999999999999999999')).toBe(ExitCode.USAGE);
		expect(stdout).toHaveLength(0);
		expect(stderr[0]).toBe("--count is too large, got '99999999999999999999'\n");
	});

	it('should reject timestamps beyond 48 bits as invalid input', () => {
		const { stderr, logs, run } = harness();
		expect(run('user', '--at', String(2 ** 48))).toBe(ExitCode.INVALID_INPUT);
		expect(stderr[0]).toContain('Timestamp must be an integer');
		expect(logs).toContainEqual(expect.objectContaining({ level: 'error', reason: 'out_of_range' }));
	});
});

describe('parse', () => {
	it('should print the decoded fields', () => {
		const { stdout, run } = harness();
		expect(run('parse', KNOWN_TEXT)).toBe(ExitCode.OK);
		expect(JSON.parse(stdout[0] ?? '')).toEqual({
			text: KNOWN_TEXT,
			prefix: 'user',
			version: 'a',
			milliseconds: 1720600366848,
			timestamp: '2024-07-10T08:32:46.848Z',
			hex: '01909bc60f9370435c61c99524d61576',
			uuid: '01909bc6-0f93-7043-5c61-c99524d61576',
			integer: '2080078208899192275105038102332577142',
		});
	});

	it('should report an invalid UPID', () => {
		const { stdout, stderr, logs, run } = harness();
		expect(run('parse', 'zzzz_zzzzzzzzzzzzzzzzzzzzjk')).toBe(ExitCode.INVALID_INPUT);
		expect(stdout).toHaveLength(0);
		expect(stderr[0]).toContain("Invalid UPID 'zzzz_zzzzzzzzzzzzzzzzzzzzjk'");
		expect(logs).toContainEqual(expect.objectContaining({ level: 'error', command: 'parse', reason: 'overflow' }));
	});

	it('should require exactly one argument', () => {
		const { run } = harness();
		expect(run('parse')).toBe(ExitCode.USAGE);
		expect(run('parse', KNOWN_TEXT, KNOWN_TEXT)).toBe(ExitCode.USAGE);
	});
});

describe('describeUpid', () => {
	it('should describe the zero UPID', () => {
		expect(describeUpid(Upid.fromBigInt(0n))).toMatchObject({
			text: '2222_2222222222222222222222',
			prefix: '2222',
			version: '2',
			milliseconds: 0,
			timestamp: '1970-01-01T00:00:00.000Z',
			integer: '0',
		});
	});
});

describe('version and help', () => {
	it('should print the version', () => {
		const { stdout, run } = harness();
		expect(run('version')).toBe(ExitCode.OK);
		expect(stdout).toEqual([`upid v${VERSION}`]);
	});

	it('should print usage', () => {
		const { stdout, run } = harness();
		expect(run('--help')).toBe(ExitCode.OK);
		expect(stdout[0]).toContain('Usage: upid [command] [options]');
	});
});

describe('loadEnv', () => {
	it('should apply defaults', () => {
		expect(loadEnv({})).toEqual({ LOG_LEVEL: 'info', LOG_PRETTY: false, UPID_DEFAULT_PREFIX: '' });
	});

	it('should read the default prefix', () => {
		expect(loadEnv({ UPID_DEFAULT_PREFIX: 'user' }).UPID_DEFAULT_PREFIX).toBe('user');
	});

	it('should reject a default prefix that would be rewritten', () => {
		expect(() => loadEnv({ UPID_DEFAULT_PREFIX: 'USER' })).toThrow(
			'Environment validation failed:\n  UPID_DEFAULT_PREFIX: Prefix may only contain 234567abcdefghijklmnopqrstuvwxyz',
		);
		expect(() => loadEnv({ UPID_DEFAULT_PREFIX: 'users' })).toThrow('UPID_DEFAULT_PREFIX');
	});

	it('should reject an unknown log level', () => {
		expect(() => loadEnv({ LOG_LEVEL: 'chatty' })).toThrow('LOG_LEVEL');
	});
});
