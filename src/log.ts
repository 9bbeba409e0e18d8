import process from 'node:process';
import type { RemoteConsole } from 'vscode-languageserver/node';

// A language-server connection console can be passed straight through.
export type Logger = Pick<RemoteConsole, 'error' | 'warn' | 'info' | 'log'>;

export const LOG_PREFIX = '[macrobridge]';
export const DEBUG_ENV = 'MACROBRIDGE_DEBUG';

export const consoleLogger: Logger = {
	error: (message: string) => console.error(message),
	warn: (message: string) => console.warn(message),
	info: (message: string) => console.info(message),
	log: (message: string) => console.log(message),
};

export function debugFromEnv(env: NodeJS.ProcessEnv = process.env): boolean {
	const v = env[DEBUG_ENV];
	return !!v && v !== '0' && v.toLowerCase() !== 'false';
}

/** Prefixing wrapper; `debug` lines are dropped unless enabled. */
export class PrefixedLogger {
	constructor(private readonly sink: Logger, readonly debugEnabled: boolean) {}

	debug(message: string) { if (this.debugEnabled) this.sink.log(`${LOG_PREFIX} ${message}`); }
	info(message: string) { this.sink.info(`${LOG_PREFIX} ${message}`); }
	warn(message: string) { this.sink.warn(`${LOG_PREFIX} ${message}`); }
	error(message: string) { this.sink.error(`${LOG_PREFIX} ${message}`); }
}
