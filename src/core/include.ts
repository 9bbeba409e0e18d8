import nodeFs from 'node:fs';
import path from 'node:path';

/** The part of `node:fs` include resolution touches; tests pass an in-memory stand-in. */
export interface IncludeFs {
	existsSync(path: string): boolean;
	readFileSync(path: string, encoding: 'utf8'): string;
}

export type IncludeResolverOptions = {
	includePaths: readonly string[];
	systemIncludePaths: readonly string[];
	fs?: IncludeFs;
	log?: (message: string) => void;
};

export type ResolvedInclude = { id: string; text: string };
export type IncludeResolver = (target: string, system: boolean, fromId?: string) => ResolvedInclude | null;

export function includeCandidates(target: string, system: boolean, opts: Pick<IncludeResolverOptions, 'includePaths' | 'systemIncludePaths'>, fromId?: string): string[] {
	if (path.isAbsolute(target)) return [target];
	const candidates: string[] = [];
	// quoted includes look beside the including file first
	if (!system && fromId && path.isAbsolute(fromId)) candidates.push(path.join(path.dirname(fromId), target));
	for (const p of opts.includePaths) candidates.push(path.join(p, target));
	for (const p of opts.systemIncludePaths) candidates.push(path.join(p, target));
	return candidates;
}

export function buildIncludeResolver(opts: IncludeResolverOptions): IncludeResolver {
	const fs = opts.fs ?? nodeFs;
	const cache = new Map<string, string>();
	return (target, system, fromId) => {
		for (const filePath of includeCandidates(target, system, opts, fromId)) {
			const cached = cache.get(filePath);
			if (cached !== undefined) return { id: filePath, text: cached };
			if (!fs.existsSync(filePath)) continue;
			const text = fs.readFileSync(filePath, 'utf8');
			cache.set(filePath, text);
			opts.log?.(`include ${system ? `<${target}>` : `"${target}"`} -> ${filePath}`);
			return { id: filePath, text };
		}
		opts.log?.(`include ${target} not found`);
		return null;
	};
}
