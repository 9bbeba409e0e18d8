import fs from 'node:fs/promises';
import path from 'node:path';
import yaml from 'js-yaml';
import Ajv2020 from 'ajv/dist/2020';
import schema from '../schema/preprocessorConfig.schema.json';
import type { MacroDefines, MacroErrorPolicy, PreprocessorOptions } from './core/preprocessor';

export interface PreprocessorConfig {
	filename?: string;
	includePaths?: string[];
	systemIncludePaths?: string[];
	defines?: MacroDefines;
	predefined?: MacroDefines;
	onMacroError?: MacroErrorPolicy;
	debug?: boolean;
}

const ajv = new Ajv2020({ allErrors: true, strict: false });
const validate = ajv.compile<PreprocessorConfig>(schema);

/** Parse and validate YAML (or JSON) config text. `source` only names the input in errors. */
export function parsePreprocessorConfig(raw: string, source = '<config>'): PreprocessorConfig {
	let obj: unknown;
	try {
		obj = yaml.load(raw, { json: true });
	} catch (err) {
		throw new Error(`Config file "${source}" could not be parsed: ${err instanceof Error ? err.message : String(err)}`, { cause: err });
	}
	// an empty document means "no settings"
	if (obj === undefined || obj === null) return {};
	if (!validate(obj)) {
		const msg = (validate.errors || []).map(e => `${e.instancePath || '/'} ${e.message ?? 'is invalid'}`).join('\n');
		throw new Error(`Config file "${source}" schema validation failed:\n${msg}`);
	}
	return obj;
}

/** Read a config file; relative include paths are taken from the file's directory. */
export async function loadPreprocessorConfig(configPath: string): Promise<PreprocessorConfig> {
	const resolved = path.resolve(configPath);
	const raw = await fs.readFile(resolved, 'utf8');
	const config = parsePreprocessorConfig(raw, resolved);
	const base = path.dirname(resolved);
	const absolute = (list?: string[]) => list?.map(p => path.resolve(base, p));
	return { ...config, includePaths: absolute(config.includePaths), systemIncludePaths: absolute(config.systemIncludePaths) };
}

/** Config values win over `base`, except that path lists and defines are merged. */
export function toPreprocessorOptions(config: PreprocessorConfig, base: PreprocessorOptions = {}): PreprocessorOptions {
	return {
		...base,
		filename: config.filename ?? base.filename,
		includePaths: [...(base.includePaths ?? []), ...(config.includePaths ?? [])],
		systemIncludePaths: [...(base.systemIncludePaths ?? []), ...(config.systemIncludePaths ?? [])],
		defines: { ...base.defines, ...config.defines },
		predefined: { ...base.predefined, ...config.predefined },
		onMacroError: config.onMacroError ?? base.onMacroError,
		debug: config.debug ?? base.debug,
	};
}
