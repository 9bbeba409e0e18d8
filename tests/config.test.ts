import { describe, it, expect } from 'vitest';
import path from 'node:path';
import { loadPreprocessorConfig, parsePreprocessorConfig, toPreprocessorOptions } from '../src/config';
import { expandText } from './testUtils';

const fixture = path.join(__dirname, 'fixtures', 'macrobridge.yaml');

describe('preprocessor config', () => {
	it('loads YAML and resolves include paths against the file', async () => {
		const config = await loadPreprocessorConfig(fixture);
		expect(config).toEqual({
			filename: 'main.c',
			includePaths: [path.join(__dirname, 'fixtures', 'include')],
			systemIncludePaths: ['/opt/sys/include'],
			defines: { GREETING: 'hello', ENABLED: true, LEVEL: 2 },
			predefined: { VERSION: 3 },
			onMacroError: 'report',
		});
	});

	it('feeds preprocessor options', async () => {
		const options = toPreprocessorOptions(await loadPreprocessorConfig(fixture));
		expect(expandText('GREETING ENABLED LEVEL VERSION __FILE__', options)).toBe('hello 1 2 3 "main.c"');
	});

	it('merges with base options', () => {
		const options = toPreprocessorOptions(
			{ includePaths: ['/b'], defines: { B: 2 } },
			{ filename: 'base.c', includePaths: ['/a'], defines: { A: 1, B: 1 }, debug: true },
		);
		expect(options).toEqual({
			filename: 'base.c',
			includePaths: ['/a', '/b'],
			systemIncludePaths: [],
			defines: { A: 1, B: 2 },
			predefined: {},
			onMacroError: undefined,
			debug: true,
		});
	});

	it('treats an empty document as no settings', () => {
		expect(parsePreprocessorConfig('')).toEqual({});
		expect(parsePreprocessorConfig('# nothing here\n')).toEqual({});
	});

	it('reports schema violations with their paths', () => {
		expect(() => parsePreprocessorConfig('onMacroError: ignore\n')).toThrow('Config file "<config>" schema validation failed:\n/onMacroError must be equal to one of the allowed values');
		expect(() => parsePreprocessorConfig('colour: red\n', 'x.yaml')).toThrow('Config file "x.yaml" schema validation failed:\n/ must NOT have additional properties');
		expect(() => parsePreprocessorConfig('defines:\n  1BAD: 1\n')).toThrow(/schema validation failed/);
		expect(() => parsePreprocessorConfig('includePaths: [1]\n')).toThrow('/includePaths/0 must be string');
	});

	it('reports YAML syntax errors', () => {
		expect(() => parsePreprocessorConfig('includePaths: [a', 'broken.yaml')).toThrow(/^Config file "broken.yaml" could not be parsed: /);
	});
});
