import { describe, it, expect } from 'vitest';
import { type BoxedToken, encode, isBoxedToken } from '../src/core/bridge';
import { MacroError } from '../src/core/errors';
import { FunctionMacro, type MacroContext, classifyResult } from '../src/core/functionMacro';
import type { SourceLocation } from '../src/core/location';
import type { Span, Token } from '../src/core/tokens';
import { makePreprocessor, memoryLogger, values } from './testUtils';

function thrown(fn: () => unknown): unknown {
	try {
		fn();
	} catch (e) {
		return e;
	}
	throw new Error('expected a throw');
}

function macroError(fn: () => unknown): MacroError {
	const e = thrown(fn);
	if (!(e instanceof MacroError)) throw new Error(`expected a MacroError, got ${String(e)}`);
	return e;
}

const here: SourceLocation = { file: 't.c', uri: 't.c', offset: 0, line: 1, column: 1 };

describe('function macro invocation', () => {
	it('removes the call when the callable returns nothing', () => {
		const pp = makePreprocessor('a NOTHING(x) b NULL() c');
		pp.defineFunction('NOTHING', () => undefined);
		pp.defineFunction('NULL', () => null);
		expect(values(pp.run().tokens)).toEqual(['a', 'b', 'c']);
	});

	it('passes argument tokens in source order without the separating commas', () => {
		const seen: string[] = [];
		let boxedOnly = true;
		const pp = makePreprocessor('CAP(x + 1, "s")');
		pp.defineFunction('CAP', (_ctx: MacroContext, ...args: BoxedToken[]) => {
			for (const a of args) {
				seen.push(a.value);
				if (!isBoxedToken(a)) boxedOnly = false;
			}
		});
		pp.run();
		expect(seen).toEqual(['x', '+', '1', '"s"']);
		expect(boxedOnly).toBe(true);
	});

	it('passes raw, unexpanded arguments', () => {
		const seen: string[] = [];
		const pp = makePreprocessor('#define N 5\nCAP(N)');
		pp.defineFunction('CAP', (_ctx: MacroContext, ...args: BoxedToken[]) => { seen.push(...args.map(String)); return args; });
		expect(values(pp.run().tokens)).toEqual(['5']);
		expect(seen).toEqual(['N']);
	});

	it('re-tokenizes returned text at the invocation site', () => {
		const pp = makePreprocessor('GEN()');
		pp.defineFunction('GEN', () => 'int y = 2;');
		expect(pp.run().tokens).toEqual([
			{ kind: 'keyword', value: 'int', span: { start: 0, end: 1 }, file: '<input>' },
			{ kind: 'id', value: 'y', span: { start: 1, end: 2 }, file: '<input>' },
			{ kind: 'op', value: '=', span: { start: 2, end: 3 }, file: '<input>' },
			{ kind: 'number', value: '2', span: { start: 3, end: 4 }, file: '<input>' },
			{ kind: 'punct', value: ';', span: { start: 4, end: 5 }, file: '<input>' },
		]);
	});

	it('accepts UTF-8 bytes as text', () => {
		const pp = makePreprocessor('BYTES()');
		pp.defineFunction('BYTES', () => Buffer.from('x + 1', 'utf8'));
		expect(values(pp.run().tokens)).toEqual(['x', '+', '1']);
	});

	it('splices an explicit token sequence verbatim', () => {
		const pp = makePreprocessor('SWAP(x, y)');
		pp.defineFunction('SWAP', (_ctx: MacroContext, a: BoxedToken, b: BoxedToken) => [b, a]);
		expect(pp.run().tokens).toEqual([
			{ kind: 'id', value: 'y', span: { start: 8, end: 9 }, file: '<input>' },
			{ kind: 'id', value: 'x', span: { start: 5, end: 6 }, file: '<input>' },
		]);
	});

	it('keeps duplicates in returned sequences', () => {
		const pp = makePreprocessor('THRICE(a) end');
		pp.defineFunction('THRICE', (_ctx: MacroContext, a: BoxedToken) => [a, a, a]);
		expect(values(pp.run().tokens)).toEqual(['a', 'a', 'a', 'end']);
	});

	it('builds tokens through the context', () => {
		const pp = makePreprocessor('SUM()');
		pp.defineFunction('SUM', (ctx: MacroContext) => ctx.tokenize('1 + 2'));
		const out = pp.run().tokens;
		expect(values(out)).toEqual(['1', '+', '2']);
		expect(out.map(t => t.span)).toEqual([{ start: 0, end: 1 }, { start: 1, end: 3 }, { start: 3, end: 5 }]);
	});

	it('rescans results for other macros', () => {
		const pp = makePreprocessor('#define N 5\n#define ID(x) x\nNAME() ID(TWICE(q))');
		pp.defineFunction('NAME', () => 'N');
		pp.defineFunction('TWICE', (_ctx: MacroContext, a: BoxedToken) => [a, a]);
		expect(values(pp.run().tokens)).toEqual(['5', 'q', 'q']);
	});

	it('does not re-invoke a macro on its own output', () => {
		let calls = 0;
		const pp = makePreprocessor('SELF()');
		pp.defineFunction('SELF', () => { calls++; return 'SELF()'; });
		expect(values(pp.run().tokens)).toEqual(['SELF', '(', ')']);
		expect(calls).toBe(1);
	});

	it('gives the callable a fresh context for each invocation', () => {
		const contexts: MacroContext[] = [];
		const pp = makePreprocessor('a\n  WHERE() WHERE()', { filename: 'main.c' });
		pp.defineFunction('WHERE', (ctx: MacroContext) => { contexts.push(ctx); });
		pp.run();
		expect(contexts).toHaveLength(2);
		const [first, second] = contexts;
		expect(first).not.toBe(second);
		expect(first?.preprocessor).toBe(pp);
		expect(first?.name).toBe('WHERE');
		expect([first?.location.line, first?.location.column]).toEqual([2, 3]);
		expect([second?.location.line, second?.location.column]).toEqual([2, 11]);
	});

	it('logs invocations in debug mode', () => {
		const logger = memoryLogger();
		const pp = makePreprocessor('F(a b)', { logger, debug: true });
		pp.defineFunction('F', () => undefined);
		pp.run();
		expect(logger.lines).toContainEqual({ level: 'log', message: "[macrobridge] <input>:1:1: invoking 'F' with 2 argument token(s)" });
	});
});

describe('function macro failures', () => {
	it('rejects results of the wrong type', () => {
		const pp = makePreprocessor('BAD()');
		pp.defineFunction('BAD', () => 42);
		const e = macroError(() => pp.run());
		expect(e.kind).toBe('TypeMismatch');
		expect(e.code).toBe('PP103');
		expect(e.macroName).toBe('BAD');
		expect(e.message).toBe("<input>:1:1: TypeMismatch in macro 'BAD': macro functions must return nothing, text, or a sequence of tokens; got number");
	});

	it('rejects a sequence with any non-token element', () => {
		const pp = makePreprocessor('MIX(q)');
		pp.defineFunction('MIX', (_ctx: MacroContext, a: BoxedToken) => [a, 'oops']);
		const e = macroError(() => pp.run());
		expect(e.kind).toBe('TypeMismatch');
		expect(e.detail).toBe('macro functions must return nothing, text, or a sequence of tokens; element 1 is string');
	});

	it('rejects promises', () => {
		const pp = makePreprocessor('LATER()');
		pp.defineFunction('LATER', async () => 'x');
		expect(macroError(() => pp.run()).kind).toBe('TypeMismatch');
	});

	it('wraps exceptions thrown by the callable', () => {
		const boom = new Error('boom');
		const pp = makePreprocessor('x\nFAIL()');
		pp.defineFunction('FAIL', () => { throw boom; });
		const e = macroError(() => pp.run());
		expect(e.kind).toBe('ExternalCallFailure');
		expect(e.diagnostic).toBe('boom');
		expect(e.cause).toBe(boom);
		expect(e.message).toBe("<input>:2:1: ExternalCallFailure in macro 'FAIL': boom");
	});

	it('wraps thrown non-errors', () => {
		const pp = makePreprocessor('FAIL()');
		pp.defineFunction('FAIL', () => { throw 'plain'; });
		const e = macroError(() => pp.run());
		expect(e.diagnostic).toBe('plain');
		expect(e.cause).toBe('plain');
	});

	it('wraps exceptions raised while a generator result is read', () => {
		const lazy = new Error('lazy boom');
		const pp = makePreprocessor('a GEN() b');
		pp.defineFunction('GEN', function* (ctx: MacroContext) {
			yield* ctx.tokenize('first');
			throw lazy;
		});
		const e = macroError(() => pp.run());
		expect(e.kind).toBe('ExternalCallFailure');
		expect(e.diagnostic).toBe('lazy boom');
		expect(e.macroName).toBe('GEN');
		expect(e.cause).toBe(lazy);
		expect(e.message).toBe("<input>:1:3: ExternalCallFailure in macro 'GEN': lazy boom");
	});

	it('reports generator failures and leaves the call in place', () => {
		const pp = makePreprocessor('a GEN() b', { onMacroError: 'report', logger: memoryLogger() });
		pp.defineFunction('GEN', function* (ctx: MacroContext) {
			yield* ctx.tokenize('first');
			throw new Error('lazy boom');
		});
		const r = pp.run();
		expect(values(r.tokens)).toEqual(['a', 'GEN', '(', ')', 'b']);
		expect(r.diagnostics).toEqual([{
			message: "ExternalCallFailure in macro 'GEN': lazy boom",
			code: 'PP101',
			severity: 'error',
			file: '<input>',
			start: 2,
			end: 5,
		}]);
	});

	it('rejects text that cannot be encoded as UTF-8', () => {
		const pp = makePreprocessor('S() B()', { onMacroError: 'report' });
		pp.defineFunction('S', () => '\uD800');
		pp.defineFunction('B', () => new Uint8Array([0xff]));
		expect(pp.run().diagnostics.map(d => d.code)).toEqual(['PP102', 'PP102']);
	});

	it('reports instead of throwing when asked and leaves the call in place', () => {
		const logger = memoryLogger();
		const pp = makePreprocessor('a MIX(q) b', { onMacroError: 'report', logger });
		pp.defineFunction('MIX', () => 3);
		const r = pp.run();
		expect(values(r.tokens)).toEqual(['a', 'MIX', '(', 'q', ')', 'b']);
		expect(r.diagnostics).toEqual([{
			message: "TypeMismatch in macro 'MIX': macro functions must return nothing, text, or a sequence of tokens; got number",
			code: 'PP103',
			severity: 'error',
			file: '<input>',
			start: 2,
			end: 5,
		}]);
		expect(logger.lines.map(l => l.level)).toEqual(['warn']);
	});

	it('reports a sequence with a non-token element without splicing its tokens', () => {
		const pp = makePreprocessor('MIX(q)', { onMacroError: 'report', logger: memoryLogger() });
		pp.defineFunction('MIX', (_ctx: MacroContext, a: BoxedToken) => [a, 42]);
		const r = pp.run();
		expect(values(r.tokens)).toEqual(['MIX', '(', 'q', ')']);
		expect(r.diagnostics.map(d => d.code)).toEqual(['PP103']);
		expect(r.diagnostics[0]?.message).toBe("TypeMismatch in macro 'MIX': macro functions must return nothing, text, or a sequence of tokens; element 1 is number");
	});

	it('reports allocation failures while boxing arguments', () => {
		const pp = makePreprocessor('');
		const macro = new FunctionMacro(pp, 'F', () => undefined);
		const broken: Token = {
			kind: 'id',
			value: 'x',
			file: 't.c',
			get span(): Span { throw new RangeError('Invalid array length'); },
		};
		const e = macroError(() => macro.invoke(here, [broken]));
		expect(e.kind).toBe('AllocationFailure');
		expect(e.code).toBe('PP104');
		expect(e.location).toBe(here);
	});
});

describe('function macro bindings', () => {
	it('rejects bad names and non-functions', () => {
		const pp = makePreprocessor('');
		expect(macroError(() => pp.defineFunction('1x', () => 1)).kind).toBe('InvalidBinding');
		expect(macroError(() => pp.defineFunction('F', 42)).message).toBe("InvalidBinding in macro 'F': expected a function, got number");
		expect(pp.isDefined('F')).toBe(false);
	});

	it('fails after the binding is disposed', () => {
		const pp = makePreprocessor('');
		const macro = new FunctionMacro(pp, 'F', () => 'x');
		expect(macro.invoke(here, []).map(t => t.value)).toEqual(['x']);
		macro.dispose();
		expect(macro.disposed).toBe(true);
		const e = macroError(() => macro.invoke(here, []));
		expect(e.kind).toBe('InvalidBinding');
		expect(e.detail).toBe('macro binding has been released');
	});

	it('disposes the previous binding on redefinition and undef', () => {
		const pp = makePreprocessor('');
		pp.defineFunction('F', () => 'a');
		const first = pp.definition('F');
		pp.defineFunction('F', () => 'b');
		const second = pp.definition('F');
		pp.undef('F');
		if (first?.kind !== 'callable' || second?.kind !== 'callable') throw new Error('expected callable bindings');
		expect(first.macro.disposed).toBe(true);
		expect(second.macro.disposed).toBe(true);
	});

	it('disposes a callable replaced by a #define', () => {
		const pp = makePreprocessor('#define F 1\nF');
		pp.defineFunction('F', () => 'a');
		const bound = pp.definition('F');
		expect(values(pp.run().tokens)).toEqual(['1']);
		if (bound?.kind !== 'callable') throw new Error('expected a callable binding');
		expect(bound.macro.disposed).toBe(true);
	});

	it('shows callables in the macro snapshot', () => {
		const pp = makePreprocessor('');
		pp.defineFunction('F', () => undefined);
		expect(pp.macros()).toEqual({ F: '<callable>' });
	});
});

describe('classifyResult', () => {
	it('sorts values into the three shapes', () => {
		const pp = makePreprocessor('');
		const tok = encode(pp, { kind: 'id', value: 'a', span: { start: 0, end: 1 }, file: 't.c' });
		function* gen() { yield tok; }
		expect(classifyResult(undefined)).toEqual({ kind: 'empty' });
		expect(classifyResult('')).toEqual({ kind: 'text', text: '' });
		expect(classifyResult(new TextEncoder().encode('é'))).toEqual({ kind: 'text', text: 'é' });
		expect(classifyResult(gen())).toEqual({ kind: 'tokens', tokens: [tok.unwrap()] });
		expect(classifyResult([])).toEqual({ kind: 'tokens', tokens: [] });
	});

	it('throws without a location when used directly', () => {
		expect(() => classifyResult({})).toThrow('TypeMismatch: macro functions must return nothing, text, or a sequence of tokens; got Object');
	});
});
