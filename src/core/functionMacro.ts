import { type BoxedToken, decode, describeValue, encode, isBoxedToken, retokenize } from './bridge';
import { MacroError, describeThrown, isMacroError } from './errors';
import type { SourceLocation } from './location';
import type { Preprocessor } from './preprocessor';
import type { Token } from './tokens';

/** What a macro callable can see of the invocation it is expanding. */
export interface MacroContext {
	readonly preprocessor: Preprocessor;
	readonly location: SourceLocation;
	readonly name: string;
	/** Lex text at the invocation site and box the result, for building token results. */
	tokenize(text: string): BoxedToken[];
}

export type MacroCallable = (ctx: MacroContext, ...args: BoxedToken[]) => unknown;

export type MacroResult =
	| { kind: 'empty' }
	| { kind: 'text'; text: string }
	| { kind: 'tokens'; tokens: Token[] };

const SHAPE_MESSAGE = 'macro functions must return nothing, text, or a sequence of tokens';
const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;
const IDENT = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

export function isMacroCallable(value: unknown): value is MacroCallable {
	return typeof value === 'function';
}

function isThenable(value: unknown): boolean {
	return typeof value === 'object' && value !== null && 'then' in value && typeof value.then === 'function';
}

function isIterable(value: unknown): value is Iterable<unknown> {
	return typeof value === 'object' && value !== null && Symbol.iterator in value && typeof value[Symbol.iterator] === 'function';
}

function decodeUtf8(bytes: Uint8Array): string {
	try {
		return new TextDecoder('utf-8', { fatal: true }).decode(bytes);
	} catch (e) {
		throw new MacroError('EncodingError', `returned bytes are not valid UTF-8 (${describeThrown(e)})`, { cause: e });
	}
}

/**
 * Sort a callable's return value into one of the three accepted shapes.
 * Sequences are all-or-nothing: one element that is not a token rejects the whole result.
 */
export function classifyResult(value: unknown): MacroResult {
	if (value === undefined || value === null) return { kind: 'empty' };
	if (typeof value === 'string') {
		if (LONE_SURROGATE.test(value)) throw new MacroError('EncodingError', 'returned text contains an unpaired surrogate and cannot be encoded as UTF-8');
		return { kind: 'text', text: value };
	}
	if (value instanceof Uint8Array) return { kind: 'text', text: decodeUtf8(value) };
	if (isThenable(value)) throw new MacroError('TypeMismatch', `${SHAPE_MESSAGE}; got a promise, but macro functions run synchronously`);
	if (isIterable(value)) {
		const tokens: Token[] = [];
		let i = 0;
		for (const item of value) {
			if (!isBoxedToken(item)) throw new MacroError('TypeMismatch', `${SHAPE_MESSAGE}; element ${i} is ${describeValue(item)}`);
			tokens.push(decode(item));
			i++;
		}
		return { kind: 'tokens', tokens };
	}
	throw new MacroError('TypeMismatch', `${SHAPE_MESSAGE}; got ${describeValue(value)}`);
}

/**
 * A macro whose expansion is computed by a callable. Holds the callable and the
 * preprocessor it was defined against until `dispose()`.
 */
export class FunctionMacro {
	readonly name: string;
	private preprocessor: Preprocessor | null;
	private callable: MacroCallable | null;

	constructor(preprocessor: Preprocessor, name: string, callable: unknown) {
		if (!IDENT.test(name)) throw new MacroError('InvalidBinding', `'${name}' is not a valid macro name`, { macroName: name });
		if (!isMacroCallable(callable)) throw new MacroError('InvalidBinding', `expected a function, got ${describeValue(callable)}`, { macroName: name });
		this.name = name;
		this.preprocessor = preprocessor;
		this.callable = callable;
	}

	get disposed(): boolean { return this.callable === null; }

	dispose(): void {
		this.callable = null;
		this.preprocessor = null;
	}

	invoke(location: SourceLocation, args: readonly Token[]): Token[] {
		const preprocessor = this.preprocessor;
		const callable = this.callable;
		if (!preprocessor || !callable) {
			throw new MacroError('InvalidBinding', 'macro binding has been released', { macroName: this.name, location });
		}

		let boxed: BoxedToken[];
		try {
			boxed = args.map(t => encode(preprocessor, t));
		} catch (e) {
			if (e instanceof RangeError) {
				throw new MacroError('AllocationFailure', `could not build the argument list: ${e.message}`, { macroName: this.name, location, cause: e });
			}
			throw e;
		}

		const ctx: MacroContext = {
			preprocessor,
			location,
			name: this.name,
			tokenize: (text: string) => retokenize(preprocessor, text).map(t => encode(preprocessor, t)),
		};

		let value: unknown;
		try {
			value = callable(ctx, ...boxed);
		} catch (e) {
			const diagnostic = describeThrown(e);
			throw new MacroError('ExternalCallFailure', diagnostic, { macroName: this.name, location, diagnostic, cause: e });
		}

		let result: MacroResult;
		try {
			result = classifyResult(value);
		} catch (e) {
			if (isMacroError(e)) throw e.at(this.name, location);
			// a lazily produced result (generator, custom iterator) failed while being read
			const diagnostic = describeThrown(e);
			throw new MacroError('ExternalCallFailure', diagnostic, { macroName: this.name, location, diagnostic, cause: e });
		}

		switch (result.kind) {
			case 'empty': return [];
			case 'text': return retokenize(preprocessor, result.text);
			case 'tokens': return result.tokens;
		}
	}
}
