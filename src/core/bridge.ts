// Conversion between engine tokens and the handles handed to macro callables.

import { MacroError } from './errors';
import type { SourceLocation } from './location';
import type { Preprocessor } from './preprocessor';
import { type Span, type Token, type TokenKind, cloneToken } from './tokens';

/**
 * Handle wrapping a copy of an engine token. The preprocessor reference is
 * borrowed: handles only live for the duration of one macro invocation.
 */
export class BoxedToken {
	private readonly token: Token;
	private readonly preprocessorRef: Preprocessor;

	constructor(preprocessor: Preprocessor, token: Token) {
		this.preprocessorRef = preprocessor;
		this.token = cloneToken(token);
	}

	get kind(): TokenKind { return this.token.kind; }
	get value(): string { return this.token.value; }
	get span(): Span { return this.token.span; }
	get file(): string { return this.token.file; }
	get preprocessor(): Preprocessor { return this.preprocessorRef; }
	get location(): SourceLocation { return this.preprocessorRef.locate(this.token); }

	/** Copy of the wrapped token. */
	unwrap(): Token { return cloneToken(this.token); }

	equals(other: unknown): boolean {
		if (!(other instanceof BoxedToken)) return false;
		if (other.preprocessorRef !== this.preprocessorRef) return false;
		const a = this.token;
		const b = other.token;
		return a.kind === b.kind && a.value === b.value && a.file === b.file && a.span.start === b.span.start && a.span.end === b.span.end;
	}

	toString(): string { return this.token.value; }
}

export function isBoxedToken(value: unknown): value is BoxedToken {
	return value instanceof BoxedToken;
}

export function encode(preprocessor: Preprocessor, token: Token): BoxedToken {
	return new BoxedToken(preprocessor, token);
}

export function decode(value: unknown): Token {
	if (!isBoxedToken(value)) {
		throw new MacroError('TypeMismatch', `expected a token, got ${describeValue(value)}`);
	}
	return value.unwrap();
}

// Lex `text` with the preprocessor's lexer, positioned at the active expansion.
export function retokenize(preprocessor: Preprocessor, text: string): Token[] {
	return preprocessor.tokenize(text);
}

export function describeValue(value: unknown): string {
	if (value === null) return 'null';
	if (Array.isArray(value)) return 'array';
	if (typeof value === 'object') return value.constructor?.name ?? 'object';
	return typeof value;
}
