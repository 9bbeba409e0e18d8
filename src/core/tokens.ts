// Token model shared by the tokenizer, the expansion engine and the macro bridge

export type Span = { readonly start: number; readonly end: number };

export type TokenKind =
	| 'id'
	| 'number'
	| 'string'
	| 'char'
	| 'keyword'
	| 'op'
	| 'punct'
	| 'comment-line'
	| 'comment-block'
	| 'directive' // entire preprocessor directive line (combined with continuations)
	| 'eof';

export interface Token {
	readonly kind: TokenKind;
	readonly value: string;
	readonly span: Span;
	readonly file: string;
}

export const UNKNOWN_FILE = '<unknown>';

export function mkToken(kind: TokenKind, value: string, start: number, end: number, file: string = UNKNOWN_FILE): Token {
	return { kind, value, span: { start, end }, file };
}

export function cloneToken(t: Token): Token {
	return { kind: t.kind, value: t.value, span: { start: t.span.start, end: t.span.end }, file: t.file };
}

// Tokens that carry code (not trivia, not directives, not the end marker)
export function isCodeToken(t: Token): boolean {
	return t.kind !== 'eof' && t.kind !== 'directive' && t.kind !== 'comment-line' && t.kind !== 'comment-block';
}

/** Pull-based token source over an array or a producer. Once eof is read it is returned forever. */
export class TokenStream implements Iterable<Token> {
	private readonly arr?: readonly Token[];
	private readonly producer?: () => Token;
	private idx = 0;
	private pushback: Token[] = [];
	private stickyEof: Token | null = null;
	private lastEnd = 0;
	private lastFile = UNKNOWN_FILE;

	constructor(source: readonly Token[] | { producer: () => Token }) {
		if (isTokenArray(source)) {
			this.arr = source;
			const last = source[source.length - 1];
			if (last) { this.lastEnd = last.span.end; this.lastFile = last.file; }
		} else {
			this.producer = source.producer;
		}
	}

	next(): Token {
		if (this.stickyEof) {
			return this.stickyEof;
		}
		const back = this.pushback.pop();
		if (back) {
			this.lastEnd = back.span.end;
			return back;
		}
		let t: Token;
		if (this.arr) {
			const at = this.arr[this.idx];
			if (at) { this.idx++; t = at; }
			else t = mkToken('eof', '', this.lastEnd, this.lastEnd, this.lastFile);
		} else if (this.producer) {
			t = this.producer();
		} else {
			t = mkToken('eof', '', this.lastEnd, this.lastEnd, this.lastFile);
		}
		if (t.kind === 'eof') { this.stickyEof = t; return t; }
		if (!this.arr) this.lastEnd = t.span.end;
		return t;
	}

	peek(): Token {
		const t = this.next();
		if (t.kind !== 'eof') this.pushBack(t);
		return t;
	}

	pushBack(t: Token) {
		if (t.kind === 'eof') return;
		this.pushback.push(t);
	}

	*[Symbol.iterator](): Iterator<Token> {
		for (;;) {
			const t = this.next();
			if (t.kind === 'eof') return;
			yield t;
		}
	}
}

function isTokenArray(source: readonly Token[] | { producer: () => Token }): source is readonly Token[] {
	return Array.isArray(source);
}
