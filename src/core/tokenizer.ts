import { isKeyword } from './keywords';
import { type Token, type TokenKind, TokenStream, UNKNOWN_FILE, mkToken } from './tokens';

const THREE = new Set(['...', '<<=', '>>=']);
const TWO = new Set(['==', '!=', '<=', '>=', '&&', '||', '<<', '>>', '+=', '-=', '*=', '/=', '%=', '&=', '|=', '^=', '++', '--', '->', '##']);
const SINGLE = new Set(['+', '-', '*', '/', '%', '!', '~', '<', '>', '=', '&', '|', '^', '.', '?', '#']);
const PUNCT = new Set([';', ',', '(', ')', '{', '}', '[', ']', ':']);

const isIdStart = (ch: string | undefined) => !!ch && /[A-Za-z_$]/.test(ch);
const isIdContinue = (ch: string | undefined) => !!ch && /[A-Za-z0-9_$]/.test(ch);
const isDigit = (ch: string | undefined) => !!ch && ch >= '0' && ch <= '9';

export type TokenizerOptions = {
	// When false, '#' at line start lexes as an operator (macro bodies, re-tokenized text)
	directives?: boolean;
};

/** Lexer for C-like source. Comments and directive lines come out as tokens; nothing is expanded. */
export class Tokenizer {
	private i = 0;
	private readonly n: number;
	private readonly text: string;
	private readonly file: string;
	private readonly directives: boolean;
	private readonly ts: TokenStream;

	constructor(text: string, file: string = UNKNOWN_FILE, opts: TokenizerOptions = {}) {
		this.text = text;
		this.n = text.length;
		this.file = file;
		this.directives = opts.directives !== false;
		this.ts = new TokenStream({ producer: () => this.scanOne() });
	}

	next(): Token { return this.ts.next(); }
	peek(): Token { return this.ts.peek(); }
	pushBack(t: Token) { this.ts.pushBack(t); }

	private scanOne(): Token {
		if (this.i >= this.n) return this.mk('eof', '', this.i, this.i);
		// whitespace and backslash-newline
		while (this.i < this.n) {
			const ch = this.text[this.i];
			if (ch === '\\') {
				const k = this.continuationEnd(this.i);
				if (k > 0) { this.i = k; continue; }
			}
			if (ch === ' ' || ch === '\t' || ch === '\r' || ch === '\n' || ch === '\f' || ch === '\v') { this.i++; continue; }
			break;
		}
		if (this.i >= this.n) return this.mk('eof', '', this.i, this.i);

		const c = this.text[this.i];
		// '#' first on a line (after indentation) starts a directive running to the
		// unspliced end of line; each backslash-newline becomes one '\n'
		if (c === '#' && this.directives && this.atLineStart(this.i)) {
			let j = this.i + 1;
			let segStart = this.i;
			let acc = '';
			while (j < this.n) {
				if (this.text[j] === '\\') {
					const k = this.continuationEnd(j);
					if (k > 0) {
						acc += this.text.slice(segStart, j) + '\n';
						j = k; segStart = j; continue;
					}
				}
				// block comments may span lines inside a directive
				if (this.text[j] === '/' && this.text[j + 1] === '*') {
					const close = this.text.indexOf('*/', j + 2);
					j = close < 0 ? this.n : close + 2;
					continue;
				}
				if (this.text[j] === '\n') break;
				j++;
			}
			acc += this.text.slice(segStart, j);
			const t = this.mk('directive', acc.replace(/\r$/, ''), this.i, j);
			this.i = j; return t;
		}

		if (c === '/') {
			const d = this.text[this.i + 1];
			if (d === '/') {
				const s = this.i; const e = this.findLineEnd(this.i + 2);
				const t = this.mk('comment-line', this.text.slice(s, e), s, e); this.i = e; return t;
			}
			if (d === '*') {
				const s = this.i; let j = this.i + 2;
				while (j < this.n && !(this.text[j] === '*' && this.text[j + 1] === '/')) j++;
				if (j < this.n) j += 2;
				const t = this.mk('comment-block', this.text.slice(s, j), s, j); this.i = j; return t;
			}
		}

		// string and character literals
		if (c === '"' || c === '\'') {
			const s = this.i;
			let j = this.i + 1;
			while (j < this.n) { const ch = this.text[j]; if (ch === '\\') { j += 2; continue; } if (ch === c) { j++; break; } if (ch === '\n') break; j++; }
			const t = this.mk(c === '"' ? 'string' : 'char', this.text.slice(s, j), s, j); this.i = j; return t;
		}

		// numbers (hex, decimal, float, exponents, integer/float suffixes)
		if (c === '0' && (this.text[this.i + 1] === 'x' || this.text[this.i + 1] === 'X')) {
			const s = this.i; let j = this.i + 2;
			while (j < this.n && /[0-9A-Fa-f]/.test(this.text[j] ?? '')) j++;
			if (this.text[j] === '.') { j++; while (j < this.n && /[0-9A-Fa-f]/.test(this.text[j] ?? '')) j++; }
			if (this.text[j] === 'p' || this.text[j] === 'P') { j++; if (this.text[j] === '+' || this.text[j] === '-') j++; while (isDigit(this.text[j])) j++; }
			j = this.skipSuffix(j);
			const t = this.mk('number', this.text.slice(s, j), s, j); this.i = j; return t;
		}
		if (isDigit(c) || (c === '.' && isDigit(this.text[this.i + 1]))) {
			const s = this.i; let j = this.i; let sawDot = false;
			while (j < this.n) { const ch = this.text[j]; if (isDigit(ch)) { j++; continue; } if (ch === '.' && !sawDot) { sawDot = true; j++; continue; } break; }
			if (this.text[j] === 'e' || this.text[j] === 'E') { j++; if (this.text[j] === '+' || this.text[j] === '-') j++; while (isDigit(this.text[j])) j++; }
			j = this.skipSuffix(j);
			const t = this.mk('number', this.text.slice(s, j), s, j); this.i = j; return t;
		}

		// identifiers/keywords
		if (isIdStart(c)) {
			const s = this.i; let j = this.i + 1;
			while (j < this.n && isIdContinue(this.text[j])) j++;
			const word = this.text.slice(s, j);
			this.i = j;
			return this.mk(isKeyword(word) ? 'keyword' : 'id', word, s, j);
		}

		// longest operator first
		const three = this.text.slice(this.i, this.i + 3);
		if (THREE.has(three)) { const t = this.mk('op', three, this.i, this.i + 3); this.i += 3; return t; }
		const two = this.text.slice(this.i, this.i + 2);
		if (TWO.has(two)) { const t = this.mk('op', two, this.i, this.i + 2); this.i += 2; return t; }
		const single = this.text[this.i] ?? '';
		if (single === '\\') { this.i++; return this.scanOne(); }
		if (SINGLE.has(single)) { const t = this.mk('op', single, this.i, this.i + 1); this.i++; return t; }
		if (PUNCT.has(single)) { const t = this.mk('punct', single, this.i, this.i + 1); this.i++; return t; }

		// anything else is a one-char punct
		const t = this.mk('punct', single, this.i, this.i + 1); this.i++; return t;
	}

	// Index just past a backslash-newline splice starting at `pos`, or -1.
	private continuationEnd(pos: number): number {
		let k = pos + 1; while (k < this.n && (this.text[k] === ' ' || this.text[k] === '\t')) k++;
		if (this.text[k] === '\n') return k + 1;
		if (this.text[k] === '\r' && this.text[k + 1] === '\n') return k + 2;
		return -1;
	}

	private atLineStart(pos: number): boolean {
		let j = pos - 1; while (j >= 0 && (this.text[j] === ' ' || this.text[j] === '\t')) j--;
		return j < 0 || this.text[j] === '\n';
	}

	private skipSuffix(pos: number): number { let j = pos; while (j < this.n && /[uUlLfF]/.test(this.text[j] ?? '')) j++; return j; }
	private findLineEnd(pos: number): number { let i = pos; while (i < this.n && this.text[i] !== '\n') i++; return i; }
	private mk(kind: TokenKind, value: string, start: number, end: number): Token { return mkToken(kind, value, start, end, this.file); }
}

export function tokenize(text: string, file: string = UNKNOWN_FILE, opts?: TokenizerOptions): Token[] {
	const tz = new Tokenizer(text, file, opts);
	const out: Token[] = [];
	for (; ;) { const t = tz.next(); out.push(t); if (t.kind === 'eof') break; }
	return out;
}
