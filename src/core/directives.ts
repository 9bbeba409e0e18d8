// Directive parsing and #if expression evaluation

export type DefineDirective =
	| { kind: 'define_obj'; name: string; body: string }
	| { kind: 'define_fn'; name: string; params: string[]; variadic: boolean; body: string };

export type Directive =
	| { kind: 'if'; expr: string }
	| { kind: 'elif'; expr: string }
	| { kind: 'else' }
	| { kind: 'endif' }
	| { kind: 'ifdef'; name: string }
	| { kind: 'ifndef'; name: string }
	| DefineDirective
	| { kind: 'undef'; name: string }
	| { kind: 'include'; target: string; system: boolean }
	| { kind: 'error'; message: string }
	| { kind: 'warning'; message: string }
	| { kind: 'null' }
	| { kind: 'other'; name: string };

export const IDENT = /^[A-Za-z_$][A-Za-z0-9_$]*$/;
const MAX_ALIAS_DEPTH = 16;

function stripComments(s: string): string {
	return s.replace(/\/\*[\s\S]*?\*\//g, ' ').replace(/\/\/.*$/gm, '');
}

// Returns null when the directive is recognized but malformed.
export function parseDirective(raw: string): Directive | null {
	const m = /^#\s*(\w*)([\s\S]*)$/.exec(raw);
	if (!m) return null;
	const head = m[1] ?? '';
	// Tokenizer already inserted literal newlines where a backslash-newline splice occurred.
	// Keep those newlines in the body for multi-line macros.
	const rest = stripComments(m[2] ?? '').trim();
	const firstWord = () => rest.split(/\s+/)[0] ?? '';
	switch (head) {
		case '': return rest ? null : { kind: 'null' };
		// conditionals always parse so nesting stays balanced; the engine validates them
		case 'if': return { kind: 'if', expr: rest };
		case 'elif': return { kind: 'elif', expr: rest };
		case 'else': return { kind: 'else' };
		case 'endif': return { kind: 'endif' };
		case 'ifdef': return { kind: 'ifdef', name: firstWord() };
		case 'ifndef': return { kind: 'ifndef', name: firstWord() };
		case 'undef': return IDENT.test(firstWord()) ? { kind: 'undef', name: firstWord() } : null;
		case 'include': return parseIncludeTarget(rest);
		case 'define': return parseDefine(rest);
		case 'error': return { kind: 'error', message: rest };
		case 'warning': return { kind: 'warning', message: rest };
		default: return { kind: 'other', name: head };
	}
}

/** Parse the part of a #define after the directive name: `NAME body` or `NAME(params) body`. */
export function parseDefine(rest: string): DefineDirective | null {
	const mm = /^([A-Za-z_$][A-Za-z0-9_$]*)(?:\(([^)]*)\))?([\s\S]*)$/.exec(rest.trim());
	if (!mm) return null;
	const name = mm[1] ?? '';
	// Preserve embedded newlines across continuations; trim trailing blanks per line
	const body = (mm[3] ?? '').replace(/[ \t]+$/gm, '').trim();
	const rawParams = mm[2];
	if (rawParams === undefined) {
		// object-like: body must be separated from the name
		if ((mm[3] ?? '').length && !/^\s/.test(mm[3] ?? '')) return null;
		return { kind: 'define_obj', name, body };
	}
	const params = rawParams.trim() ? rawParams.split(',').map(s => s.trim()) : [];
	const variadic = params[params.length - 1] === '...';
	const fixed = variadic ? params.slice(0, -1) : params;
	if (!fixed.every(p => IDENT.test(p))) return null;
	return { kind: 'define_fn', name, params: fixed, variadic, body };
}

function parseIncludeTarget(rest: string): Directive | null {
	const q = /^"([^"]+)"/.exec(rest);
	if (q) return { kind: 'include', target: q[1] ?? '', system: false };
	const a = /^<([^>]+)>/.exec(rest);
	if (a) return { kind: 'include', target: a[1] ?? '', system: true };
	return null;
}

export interface ExprLookup {
	isDefined(name: string): boolean;
	/** Body of an object-like macro, undefined for anything else. */
	objectBody(name: string): string | undefined;
}

export interface ExprResult {
	value: boolean;
	number: number;
	ok: boolean;
	undefinedIds: string[];
}

function parseIntLiteral(raw: string): number {
	const s = raw.replace(/[uUlL]+$/, '');
	if (/^0[0-7]+$/.test(s)) return parseInt(s, 8);
	const n = Number(s);
	return Number.isNaN(n) ? 0 : Math.trunc(n);
}

// Evaluate #if expressions with integer arithmetic and logical operators.
// Supported: defined(NAME), identifiers, integer literals, unary ! ~ + -,
// binary * / %, + -, << >>, < <= > >=, == !=, & ^ |, && ||, ?: and parentheses.
// Operands that short-circuiting skips are parsed but not evaluated.
export function evalExpr(expr: string, defs: ExprLookup, depth = 0): ExprResult {
	type Tok = { kind: 'num'; value: number } | { kind: 'ident'; value: string } | { kind: 'op'; value: string } | { kind: 'lparen' } | { kind: 'rparen' };
	const s = expr.trim();
	const undefinedIds: string[] = [];
	if (!s) return { value: false, number: 0, ok: false, undefinedIds };

	// Tokenizer
	const toks: Tok[] = [];
	let ok = true;
	let i = 0;
	const twoOps = new Set(['&&', '||', '==', '!=', '<=', '>=', '<<', '>>']);
	while (i < s.length) {
		const ch = s[i] ?? '';
		if (/\s/.test(ch)) { i++; continue; }
		const two = s.slice(i, i + 2);
		if (twoOps.has(two)) { toks.push({ kind: 'op', value: two }); i += 2; continue; }
		if ('+-*/%<>!~&|^?:'.includes(ch)) { toks.push({ kind: 'op', value: ch }); i++; continue; }
		if (ch === '(') { toks.push({ kind: 'lparen' }); i++; continue; }
		if (ch === ')') { toks.push({ kind: 'rparen' }); i++; continue; }
		if (/[0-9]/.test(ch)) {
			const m = /^(0[xX][0-9A-Fa-f]+|[0-9]+)[uUlL]*/.exec(s.slice(i));
			const lit = m ? m[0] : ch;
			toks.push({ kind: 'num', value: parseIntLiteral(lit) });
			i += lit.length; continue;
		}
		if (/[A-Za-z_$]/.test(ch)) {
			let j = i + 1;
			while (j < s.length && /[A-Za-z0-9_$]/.test(s[j] ?? '')) j++;
			toks.push({ kind: 'ident', value: s.slice(i, j) });
			i = j; continue;
		}
		// Unknown char: skip to avoid infinite loop
		ok = false;
		i++;
	}

	// Parser (recursive descent)
	let p = 0;
	const peek = (): Tok | undefined => toks[p];
	const take = (): Tok | undefined => toks[p++];
	const peekOp = (): string | undefined => { const t = peek(); return t && t.kind === 'op' ? t.value : undefined; };
	const truthy = (v: number) => v !== 0;
	// >0 while parsing an operand whose value cannot affect the result
	let skipping = 0;
	const unevaluated = (parse: () => number): number => { skipping++; try { parse(); } finally { skipping--; } return 0; };

	const valOfIdent = (name: string): number => {
		if (!defs.isDefined(name)) { if (!skipping) undefinedIds.push(name); return 0; }
		const body = defs.objectBody(name);
		// function-like and callable macros, empty bodies and runaway self-reference count as 0
		if (body === undefined || !body.trim() || depth >= MAX_ALIAS_DEPTH) return 0;
		return evalExpr(body, defs, depth + 1).number;
	};

	function parsePrimary(): number {
		const t = peek();
		if (!t) { ok = false; return 0; }
		if (t.kind === 'num') { take(); return t.value; }
		if (t.kind === 'ident') {
			take();
			if (t.value === 'defined') {
				// defined NAME | defined(NAME)
				let name = '';
				const next = peek();
				if (next && next.kind === 'lparen') {
					take(); // (
					const id = take();
					if (id && id.kind === 'ident') name = id.value; else ok = false;
					const close = peek();
					if (close && close.kind === 'rparen') take(); else ok = false;
				} else {
					const id = take();
					if (id && id.kind === 'ident') name = id.value; else ok = false;
				}
				return defs.isDefined(name) ? 1 : 0;
			}
			return valOfIdent(t.value);
		}
		if (t.kind === 'lparen') {
			take();
			const v = parseCond();
			const close = peek();
			if (close && close.kind === 'rparen') take(); else ok = false;
			return v;
		}
		ok = false;
		take();
		return 0;
	}

	function parseUnary(): number {
		const op = peekOp();
		if (op === '!' || op === '+' || op === '-' || op === '~') {
			take();
			const v = parseUnary();
			if (op === '!') return truthy(v) ? 0 : 1;
			if (op === '~') return ~v;
			if (op === '+') return +v;
			return -v;
		}
		return parsePrimary();
	}

	// Left-associative binary level over `ops`, delegating to `next` for operands
	function binary(next: () => number, ops: readonly string[], apply: (op: string, l: number, r: number) => number): () => number {
		return () => {
			let v = next();
			for (let op = peekOp(); op !== undefined && ops.includes(op); op = peekOp()) {
				take();
				const r = next();
				v = apply(op, v, r);
			}
			return v;
		};
	}

	const parseMul = binary(parseUnary, ['*', '/', '%'], (op, l, r) => {
		if (r === 0) { if (!skipping) ok = false; return 0; }
		return op === '*' ? l * r : op === '/' ? Math.trunc(l / r) : l % r;
	});
	const parseAdd = binary(parseMul, ['+', '-'], (op, l, r) => op === '+' ? l + r : l - r);
	const parseShift = binary(parseAdd, ['<<', '>>'], (op, l, r) => op === '<<' ? l << r : l >> r);
	const parseRel = binary(parseShift, ['<', '>', '<=', '>='], (op, l, r) => {
		if (op === '<') return l < r ? 1 : 0;
		if (op === '>') return l > r ? 1 : 0;
		if (op === '<=') return l <= r ? 1 : 0;
		return l >= r ? 1 : 0;
	});
	const parseEq = binary(parseRel, ['==', '!='], (op, l, r) => (op === '==') === (l === r) ? 1 : 0);
	const parseBitAnd = binary(parseEq, ['&'], (_op, l, r) => l & r);
	const parseBitXor = binary(parseBitAnd, ['^'], (_op, l, r) => l ^ r);
	const parseBitOr = binary(parseBitXor, ['|'], (_op, l, r) => l | r);
	function parseAnd(): number {
		let v = parseBitOr();
		while (peekOp() === '&&') {
			take();
			v = truthy(v) ? (truthy(parseBitOr()) ? 1 : 0) : unevaluated(parseBitOr);
		}
		return v;
	}
	function parseOr(): number {
		let v = parseAnd();
		while (peekOp() === '||') {
			take();
			if (truthy(v)) { unevaluated(parseAnd); v = 1; } else v = truthy(parseAnd()) ? 1 : 0;
		}
		return v;
	}
	// cond ? a : b, right-associative; only the chosen branch is evaluated
	function parseCond(): number {
		const c = parseOr();
		if (peekOp() !== '?') return c;
		take();
		const a = truthy(c) ? parseCond() : unevaluated(parseCond);
		if (peekOp() === ':') take(); else ok = false;
		const b = truthy(c) ? unevaluated(parseCond) : parseCond();
		return truthy(c) ? a : b;
	}

	const result = parseCond();
	if (p < toks.length) ok = false;
	return { value: truthy(result), number: result, ok, undefinedIds };
}
