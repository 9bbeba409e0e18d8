import type { FunctionMacro } from './functionMacro';
import { tokenize } from './tokenizer';
import { type Token, isCodeToken, mkToken } from './tokens';

export type ObjectMacroDef = { kind: 'object'; name: string; body: string; predefined: boolean };
export type FunctionMacroDef = { kind: 'function'; name: string; params: string[]; variadic: boolean; body: string; predefined: boolean };
export type CallableMacroDef = { kind: 'callable'; name: string; macro: FunctionMacro; predefined: boolean };
export type MacroDef = ObjectMacroDef | FunctionMacroDef | CallableMacroDef;

/** Invocation of a function-like macro: argument token lists split on top-level commas. */
export type MacroCall = {
	args: Token[][];
	// tokens from the first argument's start to before the closing paren, commas included
	argTokensFrom(index: number): Token[];
	nextIndex: number;
	close: Token;
};

export interface ExpansionHost {
	lookup(name: string): MacroDef | undefined;
	/** Value of a built-in such as __LINE__, or undefined when `at` is not one. */
	builtin(at: Token): Token | undefined;
	/** Expand a callable macro; returns the replacement tokens. */
	invokeCallable(def: CallableMacroDef, nameToken: Token, args: Token[], callTokens: Token[]): Token[];
	/** A name token followed by '(' without a matching ')'. */
	unterminatedCall(nameToken: Token): void;
}

const MAX_PASSES = 50; // safety

// Empty-argument stand-in used while pasting
const PLACEMARKER_VALUE = '';
const isPlacemarker = (t: Token) => t.kind === 'punct' && t.value === PLACEMARKER_VALUE;

export function lexFragment(text: string, file: string): Token[] {
	return tokenize(text, file, { directives: false }).filter(isCodeToken);
}

/** Spread `toks` over [start, end) in `file`, keeping their order. */
export function distributeSpan(toks: readonly Token[], start: number, end: number, file: string): Token[] {
	if (toks.length <= 1) return toks.map(t => mkToken(t.kind, t.value, start, end, file));
	const width = Math.max(1, end - start);
	return toks.map((t, i) => {
		const a = start + Math.floor((i * width) / toks.length);
		const b = (i === toks.length - 1) ? end : start + Math.floor(((i + 1) * width) / toks.length);
		return mkToken(t.kind, t.value, a, Math.max(a, b), file);
	});
}

export function parseMacroCall(tokens: readonly Token[], startIndex: number): MacroCall | null | 'unterminated' {
	const open = tokens[startIndex];
	if (!open || open.kind !== 'punct' || open.value !== '(') return null;
	const args: Token[][] = [[]];
	const argStarts: number[] = [startIndex + 1];
	let depth = 1;
	for (let i = startIndex + 1; i < tokens.length; i++) {
		const tk = tokens[i];
		if (!tk) break;
		const current = args[args.length - 1] ?? [];
		if (tk.kind === 'punct') {
			if (tk.value === '(') depth++;
			else if (tk.value === ')') {
				depth--;
				if (depth === 0) {
					const closeIndex = i;
					return {
						args,
						argTokensFrom: (index: number) => {
							const from = argStarts[index];
							return from === undefined ? [] : tokens.slice(from, closeIndex);
						},
						nextIndex: i + 1,
						close: tk,
					};
				}
			} else if (tk.value === ',' && depth === 1) {
				args.push([]);
				argStarts.push(i + 1);
				continue;
			}
		}
		current.push(tk);
	}
	return 'unterminated';
}

function stringify(toks: readonly Token[], at: Token): Token {
	let text = '';
	let prev: Token | undefined;
	for (const t of toks) {
		if (prev && (prev.file !== t.file || prev.span.end < t.span.start)) text += ' ';
		text += (t.kind === 'string' || t.kind === 'char') ? t.value.replace(/\\/g, '\\\\').replace(/"/g, '\\"') : t.value;
		prev = t;
	}
	return mkToken('string', `"${text}"`, at.span.start, at.span.end, at.file);
}

function matchParen(toks: readonly Token[], openIndex: number): number {
	const open = toks[openIndex];
	if (!open || open.kind !== 'punct' || open.value !== '(') return -1;
	let depth = 0;
	for (let i = openIndex; i < toks.length; i++) {
		const t = toks[i];
		if (!t || t.kind !== 'punct') continue;
		if (t.value === '(') depth++;
		else if (t.value === ')' && --depth === 0) return i;
	}
	return -1;
}

/**
 * Rescanning macro expander. Each pass replaces macro invocations left to right;
 * passes repeat until nothing changes. Hide-sets stop a macro from re-expanding
 * inside its own replacement.
 */
export class MacroExpander {
	private readonly hides = new WeakMap<Token, ReadonlySet<string>>();

	constructor(private readonly host: ExpansionHost) {}

	expand(tokens: readonly Token[]): Token[] {
		let work = tokens.slice();
		for (let pass = 0; pass < MAX_PASSES; pass++) {
			let changed = false;
			const out: Token[] = [];
			for (let i = 0; i < work.length; i++) {
				const t = work[i];
				if (!t) continue;
				if (t.kind !== 'id' && t.kind !== 'keyword') { out.push(t); continue; }
				const name = t.value;
				const hs = this.hides.get(t);
				if (hs && hs.has(name)) { out.push(t); continue; }
				const builtin = this.host.builtin(t);
				if (builtin) { out.push(builtin); continue; }
				const def = this.host.lookup(name);
				if (!def) { out.push(t); continue; }
				if (def.kind === 'object') {
					const body = distributeSpan(lexFragment(def.body, t.file), t.span.start, t.span.end, t.file);
					this.pushHidden(out, body, hs, name);
					changed = true;
					continue;
				}
				const call = parseMacroCall(work, i + 1);
				if (call === 'unterminated') { this.host.unterminatedCall(t); out.push(t); continue; }
				if (!call) { out.push(t); continue; }
				const replacement = def.kind === 'function'
					? this.expandFunction(def, t, call)
					: this.host.invokeCallable(def, t, call.args.flat(), work.slice(i, call.nextIndex));
				this.pushHidden(out, replacement, hs, name);
				i = call.nextIndex - 1;
				changed = true;
			}
			work = out;
			if (!changed) break;
		}
		return work;
	}

	private pushHidden(out: Token[], toks: readonly Token[], inherited: ReadonlySet<string> | undefined, name: string) {
		for (const nt of toks) {
			const set = new Set<string>(inherited);
			const own = this.hides.get(nt);
			if (own) for (const h of own) set.add(h);
			set.add(name);
			this.hides.set(nt, set);
			out.push(nt);
		}
	}

	private expandFunction(def: FunctionMacroDef, nameToken: Token, call: MacroCall): Token[] {
		const named = new Map<string, Token[]>();
		def.params.forEach((p, idx) => named.set(p, call.args[idx] ?? []));
		const vaTokens = def.variadic ? call.argTokensFrom(def.params.length) : [];
		if (def.variadic) named.set('__VA_ARGS__', vaTokens);
		const expandedArgs = new Map<string, Token[]>();
		const expandedArg = (p: string): Token[] => {
			let v = expandedArgs.get(p);
			if (!v) { v = this.expand(named.get(p) ?? []); expandedArgs.set(p, v); }
			return v;
		};
		const isPaste = (t: Token | undefined) => !!t && t.kind === 'op' && t.value === '##';

		const body = lexFragment(def.body, nameToken.file);
		const out: Token[] = [];
		for (let k = 0; k < body.length; k++) {
			const bt = body[k];
			if (!bt) continue;
			// stringification #param
			if (bt.kind === 'op' && bt.value === '#') {
				const nx = body[k + 1];
				if (nx && named.has(nx.value)) { out.push(stringify(named.get(nx.value) ?? [], nameToken)); k++; continue; }
			}
			// __VA_OPT__(content) keeps content only when variadic arguments were given
			if (def.variadic && bt.kind === 'id' && bt.value === '__VA_OPT__') {
				const close = matchParen(body, k + 1);
				if (close > 0) {
					const inner = vaTokens.length ? body.slice(k + 2, close) : [];
					body.splice(k, close - k + 1, ...inner);
					k--;
					continue;
				}
			}
			if ((bt.kind === 'id' || bt.kind === 'keyword') && named.has(bt.value)) {
				// operands of ## are substituted unexpanded
				const pasted = isPaste(body[k - 1]) || isPaste(body[k + 1]);
				const toks = pasted ? (named.get(bt.value) ?? []) : expandedArg(bt.value);
				if (!toks.length && pasted) out.push(mkToken('punct', PLACEMARKER_VALUE, bt.span.start, bt.span.start, bt.file));
				else out.push(...toks);
				continue;
			}
			out.push(bt);
		}

		// token pasting: A ## B -> AB
		const joined: Token[] = [];
		for (let k = 0; k < out.length; k++) {
			const t = out[k];
			if (!t) continue;
			const left = joined[joined.length - 1];
			const right = out[k + 1];
			if (isPaste(t) && left && right) {
				joined.pop();
				joined.push(...this.paste(left, right));
				k++;
				continue;
			}
			joined.push(t);
		}
		const result = joined.filter(t => !isPlacemarker(t));
		return distributeSpan(result, nameToken.span.start, call.close.span.end, nameToken.file);
	}

	private paste(left: Token, right: Token): Token[] {
		if (isPlacemarker(left)) return [right];
		if (isPlacemarker(right)) return [left];
		const merged = lexFragment(left.value + right.value, left.file);
		const only = merged[0];
		// not a single valid token: keep both operands
		if (merged.length !== 1 || !only) return [left, right];
		return [mkToken(only.kind, only.value, left.span.start, right.span.end, left.file)];
	}
}
