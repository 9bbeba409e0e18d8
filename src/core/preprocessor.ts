import { type DefineDirective, IDENT, evalExpr, parseDefine, parseDirective } from './directives';
import { type MacroDiagCode, MACRO_DIAGCODES, isMacroError } from './errors';
import { type CallableMacroDef, type ExpansionHost, type MacroDef, MacroExpander, distributeSpan, lexFragment } from './expand';
import { FunctionMacro } from './functionMacro';
import { type IncludeFs, type IncludeResolver, buildIncludeResolver } from './include';
import { type SourceLocation, SourceMap, formatLocation } from './location';
import { tokenize } from './tokenizer';
import { type Token, TokenStream, isCodeToken, mkToken } from './tokens';
import { type Logger, PrefixedLogger, consoleLogger, debugFromEnv } from '../log';

export type MacroDefines = Record<string, string | number | boolean>;

/** 'throw' rethrows a failed function macro out of run(); 'report' records it and leaves the call unexpanded. */
export type MacroErrorPolicy = 'throw' | 'report';

export interface PreprocessorOptions {
	filename?: string;
	includePaths?: readonly string[];
	systemIncludePaths?: readonly string[];
	defines?: MacroDefines;
	// Defined before the run and protected from #define / #undef
	predefined?: MacroDefines;
	fs?: IncludeFs;
	logger?: Logger;
	debug?: boolean;
	onMacroError?: MacroErrorPolicy;
}

export type PreprocessSeverity = 'error' | 'warning';

export interface PreprocessDiagnostic {
	message: string;
	code: MacroDiagCode;
	severity: PreprocessSeverity;
	file: string;
	start: number;
	end: number;
}

export interface PreprocessResult {
	tokens: Token[];
	diagnostics: PreprocessDiagnostic[];
	// Resolved include files in first-seen order
	includes: string[];
	macros: Record<string, string>;
}

export const DEFAULT_FILENAME = '<input>';
// File name of text tokenized outside any macro invocation
export const SCRATCH_FILE = '<scratch>';

type Frame = { enabled: boolean; sawElse: boolean; taken: boolean; head: Token };
type ExpansionSite = { file: string; start: number; end: number };

function defineValue(v: string | number | boolean): string {
	if (typeof v === 'boolean') return v ? '1' : '0';
	return String(v);
}

function describeDef(def: MacroDef): string {
	switch (def.kind) {
		case 'object': return def.body;
		case 'function': return `(${[...def.params, ...(def.variadic ? ['...'] : [])].join(', ')}) ${def.body}`.trim();
		case 'callable': return '<callable>';
	}
}

function toMacroDef(d: DefineDirective, predefined: boolean): MacroDef {
	if (d.kind === 'define_obj') return { kind: 'object', name: d.name, body: d.body, predefined };
	return { kind: 'function', name: d.name, params: d.params, variadic: d.variadic, body: d.body, predefined };
}

// Command-line style definition: NAME, NAME=VALUE, NAME body or NAME(params) body
function parseDefineArg(macro: string): DefineDirective | null {
	const text = macro.trim();
	const eq = /^([A-Za-z_$][A-Za-z0-9_$]*(?:\([^)]*\))?)=([\s\S]*)$/.exec(text);
	if (eq) return parseDefine(`${eq[1] ?? ''} ${eq[2] ?? ''}`);
	if (IDENT.test(text)) return { kind: 'define_obj', name: text, body: '1' };
	return parseDefine(text);
}

/**
 * C-like preprocessor over a single source text. Macros come from directives,
 * from `define()` and from `defineFunction()`, which binds a macro name to a
 * callable invoked for every expansion.
 */
export class Preprocessor {
	readonly filename: string;
	readonly sourceMap = new SourceMap();
	private readonly source: string;
	private readonly includePaths: string[] = [];
	private readonly systemIncludePaths: string[] = [];
	private readonly table = new Map<string, MacroDef>();
	private readonly log: PrefixedLogger;
	private readonly onMacroError: MacroErrorPolicy;
	private readonly resolveInclude: IncludeResolver;
	private readonly sites: ExpansionSite[] = [];
	private diagnostics: PreprocessDiagnostic[] = [];
	private result?: PreprocessResult;

	private readonly host: ExpansionHost = {
		lookup: name => this.table.get(name),
		builtin: at => this.builtin(at),
		invokeCallable: (def, nameToken, args, callTokens) => this.invokeCallable(def, nameToken, args, callTokens),
		unterminatedCall: nameToken => this.report(MACRO_DIAGCODES.UNTERMINATED_CALL, `Unterminated argument list invoking macro '${nameToken.value}'`, nameToken),
	};

	constructor(source: string, options: PreprocessorOptions = {}) {
		this.source = source;
		this.filename = options.filename ?? DEFAULT_FILENAME;
		this.log = new PrefixedLogger(options.logger ?? consoleLogger, options.debug ?? debugFromEnv());
		this.onMacroError = options.onMacroError ?? 'throw';
		for (const p of options.includePaths ?? []) this.addIncludePath(p, false);
		for (const p of options.systemIncludePaths ?? []) this.addIncludePath(p, true);
		for (const [name, value] of Object.entries(options.predefined ?? {})) this.define(`${name}=${defineValue(value)}`, true);
		for (const [name, value] of Object.entries(options.defines ?? {})) this.define(`${name}=${defineValue(value)}`);
		// the resolver reads the path arrays on every lookup, so later addIncludePath calls apply
		this.resolveInclude = buildIncludeResolver({
			includePaths: this.includePaths,
			systemIncludePaths: this.systemIncludePaths,
			fs: options.fs,
			log: message => this.log.debug(message),
		});
	}

	addIncludePath(path: string, system = true): boolean {
		if (!path) return false;
		const list = system ? this.systemIncludePaths : this.includePaths;
		if (list.includes(path)) return false;
		list.push(path);
		return true;
	}

	define(macro: string, predefined = false): boolean {
		const d = parseDefineArg(macro);
		if (!d) return false;
		return this.bind(toMacroDef(d, predefined));
	}

	/** Bind `name` to a callable. Throws a MacroError (InvalidBinding) when the name or callable is unusable. */
	defineFunction(name: string, callable: unknown, predefined = false): boolean {
		if (this.table.get(name)?.predefined) return false;
		const macro = new FunctionMacro(this, name, callable);
		return this.bind({ kind: 'callable', name, macro, predefined });
	}

	undef(name: string): boolean {
		const existing = this.table.get(name);
		if (!existing || existing.predefined) return false;
		this.release(existing);
		this.table.delete(name);
		return true;
	}

	isDefined(name: string): boolean { return this.table.has(name); }

	definition(name: string): MacroDef | undefined { return this.table.get(name); }

	macros(): Record<string, string> {
		const out: Record<string, string> = {};
		for (const [name, def] of this.table) out[name] = describeDef(def);
		return out;
	}

	/** Lex `text` as code positioned at the macro invocation being expanded, if any. */
	tokenize(text: string): Token[] {
		const site = this.sites[this.sites.length - 1];
		if (!site) return lexFragment(text, SCRATCH_FILE);
		return distributeSpan(lexFragment(text, site.file), site.start, site.end, site.file);
	}

	locate(token: Token): SourceLocation { return this.sourceMap.locateToken(token); }

	/** Preprocess the source. The result is computed once; later calls return it again. */
	run(): PreprocessResult {
		if (this.result) return this.result;
		this.diagnostics = [];
		const includes: string[] = [];
		const out: Token[] = [];
		const expander = new MacroExpander(this.host);
		this.sourceMap.register(this.filename, this.source);
		this.processFile(this.filename, this.source, [this.filename], out, includes, expander);
		this.log.debug(`${this.filename}: ${out.length} tokens, ${this.diagnostics.length} diagnostics, ${includes.length} includes`);
		this.result = { tokens: out, diagnostics: this.diagnostics, includes, macros: this.macros() };
		return this.result;
	}

	preprocess(): TokenStream { return new TokenStream(this.run().tokens); }

	private processFile(file: string, text: string, stack: readonly string[], out: Token[], includes: string[], expander: MacroExpander) {
		const frames: Frame[] = [];
		const isActive = () => frames.every(f => f.enabled);
		const lookup = { isDefined: (n: string) => this.isDefined(n), objectBody: (n: string) => { const d = this.table.get(n); return d?.kind === 'object' ? d.body : undefined; } };
		const condition = (expr: string, at: Token): boolean => {
			const r = evalExpr(expr, lookup);
			if (!r.ok) this.report(MACRO_DIAGCODES.MALFORMED_EXPRESSION, `Malformed preprocessor expression '${expr}'`, at);
			return r.value;
		};
		let pending: Token[] = [];
		const flush = () => {
			if (!pending.length) return;
			out.push(...expander.expand(pending));
			pending = [];
		};

		for (const t of tokenize(text, file)) {
			if (t.kind !== 'directive') {
				if (isCodeToken(t) && isActive()) pending.push(t);
				continue;
			}
			const d = parseDirective(t.value);
			if (!d) {
				if (isActive()) this.report(MACRO_DIAGCODES.MALFORMED_DIRECTIVE, `Malformed directive '${t.value.split('\n')[0] ?? ''}'`, t);
				continue;
			}
			switch (d.kind) {
				case 'if': {
					const enabled = isActive() && condition(d.expr, t);
					frames.push({ enabled, sawElse: false, taken: enabled, head: t });
					continue;
				}
				case 'ifdef':
				case 'ifndef': {
					const active = isActive();
					if (active && !IDENT.test(d.name)) this.report(MACRO_DIAGCODES.MALFORMED_DIRECTIVE, `#${d.kind} expects a macro name`, t);
					const enabled = active && this.isDefined(d.name) === (d.kind === 'ifdef');
					frames.push({ enabled, sawElse: false, taken: enabled, head: t });
					continue;
				}
				case 'elif': {
					const top = frames[frames.length - 1];
					if (!top) { this.report(MACRO_DIAGCODES.UNMATCHED_CONDITIONAL, '#elif without #if', t); continue; }
					if (top.sawElse) { this.report(MACRO_DIAGCODES.UNMATCHED_CONDITIONAL, '#elif after #else', t); top.enabled = false; continue; }
					const ancestors = frames.slice(0, -1).every(f => f.enabled);
					let enabled = false;
					if (!top.taken && ancestors) { enabled = condition(d.expr, t); if (enabled) top.taken = true; }
					top.enabled = enabled;
					continue;
				}
				case 'else': {
					const top = frames[frames.length - 1];
					if (!top) { this.report(MACRO_DIAGCODES.UNMATCHED_CONDITIONAL, '#else without #if', t); continue; }
					if (top.sawElse) this.report(MACRO_DIAGCODES.UNMATCHED_CONDITIONAL, '#else after #else', t);
					top.sawElse = true;
					top.enabled = frames.slice(0, -1).every(f => f.enabled) && !top.taken;
					top.taken = true;
					continue;
				}
				case 'endif':
					if (!frames.pop()) this.report(MACRO_DIAGCODES.UNMATCHED_CONDITIONAL, '#endif without #if', t);
					continue;
			}
			// everything else only acts in active regions
			if (!isActive()) continue;
			switch (d.kind) {
				case 'define_obj':
				case 'define_fn':
					flush();
					this.defineFromDirective(toMacroDef(d, false), t);
					break;
				case 'undef': {
					flush();
					const existing = this.table.get(d.name);
					if (existing?.predefined) this.report(MACRO_DIAGCODES.UNDEF_PREDEFINED, `Cannot undefine predefined macro '${d.name}'`, t);
					else this.undef(d.name);
					break;
				}
				case 'include': {
					flush();
					const shown = d.system ? `<${d.target}>` : `"${d.target}"`;
					const inc = this.resolveInclude(d.target, d.system, file);
					if (!inc) { this.report(MACRO_DIAGCODES.MISSING_INCLUDE, `Include ${shown} not found`, t); break; }
					if (stack.includes(inc.id)) { this.report(MACRO_DIAGCODES.INCLUDE_CYCLE, `Include cycle: ${[...stack, inc.id].join(' -> ')}`, t, 'warning'); break; }
					if (!includes.includes(inc.id)) includes.push(inc.id);
					this.sourceMap.register(inc.id, inc.text);
					this.processFile(inc.id, inc.text, [...stack, inc.id], out, includes, expander);
					break;
				}
				case 'error':
					this.report(MACRO_DIAGCODES.USER_ERROR, `#error ${d.message}`.trim(), t);
					break;
				case 'warning':
					this.report(MACRO_DIAGCODES.USER_WARNING, `#warning ${d.message}`.trim(), t, 'warning');
					break;
				case 'null':
					break;
				case 'other':
					this.log.debug(`${formatLocation(this.locate(t))}: ignoring #${d.name}`);
					break;
			}
		}
		flush();
		for (const f of frames) this.report(MACRO_DIAGCODES.UNTERMINATED_CONDITIONAL, 'Unterminated conditional block', f.head);
	}

	private defineFromDirective(def: MacroDef, at: Token) {
		const existing = this.table.get(def.name);
		if (existing?.predefined) {
			this.report(MACRO_DIAGCODES.REDEFINE_PREDEFINED, `Cannot redefine predefined macro '${def.name}'`, at);
			return;
		}
		if (existing && describeDef(existing) !== describeDef(def)) {
			this.report(MACRO_DIAGCODES.DUPLICATE_MACRO, `Macro '${def.name}' redefined`, at, 'warning');
		}
		this.bind(def);
	}

	private bind(def: MacroDef): boolean {
		const existing = this.table.get(def.name);
		if (existing?.predefined) return false;
		if (existing) this.release(existing);
		this.table.set(def.name, def);
		return true;
	}

	private release(def: MacroDef) {
		if (def.kind === 'callable') def.macro.dispose();
	}

	private builtin(at: Token): Token | undefined {
		if (at.kind !== 'id') return undefined;
		if (at.value === '__FILE__') return mkToken('string', JSON.stringify(at.file), at.span.start, at.span.end, at.file);
		if (at.value === '__LINE__') return mkToken('number', String(this.locate(at).line), at.span.start, at.span.end, at.file);
		return undefined;
	}

	private invokeCallable(def: CallableMacroDef, nameToken: Token, args: Token[], callTokens: Token[]): Token[] {
		const location = this.locate(nameToken);
		const last = callTokens[callTokens.length - 1];
		this.log.debug(`${formatLocation(location)}: invoking '${def.name}' with ${args.length} argument token(s)`);
		this.sites.push({ file: nameToken.file, start: nameToken.span.start, end: last ? last.span.end : nameToken.span.end });
		try {
			return def.macro.invoke(location, args);
		} catch (e) {
			if (!isMacroError(e) || this.onMacroError === 'throw') throw e;
			this.log.warn(e.message);
			this.report(e.code, `${e.kind} in macro '${def.name}': ${e.detail}`, nameToken);
			return callTokens;
		} finally {
			this.sites.pop();
		}
	}

	private report(code: MacroDiagCode, message: string, at: Token, severity: PreprocessSeverity = 'error') {
		this.diagnostics.push({ message, code, severity, file: at.file, start: at.span.start, end: at.span.end });
	}
}
