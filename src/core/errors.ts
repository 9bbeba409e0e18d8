import { type SourceLocation, formatLocation } from './location';

export const MACRO_DIAGCODES = {
	// engine diagnostics
	MALFORMED_DIRECTIVE: 'PP001',
	DUPLICATE_MACRO: 'PP002',
	UNDEF_PREDEFINED: 'PP003',
	REDEFINE_PREDEFINED: 'PP004',
	MISSING_INCLUDE: 'PP010',
	INCLUDE_CYCLE: 'PP011',
	UNMATCHED_CONDITIONAL: 'PP020',
	UNTERMINATED_CONDITIONAL: 'PP021',
	MALFORMED_EXPRESSION: 'PP022',
	USER_ERROR: 'PP030',
	USER_WARNING: 'PP031',
	UNTERMINATED_CALL: 'PP040',
	// function macro invocation failures
	INVALID_BINDING: 'PP100',
	EXTERNAL_CALL_FAILURE: 'PP101',
	ENCODING_ERROR: 'PP102',
	TYPE_MISMATCH: 'PP103',
	ALLOCATION_FAILURE: 'PP104',
} as const;
export type MacroDiagCode = typeof MACRO_DIAGCODES[keyof typeof MACRO_DIAGCODES];

export type MacroErrorKind =
	| 'InvalidBinding'
	| 'ExternalCallFailure'
	| 'EncodingError'
	| 'TypeMismatch'
	| 'AllocationFailure';

const KIND_CODES: Record<MacroErrorKind, MacroDiagCode> = {
	InvalidBinding: MACRO_DIAGCODES.INVALID_BINDING,
	ExternalCallFailure: MACRO_DIAGCODES.EXTERNAL_CALL_FAILURE,
	EncodingError: MACRO_DIAGCODES.ENCODING_ERROR,
	TypeMismatch: MACRO_DIAGCODES.TYPE_MISMATCH,
	AllocationFailure: MACRO_DIAGCODES.ALLOCATION_FAILURE,
};

export interface MacroErrorOptions {
	macroName?: string;
	location?: SourceLocation;
	/** Message produced by the callable's own error, passed through untouched. */
	diagnostic?: string;
	cause?: unknown;
}

export class MacroError extends Error {
	readonly kind: MacroErrorKind;
	readonly detail: string;
	readonly macroName?: string;
	readonly location?: SourceLocation;
	readonly diagnostic?: string;

	constructor(kind: MacroErrorKind, detail: string, opts: MacroErrorOptions = {}) {
		super(renderMessage(kind, detail, opts), opts.cause !== undefined ? { cause: opts.cause } : undefined);
		this.name = 'MacroError';
		this.kind = kind;
		this.detail = detail;
		this.macroName = opts.macroName;
		this.location = opts.location;
		this.diagnostic = opts.diagnostic;
	}

	get code(): MacroDiagCode { return KIND_CODES[this.kind]; }

	/** Same failure, attributed to a macro invocation site. */
	at(macroName: string, location: SourceLocation): MacroError {
		return new MacroError(this.kind, this.detail, { macroName, location, diagnostic: this.diagnostic, cause: this.cause });
	}
}

function renderMessage(kind: MacroErrorKind, detail: string, opts: MacroErrorOptions): string {
	const where = opts.location ? `${formatLocation(opts.location)}: ` : '';
	const what = opts.macroName ? `${kind} in macro '${opts.macroName}'` : kind;
	return `${where}${what}: ${detail}`;
}

export function isMacroError(e: unknown): e is MacroError {
	return e instanceof MacroError;
}

export function describeThrown(e: unknown): string {
	if (e instanceof Error) return e.message;
	return String(e);
}
