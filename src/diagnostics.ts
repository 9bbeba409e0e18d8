import { type Diagnostic, DiagnosticSeverity, type Range } from 'vscode-languageserver/node';
import type { MacroError } from './core/errors';
import { type SourceMap, fileToUri } from './core/location';
import type { PreprocessDiagnostic } from './core/preprocessor';

export const DIAGNOSTIC_SOURCE = 'macrobridge';

function rangeOf(sourceMap: SourceMap, file: string, start: number, end: number): Range {
	const doc = sourceMap.document(file);
	if (!doc) return { start: { line: 0, character: start }, end: { line: 0, character: end } };
	return { start: doc.positionAt(start), end: doc.positionAt(end) };
}

export function toLspDiagnostic(diag: PreprocessDiagnostic, sourceMap: SourceMap): Diagnostic {
	return {
		range: rangeOf(sourceMap, diag.file, diag.start, diag.end),
		severity: diag.severity === 'error' ? DiagnosticSeverity.Error : DiagnosticSeverity.Warning,
		message: diag.message,
		source: DIAGNOSTIC_SOURCE,
		code: diag.code,
	};
}

// Zero-width at the invocation; a MacroError knows where a call starts, not where it ends.
export function macroErrorToDiagnostic(err: MacroError): Diagnostic {
	const line = err.location ? err.location.line - 1 : 0;
	const character = err.location ? err.location.column - 1 : 0;
	const where = err.macroName ? ` in macro '${err.macroName}'` : '';
	return {
		range: { start: { line, character }, end: { line, character } },
		severity: DiagnosticSeverity.Error,
		message: `${err.kind}${where}: ${err.detail}`,
		source: DIAGNOSTIC_SOURCE,
		code: err.code,
	};
}

/** Diagnostics keyed by document URI, ready for `connection.sendDiagnostics`. */
export function diagnosticsByUri(diags: readonly PreprocessDiagnostic[], sourceMap: SourceMap): Map<string, Diagnostic[]> {
	const out = new Map<string, Diagnostic[]>();
	for (const d of diags) {
		const uri = sourceMap.document(d.file)?.uri ?? fileToUri(d.file);
		const list = out.get(uri) ?? [];
		list.push(toLspDiagnostic(d, sourceMap));
		out.set(uri, list);
	}
	return out;
}
