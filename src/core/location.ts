import path from 'node:path';
import { TextDocument } from 'vscode-languageserver-textdocument';
import { URI } from 'vscode-uri';
import type { Token } from './tokens';

/** Position of a token in a registered source file; line and column are 1-based. */
export interface SourceLocation {
	readonly file: string;
	readonly uri: string;
	readonly offset: number;
	readonly line: number;
	readonly column: number;
}

export function fileToUri(file: string): string {
	return path.isAbsolute(file) ? URI.file(file).toString() : file;
}

export function formatLocation(loc: SourceLocation): string {
	return `${loc.file}:${loc.line}:${loc.column}`;
}

/**
 * Keeps the text of every file seen during a preprocessing run so offsets can be
 * turned into line/column positions. Files never registered (synthetic tokens)
 * are reported on line 1 with the offset as column.
 */
export class SourceMap {
	private readonly docs = new Map<string, TextDocument>();

	register(file: string, text: string): void {
		const prev = this.docs.get(file);
		const version = prev ? prev.version + 1 : 1;
		this.docs.set(file, TextDocument.create(fileToUri(file), 'c', version, text));
	}

	has(file: string): boolean { return this.docs.has(file); }

	document(file: string): TextDocument | undefined { return this.docs.get(file); }

	locate(file: string, offset: number): SourceLocation {
		const doc = this.docs.get(file);
		if (!doc) return { file, uri: fileToUri(file), offset, line: 1, column: offset + 1 };
		const pos = doc.positionAt(offset);
		return { file, uri: doc.uri, offset, line: pos.line + 1, column: pos.character + 1 };
	}

	locateToken(t: Token): SourceLocation {
		return this.locate(t.file, t.span.start);
	}
}
