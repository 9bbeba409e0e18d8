const KEYWORDS = [
	'auto', 'break', 'case', 'char', 'const', 'continue', 'default', 'do',
	'double', 'else', 'enum', 'extern', 'float', 'for', 'goto', 'if',
	'inline', 'int', 'long', 'register', 'restrict', 'return', 'short', 'signed',
	'sizeof', 'static', 'struct', 'switch', 'typedef', 'union', 'unsigned', 'void',
	'volatile', 'while', '_Bool', '_Complex', '_Imaginary',
] as const;
export type Keyword = typeof KEYWORDS[number];
const KEYWORD_SET: ReadonlySet<string> = new Set<string>(KEYWORDS);
export function isKeyword(value: string): value is Keyword {
	return KEYWORD_SET.has(value);
}
