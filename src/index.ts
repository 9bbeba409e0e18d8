export { Preprocessor, DEFAULT_FILENAME, SCRATCH_FILE } from './core/preprocessor';
export type { MacroDefines, MacroErrorPolicy, PreprocessorOptions, PreprocessDiagnostic, PreprocessResult, PreprocessSeverity } from './core/preprocessor';
export { FunctionMacro, classifyResult, isMacroCallable } from './core/functionMacro';
export type { MacroCallable, MacroContext, MacroResult } from './core/functionMacro';
export { BoxedToken, decode, encode, isBoxedToken, retokenize } from './core/bridge';
export { MacroError, MACRO_DIAGCODES, isMacroError } from './core/errors';
export type { MacroDiagCode, MacroErrorKind } from './core/errors';
export { SourceMap, formatLocation } from './core/location';
export type { SourceLocation } from './core/location';
export { Tokenizer, tokenize } from './core/tokenizer';
export { TokenStream, mkToken } from './core/tokens';
export type { Span, Token, TokenKind } from './core/tokens';
export type { IncludeFs } from './core/include';
export { loadPreprocessorConfig, parsePreprocessorConfig, toPreprocessorOptions } from './config';
export type { PreprocessorConfig } from './config';
export { DIAGNOSTIC_SOURCE, diagnosticsByUri, macroErrorToDiagnostic, toLspDiagnostic } from './diagnostics';
export { DEBUG_ENV, PrefixedLogger, consoleLogger } from './log';
export type { Logger } from './log';
